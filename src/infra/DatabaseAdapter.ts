import Database from 'better-sqlite3';
import { mkdirSync, readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { DatabaseError, isAppError } from '../domain/errors.js';
import { logger } from './logger.js';
import type { Env } from './env.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const IN_MEMORY = ':memory:';

/**
 * SQLite database adapter shared by the key-value store and the job queue.
 * Opened once per process; services receive it through their constructors.
 */
export class DatabaseAdapter {
  private db: Database.Database;

  constructor(env: Pick<Env, 'SQLITE_DB_PATH'>) {
    try {
      if (env.SQLITE_DB_PATH !== IN_MEMORY) {
        mkdirSync(dirname(env.SQLITE_DB_PATH), { recursive: true });
      }
      this.db = new Database(env.SQLITE_DB_PATH);
      this.db.pragma('journal_mode = WAL');
      this.db.pragma('busy_timeout = 5000');
      this.initializeSchema();
      logger.info('Database initialized', { path: env.SQLITE_DB_PATH });
    } catch (error) {
      throw new DatabaseError('Failed to initialize database', { error });
    }
  }

  private initializeSchema(): void {
    try {
      const schemaPath = join(__dirname, 'db', 'schema.sql');
      const schema = readFileSync(schemaPath, 'utf-8');
      this.db.exec(schema);
      logger.debug('Database schema initialized');
    } catch (error) {
      throw new DatabaseError('Failed to initialize database schema', { error });
    }
  }

  /**
   * Execute a query with parameters
   */
  query<T>(sql: string, params: unknown[] = []): T[] {
    try {
      const stmt = this.db.prepare<unknown[], T>(sql);
      return stmt.all(...params);
    } catch (error) {
      logger.error('Database query failed', { sql, error });
      throw new DatabaseError('Query execution failed', { sql, error });
    }
  }

  /**
   * Execute a single-row query
   */
  queryOne<T>(sql: string, params: unknown[] = []): T | null {
    try {
      const stmt = this.db.prepare<unknown[], T>(sql);
      return stmt.get(...params) ?? null;
    } catch (error) {
      logger.error('Database queryOne failed', { sql, error });
      throw new DatabaseError('QueryOne execution failed', { sql, error });
    }
  }

  /**
   * Execute an INSERT/UPDATE/DELETE statement
   * Returns the number of affected rows
   */
  execute(sql: string, params: unknown[] = []): number {
    try {
      const stmt = this.db.prepare(sql);
      const result = stmt.run(...params);
      return result.changes;
    } catch (error) {
      logger.error('Database execute failed', { sql, error });
      throw new DatabaseError('Execute failed', { sql, error });
    }
  }

  /**
   * Execute multiple statements in one write transaction.
   * BEGIN IMMEDIATE takes the write lock up front, so a read-modify-write inside
   * cannot interleave with another process.
   */
  transaction<T>(fn: () => T): T {
    const txn = this.db.transaction(fn);
    try {
      return txn.immediate();
    } catch (error) {
      if (isAppError(error)) {
        throw error;
      }
      logger.error('Transaction failed, rolling back', { error });
      throw new DatabaseError('Transaction failed', { error });
    }
  }

  isOpen(): boolean {
    return this.db.open;
  }

  /**
   * Close database connection
   */
  close(): void {
    if (!this.db.open) {
      return;
    }
    this.db.close();
    logger.info('Database connection closed');
  }
}
