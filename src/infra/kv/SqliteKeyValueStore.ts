import type { DatabaseAdapter } from '../DatabaseAdapter.js';
import type { KeyValueStore, StoredValue } from './KeyValueStore.js';
import { InvalidInputError, StoreUnavailableError, isAppError } from '../../domain/errors.js';
import { logger } from '../logger.js';

type EntryRow = {
  value: Buffer;
};

function toBuffer(value: StoredValue): Buffer {
  return typeof value === 'string' ? Buffer.from(value, 'utf-8') : value;
}

function escapeLike(prefix: string): string {
  return prefix.replace(/[\\%_]/g, (char) => `\\${char}`);
}

/**
 * Key-value store on the shared SQLite database.
 * Expired rows stay on disk until purgeExpired() but are invisible to every read.
 */
export class SqliteKeyValueStore implements KeyValueStore {
  constructor(
    private db: DatabaseAdapter,
    private now: () => number = Date.now
  ) {}

  get(key: string): Buffer | null {
    return this.guard('get', () => {
      const row = this.db.queryOne<EntryRow>(
        'SELECT value FROM kv_entries WHERE key = ? AND expires_at > ?',
        [key, this.now()]
      );
      return row ? row.value : null;
    });
  }

  set(key: string, value: StoredValue, ttlSeconds: number): void {
    this.assertTtl(ttlSeconds);
    this.guard('set', () => {
      this.db.execute(
        `INSERT INTO kv_entries (key, value, expires_at) VALUES (?, ?, ?)
         ON CONFLICT(key) DO UPDATE SET value = excluded.value, expires_at = excluded.expires_at`,
        [key, toBuffer(value), this.expiresAt(ttlSeconds)]
      );
    });
  }

  update(
    key: string,
    ttlSeconds: number,
    mutate: (current: Buffer) => StoredValue
  ): Buffer | null {
    this.assertTtl(ttlSeconds);
    return this.guard('update', () =>
      this.db.transaction(() => {
        const row = this.db.queryOne<EntryRow>(
          'SELECT value FROM kv_entries WHERE key = ? AND expires_at > ?',
          [key, this.now()]
        );
        if (!row) {
          return null;
        }
        const next = toBuffer(mutate(row.value));
        this.db.execute('UPDATE kv_entries SET value = ?, expires_at = ? WHERE key = ?', [
          next,
          this.expiresAt(ttlSeconds),
          key,
        ]);
        return next;
      })
    );
  }

  delete(key: string): boolean {
    return this.guard('delete', () => {
      return this.db.execute('DELETE FROM kv_entries WHERE key = ?', [key]) > 0;
    });
  }

  keys(prefix: string): string[] {
    return this.guard('keys', () => {
      const rows = this.db.query<{ key: string }>(
        `SELECT key FROM kv_entries WHERE key LIKE ? ESCAPE '\\' AND expires_at > ? ORDER BY key`,
        [`${escapeLike(prefix)}%`, this.now()]
      );
      return rows.map((row) => row.key);
    });
  }

  purgeExpired(): number {
    return this.guard('purgeExpired', () => {
      const removed = this.db.execute('DELETE FROM kv_entries WHERE expires_at <= ?', [this.now()]);
      if (removed > 0) {
        logger.debug('Purged expired store entries', { removed });
      }
      return removed;
    });
  }

  ping(): void {
    this.guard('ping', () => {
      this.db.queryOne('SELECT 1 AS ok');
    });
  }

  private expiresAt(ttlSeconds: number): number {
    return this.now() + ttlSeconds * 1000;
  }

  private assertTtl(ttlSeconds: number): void {
    if (!Number.isFinite(ttlSeconds) || ttlSeconds <= 0) {
      throw new InvalidInputError('Store entries require a positive TTL', { ttlSeconds });
    }
  }

  /**
   * Errors raised by callers' mutate functions pass through untouched;
   * everything else means the store could not serve the request.
   */
  private guard<T>(operation: string, fn: () => T): T {
    try {
      if (!this.db.isOpen()) {
        throw new Error('database connection is closed');
      }
      return fn();
    } catch (error) {
      if (isAppError(error) && error.code !== 'DATABASE_ERROR') {
        throw error;
      }
      logger.error('Key-value store operation failed', { operation, error });
      throw new StoreUnavailableError('Key-value store is unavailable', { operation });
    }
  }
}
