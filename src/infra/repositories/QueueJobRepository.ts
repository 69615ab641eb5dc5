import type { DatabaseAdapter } from '../DatabaseAdapter.js';
import type { QueueJob, QueueJobStatus } from '../../domain/entities/QueueJob.js';
import { logger } from '../logger.js';

type QueueJobRow = {
  id: string;
  name: string;
  payload: string;
  status: QueueJobStatus;
  worker_id: string | null;
  created_at: string;
  started_at: string | null;
  completed_at: string | null;
  result: string | null;
  error: string | null;
};

function parseJson(text: string | null): unknown {
  return text === null ? null : JSON.parse(text);
}

export class QueueJobRepository {
  constructor(private db: DatabaseAdapter) {}

  create(job: QueueJob): void {
    const sql = `
      INSERT INTO queue_jobs (
        id, name, payload, status, worker_id, created_at, started_at, completed_at, result, error
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `;

    this.db.execute(sql, [
      job.id,
      job.name,
      JSON.stringify(job.payload ?? null),
      job.status,
      job.workerId,
      job.createdAt.toISOString(),
      job.startedAt ? job.startedAt.toISOString() : null,
      job.completedAt ? job.completedAt.toISOString() : null,
      job.result === null || job.result === undefined ? null : JSON.stringify(job.result),
      job.error,
    ]);

    logger.debug('Queue job created', { queueJobId: job.id, name: job.name });
  }

  getById(jobId: string): QueueJob | null {
    const row = this.db.queryOne<QueueJobRow>('SELECT * FROM queue_jobs WHERE id = ?', [jobId]);
    return row ? this.mapRowToJob(row) : null;
  }

  /**
   * Oldest queued job becomes running for the given worker. Atomic across processes.
   */
  claimOldestQueued(workerId: string, startedAt: Date): QueueJob | null {
    return this.db.transaction(() => {
      const row = this.db.queryOne<QueueJobRow>(
        `SELECT * FROM queue_jobs
         WHERE status = 'queued'
         ORDER BY created_at ASC, rowid ASC
         LIMIT 1`
      );
      if (!row) {
        return null;
      }

      this.db.execute(
        `UPDATE queue_jobs SET status = 'running', worker_id = ?, started_at = ?
         WHERE id = ? AND status = 'queued'`,
        [workerId, startedAt.toISOString(), row.id]
      );

      return this.mapRowToJob({
        ...row,
        status: 'running',
        worker_id: workerId,
        started_at: startedAt.toISOString(),
      });
    });
  }

  /**
   * Moves a job to a terminal status only from the given active statuses.
   * Returns false when the job was already finished (e.g. failed by the timeout sweep).
   */
  finish(params: {
    jobId: string;
    status: 'succeeded' | 'failed';
    from: QueueJobStatus[];
    completedAt: Date;
    result?: unknown;
    error?: string | null;
  }): boolean {
    const placeholders = params.from.map(() => '?').join(', ');
    const sql = `
      UPDATE queue_jobs
      SET status = ?, completed_at = ?, result = ?, error = ?
      WHERE id = ? AND status IN (${placeholders})
    `;

    const changes = this.db.execute(sql, [
      params.status,
      params.completedAt.toISOString(),
      params.result === undefined || params.result === null ? null : JSON.stringify(params.result),
      params.error ?? null,
      params.jobId,
      ...params.from,
    ]);

    logger.debug('Queue job finished', {
      queueJobId: params.jobId,
      status: params.status,
      applied: changes > 0,
    });
    return changes > 0;
  }

  listTimedOutJobs(runningBefore: Date, queuedBefore: Date): QueueJob[] {
    const sql = `
      SELECT * FROM queue_jobs
      WHERE (status = 'running' AND started_at IS NOT NULL AND started_at < ?)
         OR (status = 'queued' AND created_at < ?)
      ORDER BY created_at ASC
    `;

    const rows = this.db.query<QueueJobRow>(sql, [
      runningBefore.toISOString(),
      queuedBefore.toISOString(),
    ]);
    return rows.map((row) => this.mapRowToJob(row));
  }

  deleteFinishedBefore(cutoff: Date): number {
    return this.db.execute(
      `DELETE FROM queue_jobs
       WHERE status IN ('succeeded', 'failed') AND completed_at IS NOT NULL AND completed_at < ?`,
      [cutoff.toISOString()]
    );
  }

  countByStatus(): Record<QueueJobStatus, number> {
    const counts: Record<QueueJobStatus, number> = {
      queued: 0,
      running: 0,
      succeeded: 0,
      failed: 0,
    };
    const rows = this.db.query<{ status: QueueJobStatus; total: number }>(
      'SELECT status, COUNT(*) AS total FROM queue_jobs GROUP BY status'
    );
    for (const row of rows) {
      counts[row.status] = row.total;
    }
    return counts;
  }

  private mapRowToJob(row: QueueJobRow): QueueJob {
    return {
      id: row.id,
      name: row.name,
      payload: parseJson(row.payload),
      status: row.status,
      workerId: row.worker_id,
      createdAt: new Date(row.created_at),
      startedAt: row.started_at ? new Date(row.started_at) : null,
      completedAt: row.completed_at ? new Date(row.completed_at) : null,
      result: parseJson(row.result),
      error: row.error,
    };
  }
}
