import type { DatabaseAdapter } from '../DatabaseAdapter.js';
import type { QueueWorker } from '../../domain/entities/QueueJob.js';

type QueueWorkerRow = {
  id: string;
  hostname: string;
  pid: number;
  concurrency: number;
  active_jobs: number;
  started_at: string;
  last_seen_at: string;
};

export class QueueWorkerRepository {
  constructor(private db: DatabaseAdapter) {}

  upsert(worker: QueueWorker): void {
    const sql = `
      INSERT INTO queue_workers (id, hostname, pid, concurrency, active_jobs, started_at, last_seen_at)
      VALUES (?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(id) DO UPDATE SET
        active_jobs = excluded.active_jobs,
        last_seen_at = excluded.last_seen_at
    `;

    this.db.execute(sql, [
      worker.id,
      worker.hostname,
      worker.pid,
      worker.concurrency,
      worker.activeJobs,
      worker.startedAt.toISOString(),
      worker.lastSeenAt.toISOString(),
    ]);
  }

  delete(workerId: string): void {
    this.db.execute('DELETE FROM queue_workers WHERE id = ?', [workerId]);
  }

  listSeenSince(since: Date): QueueWorker[] {
    const rows = this.db.query<QueueWorkerRow>(
      'SELECT * FROM queue_workers WHERE last_seen_at >= ? ORDER BY started_at ASC',
      [since.toISOString()]
    );
    return rows.map((row) => ({
      id: row.id,
      hostname: row.hostname,
      pid: row.pid,
      concurrency: row.concurrency,
      activeJobs: row.active_jobs,
      startedAt: new Date(row.started_at),
      lastSeenAt: new Date(row.last_seen_at),
    }));
  }
}
