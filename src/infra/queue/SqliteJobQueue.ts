import { randomUUID } from 'node:crypto';
import type { DatabaseAdapter } from '../DatabaseAdapter.js';
import type { JobHandle, JobQueue, JobSpec, QueueJobSnapshot, WorkerJobSource } from './JobQueue.js';
import type { QueueJob, QueueJobStatus, QueueWorker } from '../../domain/entities/QueueJob.js';
import { createQueueJob } from '../../domain/entities/QueueJob.js';
import { QueueJobRepository } from '../repositories/QueueJobRepository.js';
import { QueueWorkerRepository } from '../repositories/QueueWorkerRepository.js';
import { QueueUnavailableError, isAppError } from '../../domain/errors.js';
import { logger } from '../logger.js';

/**
 * Job queue persisted in SQLite. Server and worker processes opening the same
 * database file share one queue.
 */
export class SqliteJobQueue implements JobQueue, WorkerJobSource {
  private jobs: QueueJobRepository;
  private workers: QueueWorkerRepository;

  constructor(db: DatabaseAdapter) {
    this.jobs = new QueueJobRepository(db);
    this.workers = new QueueWorkerRepository(db);
  }

  async submit(spec: JobSpec): Promise<JobHandle> {
    const job = createQueueJob({ id: randomUUID(), name: spec.name, payload: spec.payload });
    this.guard('submit', () => this.jobs.create(job));
    logger.info('Queue job submitted', { queueJobId: job.id, name: job.name });
    return { id: job.id, name: job.name };
  }

  async poll(handleId: string): Promise<QueueJobSnapshot | null> {
    const job = this.guard('poll', () => this.jobs.getById(handleId));
    if (!job) {
      return null;
    }
    return {
      id: job.id,
      name: job.name,
      status: job.status,
      error: job.error,
      result: job.result,
      createdAt: job.createdAt,
      startedAt: job.startedAt,
      completedAt: job.completedAt,
    };
  }

  claimNext(workerId: string): QueueJob | null {
    const job = this.guard('claim', () => this.jobs.claimOldestQueued(workerId, new Date()));
    if (job) {
      logger.info('Queue job claimed', { queueJobId: job.id, name: job.name, workerId });
    }
    return job;
  }

  complete(jobId: string, result: unknown): boolean {
    return this.guard('complete', () =>
      this.jobs.finish({
        jobId,
        status: 'succeeded',
        from: ['running'],
        completedAt: new Date(),
        result,
      })
    );
  }

  fail(jobId: string, error: string): boolean {
    return this.guard('fail', () =>
      this.jobs.finish({
        jobId,
        status: 'failed',
        from: ['queued', 'running'],
        completedAt: new Date(),
        error,
      })
    );
  }

  heartbeat(worker: QueueWorker): void {
    this.guard('heartbeat', () => this.workers.upsert(worker));
  }

  removeWorker(workerId: string): void {
    this.guard('removeWorker', () => this.workers.delete(workerId));
  }

  listWorkers(seenSince: Date): QueueWorker[] {
    return this.guard('listWorkers', () => this.workers.listSeenSince(seenSince));
  }

  failTimedOut(params: {
    runningBefore: Date;
    queuedBefore: Date;
    runningReason: string;
    queuedReason: string;
  }): QueueJob[] {
    return this.guard('failTimedOut', () => {
      const candidates = this.jobs.listTimedOutJobs(params.runningBefore, params.queuedBefore);
      const failed: QueueJob[] = [];
      for (const job of candidates) {
        const reason = job.status === 'running' ? params.runningReason : params.queuedReason;
        const applied = this.jobs.finish({
          jobId: job.id,
          status: 'failed',
          from: [job.status],
          completedAt: new Date(),
          error: reason,
        });
        if (applied) {
          failed.push({ ...job, status: 'failed', error: reason });
        }
      }
      return failed;
    });
  }

  purgeFinishedBefore(cutoff: Date): number {
    return this.guard('purge', () => this.jobs.deleteFinishedBefore(cutoff));
  }

  countByStatus(): Record<QueueJobStatus, number> {
    return this.guard('count', () => this.jobs.countByStatus());
  }

  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (isAppError(error) && error.code !== 'DATABASE_ERROR') {
        throw error;
      }
      logger.error('Job queue operation failed', { operation, error });
      throw new QueueUnavailableError('Job queue is unavailable', { operation });
    }
  }
}
