import type { QueueJob, QueueJobStatus, QueueWorker } from '../../domain/entities/QueueJob.js';

export interface JobSpec {
  name: string;
  payload: unknown;
}

export interface JobHandle {
  id: string;
  name: string;
}

export interface QueueJobSnapshot {
  id: string;
  name: string;
  status: QueueJobStatus;
  error: string | null;
  result: unknown;
  createdAt: Date;
  startedAt: Date | null;
  completedAt: Date | null;
}

/**
 * Dispatch side of the job queue. Request handlers only ever see this,
 * so the concrete dispatcher can change without touching them.
 */
export interface JobQueue {
  submit(spec: JobSpec): Promise<JobHandle>;
  /** Point-in-time status; null when the queue no longer knows the job */
  poll(handleId: string): Promise<QueueJobSnapshot | null>;
}

/**
 * Worker side of the job queue
 */
export interface WorkerJobSource {
  claimNext(workerId: string): QueueJob | null;
  complete(jobId: string, result: unknown): boolean;
  fail(jobId: string, error: string): boolean;
  heartbeat(worker: QueueWorker): void;
  removeWorker(workerId: string): void;
  listWorkers(seenSince: Date): QueueWorker[];
  failTimedOut(params: {
    runningBefore: Date;
    queuedBefore: Date;
    runningReason: string;
    queuedReason: string;
  }): QueueJob[];
  purgeFinishedBefore(cutoff: Date): number;
  countByStatus(): Record<QueueJobStatus, number>;
}
