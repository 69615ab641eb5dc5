import type { ImageJob, ImageJobStatus } from '../domain/entities/ImageJob.js';
import type { QueueJobStatus } from '../domain/entities/QueueJob.js';
import { isTerminalStatus } from '../domain/entities/ImageJob.js';
import type { JobQueue, QueueJobSnapshot } from '../infra/queue/JobQueue.js';
import type { ImageJobService } from './ImageJobService.js';
import { describeError } from '../domain/errors.js';
import { logger } from '../infra/logger.js';

export interface MergedJobStatus {
  job: ImageJob;
  status: ImageJobStatus;
  queueStatus: QueueJobStatus | 'unknown';
  error: string | null;
}

const QUEUE_FAILURE_FALLBACK = 'Processing job failed';

/**
 * Combines the stored record with the queue's view of its job.
 * The record is authoritative for its own terminal states and for the
 * processing sub-state; the queue only contributes failures the record missed
 * (worker crash, timeout).
 */
export function mergeStatus(job: ImageJob, queueJob: QueueJobSnapshot | null): MergedJobStatus {
  const queueStatus = queueJob ? queueJob.status : 'unknown';

  if (isTerminalStatus(job.status)) {
    return { job, status: job.status, queueStatus, error: job.error };
  }

  if (queueJob?.status === 'failed') {
    return {
      job,
      status: 'failed',
      queueStatus,
      error: job.error ?? queueJob.error ?? QUEUE_FAILURE_FALLBACK,
    };
  }

  return { job, status: job.status, queueStatus, error: null };
}

/**
 * StatusService - point-in-time status reads; never waits for a job to progress
 */
export class StatusService {
  constructor(
    private jobService: Pick<ImageJobService, 'getJob' | 'listJobs'>,
    private queue: JobQueue
  ) {}

  async getStatus(id: string): Promise<MergedJobStatus> {
    const job = this.jobService.getJob(id);
    return mergeStatus(job, await this.pollQueue(job));
  }

  async listStatuses(): Promise<MergedJobStatus[]> {
    const jobs = this.jobService.listJobs();
    return Promise.all(jobs.map(async (job) => mergeStatus(job, await this.pollQueue(job))));
  }

  /**
   * An unreachable queue degrades the read to the record alone
   */
  private async pollQueue(job: ImageJob): Promise<QueueJobSnapshot | null> {
    if (!job.queueJobId) {
      return null;
    }
    try {
      return await this.queue.poll(job.queueJobId);
    } catch (error) {
      logger.warn('Queue status unavailable', {
        uploadId: job.id,
        queueJobId: job.queueJobId,
        error: describeError(error),
      });
      return null;
    }
  }
}
