import type {
  ColorMode,
  ImageDimensions,
  ImageJob,
  ImageJobTransition,
  ProcessingSummary,
} from '../domain/entities/ImageJob.js';
import { attachQueueJob, createImageJob, transitionImageJob } from '../domain/entities/ImageJob.js';
import type { ImageJobRepository } from '../infra/repositories/ImageJobRepository.js';
import { NotFoundError } from '../domain/errors.js';
import { logger } from '../infra/logger.js';

/**
 * ImageJobService - owns the job record lifecycle; every status change goes
 * through transitionImageJob inside an atomic store update
 */
export class ImageJobService {
  constructor(private jobRepo: ImageJobRepository) {}

  createJob(params: {
    id: string;
    originalFilename: string;
    contentType: string;
    sizeBytes: number;
    dimensions: ImageDimensions;
    format: string;
    colorMode: ColorMode;
  }): ImageJob {
    const job = createImageJob(params);
    this.jobRepo.create(job);
    logger.info('Image job created', { uploadId: job.id, status: job.status });
    return job;
  }

  getJob(id: string): ImageJob {
    const job = this.jobRepo.getById(id);
    if (!job) {
      throw new NotFoundError('Image job', id);
    }
    return job;
  }

  findJob(id: string): ImageJob | null {
    return this.jobRepo.getById(id);
  }

  listJobs(): ImageJob[] {
    const jobs: ImageJob[] = [];
    for (const id of this.jobRepo.listIds()) {
      const job = this.jobRepo.getById(id);
      if (job) {
        jobs.push(job);
      }
    }
    return jobs.sort((a, b) => a.createdAt.localeCompare(b.createdAt));
  }

  attachQueueJob(id: string, queueJobId: string): ImageJob {
    const job = this.jobRepo.update(id, (current) => attachQueueJob(current, queueJobId));
    if (!job) {
      throw new NotFoundError('Image job', id);
    }
    logger.debug('Queue job attached', { uploadId: id, queueJobId });
    return job;
  }

  markProcessing(id: string): ImageJob {
    const job = this.transition(id, { status: 'processing' });
    logger.info('Image job processing', { uploadId: id });
    return job;
  }

  markCompleted(id: string, result: ProcessingSummary): ImageJob {
    const job = this.transition(id, { status: 'completed', result });
    logger.info('Image job completed', {
      uploadId: id,
      processedDimensions: result.processedDimensions,
      compressionRatio: result.compressionRatio,
    });
    return job;
  }

  markFailed(id: string, reason: string): ImageJob {
    const job = this.transition(id, { status: 'failed', error: reason });
    logger.info('Image job failed', { uploadId: id, reason });
    return job;
  }

  /**
   * Fails the record unless it already reached a terminal state
   */
  markFailedIfActive(id: string, reason: string): boolean {
    let applied = false;
    const job = this.jobRepo.update(id, (current) => {
      if (current.status !== 'queued' && current.status !== 'processing') {
        return current;
      }
      applied = true;
      return transitionImageJob(current, { status: 'failed', error: reason });
    });
    if (!job) {
      throw new NotFoundError('Image job', id);
    }
    if (applied) {
      logger.info('Image job failed', { uploadId: id, reason });
    }
    return applied;
  }

  private transition(id: string, transition: ImageJobTransition): ImageJob {
    const job = this.jobRepo.update(id, (current) => transitionImageJob(current, transition));
    if (!job) {
      throw new NotFoundError('Image job', id);
    }
    return job;
  }
}
