import { randomUUID } from 'node:crypto';
import type { ImageJob } from '../domain/entities/ImageJob.js';
import type { ImageCodec } from '../infra/ImageCodec.js';
import type { JobHandle, JobQueue } from '../infra/queue/JobQueue.js';
import type { ImageBlobRepository } from '../infra/repositories/ImageBlobRepository.js';
import type { ImageJobService } from './ImageJobService.js';
import { InvalidInputError, QueueUnavailableError, describeError } from '../domain/errors.js';
import { PROCESS_IMAGE_JOB } from './ImageProcessingJob.js';
import { logger } from '../infra/logger.js';

export const ENQUEUE_FAILURE_REASON = 'Failed to enqueue processing job';

export interface UploadInput {
  bytes: Buffer;
  contentType: string;
  filename: string;
}

export interface UploadResult {
  job: ImageJob;
  statusUrl: string;
}

/**
 * UploadService - validates an upload, persists it and dispatches its processing job.
 * Nothing is written before the bytes have been decoded successfully.
 */
export class UploadService {
  constructor(
    private codec: ImageCodec,
    private jobService: ImageJobService,
    private blobRepo: ImageBlobRepository,
    private queue: JobQueue
  ) {}

  async ingest(input: UploadInput): Promise<UploadResult> {
    const contentType = input.contentType.trim().toLowerCase();
    if (!contentType.startsWith('image/')) {
      throw new InvalidInputError('File must be an image', { contentType: input.contentType });
    }

    const probe = await this.codec.probe(input.bytes);
    const id = randomUUID();

    this.blobRepo.savePayload(id, input.bytes);
    const job = this.jobService.createJob({
      id,
      originalFilename: input.filename,
      contentType,
      sizeBytes: input.bytes.length,
      dimensions: probe.dimensions,
      format: probe.format,
      colorMode: probe.colorMode,
    });

    let handle: JobHandle;
    try {
      handle = await this.queue.submit({ name: PROCESS_IMAGE_JOB, payload: { uploadId: id } });
    } catch (error) {
      logger.error('Image job could not be queued', { uploadId: id, error: describeError(error) });
      this.abandon(id);
      throw new QueueUnavailableError('Image could not be queued for processing', {
        uploadId: id,
        status: 'failed',
      });
    }

    const queued = this.recordQueueJob(job, handle);
    logger.info('Image queued for processing', { uploadId: id, queueJobId: handle.id });
    return { job: queued, statusUrl: `/status/${id}` };
  }

  /**
   * The job is already dispatched at this point, so a failed write only costs
   * the queue id on the record; status falls back to the record alone.
   * The caller gets the record as created: a worker may already have moved
   * the stored one past `queued`.
   */
  private recordQueueJob(job: ImageJob, handle: JobHandle): ImageJob {
    try {
      this.jobService.attachQueueJob(job.id, handle.id);
      return { ...job, queueJobId: handle.id };
    } catch (error) {
      logger.warn('Queue job id not recorded', {
        uploadId: job.id,
        queueJobId: handle.id,
        error: describeError(error),
      });
      return job;
    }
  }

  /**
   * A record whose job never reached the queue must not stay queued
   */
  private abandon(id: string): void {
    try {
      this.jobService.markFailed(id, ENQUEUE_FAILURE_REASON);
    } catch (error) {
      logger.error('Dangling image job left queued until expiry', {
        uploadId: id,
        error: describeError(error),
      });
    }

    try {
      this.blobRepo.deletePayload(id);
    } catch (error) {
      logger.warn('Original payload not removed', { uploadId: id, error: describeError(error) });
    }
  }
}
