import { z } from 'zod';
import type {
  ImageDimensions,
  ImageJob,
  ProcessingEffect,
  ProcessingSummary,
} from '../domain/entities/ImageJob.js';
import type { ImageCodec, RenderedImage } from '../infra/ImageCodec.js';
import type { ImageBlobRepository } from '../infra/repositories/ImageBlobRepository.js';
import type { JobDefinition } from '../infra/queue/defineJob.js';
import type { ImageJobService } from './ImageJobService.js';
import { defineJob } from '../infra/queue/defineJob.js';
import { NotFoundError, ProcessingError, describeError } from '../domain/errors.js';
import { logger } from '../infra/logger.js';

export const PROCESS_IMAGE_JOB = 'process-image';

export const processImageInput = z.object({
  uploadId: z.string().uuid(),
});

export type ProcessImageInput = z.infer<typeof processImageInput>;

export type ProcessingOutcome =
  | { status: 'completed'; uploadId: string; summary: ProcessingSummary }
  | { status: 'failed'; uploadId: string; error: string };

export interface ProcessingSettings {
  maxDimension: number;
  thumbnailSize: number;
  thumbnailsEnabled: boolean;
  quality: number;
}

function sameDimensions(a: ImageDimensions, b: ImageDimensions): boolean {
  return a.width === b.width && a.height === b.height;
}

export function compressionRatio(originalBytes: number, processedBytes: number): number {
  const ratio = ((originalBytes - processedBytes) / originalBytes) * 100;
  return Math.round(ratio * 10) / 10;
}

/**
 * ImageProcessingJob - the unit of work run by the worker pool for each upload.
 * Failures become a `failed` job record and a failed outcome, not a rejected promise.
 */
export class ImageProcessingJob {
  constructor(
    private jobService: ImageJobService,
    private blobRepo: ImageBlobRepository,
    private codec: ImageCodec,
    private settings: ProcessingSettings
  ) {}

  definition(): JobDefinition<ProcessImageInput, ProcessingOutcome> {
    return defineJob({
      name: PROCESS_IMAGE_JOB,
      input: processImageInput,
      run: (payload, context) => this.run(payload.uploadId, context.signal),
    });
  }

  async run(uploadId: string, signal: AbortSignal): Promise<ProcessingOutcome> {
    const job = this.jobService.findJob(uploadId);
    if (!job) {
      const error = `Image job ${uploadId} not found`;
      logger.warn('Image job missing before processing', { uploadId });
      return { status: 'failed', uploadId, error };
    }

    if (job.status !== 'queued') {
      logger.warn('Image job already picked up', { uploadId, status: job.status });
      return this.outcomeOf(job);
    }

    let artifactsWritten = false;
    try {
      const original = this.blobRepo.getPayload(uploadId);
      if (!original) {
        throw new NotFoundError('Original image data', uploadId);
      }

      this.jobService.markProcessing(uploadId);
      logger.info('Image processing started', {
        uploadId,
        dimensions: job.dimensions,
        colorMode: job.colorMode,
        format: job.format,
      });

      signal.throwIfAborted();
      const processed = await this.codec.render(original, {
        maxDimension: this.settings.maxDimension,
        quality: this.settings.quality,
      });

      signal.throwIfAborted();
      const thumbnail = this.settings.thumbnailsEnabled
        ? await this.codec.render(original, {
            maxDimension: this.settings.thumbnailSize,
            quality: this.settings.quality,
          })
        : null;

      signal.throwIfAborted();
      artifactsWritten = true;
      this.blobRepo.saveArtifact(uploadId, 'processed', processed.data);
      if (thumbnail) {
        this.blobRepo.saveArtifact(uploadId, 'thumbnail', thumbnail.data);
      }

      const summary = this.summarize(job, original.length, processed, thumbnail);
      signal.throwIfAborted();
      this.jobService.markCompleted(uploadId, summary);
      this.discardPayload(uploadId);

      return { status: 'completed', uploadId, summary };
    } catch (error) {
      const reason = describeError(error);
      logger.error('Image processing failed', { uploadId, error: reason });
      if (artifactsWritten) {
        this.discardArtifacts(uploadId);
      }
      this.recordFailure(uploadId, reason);
      return { status: 'failed', uploadId, error: reason };
    }
  }

  private summarize(
    job: ImageJob,
    originalBytes: number,
    processed: RenderedImage,
    thumbnail: RenderedImage | null
  ): ProcessingSummary {
    const effects: ProcessingEffect[] = [];
    if (job.colorMode === 'RGBA' || job.colorMode === 'LA') {
      effects.push('flatten_alpha');
    }
    if (job.colorMode !== processed.colorMode) {
      effects.push('convert_rgb');
    }
    if (!sameDimensions(job.dimensions, processed.dimensions)) {
      effects.push('resize');
    }
    effects.push('jpeg_optimize');
    if (thumbnail) {
      effects.push('thumbnail');
    }

    return {
      originalDimensions: job.dimensions,
      processedDimensions: processed.dimensions,
      thumbnailDimensions: thumbnail ? thumbnail.dimensions : null,
      originalSizeBytes: originalBytes,
      processedSizeBytes: processed.data.length,
      thumbnailSizeBytes: thumbnail ? thumbnail.data.length : null,
      compressionRatio: compressionRatio(originalBytes, processed.data.length),
      originalColorMode: job.colorMode,
      outputColorMode: processed.colorMode,
      outputFormat: processed.format,
      effectsApplied: effects,
    };
  }

  private outcomeOf(job: ImageJob): ProcessingOutcome {
    if (job.status === 'completed' && job.result) {
      return { status: 'completed', uploadId: job.id, summary: job.result };
    }
    return {
      status: 'failed',
      uploadId: job.id,
      error: job.error ?? `Image job is already ${job.status}`,
    };
  }

  /**
   * If even the failure cannot be written, the queue job has to fail instead
   * so status reads still reach a terminal state.
   */
  private recordFailure(uploadId: string, reason: string): void {
    try {
      this.jobService.markFailedIfActive(uploadId, reason);
    } catch (error) {
      logger.error('Image job failure not recorded', { uploadId, error: describeError(error) });
      throw new ProcessingError(reason, { recordError: describeError(error) });
    }
  }

  private discardPayload(uploadId: string): void {
    try {
      this.blobRepo.deletePayload(uploadId);
    } catch (error) {
      logger.warn('Original payload not removed', { uploadId, error: describeError(error) });
    }
  }

  private discardArtifacts(uploadId: string): void {
    try {
      this.blobRepo.deleteArtifacts(uploadId);
    } catch (error) {
      logger.warn('Partial artifacts not removed', { uploadId, error: describeError(error) });
    }
  }
}
