import { z } from 'zod';
import type { KeyValueStore } from '../kv/KeyValueStore.js';
import type { ImageJob } from '../../domain/entities/ImageJob.js';
import { COLOR_MODES, IMAGE_JOB_STATUSES, PROCESSING_EFFECTS } from '../../domain/entities/ImageJob.js';
import { imageKeys } from './imageKeys.js';
import { logger } from '../logger.js';

const dimensionsSchema = z.object({
  width: z.number().int().nonnegative(),
  height: z.number().int().nonnegative(),
});

const summarySchema = z.object({
  originalDimensions: dimensionsSchema,
  processedDimensions: dimensionsSchema,
  thumbnailDimensions: dimensionsSchema.nullable(),
  originalSizeBytes: z.number().int().nonnegative(),
  processedSizeBytes: z.number().int().nonnegative(),
  thumbnailSizeBytes: z.number().int().nonnegative().nullable(),
  compressionRatio: z.number(),
  originalColorMode: z.enum(COLOR_MODES),
  outputColorMode: z.enum(COLOR_MODES),
  outputFormat: z.string(),
  effectsApplied: z.array(z.enum(PROCESSING_EFFECTS)),
});

const imageJobSchema = z.object({
  id: z.string(),
  originalFilename: z.string(),
  contentType: z.string(),
  sizeBytes: z.number().int().nonnegative(),
  dimensions: dimensionsSchema,
  format: z.string(),
  colorMode: z.enum(COLOR_MODES),
  status: z.enum(IMAGE_JOB_STATUSES),
  queueJobId: z.string().nullable(),
  createdAt: z.string(),
  processingStartedAt: z.string().nullable(),
  processingCompletedAt: z.string().nullable(),
  failedAt: z.string().nullable(),
  error: z.string().nullable(),
  result: summarySchema.nullable(),
});

/**
 * Job records stored as JSON under meta:{id}, every write refreshing the TTL
 */
export class ImageJobRepository {
  constructor(
    private store: KeyValueStore,
    private ttlSeconds: number
  ) {}

  create(job: ImageJob): void {
    this.store.set(imageKeys.meta(job.id), JSON.stringify(job), this.ttlSeconds);
    logger.debug('Image job stored', { uploadId: job.id, status: job.status });
  }

  getById(id: string): ImageJob | null {
    const raw = this.store.get(imageKeys.meta(id));
    return raw ? this.decode(id, raw) : null;
  }

  /**
   * Atomic read-modify-write; returns null when the record is gone
   */
  update(id: string, mutate: (job: ImageJob) => ImageJob): ImageJob | null {
    const written = this.store.update(imageKeys.meta(id), this.ttlSeconds, (raw) =>
      JSON.stringify(mutate(this.decode(id, raw)))
    );
    return written ? this.decode(id, written) : null;
  }

  listIds(): string[] {
    return this.store
      .keys(imageKeys.metaPrefix)
      .map((key) => key.slice(imageKeys.metaPrefix.length));
  }

  private decode(id: string, raw: Buffer): ImageJob {
    const parsed = imageJobSchema.safeParse(JSON.parse(raw.toString('utf-8')));
    if (!parsed.success) {
      logger.error('Stored image job is malformed', { uploadId: id, issues: parsed.error.issues });
      throw new Error(`Stored record for ${id} is malformed`);
    }
    return parsed.data;
  }
}
