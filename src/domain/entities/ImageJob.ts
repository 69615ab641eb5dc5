import { InvalidTransitionError } from '../errors.js';

/**
 * ImageJob entity - the job record tracking one upload from ingestion to its terminal state
 */
export const IMAGE_JOB_STATUSES = ['queued', 'processing', 'completed', 'failed'] as const;
export type ImageJobStatus = (typeof IMAGE_JOB_STATUSES)[number];

export const COLOR_MODES = ['L', 'LA', 'RGB', 'RGBA', 'CMYK'] as const;
export type ColorMode = (typeof COLOR_MODES)[number];

export const PROCESSING_EFFECTS = [
  'flatten_alpha',
  'convert_rgb',
  'resize',
  'jpeg_optimize',
  'thumbnail',
] as const;
export type ProcessingEffect = (typeof PROCESSING_EFFECTS)[number];

export interface ImageDimensions {
  width: number;
  height: number;
}

export interface ProcessingSummary {
  originalDimensions: ImageDimensions;
  processedDimensions: ImageDimensions;
  thumbnailDimensions: ImageDimensions | null;
  originalSizeBytes: number;
  processedSizeBytes: number;
  thumbnailSizeBytes: number | null;
  /** Percentage saved relative to the upload; negative when the output grew */
  compressionRatio: number;
  originalColorMode: ColorMode;
  outputColorMode: ColorMode;
  outputFormat: string;
  effectsApplied: ProcessingEffect[];
}

export interface ImageJob {
  id: string;
  originalFilename: string;
  contentType: string;
  sizeBytes: number;
  dimensions: ImageDimensions;
  format: string;
  colorMode: ColorMode;
  status: ImageJobStatus;
  queueJobId: string | null;
  createdAt: string;
  processingStartedAt: string | null;
  processingCompletedAt: string | null;
  failedAt: string | null;
  error: string | null;
  result: ProcessingSummary | null;
}

export type ImageJobTransition =
  | { status: 'processing' }
  | { status: 'completed'; result: ProcessingSummary }
  | { status: 'failed'; error: string };

const transitions: Record<ImageJobStatus, ImageJobStatus[]> = {
  queued: ['processing', 'failed'],
  processing: ['completed', 'failed'],
  completed: [],
  failed: [],
};

export function isTerminalStatus(status: ImageJobStatus): boolean {
  return transitions[status].length === 0;
}

export function canTransition(from: ImageJobStatus, to: ImageJobStatus): boolean {
  return transitions[from].includes(to);
}

/**
 * Factory function to create a freshly ingested job record
 */
export function createImageJob(params: {
  id: string;
  originalFilename: string;
  contentType: string;
  sizeBytes: number;
  dimensions: ImageDimensions;
  format: string;
  colorMode: ColorMode;
  createdAt?: Date;
}): ImageJob {
  return {
    id: params.id,
    originalFilename: params.originalFilename,
    contentType: params.contentType,
    sizeBytes: params.sizeBytes,
    dimensions: { ...params.dimensions },
    format: params.format,
    colorMode: params.colorMode,
    status: 'queued',
    queueJobId: null,
    createdAt: (params.createdAt ?? new Date()).toISOString(),
    processingStartedAt: null,
    processingCompletedAt: null,
    failedAt: null,
    error: null,
    result: null,
  };
}

/**
 * The only way a job record changes status. Rejects anything that is not a forward step
 * and stamps the timestamp owned by the target status.
 */
export function transitionImageJob(
  job: ImageJob,
  transition: ImageJobTransition,
  at: Date = new Date()
): ImageJob {
  if (!canTransition(job.status, transition.status)) {
    throw new InvalidTransitionError(job.status, transition.status);
  }

  const timestamp = at.toISOString();
  switch (transition.status) {
    case 'processing':
      return { ...job, status: 'processing', processingStartedAt: timestamp };
    case 'completed':
      return {
        ...job,
        status: 'completed',
        processingCompletedAt: timestamp,
        result: transition.result,
      };
    case 'failed':
      return { ...job, status: 'failed', failedAt: timestamp, error: transition.error };
  }
}

/**
 * Records the dispatched queue job id; set once, never overwritten
 */
export function attachQueueJob(job: ImageJob, queueJobId: string): ImageJob {
  if (job.queueJobId !== null) {
    return job;
  }
  return { ...job, queueJobId };
}
