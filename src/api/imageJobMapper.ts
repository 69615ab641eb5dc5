import type { ImageJob, ImageJobStatus } from '../domain/entities/ImageJob.js';
import type { MergedJobStatus } from '../services/StatusService.js';

const STATUS_MESSAGES: Record<ImageJobStatus, string> = {
  queued: 'Image is waiting for a worker',
  processing: 'Image is being processed',
  completed: 'Image processed successfully',
  failed: 'Image processing failed',
};

export function mapImageJobToResponse(job: ImageJob) {
  return {
    id: job.id,
    status: job.status,
    originalFilename: job.originalFilename,
    contentType: job.contentType,
    sizeBytes: job.sizeBytes,
    dimensions: job.dimensions,
    format: job.format,
    colorMode: job.colorMode,
    queueJobId: job.queueJobId,
    createdAt: job.createdAt,
    processingStartedAt: job.processingStartedAt,
    processingCompletedAt: job.processingCompletedAt,
    failedAt: job.failedAt,
    error: job.error,
    result: job.result,
  };
}

export function mapStatusToResponse(merged: MergedJobStatus) {
  const { job, status } = merged;
  const completed = status === 'completed';

  return {
    ...mapImageJobToResponse(job),
    status,
    queueStatus: merged.queueStatus,
    message: STATUS_MESSAGES[status],
    error: merged.error,
    result: completed ? job.result : null,
    downloadUrl: completed ? `/download/${job.id}` : null,
    thumbnailUrl: completed && job.result?.thumbnailDimensions ? `/download/${job.id}/thumbnail` : null,
  };
}
