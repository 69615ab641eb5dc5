import { describe, it, expect } from 'vitest';
import {
  attachQueueJob,
  canTransition,
  createImageJob,
  isTerminalStatus,
  transitionImageJob,
} from '../../../src/domain/entities/ImageJob.js';
import type { ProcessingSummary } from '../../../src/domain/entities/ImageJob.js';
import { InvalidTransitionError } from '../../../src/domain/errors.js';

function newJob() {
  return createImageJob({
    id: 'upload-1',
    originalFilename: 'photo.png',
    contentType: 'image/png',
    sizeBytes: 2048,
    dimensions: { width: 1200, height: 600 },
    format: 'png',
    colorMode: 'RGBA',
    createdAt: new Date('2024-05-01T10:00:00.000Z'),
  });
}

const summary: ProcessingSummary = {
  originalDimensions: { width: 1200, height: 600 },
  processedDimensions: { width: 800, height: 400 },
  thumbnailDimensions: { width: 200, height: 100 },
  originalSizeBytes: 2048,
  processedSizeBytes: 1024,
  thumbnailSizeBytes: 256,
  compressionRatio: 50,
  originalColorMode: 'RGBA',
  outputColorMode: 'RGB',
  outputFormat: 'jpeg',
  effectsApplied: ['flatten_alpha', 'convert_rgb', 'resize', 'jpeg_optimize', 'thumbnail'],
};

describe('ImageJob', () => {
  it('should create a queued record with no outcome fields', () => {
    const job = newJob();

    expect(job.status).toBe('queued');
    expect(job.createdAt).toBe('2024-05-01T10:00:00.000Z');
    expect(job.queueJobId).toBeNull();
    expect(job.processingStartedAt).toBeNull();
    expect(job.processingCompletedAt).toBeNull();
    expect(job.failedAt).toBeNull();
    expect(job.error).toBeNull();
    expect(job.result).toBeNull();
  });

  it('should stamp processingStartedAt when processing begins', () => {
    const at = new Date('2024-05-01T10:00:05.000Z');
    const job = transitionImageJob(newJob(), { status: 'processing' }, at);

    expect(job.status).toBe('processing');
    expect(job.processingStartedAt).toBe('2024-05-01T10:00:05.000Z');
  });

  it('should attach the result when completed', () => {
    const processing = transitionImageJob(newJob(), { status: 'processing' });
    const at = new Date('2024-05-01T10:00:09.000Z');
    const completed = transitionImageJob(processing, { status: 'completed', result: summary }, at);

    expect(completed.status).toBe('completed');
    expect(completed.processingCompletedAt).toBe('2024-05-01T10:00:09.000Z');
    expect(completed.result).toEqual(summary);
    expect(completed.error).toBeNull();
  });

  it('should allow failing a queued record directly', () => {
    const at = new Date('2024-05-01T10:01:00.000Z');
    const failed = transitionImageJob(newJob(), { status: 'failed', error: 'queue down' }, at);

    expect(failed.status).toBe('failed');
    expect(failed.failedAt).toBe('2024-05-01T10:01:00.000Z');
    expect(failed.error).toBe('queue down');
  });

  it('should reject completing a queued record', () => {
    expect(() => transitionImageJob(newJob(), { status: 'completed', result: summary })).toThrow(
      InvalidTransitionError
    );
  });

  it('should reject leaving a terminal state', () => {
    const failed = transitionImageJob(newJob(), { status: 'failed', error: 'boom' });

    expect(() => transitionImageJob(failed, { status: 'processing' })).toThrow(
      'Invalid job status transition: failed -> processing'
    );
  });

  it('should not move backwards from processing to queued', () => {
    expect(canTransition('processing', 'queued')).toBe(false);
    expect(canTransition('queued', 'processing')).toBe(true);
  });

  it('should report completed and failed as terminal', () => {
    expect(isTerminalStatus('completed')).toBe(true);
    expect(isTerminalStatus('failed')).toBe(true);
    expect(isTerminalStatus('queued')).toBe(false);
    expect(isTerminalStatus('processing')).toBe(false);
  });

  it('should record the queue job id only once', () => {
    const attached = attachQueueJob(newJob(), 'queue-1');
    const again = attachQueueJob(attached, 'queue-2');

    expect(attached.queueJobId).toBe('queue-1');
    expect(again.queueJobId).toBe('queue-1');
  });

  it('should keep the status when attaching a queue job after processing started', () => {
    const processing = transitionImageJob(newJob(), { status: 'processing' });

    expect(attachQueueJob(processing, 'queue-1').status).toBe('processing');
  });
});
