import { describe, it, expect, vi } from 'vitest';
import { StatusService, mergeStatus } from '../../../src/services/StatusService.js';
import type { ImageJobService } from '../../../src/services/ImageJobService.js';
import type { JobQueue, QueueJobSnapshot } from '../../../src/infra/queue/JobQueue.js';
import type { QueueJobStatus } from '../../../src/domain/entities/QueueJob.js';
import type { ImageJob } from '../../../src/domain/entities/ImageJob.js';
import { createImageJob, transitionImageJob } from '../../../src/domain/entities/ImageJob.js';
import { NotFoundError, QueueUnavailableError } from '../../../src/domain/errors.js';

// Mock the logger to avoid console output during tests
vi.mock('../../../src/infra/logger.js', () => ({
  logger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
}));

function record(queueJobId: string | null = 'queue-1'): ImageJob {
  const job = createImageJob({
    id: 'upload-1',
    originalFilename: 'a.png',
    contentType: 'image/png',
    sizeBytes: 100,
    dimensions: { width: 10, height: 10 },
    format: 'png',
    colorMode: 'RGB',
  });
  return { ...job, queueJobId };
}

function snapshot(status: QueueJobStatus, error: string | null = null): QueueJobSnapshot {
  return {
    id: 'queue-1',
    name: 'process-image',
    status,
    error,
    result: null,
    createdAt: new Date(),
    startedAt: null,
    completedAt: null,
  };
}

describe('mergeStatus', () => {
  it('should keep a queued record queued while the job waits', () => {
    const merged = mergeStatus(record(), snapshot('queued'));

    expect(merged.status).toBe('queued');
    expect(merged.queueStatus).toBe('queued');
    expect(merged.error).toBeNull();
  });

  it('should report processing from the record while the job runs', () => {
    const processing = transitionImageJob(record(), { status: 'processing' });

    expect(mergeStatus(processing, snapshot('running')).status).toBe('processing');
  });

  it('should trust a terminal record over the queue', () => {
    const failed = transitionImageJob(record(), { status: 'failed', error: 'decode error' });
    const merged = mergeStatus(failed, snapshot('succeeded'));

    expect(merged.status).toBe('failed');
    expect(merged.error).toBe('decode error');
    expect(merged.queueStatus).toBe('succeeded');
  });

  it('should surface a queue failure the record never saw', () => {
    const processing = transitionImageJob(record(), { status: 'processing' });
    const merged = mergeStatus(processing, snapshot('failed', 'Timed out after 300 seconds'));

    expect(merged.status).toBe('failed');
    expect(merged.error).toBe('Timed out after 300 seconds');
  });

  it('should fall back to a generic reason when the queue gives none', () => {
    expect(mergeStatus(record(), snapshot('failed')).error).toBe('Processing job failed');
  });

  it('should report an unknown queue status without a snapshot', () => {
    const merged = mergeStatus(record(null), null);

    expect(merged.status).toBe('queued');
    expect(merged.queueStatus).toBe('unknown');
  });
});

describe('StatusService', () => {
  function createService(job: ImageJob, queue: JobQueue): StatusService {
    const jobService: Pick<ImageJobService, 'getJob' | 'listJobs'> = {
      getJob: (id) => {
        if (id !== job.id) {
          throw new NotFoundError('Image job', id);
        }
        return job;
      },
      listJobs: () => [job],
    };
    return new StatusService(jobService, queue);
  }

  it('should merge the queue snapshot into the read', async () => {
    const queue: JobQueue = {
      submit: vi.fn(),
      poll: vi.fn().mockResolvedValue(snapshot('failed', 'worker lost')),
    };

    const merged = await createService(record(), queue).getStatus('upload-1');

    expect(merged.status).toBe('failed');
    expect(merged.error).toBe('worker lost');
    expect(queue.poll).toHaveBeenCalledWith('queue-1');
  });

  it('should not poll the queue before a job id is recorded', async () => {
    const queue: JobQueue = { submit: vi.fn(), poll: vi.fn() };

    const merged = await createService(record(null), queue).getStatus('upload-1');

    expect(merged.queueStatus).toBe('unknown');
    expect(queue.poll).not.toHaveBeenCalled();
  });

  it('should degrade to the record when the queue is unreachable', async () => {
    const queue: JobQueue = {
      submit: vi.fn(),
      poll: vi.fn().mockRejectedValue(new QueueUnavailableError('Job queue is unavailable')),
    };

    const merged = await createService(record(), queue).getStatus('upload-1');

    expect(merged.status).toBe('queued');
    expect(merged.queueStatus).toBe('unknown');
  });

  it('should reject unknown ids', async () => {
    const queue: JobQueue = { submit: vi.fn(), poll: vi.fn() };

    await expect(createService(record(), queue).getStatus('other')).rejects.toBeInstanceOf(
      NotFoundError
    );
  });

  it('should list every job with its merged status', async () => {
    const queue: JobQueue = {
      submit: vi.fn(),
      poll: vi.fn().mockResolvedValue(snapshot('queued')),
    };

    const statuses = await createService(record(), queue).listStatuses();

    expect(statuses.map((entry) => entry.status)).toEqual(['queued']);
  });
});
