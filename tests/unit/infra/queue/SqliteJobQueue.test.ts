import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { DatabaseAdapter } from '../../../../src/infra/DatabaseAdapter.js';
import { SqliteJobQueue } from '../../../../src/infra/queue/SqliteJobQueue.js';
import { QueueUnavailableError } from '../../../../src/domain/errors.js';
import type { QueueWorker } from '../../../../src/domain/entities/QueueJob.js';

// Mock the logger to avoid console output during tests
vi.mock('../../../../src/infra/logger.js', () => ({
  logger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
}));

function worker(id: string, lastSeenAt: Date): QueueWorker {
  return {
    id,
    hostname: 'test-host',
    pid: 4242,
    concurrency: 2,
    activeJobs: 0,
    startedAt: new Date('2024-05-01T09:00:00.000Z'),
    lastSeenAt,
  };
}

describe('SqliteJobQueue', () => {
  let db: DatabaseAdapter;
  let queue: SqliteJobQueue;

  beforeEach(() => {
    db = new DatabaseAdapter({ SQLITE_DB_PATH: ':memory:' });
    queue = new SqliteJobQueue(db);
  });

  afterEach(() => {
    db.close();
  });

  it('should submit a queued job visible to poll', async () => {
    const handle = await queue.submit({ name: 'process-image', payload: { uploadId: 'u1' } });
    const snapshot = await queue.poll(handle.id);

    expect(handle.name).toBe('process-image');
    expect(snapshot?.status).toBe('queued');
    expect(snapshot?.startedAt).toBeNull();
    expect(snapshot?.error).toBeNull();
  });

  it('should return null when polling an unknown job', async () => {
    expect(await queue.poll('missing')).toBeNull();
  });

  it('should claim jobs oldest first and never twice', async () => {
    const first = await queue.submit({ name: 'process-image', payload: { uploadId: 'u1' } });
    const second = await queue.submit({ name: 'process-image', payload: { uploadId: 'u2' } });

    const claimedA = queue.claimNext('worker-a');
    const claimedB = queue.claimNext('worker-b');

    expect(claimedA?.id).toBe(first.id);
    expect(claimedA?.status).toBe('running');
    expect(claimedA?.workerId).toBe('worker-a');
    expect(claimedA?.payload).toEqual({ uploadId: 'u1' });
    expect(claimedB?.id).toBe(second.id);
    expect(queue.claimNext('worker-c')).toBeNull();
  });

  it('should record success with its result', async () => {
    const handle = await queue.submit({ name: 'process-image', payload: {} });
    queue.claimNext('worker-a');

    expect(queue.complete(handle.id, { status: 'completed' })).toBe(true);

    const snapshot = await queue.poll(handle.id);
    expect(snapshot?.status).toBe('succeeded');
    expect(snapshot?.result).toEqual({ status: 'completed' });
    expect(snapshot?.completedAt).toBeInstanceOf(Date);
  });

  it('should not complete a job that already failed', async () => {
    const handle = await queue.submit({ name: 'process-image', payload: {} });
    queue.claimNext('worker-a');
    queue.fail(handle.id, 'Timed out after 1 second');

    expect(queue.complete(handle.id, null)).toBe(false);
    expect((await queue.poll(handle.id))?.error).toBe('Timed out after 1 second');
  });

  it('should fail jobs stuck past their deadlines with per-status reasons', async () => {
    const stale = await queue.submit({ name: 'process-image', payload: {} });
    queue.claimNext('worker-a');
    const waiting = await queue.submit({ name: 'process-image', payload: {} });

    const future = new Date(Date.now() + 60_000);
    const failed = queue.failTimedOut({
      runningBefore: future,
      queuedBefore: future,
      runningReason: 'Timed out after 300 seconds',
      queuedReason: 'Not picked up by a worker within 3600 seconds',
    });

    expect(failed.map((job) => job.id).sort()).toEqual([stale.id, waiting.id].sort());
    expect((await queue.poll(stale.id))?.error).toBe('Timed out after 300 seconds');
    expect((await queue.poll(waiting.id))?.error).toBe(
      'Not picked up by a worker within 3600 seconds'
    );
  });

  it('should leave recent jobs alone when sweeping timeouts', async () => {
    await queue.submit({ name: 'process-image', payload: {} });
    queue.claimNext('worker-a');

    const past = new Date(Date.now() - 60_000);
    const failed = queue.failTimedOut({
      runningBefore: past,
      queuedBefore: past,
      runningReason: 'late',
      queuedReason: 'late',
    });

    expect(failed).toEqual([]);
    expect(queue.countByStatus()).toEqual({ queued: 0, running: 1, succeeded: 0, failed: 0 });
  });

  it('should purge finished jobs older than the cutoff', async () => {
    const handle = await queue.submit({ name: 'process-image', payload: {} });
    await queue.submit({ name: 'process-image', payload: {} });
    queue.fail(handle.id, 'boom');

    expect(queue.purgeFinishedBefore(new Date(Date.now() + 1_000))).toBe(1);
    expect(queue.countByStatus()).toEqual({ queued: 1, running: 0, succeeded: 0, failed: 0 });
  });

  it('should track worker heartbeats', () => {
    const now = new Date();
    queue.heartbeat(worker('fresh', now));
    queue.heartbeat(worker('stale', new Date(now.getTime() - 120_000)));

    const live = queue.listWorkers(new Date(now.getTime() - 30_000));
    expect(live.map((entry) => entry.id)).toEqual(['fresh']);

    queue.removeWorker('fresh');
    expect(queue.listWorkers(new Date(0)).map((entry) => entry.id)).toEqual(['stale']);
  });

  it('should report unavailability when the database is closed', async () => {
    db.close();

    await expect(queue.submit({ name: 'process-image', payload: {} })).rejects.toBeInstanceOf(
      QueueUnavailableError
    );
  });
});
