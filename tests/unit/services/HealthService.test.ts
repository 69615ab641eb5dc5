import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { DatabaseAdapter } from '../../../src/infra/DatabaseAdapter.js';
import { SqliteKeyValueStore } from '../../../src/infra/kv/SqliteKeyValueStore.js';
import { SqliteJobQueue } from '../../../src/infra/queue/SqliteJobQueue.js';
import { HealthService } from '../../../src/services/HealthService.js';

// Mock the logger to avoid console output during tests
vi.mock('../../../src/infra/logger.js', () => ({
  logger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
}));

describe('HealthService', () => {
  let db: DatabaseAdapter;
  let queue: SqliteJobQueue;
  let health: HealthService;

  beforeEach(() => {
    db = new DatabaseAdapter({ SQLITE_DB_PATH: ':memory:' });
    queue = new SqliteJobQueue(db);
    health = new HealthService(new SqliteKeyValueStore(db), queue, 30);
  });

  afterEach(() => {
    db.close();
  });

  it('should be degraded while no worker has checked in', () => {
    const report = health.check();

    expect(report.status).toBe('degraded');
    expect(report.services).toEqual({
      api: 'ready',
      store: 'connected',
      workers: 'no_workers',
      activeWorkers: 0,
      workerIds: [],
    });
  });

  it('should be healthy with a live worker', () => {
    const now = new Date();
    queue.heartbeat({
      id: 'worker-a',
      hostname: 'test-host',
      pid: 1,
      concurrency: 2,
      activeJobs: 0,
      startedAt: now,
      lastSeenAt: now,
    });

    const report = health.check();

    expect(report.status).toBe('healthy');
    expect(report.services.activeWorkers).toBe(1);
    expect(report.services.workers).toBe('workers_available');
    expect(report.services.workerIds).toEqual(['worker-a']);
  });

  it('should ignore workers whose heartbeat went stale', () => {
    const old = new Date(Date.now() - 60_000);
    queue.heartbeat({
      id: 'worker-gone',
      hostname: 'test-host',
      pid: 1,
      concurrency: 2,
      activeJobs: 0,
      startedAt: old,
      lastSeenAt: old,
    });

    expect(health.liveWorkers()).toEqual([]);
  });

  it('should report failures instead of throwing when storage is down', () => {
    db.close();

    const report = health.check();

    expect(report.status).toBe('degraded');
    expect(report.services.store).toBe('disconnected');
    expect(report.services.workers).toBe('error');
  });
});
