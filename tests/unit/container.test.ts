import { describe, it, expect, vi, afterEach } from 'vitest';
import { createContainer } from '../../src/container.js';
import type { Container } from '../../src/container.js';
import { createTestEnv } from '../helpers/fixtures.js';

// Mock the logger to avoid console output during tests
vi.mock('../../src/infra/logger.js', () => ({
  logger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
}));

describe('createContainer', () => {
  let container: Container | null = null;

  afterEach(async () => {
    await container?.close();
    container = null;
  });

  describe('startApiBackground', () => {
    it('should run the maintenance sweep without a worker in external mode', () => {
      container = createContainer(createTestEnv({ WORKER_MODE: 'external' }));

      const { scheduler, worker } = container.startApiBackground();

      expect(scheduler.isRunning()).toBe(true);
      expect(worker).toBeNull();
      expect(container.queue.listWorkers(new Date(0))).toEqual([]);
    });

    it('should run the maintenance sweep and a worker in embedded mode', () => {
      container = createContainer(
        createTestEnv({ WORKER_MODE: 'embedded', WORKER_POLL_INTERVAL_MS: '60000' })
      );

      const { scheduler, worker } = container.startApiBackground();

      expect(scheduler.isRunning()).toBe(true);
      expect(worker?.isRunning()).toBe(true);
      expect(container.queue.listWorkers(new Date(0)).map((entry) => entry.id)).toEqual([
        worker?.id,
      ]);
    });

    it('should stop the sweep when the container closes', async () => {
      const current = createContainer(createTestEnv({ WORKER_MODE: 'external' }));
      const { scheduler } = current.startApiBackground();

      await current.close();

      expect(scheduler.isRunning()).toBe(false);
    });
  });
});
