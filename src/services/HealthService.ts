import type { QueueJobStatus, QueueWorker } from '../domain/entities/QueueJob.js';
import type { KeyValueStore } from '../infra/kv/KeyValueStore.js';
import type { WorkerJobSource } from '../infra/queue/JobQueue.js';
import { describeError } from '../domain/errors.js';
import { logger } from '../infra/logger.js';

export type StoreState = 'connected' | 'disconnected';
export type WorkerState = 'workers_available' | 'no_workers' | 'error';

export interface HealthReport {
  status: 'healthy' | 'degraded';
  services: {
    api: 'ready';
    store: StoreState;
    workers: WorkerState;
    activeWorkers: number;
    workerIds: string[];
  };
  timestamp: string;
}

/**
 * HealthService - reports dependency state; never throws
 */
export class HealthService {
  constructor(
    private store: KeyValueStore,
    private workers: WorkerJobSource,
    private heartbeatStaleSeconds: number
  ) {}

  check(): HealthReport {
    const store = this.checkStore();
    let workers: WorkerState = 'error';
    let workerIds: string[] = [];
    try {
      workerIds = this.liveWorkers().map((worker) => worker.id);
      workers = workerIds.length > 0 ? 'workers_available' : 'no_workers';
    } catch (error) {
      logger.warn('Worker lookup failed during health check', { error: describeError(error) });
    }

    return {
      status: store === 'connected' && workers === 'workers_available' ? 'healthy' : 'degraded',
      services: { api: 'ready', store, workers, activeWorkers: workerIds.length, workerIds },
      timestamp: new Date().toISOString(),
    };
  }

  /**
   * Workers whose heartbeat is recent enough to count as alive
   */
  liveWorkers(): QueueWorker[] {
    const since = new Date(Date.now() - this.heartbeatStaleSeconds * 1000);
    return this.workers.listWorkers(since);
  }

  queueCounts(): Record<QueueJobStatus, number> {
    return this.workers.countByStatus();
  }

  private checkStore(): StoreState {
    try {
      this.store.ping();
      return 'connected';
    } catch (error) {
      logger.warn('Store ping failed during health check', { error: describeError(error) });
      return 'disconnected';
    }
  }
}
