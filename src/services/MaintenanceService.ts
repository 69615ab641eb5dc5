import type { KeyValueStore } from '../infra/kv/KeyValueStore.js';
import type { WorkerJobSource } from '../infra/queue/JobQueue.js';
import { timeoutReason } from '../domain/entities/QueueJob.js';
import { logger } from '../infra/logger.js';

export interface MaintenanceSettings {
  jobTimeoutSeconds: number;
  ttlSeconds: number;
}

/**
 * MaintenanceService - fails queue jobs stuck past their budget and drops expired data.
 * Jobs that died with their worker are only ever failed here.
 */
export class MaintenanceService {
  constructor(
    private source: WorkerJobSource,
    private store: KeyValueStore,
    private settings: MaintenanceSettings
  ) {}

  failTimedOutJobs(now: Date = new Date()): number {
    const failed = this.source.failTimedOut({
      runningBefore: new Date(now.getTime() - this.settings.jobTimeoutSeconds * 1000),
      queuedBefore: new Date(now.getTime() - this.settings.ttlSeconds * 1000),
      runningReason: timeoutReason(this.settings.jobTimeoutSeconds),
      queuedReason: `Not picked up by a worker within ${this.settings.ttlSeconds} seconds`,
    });

    for (const job of failed) {
      logger.warn('Queue job timed out', {
        queueJobId: job.id,
        name: job.name,
        workerId: job.workerId,
        reason: job.error,
      });
    }
    return failed.length;
  }

  purgeExpired(now: Date = new Date()): { storeEntries: number; queueJobs: number } {
    const storeEntries = this.store.purgeExpired();
    const queueJobs = this.source.purgeFinishedBefore(
      new Date(now.getTime() - this.settings.ttlSeconds * 1000)
    );

    if (storeEntries > 0 || queueJobs > 0) {
      logger.info('Expired data purged', { storeEntries, queueJobs });
    }
    return { storeEntries, queueJobs };
  }
}
