import cron, { type ScheduledTask } from 'node-cron';
import { logger } from '../infra/logger.js';
import type { MaintenanceService } from '../services/MaintenanceService.js';
import { describeError } from '../domain/errors.js';

/**
 * MaintenanceScheduler - periodic timeout sweep and expiry purge using node-cron
 */
export class MaintenanceScheduler {
  private task: ScheduledTask | null = null;

  constructor(
    private maintenance: MaintenanceService,
    private intervalMinutes: number
  ) {}

  isRunning(): boolean {
    return this.task !== null;
  }

  /**
   * Start the periodic sweep, every intervalMinutes minutes (1-59)
   */
  start(): void {
    if (this.task) {
      return;
    }

    const cronExpression =
      this.intervalMinutes <= 1 ? '* * * * *' : `*/${this.intervalMinutes} * * * *`;

    this.task = cron.schedule(cronExpression, () => {
      this.runOnce();
    });

    logger.info('MaintenanceScheduler started', {
      intervalMinutes: this.intervalMinutes,
      cronExpression,
    });
  }

  stop(): void {
    if (this.task) {
      this.task.stop();
      this.task = null;
      logger.info('MaintenanceScheduler stopped');
    }
  }

  /**
   * One sweep; a failing step is logged and does not stop the other
   */
  runOnce(): void {
    try {
      this.maintenance.failTimedOutJobs();
    } catch (error) {
      logger.error('Timeout sweep failed', { error: describeError(error) });
    }

    try {
      this.maintenance.purgeExpired();
    } catch (error) {
      logger.error('Expiry purge failed', { error: describeError(error) });
    }
  }
}
