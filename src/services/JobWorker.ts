import { randomUUID } from 'node:crypto';
import { hostname } from 'node:os';
import type { QueueJob, QueueWorker } from '../domain/entities/QueueJob.js';
import { timeoutReason } from '../domain/entities/QueueJob.js';
import type { WorkerJobSource } from '../infra/queue/JobQueue.js';
import type { RegisteredJob } from '../infra/queue/defineJob.js';
import { describeError } from '../domain/errors.js';
import { logger } from '../infra/logger.js';

export interface JobWorkerOptions {
  concurrency: number;
  pollIntervalMs: number;
  timeoutSeconds: number;
  workerId?: string;
}

/**
 * JobWorker - a bounded pool that claims queued jobs and runs their handlers.
 * Each job gets a wall-clock budget; when it runs out the handler's signal
 * aborts and the queue job fails regardless of what the handler does next.
 */
export class JobWorker {
  readonly id: string;
  private registry = new Map<string, RegisteredJob>();
  private inFlight = new Map<string, Promise<void>>();
  private timer: NodeJS.Timeout | null = null;
  private readonly startedAt = new Date();

  constructor(
    private source: WorkerJobSource,
    jobs: RegisteredJob[],
    private options: JobWorkerOptions
  ) {
    this.id = options.workerId ?? `${hostname()}:${process.pid}:${randomUUID().slice(0, 8)}`;
    for (const job of jobs) {
      this.registry.set(job.name, job);
    }
  }

  get activeJobs(): number {
    return this.inFlight.size;
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => this.tick(), this.options.pollIntervalMs);
    this.tick();
    logger.info('Job worker started', {
      workerId: this.id,
      concurrency: this.options.concurrency,
      jobs: [...this.registry.keys()],
    });
  }

  /**
   * Stops claiming and waits for in-flight jobs to settle
   */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    await Promise.allSettled(this.inFlight.values());
    try {
      this.source.removeWorker(this.id);
    } catch (error) {
      logger.warn('Worker registration not removed', {
        workerId: this.id,
        error: describeError(error),
      });
    }
    logger.info('Job worker stopped', { workerId: this.id });
  }

  /**
   * Claims jobs into free slots; returns how many were started
   */
  tick(): number {
    this.heartbeat();

    let started = 0;
    while (this.inFlight.size < this.options.concurrency) {
      let job: QueueJob | null;
      try {
        job = this.source.claimNext(this.id);
      } catch (error) {
        logger.error('Job claim failed', { workerId: this.id, error: describeError(error) });
        break;
      }
      if (!job) {
        break;
      }
      this.launch(job);
      started += 1;
    }
    return started;
  }

  /**
   * Runs until nothing is claimable and nothing is in flight
   */
  async drain(): Promise<void> {
    for (;;) {
      this.tick();
      if (this.inFlight.size === 0) {
        return;
      }
      await Promise.race(this.inFlight.values());
    }
  }

  private launch(job: QueueJob): void {
    const run = this.execute(job).finally(() => {
      this.inFlight.delete(job.id);
    });
    this.inFlight.set(job.id, run);
  }

  private async execute(job: QueueJob): Promise<void> {
    const handler = this.registry.get(job.name);
    if (!handler) {
      this.settle(job, { error: `No handler registered for job ${job.name}` });
      return;
    }

    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        const reason = new Error(timeoutReason(this.options.timeoutSeconds));
        controller.abort(reason);
        reject(reason);
      }, this.options.timeoutSeconds * 1000);
    });

    const execution = handler.execute(job.payload, {
      queueJobId: job.id,
      workerId: this.id,
      signal: controller.signal,
    });
    execution.catch((error: unknown) => {
      if (controller.signal.aborted) {
        logger.warn('Timed out job rejected after its deadline', {
          queueJobId: job.id,
          error: describeError(error),
        });
      }
    });

    try {
      const result = await Promise.race([execution, deadline]);
      this.settle(job, { result });
    } catch (error) {
      this.settle(job, { error: describeError(error) });
      if (controller.signal.aborted) {
        // The slot stays taken until the handler itself returns
        await execution.then(
          () => undefined,
          () => undefined
        );
      }
    } finally {
      clearTimeout(timer);
    }
  }

  private settle(job: QueueJob, outcome: { result: unknown } | { error: string }): void {
    try {
      if ('error' in outcome) {
        logger.error('Queue job failed', {
          queueJobId: job.id,
          name: job.name,
          error: outcome.error,
        });
        this.source.fail(job.id, outcome.error);
      } else {
        this.source.complete(job.id, outcome.result);
        logger.info('Queue job succeeded', { queueJobId: job.id, name: job.name });
      }
    } catch (error) {
      logger.error('Queue job outcome not recorded', {
        queueJobId: job.id,
        error: describeError(error),
      });
    }
  }

  private heartbeat(): void {
    const worker: QueueWorker = {
      id: this.id,
      hostname: hostname(),
      pid: process.pid,
      concurrency: this.options.concurrency,
      activeJobs: this.inFlight.size,
      startedAt: this.startedAt,
      lastSeenAt: new Date(),
    };
    try {
      this.source.heartbeat(worker);
    } catch (error) {
      logger.warn('Worker heartbeat failed', { workerId: this.id, error: describeError(error) });
    }
  }
}
