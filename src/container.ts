import type { Env } from './infra/env.js';
import type { JobQueue } from './infra/queue/JobQueue.js';
import type { RegisteredJob } from './infra/queue/defineJob.js';
import { DatabaseAdapter } from './infra/DatabaseAdapter.js';
import { SqliteKeyValueStore } from './infra/kv/SqliteKeyValueStore.js';
import { SqliteJobQueue } from './infra/queue/SqliteJobQueue.js';
import { registerJob } from './infra/queue/defineJob.js';
import { ImageCodec } from './infra/ImageCodec.js';
import { ImageJobRepository } from './infra/repositories/ImageJobRepository.js';
import { ImageBlobRepository } from './infra/repositories/ImageBlobRepository.js';
import { ImageJobService } from './services/ImageJobService.js';
import { UploadService } from './services/UploadService.js';
import { ImageProcessingJob } from './services/ImageProcessingJob.js';
import { StatusService } from './services/StatusService.js';
import { ArtifactService } from './services/ArtifactService.js';
import { HealthService } from './services/HealthService.js';
import { MaintenanceService } from './services/MaintenanceService.js';
import { JobWorker } from './services/JobWorker.js';
import { MaintenanceScheduler } from './scheduler/MaintenanceScheduler.js';
import { logger } from './infra/logger.js';

export interface Container {
  env: Env;
  db: DatabaseAdapter;
  store: SqliteKeyValueStore;
  queue: SqliteJobQueue;
  imageJobService: ImageJobService;
  uploadService: UploadService;
  statusService: StatusService;
  artifactService: ArtifactService;
  healthService: HealthService;
  maintenanceService: MaintenanceService;
  jobs: RegisteredJob[];
  createWorker(options?: { workerId?: string }): JobWorker;
  startScheduler(): MaintenanceScheduler;
  startApiBackground(): { scheduler: MaintenanceScheduler; worker: JobWorker | null };
  close(): Promise<void>;
}

/**
 * Process-wide wiring: one database connection, one store, one queue.
 * Built once at start-up by server.ts or worker.ts and torn down with close().
 * `dispatcher` swaps the queue that uploads submit to (the worker side stays on SQLite).
 */
export function createContainer(env: Env, overrides: { dispatcher?: JobQueue } = {}): Container {
  const db = new DatabaseAdapter(env);
  const store = new SqliteKeyValueStore(db);
  const queue = new SqliteJobQueue(db);
  const codec = new ImageCodec();

  const imageJobRepo = new ImageJobRepository(store, env.STORE_TTL_SECONDS);
  const blobRepo = new ImageBlobRepository(store, env.STORE_TTL_SECONDS);
  const imageJobService = new ImageJobService(imageJobRepo);

  const dispatcher = overrides.dispatcher ?? queue;
  const uploadService = new UploadService(codec, imageJobService, blobRepo, dispatcher);
  const statusService = new StatusService(imageJobService, dispatcher);
  const artifactService = new ArtifactService(imageJobService, blobRepo);
  const healthService = new HealthService(store, queue, env.WORKER_HEARTBEAT_STALE_SECONDS);
  const maintenanceService = new MaintenanceService(queue, store, {
    jobTimeoutSeconds: env.JOB_TIMEOUT_SECONDS,
    ttlSeconds: env.STORE_TTL_SECONDS,
  });

  const processingJob = new ImageProcessingJob(imageJobService, blobRepo, codec, {
    maxDimension: env.MAX_DIMENSION,
    thumbnailSize: env.THUMBNAIL_SIZE,
    thumbnailsEnabled: env.THUMBNAILS_ENABLED,
    quality: env.JPEG_QUALITY,
  });
  const jobs = [registerJob(processingJob.definition())];

  const workers: JobWorker[] = [];
  const schedulers: MaintenanceScheduler[] = [];

  function createWorker(options: { workerId?: string } = {}): JobWorker {
    const worker = new JobWorker(queue, jobs, {
      concurrency: env.WORKER_CONCURRENCY,
      pollIntervalMs: env.WORKER_POLL_INTERVAL_MS,
      timeoutSeconds: env.JOB_TIMEOUT_SECONDS,
      workerId: options.workerId,
    });
    workers.push(worker);
    return worker;
  }

  function startScheduler(): MaintenanceScheduler {
    const scheduler = new MaintenanceScheduler(maintenanceService, env.MAINTENANCE_INTERVAL_MINUTES);
    scheduler.start();
    schedulers.push(scheduler);
    return scheduler;
  }

  return {
    env,
    db,
    store,
    queue,
    imageJobService,
    uploadService,
    statusService,
    artifactService,
    healthService,
    maintenanceService,
    jobs,
    createWorker,
    startScheduler,
    /**
     * Background roles of the API process: the maintenance sweep always runs,
     * the worker pool only when WORKER_MODE is embedded.
     */
    startApiBackground() {
      const scheduler = startScheduler();
      if (env.WORKER_MODE !== 'embedded') {
        logger.info('Embedded worker disabled; run the worker process separately');
        return { scheduler, worker: null };
      }
      const worker = createWorker();
      worker.start();
      return { scheduler, worker };
    },
    async close() {
      for (const scheduler of schedulers) {
        scheduler.stop();
      }
      await Promise.all(workers.map((worker) => worker.stop()));
      db.close();
      logger.info('Container closed');
    },
  };
}
