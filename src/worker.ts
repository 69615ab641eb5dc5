import dotenv from 'dotenv';
import { validateEnv } from './infra/env.js';
import { createLogger, setLogger } from './infra/logger.js';
import { createContainer } from './container.js';

// Standalone worker process; pairs with WORKER_MODE=external on the API
dotenv.config();

const env = validateEnv();

const loggerInstance = createLogger({ ...env, defaultMeta: { process: 'worker' } });
setLogger(loggerInstance);

const container = createContainer(env);
const worker = container.createWorker();
worker.start();
container.startScheduler();

loggerInstance.info('Worker process started', {
  workerId: worker.id,
  concurrency: env.WORKER_CONCURRENCY,
  pollIntervalMs: env.WORKER_POLL_INTERVAL_MS,
});

function shutdown(signal: string): void {
  loggerInstance.info(`${signal} received, waiting for in-flight jobs`);
  container
    .close()
    .then(() => process.exit(0))
    .catch((error: unknown) => {
      loggerInstance.error('Worker shutdown failed', { error });
      process.exit(1);
    });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
