import dotenv from 'dotenv';
import { validateEnv } from './infra/env.js';
import { createLogger, setLogger } from './infra/logger.js';
import { createContainer } from './container.js';
import { createApp } from './app.js';

// Load environment variables
dotenv.config();

// Validate environment (fail-fast)
const env = validateEnv();

// Initialize logger
const loggerInstance = createLogger({ ...env, defaultMeta: { process: 'api' } });
setLogger(loggerInstance);

const container = createContainer(env);
const app = createApp(container);

// Start server
const server = app.listen(env.PORT, () => {
  loggerInstance.info('Server started', {
    port: env.PORT,
    nodeEnv: env.NODE_ENV,
    workerMode: env.WORKER_MODE,
  });

  container.startApiBackground();
});

// Graceful shutdown
function shutdown(signal: string): void {
  loggerInstance.info(`${signal} received, shutting down gracefully`);
  server.close(() => {
    loggerInstance.info('Server closed');
    container
      .close()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        loggerInstance.error('Shutdown failed', { error });
        process.exit(1);
      });
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

export { app };
