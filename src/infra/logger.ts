import winston from 'winston';
import type { Env } from './env.js';

/**
 * Structured logger
 * Logs to console in every environment, adds a JSON file in production when LOG_FILE is set
 */

type LoggerOptions = Pick<Env, 'NODE_ENV' | 'LOG_LEVEL' | 'LOG_FILE'> & {
  defaultMeta?: Record<string, unknown>;
};

/**
 * Buffers are replaced by their length so image payloads never reach a log line
 */
function summarizeBinary(value: unknown): unknown {
  if (Buffer.isBuffer(value)) {
    return `<${value.length} bytes>`;
  }
  if (Array.isArray(value)) {
    return value.map(summarizeBinary);
  }
  if (value && typeof value === 'object' && !(value instanceof Error)) {
    const summarized: Record<string, unknown> = {};
    for (const [key, inner] of Object.entries(value)) {
      summarized[key] = summarizeBinary(inner);
    }
    return summarized;
  }
  return value;
}

const binaryFormat = winston.format((info) => {
  for (const key of Object.keys(info)) {
    if (key !== 'level' && key !== 'message') {
      info[key] = summarizeBinary(info[key]);
    }
  }
  return info;
})();

/**
 * Creates a Winston logger instance
 */
export function createLogger(options: LoggerOptions): winston.Logger {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        winston.format.printf(({ timestamp, level, message, ...meta }) => {
          const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
          return `${String(timestamp)} [${level}]: ${String(message)}${metaStr}`;
        })
      ),
    }),
  ];

  if (options.NODE_ENV === 'production' && options.LOG_FILE) {
    transports.push(
      new winston.transports.File({
        filename: options.LOG_FILE,
        format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
      })
    );
  }

  return winston.createLogger({
    level: options.LOG_LEVEL,
    defaultMeta: options.defaultMeta,
    format: winston.format.combine(
      binaryFormat,
      winston.format.errors({ stack: true }),
      winston.format.timestamp(),
      winston.format.json()
    ),
    transports,
    exitOnError: false,
  });
}

/**
 * Global logger instance, silent until server.ts or worker.ts installs the real one
 */
export let logger: winston.Logger = winston.createLogger({
  silent: true,
  transports: [new winston.transports.Console()],
});

export function setLogger(instance: winston.Logger): void {
  logger = instance;
}
