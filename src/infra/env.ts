import { z, ZodError } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .default('true')
  .transform((value) => value === 'true' || value === '1');

/**
 * Environment variable schema with strict validation
 * Every tunable is fixed at start-up; nothing is negotiated per request
 */
const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().default(8000),

  // Key-value store and job queue (one SQLite file, shared by server and workers)
  SQLITE_DB_PATH: z.string().min(1).default('./data/images.db'),
  STORE_TTL_SECONDS: z.coerce
    .number()
    .int()
    .min(1, { message: 'STORE_TTL_SECONDS must be at least 1' })
    .default(3600),

  // Image processing
  MAX_DIMENSION: z.coerce.number().int().min(1).default(800),
  THUMBNAIL_SIZE: z.coerce.number().int().min(1).default(200),
  THUMBNAILS_ENABLED: booleanFlag,
  JPEG_QUALITY: z.coerce.number().int().min(1).max(100).default(85),
  MAX_UPLOAD_MB: z.coerce.number().positive().default(20),

  // Worker pool
  WORKER_MODE: z.enum(['embedded', 'external']).default('embedded'),
  WORKER_CONCURRENCY: z.coerce
    .number()
    .int()
    .min(1, { message: 'WORKER_CONCURRENCY must be at least 1' })
    .default(2),
  WORKER_POLL_INTERVAL_MS: z.coerce.number().int().min(10).default(500),
  WORKER_HEARTBEAT_STALE_SECONDS: z.coerce.number().int().min(1).default(30),

  // Job timeout handling
  JOB_TIMEOUT_SECONDS: z.coerce
    .number()
    .int()
    .min(1, { message: 'JOB_TIMEOUT_SECONDS must be at least 1' })
    // setTimeout overflows past 2^31 - 1 ms
    .max(2147483, { message: 'JOB_TIMEOUT_SECONDS must be at most 2147483' })
    .default(300),
  MAINTENANCE_INTERVAL_MINUTES: z.coerce
    .number()
    .int()
    .min(1, { message: 'MAINTENANCE_INTERVAL_MINUTES must be at least 1' })
    .max(59)
    .default(1),

  // Logging
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  LOG_FILE: z.string().optional(),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Parses environment variables without side effects
 */
export function parseEnv(source: NodeJS.ProcessEnv): Env {
  return envSchema.parse(source);
}

/**
 * Validates and parses environment variables
 * Exits process with code 1 if validation fails
 */
export function validateEnv(source: NodeJS.ProcessEnv = process.env): Env {
  try {
    return parseEnv(source);
  } catch (error) {
    if (error instanceof ZodError) {
      console.error('❌ Environment validation failed:');
      error.issues.forEach((err) => {
        console.error(`  - ${err.path.join('.')}: ${err.message}`);
      });
      console.error('\nCheck .env.example for supported variables');
      process.exit(1);
    }
    throw error;
  }
}
