import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { parseEnv } from '../../../src/infra/env.js';

describe('parseEnv', () => {
  it('should apply defaults', () => {
    const env = parseEnv({});

    expect(env.NODE_ENV).toBe('development');
    expect(env.PORT).toBe(8000);
    expect(env.SQLITE_DB_PATH).toBe('./data/images.db');
    expect(env.STORE_TTL_SECONDS).toBe(3600);
    expect(env.MAX_DIMENSION).toBe(800);
    expect(env.THUMBNAIL_SIZE).toBe(200);
    expect(env.THUMBNAILS_ENABLED).toBe(true);
    expect(env.JPEG_QUALITY).toBe(85);
    expect(env.WORKER_MODE).toBe('embedded');
    expect(env.WORKER_CONCURRENCY).toBe(2);
    expect(env.JOB_TIMEOUT_SECONDS).toBe(300);
    expect(env.LOG_FILE).toBeUndefined();
  });

  it('should coerce numbers and flags from strings', () => {
    const env = parseEnv({
      PORT: '9100',
      MAX_DIMENSION: '1024',
      THUMBNAILS_ENABLED: '0',
      WORKER_MODE: 'external',
    });

    expect(env.PORT).toBe(9100);
    expect(env.MAX_DIMENSION).toBe(1024);
    expect(env.THUMBNAILS_ENABLED).toBe(false);
    expect(env.WORKER_MODE).toBe('external');
  });

  it('should reject a zero TTL', () => {
    expect(() => parseEnv({ STORE_TTL_SECONDS: '0' })).toThrow(ZodError);
  });

  it('should reject a quality above 100', () => {
    expect(() => parseEnv({ JPEG_QUALITY: '101' })).toThrow(ZodError);
  });

  it('should reject a job timeout beyond what a timer can hold', () => {
    expect(() => parseEnv({ JOB_TIMEOUT_SECONDS: '2147484' })).toThrow(
      'JOB_TIMEOUT_SECONDS must be at most 2147483'
    );
  });

  it('should accept the longest job timeout a timer can hold', () => {
    expect(parseEnv({ JOB_TIMEOUT_SECONDS: '2147483' }).JOB_TIMEOUT_SECONDS).toBe(2147483);
  });

  it('should reject an unknown worker mode', () => {
    expect(() => parseEnv({ WORKER_MODE: 'threads' })).toThrow(ZodError);
  });
});
