import sharp from 'sharp';
import { parseEnv } from '../../src/infra/env.js';
import type { Env } from '../../src/infra/env.js';

/**
 * Env for an in-process container on a private in-memory database
 */
export function createTestEnv(overrides: Record<string, string> = {}): Env {
  return parseEnv({
    NODE_ENV: 'test',
    SQLITE_DB_PATH: ':memory:',
    LOG_LEVEL: 'error',
    ...overrides,
  });
}

/**
 * Solid-colour PNG; alpha below 1 yields an RGBA image
 */
export async function createPng(
  width: number,
  height: number,
  options: { alpha?: number } = {}
): Promise<Buffer> {
  const channels = options.alpha === undefined ? 3 : 4;
  return sharp({
    create: {
      width,
      height,
      channels,
      background: { r: 40, g: 120, b: 200, alpha: options.alpha ?? 1 },
    },
  })
    .png()
    .toBuffer();
}

export async function createJpeg(width: number, height: number): Promise<Buffer> {
  return sharp({
    create: { width, height, channels: 3, background: { r: 200, g: 80, b: 40 } },
  })
    .jpeg({ quality: 90 })
    .toBuffer();
}
