/**
 * Runtime settings
 *
 * Resolved from environment variables with defaults that match a normal
 * interactive install. Nothing here is cached: call `loadSettings()` again
 * to pick up a changed environment.
 */

import { join } from 'path';
import { expandPath } from './paths.js';
import { LIMITS } from './types.js';

export interface DiskwardSettings {
  /** Directory holding diskward's own files */
  configDir: string;

  /** JSON file with protected paths and categories */
  protectionFile: string;

  /** Worker pool size for category scans */
  maxWorkers: number;

  /** Time-to-live of cached directory sizes */
  cacheTtlMs: number;

  /** Print debug output */
  verbose: boolean;
}

function positiveInteger(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  return Number.isInteger(value) && value > 0 ? value : undefined;
}

/**
 * Build settings from an environment (defaults to `process.env`).
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): DiskwardSettings {
  const configDir = expandPath(env.DISKWARD_HOME || '~/.diskward');
  const ttlSeconds = positiveInteger(env.DISKWARD_CACHE_TTL);

  return {
    configDir,
    protectionFile: join(configDir, 'config.json'),
    maxWorkers: positiveInteger(env.DISKWARD_MAX_WORKERS) ?? LIMITS.DEFAULT_WORKERS,
    cacheTtlMs: ttlSeconds !== undefined ? ttlSeconds * 1000 : LIMITS.CACHE_TTL_MS,
    verbose: Boolean(env.DISKWARD_DEBUG),
  };
}
