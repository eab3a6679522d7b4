/**
 * Volume capacity
 *
 * On APFS the figures macOS shows in System Settings are container-level,
 * so `diskutil info` is asked first. Anything else falls back to a plain
 * filesystem statistics call.
 */

import checkDiskSpace from 'check-disk-space';
import { createCommandRunner, type CommandRunner } from './exec.js';
import { logger } from './logger.js';
import { DiskwardError, classifyError, errorMessage } from './errors.js';
import type { DiskUsage } from './types.js';

const DISKUTIL_TIMEOUT_MS = 10_000;
const GB = 1000 ** 3;

/**
 * Extract container totals from `diskutil info` output, e.g.
 *
 *   Container Total Space:     245.1 GB (245107195904 Bytes)
 *   Container Free Space:      40.2 GB (40213422080 Bytes)
 */
export function parseDiskutilInfo(
  stdout: string
): { totalBytes: number; freeBytes: number } | undefined {
  let totalBytes: number | undefined;
  let freeBytes: number | undefined;

  for (const line of stdout.split('\n')) {
    const bytes = line.match(/\((\d+) Bytes\)/);
    if (!bytes) continue;
    if (line.includes('Container Total Space:')) {
      totalBytes = Number(bytes[1]);
    } else if (line.includes('Container Free Space:')) {
      freeBytes = Number(bytes[1]);
    }
  }

  // Zero free space is a full disk
  if (!totalBytes || freeBytes === undefined) return undefined;
  return { totalBytes, freeBytes };
}

/**
 * Capacity of the volume holding `mountPoint`.
 */
export async function getDiskUsage(
  mountPoint = '/',
  runner: CommandRunner = createCommandRunner()
): Promise<DiskUsage> {
  const outcome = await runner.run('diskutil', ['info', mountPoint], {
    timeoutMs: DISKUTIL_TIMEOUT_MS,
  });

  if (outcome.exitCode === 0) {
    const container = parseDiskutilInfo(outcome.stdout);
    if (container) {
      return {
        totalBytes: container.totalBytes,
        usedBytes: container.totalBytes - container.freeBytes,
        freeBytes: container.freeBytes,
        mountPoint,
      };
    }
  }

  logger.debug(`diskutil unavailable for ${mountPoint}, using filesystem statistics`);

  try {
    const space = await checkDiskSpace(mountPoint);
    return {
      totalBytes: space.size,
      usedBytes: space.size - space.free,
      freeBytes: space.free,
      mountPoint,
    };
  } catch (error) {
    throw new DiskwardError(
      classifyError(error) ?? 'CommandFailure',
      `Cannot read disk usage for ${mountPoint}: ${errorMessage(error)}`
    );
  }
}

export function totalGb(usage: DiskUsage): number {
  return usage.totalBytes / GB;
}

export function usedGb(usage: DiskUsage): number {
  return usage.usedBytes / GB;
}

export function freeGb(usage: DiskUsage): number {
  return usage.freeBytes / GB;
}

/** Used share of the volume, 0-100 */
export function usedPercent(usage: DiskUsage): number {
  if (usage.totalBytes === 0) return 0;
  return (usage.usedBytes / usage.totalBytes) * 100;
}
