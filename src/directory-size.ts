/**
 * Directory size calculation
 *
 * Iterative walk that sums regular-file sizes and counts files and
 * directories. Symlinks are never followed, recursion stops past a depth
 * bound, and unreadable entries count as zero so one locked folder never
 * aborts a scan.
 */

import { promises as fs, type Dirent } from 'fs';
import { join } from 'path';
import { expandPath } from './paths.js';
import { SizeCache } from './size-cache.js';
import { LIMITS, type SizeTotals } from './types.js';

interface PendingDirectory {
  path: string;
  depth: number;
}

/**
 * Measure a directory tree.
 *
 * The root is depth 0. A directory at depth d is listed only while
 * d <= maxDepth; deeper directories still count towards dirCount but their
 * contents are not visited.
 *
 * @param dirPath - Absolute directory path
 * @param maxDepth - Deepest level whose entries are listed
 * @returns Byte size, regular file count and directory count
 */
export async function computeDirectorySize(
  dirPath: string,
  maxDepth: number = LIMITS.SIZE_MAX_DEPTH
): Promise<SizeTotals> {
  let sizeBytes = 0;
  let fileCount = 0;
  let dirCount = 0;

  const pathsToProcess: PendingDirectory[] = [{ path: dirPath, depth: 0 }];

  while (pathsToProcess.length > 0) {
    const current = pathsToProcess.pop();
    if (!current || current.depth > maxDepth) continue;

    let entries: Dirent[];
    try {
      entries = await fs.readdir(current.path, { withFileTypes: true });
    } catch {
      // Permission denied or vanished - contributes nothing
      continue;
    }

    const fileSizes = await Promise.all(
      entries
        .filter(entry => entry.isFile())
        .map(entry => regularFileSize(join(current.path, entry.name)))
    );

    for (const size of fileSizes) {
      if (size !== undefined) {
        sizeBytes += size;
        fileCount++;
      }
    }

    for (const entry of entries) {
      if (entry.isDirectory()) {
        dirCount++;
        pathsToProcess.push({ path: join(current.path, entry.name), depth: current.depth + 1 });
      }
    }
  }

  return { sizeBytes, fileCount, dirCount };
}

async function regularFileSize(filePath: string): Promise<number | undefined> {
  try {
    const stats = await fs.lstat(filePath);
    return stats.isFile() ? stats.size : undefined;
  } catch {
    return undefined;
  }
}

/**
 * Size engine with a shared, time-bounded cache.
 */
export class DirectorySizer {
  readonly cache: SizeCache;

  constructor(cache: SizeCache = new SizeCache()) {
    this.cache = cache;
  }

  /**
   * Measure without consulting the cache.
   */
  computeSize(path: string, maxDepth: number = LIMITS.SIZE_MAX_DEPTH): Promise<SizeTotals> {
    return computeDirectorySize(expandPath(path), maxDepth);
  }

  /**
   * Measure, reusing totals younger than the cache TTL.
   * Keyed by the expanded absolute path.
   */
  computeSizeCached(path: string, maxDepth: number = LIMITS.SIZE_MAX_DEPTH): Promise<SizeTotals> {
    const key = expandPath(path);
    return this.cache.getOrCompute(key, () => computeDirectorySize(key, maxDepth));
  }
}
