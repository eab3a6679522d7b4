/**
 * File finders
 *
 * Whole-tree searches for individual files worth a look: very large ones
 * anywhere in home, and ones nobody has opened in months. Discovery uses
 * fdir; candidates are then stat'ed through a bounded pool.
 */

import { promises as fs } from 'fs';
import { fdir } from 'fdir';
import pLimit from 'p-limit';
import { expandPath } from './paths.js';
import { LIMITS } from './types.js';
import { daysSince, isDirectory, sortBySize } from './utils.js';

export interface FoundFile {
  path: string;
  sizeBytes: number;
}

export interface OldFile extends FoundFile {
  /** Whole days since the file was last read */
  lastAccessedDays: number;
}

export interface LargeFileOptions {
  /** Smallest size reported (default 100 MB) */
  minSizeBytes?: number;
  /** Directory to search (default ~) */
  root?: string;
  maxResults?: number;
}

export interface OldFileOptions {
  /** Files not accessed for at least this many days (default 180) */
  days?: number;
  /** Directory to search (default ~/Downloads) */
  root?: string;
  maxResults?: number;
  now?: () => number;
}

const DAY_MS = 24 * 60 * 60 * 1000;

async function crawlFiles(root: string): Promise<string[]> {
  if (!(await isDirectory(root))) return [];

  // Symlinks are reported as paths but never resolved or descended into
  return new fdir().withFullPaths().crawl(root).withPromise();
}

interface FileStats {
  path: string;
  size: number;
  atimeMs: number;
}

/**
 * lstat every path through the pool, keeping regular files only.
 */
async function statRegularFiles(paths: string[]): Promise<FileStats[]> {
  const limit = pLimit(LIMITS.BREAKDOWN_WORKERS);
  const files = await Promise.all(
    paths.map(path =>
      limit(async (): Promise<FileStats | undefined> => {
        try {
          const stats = await fs.lstat(path);
          return stats.isFile() ? { path, size: stats.size, atimeMs: stats.atimeMs } : undefined;
        } catch {
          return undefined;
        }
      })
    )
  );
  return files.filter((item): item is FileStats => item !== undefined);
}

/**
 * Regular files of at least `minSizeBytes`, largest first.
 */
export async function findLargeFiles(options: LargeFileOptions = {}): Promise<FoundFile[]> {
  const { minSizeBytes = 100 * 1000 ** 2, root = '~', maxResults = 50 } = options;

  const paths = await crawlFiles(expandPath(root));
  const large = (await statRegularFiles(paths))
    .filter(file => file.size >= minSizeBytes)
    .map(file => ({ path: file.path, sizeBytes: file.size }));

  return sortBySize(large).slice(0, maxResults);
}

/**
 * Regular files last accessed more than `days` ago, largest first.
 */
export async function findOldFiles(options: OldFileOptions = {}): Promise<OldFile[]> {
  const { days = 180, root = '~/Downloads', maxResults = 50, now = Date.now } = options;

  const current = now();
  const cutoff = current - days * DAY_MS;

  const paths = await crawlFiles(expandPath(root));
  const old = (await statRegularFiles(paths))
    .filter(file => file.atimeMs < cutoff)
    .map(file => ({
      path: file.path,
      sizeBytes: file.size,
      lastAccessedDays: daysSince(file.atimeMs, current),
    }));

  return sortBySize(old).slice(0, maxResults);
}
