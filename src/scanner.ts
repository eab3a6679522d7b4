/**
 * Category scanner
 *
 * Measures every category in the registry and folds the per-path results
 * into one summary per category. Fixed-path categories run through a
 * bounded pool; recursive developer categories (node_modules, venvs, ...)
 * are discovered lazily and measured one match at a time.
 */

import { promises as fs, type Stats } from 'fs';
import pLimit from 'p-limit';
import { CategoryRegistry } from './categories.js';
import { DirectorySizer } from './directory-size.js';
import { DockerClient, type DockerBreakdown } from './docker.js';
import { getDiskUsage } from './disk-usage.js';
import { errorMessage } from './errors.js';
import { logger } from './logger.js';
import { expandPath } from './paths.js';
import { findMatchingDirectories, patternNameFromGlob } from './pattern-discovery.js';
import {
  LIMITS,
  type Analysis,
  type Category,
  type DiskUsage,
  type FixedCategory,
  type RecursiveCategory,
  type ScanAllOptions,
  type ScanResult,
} from './types.js';
import { isDirectory, sortBySize } from './utils.js';

/** Anything that can report Docker usage */
export interface DockerBreakdownSource {
  getBreakdown(): Promise<DockerBreakdown>;
}

export type DiskUsageProvider = (mountPoint: string) => Promise<DiskUsage>;

export interface ScannerOptions {
  registry?: CategoryRegistry;
  sizer?: DirectorySizer;
  docker?: DockerBreakdownSource;
  diskUsage?: DiskUsageProvider;
}

function emptyResult(category: Category, path: string, exists: boolean, error?: string): ScanResult {
  return {
    categoryId: category.id,
    categoryName: category.name,
    path,
    sizeBytes: 0,
    fileCount: 0,
    dirCount: 0,
    riskLevel: category.riskLevel,
    exists,
    error,
  };
}

/**
 * Fold results for one category into a single summary.
 *
 * Totals are summed, `exists` is true when any input exists, the display
 * path is the first existing non-empty path (else the first input's) and
 * errors are joined with "; ".
 *
 * @returns The summary, or undefined for no results
 */
export function aggregate(results: readonly ScanResult[]): ScanResult | undefined {
  if (results.length === 0) return undefined;

  const first = results[0];
  const displayed = results.find(r => r.exists && r.sizeBytes > 0);
  const errors = results.map(r => r.error).filter((e): e is string => Boolean(e));

  return {
    categoryId: first.categoryId,
    categoryName: first.categoryName,
    path: displayed ? displayed.path : first.path,
    sizeBytes: results.reduce((sum, r) => sum + r.sizeBytes, 0),
    fileCount: results.reduce((sum, r) => sum + r.fileCount, 0),
    dirCount: results.reduce((sum, r) => sum + r.dirCount, 0),
    riskLevel: first.riskLevel,
    exists: results.some(r => r.exists),
    error: errors.length > 0 ? errors.join('; ') : undefined,
  };
}

/**
 * Summarise the matches of a recursive category.
 *
 * The display path is the largest match, suffixed with "(+N more)" when
 * there are others; the name carries the match count.
 */
export function aggregateRecursive(
  results: readonly ScanResult[],
  category: Category
): ScanResult | undefined {
  if (results.length === 0) return undefined;

  const largest = results.reduce((max, r) => (r.sizeBytes > max.sizeBytes ? r : max));
  const found = results.length;

  return {
    categoryId: category.id,
    categoryName: `${category.name} (${found} found)`,
    path: found > 1 ? `${largest.path} (+${found - 1} more)` : largest.path,
    sizeBytes: results.reduce((sum, r) => sum + r.sizeBytes, 0),
    fileCount: results.reduce((sum, r) => sum + r.fileCount, 0),
    dirCount: results.reduce((sum, r) => sum + r.dirCount, 0),
    riskLevel: category.riskLevel,
    exists: true,
  };
}

export class Scanner {
  readonly registry: CategoryRegistry;
  readonly sizer: DirectorySizer;
  private readonly docker: DockerBreakdownSource;
  private readonly diskUsage: DiskUsageProvider;

  constructor(options: ScannerOptions = {}) {
    this.registry = options.registry ?? new CategoryRegistry();
    this.sizer = options.sizer ?? new DirectorySizer();
    this.docker = options.docker ?? new DockerClient();
    this.diskUsage = options.diskUsage ?? (mountPoint => getDiskUsage(mountPoint));
  }

  /**
   * Measure one declared path of a category.
   * A missing path is not an error: it comes back with `exists: false`.
   */
  async scanPath(rawPath: string, category: Category): Promise<ScanResult> {
    const path = expandPath(rawPath);

    let stats: Stats;
    try {
      stats = await fs.stat(path);
    } catch {
      return emptyResult(category, path, false);
    }

    try {
      if (stats.isFile()) {
        return {
          ...emptyResult(category, path, true),
          sizeBytes: stats.size,
          fileCount: 1,
        };
      }
      if (stats.isDirectory()) {
        const totals = await this.sizer.computeSizeCached(path);
        return { ...emptyResult(category, path, true), ...totals };
      }
      return emptyResult(category, path, false);
    } catch (error) {
      return emptyResult(category, path, true, errorMessage(error));
    }
  }

  /**
   * Per-path results of a fixed category. Docker-backed categories ask the
   * Docker CLI and only walk their paths when Docker is unavailable.
   */
  async scanCategory(category: FixedCategory): Promise<ScanResult[]> {
    if (category.externalTool === 'docker') {
      const summary = await this.scanDocker(category);
      if (summary) return [summary];
    }

    const results: ScanResult[] = [];
    for (const path of category.paths) {
      results.push(await this.scanPath(path, category));
    }
    return results;
  }

  private async scanDocker(category: FixedCategory): Promise<ScanResult | undefined> {
    try {
      const breakdown = await this.docker.getBreakdown();
      if (!breakdown.available) {
        logger.debug(`Docker unavailable (${breakdown.error ?? 'unknown'}), scanning paths`);
        return undefined;
      }
      return {
        ...emptyResult(category, 'Docker Desktop', true),
        sizeBytes: breakdown.totalBytes,
        fileCount: breakdown.images.length,
        dirCount: breakdown.containers.length,
      };
    } catch (error) {
      logger.debug(`Docker query failed: ${errorMessage(error)}`);
      return undefined;
    }
  }

  /**
   * One result per discovered match of a recursive category, largest first.
   * Matches reached through overlapping roots are counted once, and
   * matches below the category's minimum size are dropped.
   */
  async scanRecursiveCategory(category: RecursiveCategory): Promise<ScanResult[]> {
    const results: ScanResult[] = [];
    const seen = new Set<string>();

    for (const searchRoot of category.searchRoots) {
      const root = expandPath(searchRoot);
      if (!(await isDirectory(root))) continue;

      for (const glob of category.globPatterns) {
        const pattern = patternNameFromGlob(glob);

        for await (const found of findMatchingDirectories(root, pattern)) {
          if (seen.has(found)) continue;
          seen.add(found);

          const totals = await this.sizer.computeSizeCached(found);
          if (totals.sizeBytes < category.minSizeBytes) continue;

          results.push({ ...emptyResult(category, found, true), ...totals });
        }
      }
    }

    return sortBySize(results);
  }

  /**
   * Scan every category and return one summary each, largest first.
   *
   * Progress is reported once per finished category in completion order;
   * `total` counts every category taking part. A category that throws
   * becomes a zero-size result carrying the message.
   */
  async scanAll(options: ScanAllOptions = {}): Promise<ScanResult[]> {
    const { includeDev = false, maxWorkers = LIMITS.DEFAULT_WORKERS, onProgress } = options;

    const fixed = this.registry.fixed();
    const recursive = includeDev ? this.registry.recursive() : [];
    const total = fixed.length + recursive.length;

    let completed = 0;
    const report = (category: Category): void => {
      completed++;
      onProgress?.(category.name, completed, total);
    };

    const limit = pLimit(Math.max(1, maxWorkers));
    const fixedTasks = fixed.map(category =>
      limit(async () => {
        let summary: ScanResult | undefined;
        try {
          summary = aggregate(await this.scanCategory(category));
        } catch (error) {
          summary = emptyResult(category, category.paths[0] ?? '', false, errorMessage(error));
        }
        report(category);
        return summary;
      })
    );

    // Discovery is I/O heavy on its own; run those categories one at a time
    const recursiveLimit = pLimit(1);
    const recursiveTasks = recursive.map(category =>
      recursiveLimit(async () => {
        let summary: ScanResult | undefined;
        try {
          summary = aggregateRecursive(await this.scanRecursiveCategory(category), category);
        } catch (error) {
          summary = emptyResult(category, category.searchRoots[0] ?? '', false, errorMessage(error));
        }
        report(category);
        return summary;
      })
    );

    const summaries = await Promise.all([...fixedTasks, ...recursiveTasks]);
    return sortBySize(summaries.filter((r): r is ScanResult => r !== undefined));
  }

  /**
   * Scan selected categories, or all of them when no ids are given.
   * Unknown ids are ignored.
   */
  async quickScan(categoryIds?: readonly string[]): Promise<ScanResult[]> {
    if (categoryIds === undefined) {
      return this.scanAll();
    }

    const results: ScanResult[] = [];
    for (const id of categoryIds) {
      const category = this.registry.get(id);
      if (!category) continue;

      const summary = category.isRecursive
        ? aggregateRecursive(await this.scanRecursiveCategory(category), category)
        : aggregate(await this.scanCategory(category));
      if (summary) results.push(summary);
    }
    return sortBySize(results);
  }

  /**
   * Volume usage plus a full category scan.
   */
  async analyzeDisk(options: ScanAllOptions & { mountPoint?: string } = {}): Promise<Analysis> {
    const { mountPoint = '/', ...scanOptions } = options;
    const [diskUsage, scanResults] = await Promise.all([
      this.diskUsage(mountPoint),
      this.scanAll(scanOptions),
    ]);
    return { timestamp: new Date(), diskUsage, scanResults };
  }
}
