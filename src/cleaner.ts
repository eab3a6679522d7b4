/**
 * Cleanup execution with safety checks
 *
 * Every deletion goes through the same gate. The path must exist and must
 * not be one of the blocked system or personal folders. It must neither lie
 * in nor contain a path the user protected. Failures are reported on the returned result and
 * never thrown, so one stubborn folder cannot stop a multi-category cleanup.
 */

import { promises as fs, type Dirent, type Stats } from 'fs';
import { basename, join } from 'path';
import { CategoryRegistry } from './categories.js';
import { DirectorySizer } from './directory-size.js';
import { DockerClient } from './docker.js';
import { describeDeletionError, errorMessage } from './errors.js';
import { createCommandRunner, describeFailure, type CommandRunner } from './exec.js';
import { logger } from './logger.js';
import { expandPath, homeDirectory, isSameOrDescendant, isStrictDescendant } from './paths.js';
import { ProtectionStore } from './protection.js';
import { Scanner, type DockerBreakdownSource } from './scanner.js';
import {
  LIMITS,
  type Category,
  type CleanupResult,
  type CleanupValidation,
  type ItemDeletionResult,
  type PathDeletion,
  type ScanResult,
} from './types.js';

/**
 * Paths that are never deleted themselves. Only an exact match is
 * blocked: ~/Library/Caches/x is fine even though /Library is listed.
 */
export const BLOCKED_PATHS: readonly string[] = [
  '~/Documents',
  '~/Desktop',
  '~/Pictures',
  '~/Music',
  '~/Movies',
  '~/Code',
  '~/Projects',
  '~/Work',
  '/System',
  '/Library',
  '/Applications',
  '/usr',
  '/bin',
  '/sbin',
  '/var',
  '/private',
  '/Users',
  '~',
];

export type DockerItemType = 'image' | 'container' | 'volume';
export type DockerPruneType = 'images' | 'containers' | 'volumes';

const DOCKER_REMOVE_ARGS: Record<DockerItemType, string[]> = {
  image: ['rmi'],
  container: ['rm'],
  volume: ['volume', 'rm'],
};

const DOCKER_PRUNE_ARGS: Record<DockerPruneType, string[]> = {
  images: ['image', 'prune', '-f'],
  containers: ['container', 'prune', '-f'],
  volumes: ['volume', 'prune', '-f'],
};

export function isDockerItemType(value: string): value is DockerItemType {
  return value === 'image' || value === 'container' || value === 'volume';
}

export function isDockerPruneType(value: string): value is DockerPruneType {
  return value === 'images' || value === 'containers' || value === 'volumes';
}

/** Reports the (category or path, completed, total) of a batch cleanup */
export type CleanupProgressCallback = (categoryName: string, completed: number, total: number) => void;

/** Reports each path as it is cleaned within a category */
export type PathCleanedCallback = (path: string, bytesFreed: number) => void;

export interface CleanerOptions {
  registry?: CategoryRegistry;
  sizer?: DirectorySizer;
  protection?: ProtectionStore;
  runner?: CommandRunner;
  docker?: DockerBreakdownSource;

  /** Directory holding per-app caches (default ~/Library/Caches) */
  cachesDir?: string;

  /** Hugging Face hub cache (default ~/.cache/huggingface/hub) */
  huggingFaceDir?: string;
}

function failedItem(error: string, dryRun: boolean, path?: string): ItemDeletionResult {
  return { success: false, dryRun, path, bytesFreed: 0, filesDeleted: 0, error };
}

export class Cleaner {
  readonly registry: CategoryRegistry;
  readonly sizer: DirectorySizer;
  readonly protection: ProtectionStore;
  private readonly runner: CommandRunner;
  private readonly docker: DockerBreakdownSource;
  private readonly scanner: Scanner;
  private readonly cachesDir: string;
  private readonly huggingFaceDir: string;

  constructor(options: CleanerOptions = {}) {
    this.registry = options.registry ?? new CategoryRegistry();
    this.sizer = options.sizer ?? new DirectorySizer();
    this.protection = options.protection ?? new ProtectionStore(undefined, this.sizer);
    this.runner = options.runner ?? createCommandRunner();
    this.docker = options.docker ?? new DockerClient(this.runner);
    this.scanner = new Scanner({ registry: this.registry, sizer: this.sizer, docker: this.docker });
    this.cachesDir = expandPath(options.cachesDir ?? '~/Library/Caches');
    this.huggingFaceDir = expandPath(options.huggingFaceDir ?? '~/.cache/huggingface/hub');
  }

  /**
   * False for the home directory and for any blocked path itself.
   */
  isPathSafe(path: string): boolean {
    const expanded = expandPath(path);
    if (BLOCKED_PATHS.some(blocked => expandPath(blocked) === expanded)) {
      return false;
    }
    return expanded !== expandPath(homeDirectory());
  }

  /**
   * True when the path lies in (or is) one of the category's declared paths.
   */
  isInsideAllowedPath(path: string, categoryId: string): boolean {
    const category = this.registry.get(categoryId);
    if (!category || category.isRecursive) return false;
    return category.paths.some(allowed => isSameOrDescendant(path, allowed));
  }

  /**
   * Delete a file or directory tree, or only measure it on a dry run.
   * A missing path frees nothing and is not an error.
   */
  async deletePath(path: string, dryRun: boolean): Promise<PathDeletion> {
    const target = expandPath(path);

    let stats: Stats;
    try {
      stats = await fs.lstat(target);
    } catch {
      return { bytesFreed: 0, filesDeleted: 0 };
    }

    // Always measured fresh: a cached size may predate files written since
    const { sizeBytes, fileCount } = stats.isDirectory()
      ? await this.sizer.computeSize(target)
      : { sizeBytes: stats.size, fileCount: 1 };

    if (dryRun) {
      return { bytesFreed: sizeBytes, filesDeleted: fileCount };
    }

    try {
      await fs.rm(target, { recursive: stats.isDirectory() });
    } catch (error) {
      return { bytesFreed: 0, filesDeleted: 0, error: describeDeletionError(error) };
    }

    this.sizer.cache.invalidate(target);
    logger.debug(`Deleted ${target} (${sizeBytes} bytes)`);
    return { bytesFreed: sizeBytes, filesDeleted: fileCount };
  }

  /**
   * Clean one category.
   *
   * Categories with a native cleanup command run it instead of deleting
   * files. A dry run measures the declared paths either way, since a
   * command cannot be previewed.
   */
  async cleanCategory(
    categoryId: string,
    dryRun: boolean,
    onPath?: PathCleanedCallback
  ): Promise<CleanupResult> {
    const category = this.registry.get(categoryId);
    if (!category) {
      return {
        categoryId,
        path: '',
        bytesFreed: 0,
        filesDeleted: 0,
        success: false,
        error: `Unknown category: ${categoryId}`,
        dryRun,
      };
    }

    const fallbackPath = expandPath(category.isRecursive ? category.searchRoots[0] : category.paths[0]);

    if (await this.protection.isCategoryProtected(categoryId)) {
      return {
        categoryId,
        path: fallbackPath,
        bytesFreed: 0,
        filesDeleted: 0,
        success: false,
        error: `Category '${categoryId}' is protected`,
        dryRun,
      };
    }

    if (category.cleanupCommand && !dryRun) {
      for (const path of category.paths) {
        const problem = await this.protectionProblem(expandPath(path));
        if (problem) {
          return {
            categoryId,
            path: fallbackPath,
            bytesFreed: 0,
            filesDeleted: 0,
            success: false,
            error: problem,
            dryRun,
          };
        }
      }
      return this.runNativeCleanup(categoryId, category.cleanupCommand);
    }

    const candidates = await this.cleanupCandidates(category);

    let bytesFreed = 0;
    let filesDeleted = 0;
    const errors: string[] = [];
    const cleaned: string[] = [];

    for (const path of candidates) {
      try {
        await fs.lstat(path);
      } catch {
        continue;
      }

      if (!this.isPathSafe(path)) {
        errors.push(`Blocked path: ${path}`);
        continue;
      }
      const problem = await this.protectionProblem(path);
      if (problem) {
        errors.push(problem);
        continue;
      }

      const deletion = await this.deletePath(path, dryRun);
      if (deletion.error) {
        errors.push(`${path}: ${deletion.error}`);
        continue;
      }

      bytesFreed += deletion.bytesFreed;
      filesDeleted += deletion.filesDeleted;
      cleaned.push(path);
      onPath?.(path, deletion.bytesFreed);
    }

    if (dryRun && category.cleanupCommand && cleaned.length === 0 && errors.length === 0) {
      return {
        categoryId,
        path: `[native command: ${category.cleanupCommand}]`,
        bytesFreed: 0,
        filesDeleted: 0,
        success: true,
        dryRun,
      };
    }

    return {
      categoryId,
      path: cleaned[0] ?? fallbackPath,
      bytesFreed,
      filesDeleted,
      success: errors.length === 0,
      error: errors.length > 0 ? errors.join('; ') : undefined,
      dryRun,
    };
  }

  /** Why `path` must not be deleted as a whole, if the user protected any of it */
  private async protectionProblem(path: string): Promise<string | undefined> {
    if (await this.protection.isProtected(path)) {
      return `Protected path: ${path}`;
    }
    const inside = await this.protection.protectedPathInside(path);
    return inside === undefined ? undefined : `Protected path inside ${path}: ${inside}`;
  }

  private async cleanupCandidates(category: Category): Promise<string[]> {
    if (!category.isRecursive) {
      return category.paths.map(path => expandPath(path));
    }
    const matches = await this.scanner.scanRecursiveCategory(category);
    return matches.map(match => match.path);
  }

  private async runNativeCleanup(categoryId: string, command: string): Promise<CleanupResult> {
    const path = `[native command: ${command}]`;
    const timeoutMs = LIMITS.BULK_COMMAND_TIMEOUT_MS;

    logger.debug(`Running ${command}`);
    const outcome = await this.runner.runShell(command, { timeoutMs });

    if (outcome.exitCode === 0 && !outcome.timedOut) {
      return { categoryId, path, bytesFreed: 0, filesDeleted: 0, success: true, dryRun: false };
    }

    return {
      categoryId,
      path,
      bytesFreed: 0,
      filesDeleted: 0,
      success: false,
      error: describeFailure(outcome, timeoutMs),
      dryRun: false,
    };
  }

  /**
   * Clean every safe result that has something in it, one category at a time.
   */
  async cleanSafeItems(
    scanResults: readonly ScanResult[],
    dryRun: boolean,
    onProgress?: CleanupProgressCallback
  ): Promise<CleanupResult[]> {
    const safe = scanResults.filter(r => r.riskLevel === 'safe' && r.sizeBytes > 0);

    const results: CleanupResult[] = [];
    for (const [index, item] of safe.entries()) {
      onProgress?.(item.categoryName, index + 1, safe.length);
      results.push(await this.cleanCategory(item.categoryId, dryRun));
    }
    return results;
  }

  /**
   * Pre-flight check run before any deletion starts.
   */
  validateCleanupRequest(categoryIds: readonly string[], totalBytes: number): CleanupValidation {
    if (totalBytes >= LIMITS.MAX_CLEANUP_BYTES) {
      const gb = (totalBytes / 1000 ** 3).toFixed(1);
      return { valid: false, error: `Cleanup exceeds safety limit (${gb} GB > 100 GB)` };
    }

    const unknown = categoryIds.find(id => !this.registry.has(id));
    if (unknown !== undefined) {
      return { valid: false, error: `Unknown category: ${unknown}` };
    }

    return { valid: true };
  }

  /**
   * Remove one Docker image, container or volume by id or name.
   */
  async deleteDockerItem(type: DockerItemType, id: string, dryRun: boolean): Promise<ItemDeletionResult> {
    if (id.trim() === '') {
      return failedItem(`Docker ${type} id is empty`, dryRun);
    }

    const breakdown = await this.docker.getBreakdown();
    if (!breakdown.available) {
      return failedItem(breakdown.error ?? 'Docker is not available', dryRun);
    }

    let sizeBytes: number | undefined;
    if (type === 'image') {
      sizeBytes = breakdown.images.find(
        image => id.startsWith(image.id) || image.id.startsWith(id) || `${image.repository}:${image.tag}` === id
      )?.sizeBytes;
    } else if (type === 'container') {
      sizeBytes = breakdown.containers.find(
        container => id.startsWith(container.id) || container.id.startsWith(id) || container.name === id
      )?.sizeBytes;
    } else if (breakdown.volumes.some(volume => volume.name === id)) {
      sizeBytes = 0;
    }

    if (sizeBytes === undefined) {
      return failedItem(`Docker ${type} not found: ${id}`, dryRun);
    }

    const args = [...DOCKER_REMOVE_ARGS[type], id];
    return this.runDocker(args, sizeBytes, dryRun, LIMITS.ITEM_COMMAND_TIMEOUT_MS);
  }

  /**
   * Prune unused Docker items of one kind, or everything unused.
   */
  async deleteDockerUnused(type: DockerPruneType | undefined, dryRun: boolean): Promise<ItemDeletionResult> {
    const args = type ? DOCKER_PRUNE_ARGS[type] : ['system', 'prune', '-f'];
    return this.runDocker(args, 0, dryRun, LIMITS.BULK_COMMAND_TIMEOUT_MS);
  }

  private async runDocker(
    args: string[],
    sizeBytes: number,
    dryRun: boolean,
    timeoutMs: number
  ): Promise<ItemDeletionResult> {
    const command = ['docker', ...args].join(' ');
    if (dryRun) {
      return { success: true, dryRun, command, bytesFreed: sizeBytes, filesDeleted: 0 };
    }

    const outcome = await this.runner.run('docker', args, { timeoutMs });
    if (outcome.exitCode === 0 && !outcome.timedOut) {
      return { success: true, dryRun, command, bytesFreed: sizeBytes, filesDeleted: 0 };
    }
    return { ...failedItem(describeFailure(outcome, timeoutMs), dryRun), command };
  }

  /**
   * Delete one discovered artifact directory (a project's node_modules,
   * a .venv, a target/ ...). Accepts the artifact itself or its project.
   */
  async deleteArtifactDirectory(
    path: string,
    artifactName = 'node_modules',
    dryRun = false
  ): Promise<ItemDeletionResult> {
    const expanded = expandPath(path);
    const target = basename(expanded) === artifactName ? expanded : join(expanded, artifactName);

    try {
      await fs.lstat(target);
    } catch {
      return failedItem(`${artifactName} not found at ${target}`, dryRun);
    }

    return this.deleteChecked(target, dryRun);
  }

  /**
   * Delete one app's cache directory, found by bundle id, name fragment or path.
   * The resolved directory must lie inside the caches directory.
   */
  async deleteAppCache(nameOrPath: string, dryRun: boolean): Promise<ItemDeletionResult> {
    let target: string | undefined;

    if (nameOrPath.startsWith('/') || nameOrPath.startsWith('~')) {
      target = expandPath(nameOrPath);
    } else {
      target = await this.findEntry(this.cachesDir, nameOrPath.toLowerCase());
      if (!target) {
        return failedItem(`Cache not found for: ${nameOrPath}`, dryRun);
      }
    }

    let resolved: string;
    let root: string;
    try {
      resolved = await fs.realpath(target);
      root = await fs.realpath(this.cachesDir);
    } catch {
      return failedItem(`Cache path does not exist: ${target}`, dryRun);
    }

    if (!isStrictDescendant(resolved, root)) {
      return failedItem(`Path not inside ${this.cachesDir}: ${target}`, dryRun);
    }

    return this.deleteChecked(resolved, dryRun);
  }

  /**
   * Delete one model from the Hugging Face hub cache.
   *
   * @param name - Repo id ("org/model"), cache directory name or fragment of one
   */
  async deleteHuggingFaceModel(name: string, dryRun: boolean): Promise<ItemDeletionResult> {
    const cacheName = name.includes('/') ? `models--${name.replace(/\//g, '--')}` : name;
    let target: string | undefined = join(this.huggingFaceDir, cacheName);

    try {
      await fs.lstat(target);
    } catch {
      target = await this.findEntry(this.huggingFaceDir, name.toLowerCase().replace(/\//g, '--'));
    }

    if (!target || !isStrictDescendant(target, this.huggingFaceDir)) {
      return failedItem(`Model not found: ${name}`, dryRun);
    }

    return this.deleteChecked(target, dryRun);
  }

  /** First entry (by name) in `dir` whose lowercased name contains `term` */
  private async findEntry(dir: string, term: string): Promise<string | undefined> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch (error) {
      logger.debug(`Cannot list ${dir}: ${errorMessage(error)}`);
      return undefined;
    }
    const match = entries
      .map(entry => entry.name)
      .sort()
      .find(entryName => entryName.toLowerCase().includes(term));
    return match === undefined ? undefined : join(dir, match);
  }

  private async deleteChecked(target: string, dryRun: boolean): Promise<ItemDeletionResult> {
    if (!this.isPathSafe(target)) {
      return failedItem(`Blocked path: ${target}`, dryRun, target);
    }
    const problem = await this.protectionProblem(target);
    if (problem) {
      return failedItem(problem, dryRun, target);
    }

    const deletion = await this.deletePath(target, dryRun);
    if (deletion.error) {
      return failedItem(deletion.error, dryRun, target);
    }
    return {
      success: true,
      dryRun,
      path: target,
      bytesFreed: deletion.bytesFreed,
      filesDeleted: deletion.filesDeleted,
    };
  }
}
