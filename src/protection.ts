/**
 * Protected paths and categories
 *
 * Users can exempt paths (and everything below them) or whole categories
 * from cleanup. The list lives in a small JSON file:
 *
 *   { "protectedPaths": ["/Users/me/keep"], "protectedCategories": ["trash"] }
 *
 * Every operation re-reads the file, so a change made by another process
 * is seen on the next check. A missing or unreadable file counts as empty.
 */

import { promises as fs } from 'fs';
import { dirname } from 'path';
import { DirectorySizer } from './directory-size.js';
import { classifyError, errorMessage } from './errors.js';
import { loadSettings } from './config.js';
import { logger } from './logger.js';
import { expandPath, isSameOrDescendant, isStrictDescendant } from './paths.js';

export interface ProtectionConfig {
  protectedPaths: string[];
  protectedCategories: string[];
}

export interface ProtectionUpdate {
  success: boolean;
  error?: string;
  protectedPaths: string[];
  protectedCategories: string[];
}

export interface ProtectedPathInfo {
  path: string;
  exists: boolean;
  sizeBytes?: number;
  fileCount?: number;
  error?: string;
}

export interface ProtectionList {
  protectedPaths: ProtectedPathInfo[];
  protectedCategories: string[];
}

function emptyConfig(): ProtectionConfig {
  return { protectedPaths: [], protectedCategories: [] };
}

function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];
}

/**
 * Parse the stored document, treating anything malformed as empty.
 */
export function parseProtectionConfig(content: string): ProtectionConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    return emptyConfig();
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return emptyConfig();
  }
  return {
    protectedPaths: 'protectedPaths' in parsed ? stringList(parsed.protectedPaths) : [],
    protectedCategories: 'protectedCategories' in parsed ? stringList(parsed.protectedCategories) : [],
  };
}

export class ProtectionStore {
  readonly file: string;
  private readonly sizer: DirectorySizer;

  /**
   * @param file - JSON file to persist to (defaults to ~/.diskward/config.json)
   * @param sizer - Used by `list()` to measure protected paths
   */
  constructor(file: string = loadSettings().protectionFile, sizer: DirectorySizer = new DirectorySizer()) {
    this.file = file;
    this.sizer = sizer;
  }

  /** Current stored state */
  async load(): Promise<ProtectionConfig> {
    let content: string;
    try {
      content = await fs.readFile(this.file, 'utf-8');
    } catch {
      return emptyConfig();
    }
    return parseProtectionConfig(content);
  }

  private async save(config: ProtectionConfig): Promise<string | undefined> {
    try {
      await fs.mkdir(dirname(this.file), { recursive: true });
      await fs.writeFile(this.file, JSON.stringify(config, null, 2) + '\n', 'utf-8');
      return undefined;
    } catch (error) {
      logger.debug(`Could not write ${this.file}: ${errorMessage(error)}`);
      return 'Failed to save config';
    }
  }

  private async update(
    mutate: (config: ProtectionConfig) => string | undefined | Promise<string | undefined>
  ): Promise<ProtectionUpdate> {
    const config = await this.load();
    const problem = (await mutate(config)) ?? (await this.save(config));
    if (problem) {
      return { success: false, error: problem, ...(await this.load()) };
    }
    return { success: true, ...config };
  }

  /**
   * True when the path is a protected path or lies below one.
   */
  async isProtected(path: string): Promise<boolean> {
    const { protectedPaths } = await this.load();
    const expanded = expandPath(path);
    return protectedPaths.some(protectedPath => isSameOrDescendant(expanded, protectedPath));
  }

  /**
   * First protected path lying strictly below `path`. Deleting `path`
   * as a whole would take it along.
   */
  async protectedPathInside(path: string): Promise<string | undefined> {
    const { protectedPaths } = await this.load();
    const expanded = expandPath(path);
    return protectedPaths.find(protectedPath => isStrictDescendant(protectedPath, expanded));
  }

  async isCategoryProtected(categoryId: string): Promise<boolean> {
    const { protectedCategories } = await this.load();
    return protectedCategories.includes(categoryId);
  }

  /**
   * Protect an existing path. Stored in expanded form.
   */
  addPath(path: string): Promise<ProtectionUpdate> {
    const expanded = expandPath(path);
    return this.update(async config => {
      try {
        await fs.access(expanded);
      } catch {
        return `Path does not exist: ${path}`;
      }
      if (!config.protectedPaths.includes(expanded)) {
        config.protectedPaths.push(expanded);
      }
      return undefined;
    });
  }

  addCategory(categoryId: string): Promise<ProtectionUpdate> {
    return this.update(config => {
      if (!config.protectedCategories.includes(categoryId)) {
        config.protectedCategories.push(categoryId);
      }
      return undefined;
    });
  }

  removePath(path: string): Promise<ProtectionUpdate> {
    const expanded = expandPath(path);
    return this.update(config => {
      config.protectedPaths = config.protectedPaths.filter(p => p !== expanded);
      return undefined;
    });
  }

  removeCategory(categoryId: string): Promise<ProtectionUpdate> {
    return this.update(config => {
      config.protectedCategories = config.protectedCategories.filter(id => id !== categoryId);
      return undefined;
    });
  }

  /**
   * Protected paths with their current size, plus protected categories.
   */
  async list(): Promise<ProtectionList> {
    const config = await this.load();

    const protectedPaths: ProtectedPathInfo[] = [];
    for (const path of config.protectedPaths) {
      protectedPaths.push(await this.describe(path));
    }

    return { protectedPaths, protectedCategories: config.protectedCategories };
  }

  private async describe(path: string): Promise<ProtectedPathInfo> {
    try {
      const stats = await fs.stat(path);
      if (stats.isDirectory()) {
        const totals = await this.sizer.computeSizeCached(path);
        return { path, exists: true, sizeBytes: totals.sizeBytes, fileCount: totals.fileCount };
      }
      return { path, exists: true, sizeBytes: stats.size, fileCount: 1 };
    } catch (error) {
      if (classifyError(error) === 'NotFound') {
        return { path, exists: false };
      }
      return { path, exists: true, error: 'Cannot access' };
    }
  }
}
