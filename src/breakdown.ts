/**
 * Drill-down breakdowns
 *
 * Per-item views behind the category summaries: which apps fill
 * ~/Library/Caches, which projects hold the biggest node_modules, which
 * Hugging Face models are cached, and a Settings-style storage overview.
 * Sizes are computed through the shared cache with a wider pool than
 * category scans, since each item is small.
 */

import { promises as fs, type Dirent } from 'fs';
import { basename, dirname, join } from 'path';
import { fdir } from 'fdir';
import pLimit from 'p-limit';
import { DirectorySizer } from './directory-size.js';
import { getDiskUsage } from './disk-usage.js';
import type { DiskUsageProvider } from './scanner.js';
import { expandPath, homeDirectory } from './paths.js';
import { LIMITS, type DiskUsage } from './types.js';
import { daysSince, fileExists, isDirectory, sortBySize, totalSize } from './utils.js';

/** Where project checkouts usually live */
export const PROJECT_SEARCH_PATHS: readonly string[] = [
  '~/Projects',
  '~/Code',
  '~/code',
  '~/Development',
  '~/dev',
  '~/Developer',
  '~/workspace',
  '~/Workspace',
  '~/GitHub',
  '~/github',
  '~/repos',
  '~/src',
  '~/www',
];

const NODE_MODULES_SEARCH_DEPTH = 5;
const INACTIVE_AFTER_DAYS = 180;
const TOP_CHILDREN = 20;

const BROWSER_BUNDLE_IDS: ReadonlyArray<[string, string]> = [
  ['com.google.Chrome', 'Chrome'],
  ['com.apple.Safari', 'Safari'],
  ['org.mozilla.firefox', 'Firefox'],
  ['com.microsoft.edgemac', 'Edge'],
  ['com.brave.Browser', 'Brave'],
];

interface StorageCategory {
  id: string;
  name: string;
  paths: string[];
}

const STORAGE_CATEGORIES: readonly StorageCategory[] = [
  { id: 'applications', name: 'Applications', paths: ['/Applications', '~/Applications'] },
  { id: 'documents', name: 'Documents', paths: ['~/Documents'] },
  { id: 'downloads', name: 'Downloads', paths: ['~/Downloads'] },
  { id: 'photos', name: 'Photos', paths: ['~/Pictures', '~/Library/Photos'] },
  { id: 'music', name: 'Music', paths: ['~/Music'] },
  { id: 'movies', name: 'Movies', paths: ['~/Movies'] },
  { id: 'mail', name: 'Mail', paths: ['~/Library/Mail'] },
  { id: 'messages', name: 'Messages', paths: ['~/Library/Messages'] },
  {
    id: 'developer',
    name: 'Developer',
    paths: [
      '~/Library/Developer',
      '~/.npm',
      '~/.cargo',
      '~/.rustup',
      '~/.gradle',
      '~/.m2',
      '~/.conda',
      '~/.docker',
      '~/go',
    ],
  },
  { id: 'icloud', name: 'iCloud Drive', paths: ['~/Library/Mobile Documents'] },
  {
    id: 'library',
    name: 'Library (Caches & Data)',
    paths: ['~/Library/Caches', '~/Library/Application Support'],
  },
];

export interface AppCacheInfo {
  name: string;
  bundleId: string;
  path: string;
  sizeBytes: number;
  fileCount: number;
  isBrowser: boolean;
}

export interface AppCachesBreakdown {
  apps: AppCacheInfo[];
  totalBytes: number;
  browsers: AppCacheInfo[];
  browserBytes: number;
}

export interface HuggingFaceModel {
  /** "org/model" */
  name: string;
  path: string;
  sizeBytes: number;
  fileCount: number;
}

export interface HuggingFaceBreakdown {
  models: HuggingFaceModel[];
  totalBytes: number;
}

export interface NodeModulesProject {
  projectName: string;
  projectPath: string;
  nodeModulesPath: string;
  sizeBytes: number;
  fileCount: number;
  daysSinceModified: number;
  status: 'active' | 'inactive';
}

export interface NodeModulesBreakdown {
  projects: NodeModulesProject[];
  totalBytes: number;
  inactiveCount: number;
  inactiveBytes: number;
}

export interface StorageEntry {
  id: string;
  name: string;
  sizeBytes: number;
  /** Share of used space, one decimal */
  percent: number;
  /** First measured path; undefined for "System & Other" */
  path?: string;
}

export interface StorageBreakdown {
  disk: DiskUsage;
  categories: StorageEntry[];
}

export interface DirectoryChild {
  name: string;
  path: string;
  sizeBytes: number;
  isDirectory: boolean;
}

export type DirectoryAnalysis =
  | { kind: 'missing'; path: string; error: string }
  | { kind: 'file'; path: string; sizeBytes: number }
  | {
      kind: 'directory';
      path: string;
      sizeBytes: number;
      fileCount: number;
      dirCount: number;
      children: DirectoryChild[];
    };

export interface BreakdownOptions {
  sizer?: DirectorySizer;
  diskUsage?: DiskUsageProvider;
  cachesDir?: string;
  huggingFaceDir?: string;

  /** Roots searched for project node_modules */
  projectRoots?: readonly string[];

  /** Directory whose top-level projects are also searched (default: home) */
  home?: string;

  now?: () => number;
}

/**
 * Turn a cache directory name into something readable:
 * known browsers by name, "com.vendor.some-app" as "Some App".
 */
export function appNameFromBundleId(bundleId: string): { name: string; isBrowser: boolean } {
  for (const [id, browser] of BROWSER_BUNDLE_IDS) {
    if (bundleId.includes(id)) return { name: browser, isBrowser: true };
  }

  if (bundleId.startsWith('com.')) {
    const parts = bundleId.split('.');
    if (parts.length >= 3) {
      const words = parts[2].replace(/-/g, ' ').split(' ');
      const titled = words.map(word => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());
      return { name: titled.join(' '), isBrowser: false };
    }
  }

  return { name: bundleId, isBrowser: false };
}

/**
 * "models--org--name" to "org/name".
 */
export function modelNameFromCacheDir(dirName: string): string {
  const parts = dirName.replace(/^models--/, '').split('--');
  return parts.length >= 2 ? `${parts[0]}/${parts[1]}` : parts[0];
}

async function listDirectories(dir: string): Promise<Dirent[]> {
  try {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    return entries.filter(entry => entry.isDirectory());
  } catch {
    return [];
  }
}

async function readProjectName(projectPath: string): Promise<string> {
  try {
    const content = await fs.readFile(join(projectPath, 'package.json'), 'utf-8');
    const parsed: unknown = JSON.parse(content);
    if (typeof parsed === 'object' && parsed !== null && 'name' in parsed && typeof parsed.name === 'string') {
      return parsed.name;
    }
  } catch {
    // Unreadable or invalid package.json - fall back to the folder name
  }
  return basename(projectPath);
}

export class BreakdownService {
  private readonly sizer: DirectorySizer;
  private readonly diskUsage: DiskUsageProvider;
  private readonly cachesDir: string;
  private readonly huggingFaceDir: string;
  private readonly projectRoots: readonly string[];
  private readonly home: string;
  private readonly now: () => number;

  constructor(options: BreakdownOptions = {}) {
    this.sizer = options.sizer ?? new DirectorySizer();
    this.diskUsage = options.diskUsage ?? (mountPoint => getDiskUsage(mountPoint));
    this.cachesDir = expandPath(options.cachesDir ?? '~/Library/Caches');
    this.huggingFaceDir = expandPath(options.huggingFaceDir ?? '~/.cache/huggingface/hub');
    this.projectRoots = options.projectRoots ?? PROJECT_SEARCH_PATHS;
    this.home = expandPath(options.home ?? homeDirectory());
    this.now = options.now ?? Date.now;
  }

  /**
   * One entry per non-empty app cache directory, largest first.
   */
  async getAppCachesBreakdown(): Promise<AppCachesBreakdown> {
    const entries = await listDirectories(this.cachesDir);
    const limit = pLimit(LIMITS.BREAKDOWN_WORKERS);

    const measured = await Promise.all(
      entries.map(entry =>
        limit(async (): Promise<AppCacheInfo> => {
          const path = join(this.cachesDir, entry.name);
          const totals = await this.sizer.computeSizeCached(path);
          const { name, isBrowser } = appNameFromBundleId(entry.name);
          return {
            name,
            bundleId: entry.name,
            path,
            sizeBytes: totals.sizeBytes,
            fileCount: totals.fileCount,
            isBrowser,
          };
        })
      )
    );

    const apps = sortBySize(measured.filter(app => app.sizeBytes > 0));
    const browsers = apps.filter(app => app.isBrowser);
    return {
      apps,
      totalBytes: totalSize(apps),
      browsers,
      browserBytes: totalSize(browsers),
    };
  }

  /**
   * Cached Hugging Face models, largest first.
   */
  async getHuggingFaceBreakdown(): Promise<HuggingFaceBreakdown> {
    const entries = (await listDirectories(this.huggingFaceDir)).filter(entry =>
      entry.name.startsWith('models--')
    );
    const limit = pLimit(LIMITS.BREAKDOWN_WORKERS);

    const measured = await Promise.all(
      entries.map(entry =>
        limit(async (): Promise<HuggingFaceModel> => {
          const path = join(this.huggingFaceDir, entry.name);
          const totals = await this.sizer.computeSizeCached(path);
          return {
            name: modelNameFromCacheDir(entry.name),
            path,
            sizeBytes: totals.sizeBytes,
            fileCount: totals.fileCount,
          };
        })
      )
    );

    const models = sortBySize(measured.filter(model => model.sizeBytes > 0));
    return { models, totalBytes: totalSize(models) };
  }

  /**
   * Project-level node_modules under the usual project folders, largest
   * first. A project untouched for more than 180 days is inactive.
   */
  async getNodeModulesBreakdown(): Promise<NodeModulesBreakdown> {
    const roots = await this.projectSearchRoots();

    const found = new Set<string>();
    for (const root of roots) {
      for (const path of await this.findNodeModules(root)) found.add(path);
    }

    const limit = pLimit(LIMITS.BREAKDOWN_WORKERS);
    const measured = await Promise.all(
      [...found].map(nodeModulesPath =>
        limit(async (): Promise<NodeModulesProject | undefined> => {
          let mtimeMs: number;
          try {
            mtimeMs = (await fs.stat(nodeModulesPath)).mtimeMs;
          } catch {
            return undefined;
          }
          const projectPath = dirname(nodeModulesPath);
          const totals = await this.sizer.computeSizeCached(nodeModulesPath);
          const daysSinceModified = daysSince(mtimeMs, this.now());
          return {
            projectName: await readProjectName(projectPath),
            projectPath,
            nodeModulesPath,
            sizeBytes: totals.sizeBytes,
            fileCount: totals.fileCount,
            daysSinceModified,
            status: daysSinceModified > INACTIVE_AFTER_DAYS ? 'inactive' : 'active',
          };
        })
      )
    );

    const projects = sortBySize(
      measured.filter((project): project is NodeModulesProject => project !== undefined)
    );
    const inactive = projects.filter(project => project.status === 'inactive');
    return {
      projects,
      totalBytes: totalSize(projects),
      inactiveCount: inactive.length,
      inactiveBytes: totalSize(inactive),
    };
  }

  /** Existing project roots, plus top-level projects directly in home */
  private async projectSearchRoots(): Promise<string[]> {
    const roots: string[] = [];
    for (const raw of this.projectRoots) {
      const root = expandPath(raw);
      if (!roots.includes(root) && (await isDirectory(root))) roots.push(root);
    }

    for (const entry of await listDirectories(this.home)) {
      if (entry.name.startsWith('.')) continue;
      const candidate = join(this.home, entry.name);
      if (roots.includes(candidate)) continue;
      const isProject =
        (await fileExists(join(candidate, '.git'))) ||
        (await fileExists(join(candidate, 'package.json')));
      if (isProject) roots.push(candidate);
    }

    return roots;
  }

  /** node_modules directories below `root`, without descending into any of them */
  private async findNodeModules(root: string): Promise<string[]> {
    const crawler = new fdir()
      .withDirs()
      .withFullPaths()
      .withMaxDepth(NODE_MODULES_SEARCH_DEPTH - 1)
      .exclude((dirName, dirPath) => dirName.startsWith('.') || basename(dirname(dirPath)) === 'node_modules')
      .filter((path, isDir) => isDir && basename(path) === 'node_modules');

    const paths = await crawler.crawl(root).withPromise();
    // fdir ends directory paths with a separator
    return paths.map(path => path.replace(/[/\\]+$/, ''));
  }

  /**
   * Where used space goes, grouped the way System Settings shows it.
   * Whatever the groups do not account for is "System & Other".
   */
  async getStorageBreakdown(): Promise<StorageBreakdown> {
    const disk = await this.diskUsage('/');
    const limit = pLimit(LIMITS.BREAKDOWN_WORKERS);

    const grouped = await Promise.all(
      STORAGE_CATEGORIES.map(async category => {
        const paths: string[] = [];
        for (const raw of category.paths) {
          const path = expandPath(raw);
          if (await fileExists(path)) paths.push(path);
        }
        const sizes = await Promise.all(
          paths.map(path => limit(async () => (await this.sizer.computeSizeCached(path)).sizeBytes))
        );
        return { category, path: paths[0], sizeBytes: sizes.reduce((sum, size) => sum + size, 0) };
      })
    );

    const percentOf = (bytes: number): number =>
      disk.usedBytes > 0 ? Math.round((bytes / disk.usedBytes) * 1000) / 10 : 0;

    const categories: StorageEntry[] = grouped
      .filter(group => group.sizeBytes > 0)
      .map(group => ({
        id: group.category.id,
        name: group.category.name,
        sizeBytes: group.sizeBytes,
        percent: percentOf(group.sizeBytes),
        path: group.path,
      }));

    const other = disk.usedBytes - totalSize(categories);
    if (other > 0) {
      categories.push({ id: 'other', name: 'System & Other', sizeBytes: other, percent: percentOf(other) });
    }

    return { disk, categories: sortBySize(categories) };
  }

  /**
   * Total size of a directory plus its 20 largest immediate children.
   */
  async analyzeDirectory(rawPath: string): Promise<DirectoryAnalysis> {
    const path = expandPath(rawPath);

    let isDir: boolean;
    let fileSize: number;
    try {
      const stats = await fs.stat(path);
      isDir = stats.isDirectory();
      fileSize = stats.size;
    } catch {
      return { kind: 'missing', path, error: `Path does not exist: ${rawPath}` };
    }

    if (!isDir) {
      return { kind: 'file', path, sizeBytes: fileSize };
    }

    const totals = await this.sizer.computeSizeCached(path);

    let entries: Dirent[] = [];
    try {
      entries = await fs.readdir(path, { withFileTypes: true });
    } catch {
      // Listing denied: report the total without children
    }

    const limit = pLimit(LIMITS.BREAKDOWN_WORKERS);
    const children = await Promise.all(
      entries.map(entry =>
        limit(async (): Promise<DirectoryChild> => {
          const childPath = join(path, entry.name);
          if (entry.isDirectory()) {
            const child = await this.sizer.computeSizeCached(childPath);
            return { name: entry.name, path: childPath, sizeBytes: child.sizeBytes, isDirectory: true };
          }
          let sizeBytes = 0;
          if (entry.isFile()) {
            try {
              sizeBytes = (await fs.lstat(childPath)).size;
            } catch {
              sizeBytes = 0;
            }
          }
          return { name: entry.name, path: childPath, sizeBytes, isDirectory: false };
        })
      )
    );

    return {
      kind: 'directory',
      path,
      sizeBytes: totals.sizeBytes,
      fileCount: totals.fileCount,
      dirCount: totals.dirCount,
      children: sortBySize(children.filter(child => child.sizeBytes > 0)).slice(0, TOP_CHILDREN),
    };
  }
}
