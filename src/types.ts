/**
 * Core type definitions for diskward
 *
 * These types describe the domain model shared by the scanner, the cleaner
 * and every presentation layer that consumes them. Records produced by the
 * core are plain readonly objects: built once, never mutated afterwards.
 */

/**
 * How much judgement a category needs before it is cleaned.
 *
 * - safe: no data loss, tools re-create the files on demand
 * - review: recoverable by hand, the user should look first
 * - risky: potential data loss
 */
export type RiskLevel = 'safe' | 'review' | 'risky';

export const RISK_LEVELS: readonly RiskLevel[] = ['safe', 'review', 'risky'];

/** External tools whose own accounting replaces a directory walk. */
export type ExternalTool = 'docker';

/** Fields every category carries, whatever its scan strategy. */
interface CategoryBase {
  /** Unique key, e.g. "npm_cache" */
  id: string;

  /** Human-readable name */
  name: string;

  riskLevel: RiskLevel;

  /** Shell command that cleans the category natively (e.g. "npm cache clean --force") */
  cleanupCommand?: string;

  /** What the category contains */
  description?: string;

  /** What happens once it is deleted */
  consequences?: string;

  /** How to get it back */
  recovery?: string;
}

/**
 * A category measured at a fixed list of candidate locations.
 * Paths may contain `~` and environment variables.
 */
export interface FixedCategory extends CategoryBase {
  isRecursive?: false;
  paths: string[];

  /**
   * Set when the on-disk footprint is misleading and an external tool
   * reports the real usage (Docker keeps everything inside a VM disk image).
   */
  externalTool?: ExternalTool;
}

/**
 * A category discovered by walking search roots for directories with a
 * given name (node_modules, .venv, target, ...).
 */
export interface RecursiveCategory extends CategoryBase {
  isRecursive: true;

  /** Glob-style patterns such as "**\/node_modules"; only the last segment is matched */
  globPatterns: string[];

  /** Directories to search from */
  searchRoots: string[];

  /** Matches smaller than this are ignored */
  minSizeBytes: number;
}

export type Category = FixedCategory | RecursiveCategory;

/**
 * One measurement of a category (or of a single path within one).
 */
export interface ScanResult {
  categoryId: string;
  categoryName: string;

  /** Path that was measured, or a representative path for aggregates */
  path: string;

  sizeBytes: number;
  fileCount: number;
  dirCount: number;
  riskLevel: RiskLevel;

  /** Whether anything was found on disk */
  exists: boolean;

  error?: string;
}

/** Byte size plus entry counts of a directory tree. */
export interface SizeTotals {
  sizeBytes: number;
  fileCount: number;
  dirCount: number;
}

/**
 * Snapshot of a volume's capacity.
 * usedBytes + freeBytes may be less than totalBytes (reserved blocks).
 */
export interface DiskUsage {
  totalBytes: number;
  usedBytes: number;
  freeBytes: number;
  mountPoint: string;
}

/**
 * Outcome of one cleanup attempt on a category.
 */
export interface CleanupResult {
  categoryId: string;
  path: string;
  bytesFreed: number;
  filesDeleted: number;
  success: boolean;
  error?: string;
  dryRun: boolean;
}

/** Result of deleting a single path. */
export interface PathDeletion {
  bytesFreed: number;
  filesDeleted: number;
  error?: string;
}

/**
 * Result of a drill-down deletion (one Docker image, one project's
 * node_modules, one app cache, ...).
 */
export interface ItemDeletionResult {
  success: boolean;
  dryRun: boolean;
  path?: string;
  bytesFreed: number;
  filesDeleted: number;
  /** Command that was (or would be) run, for tool-backed deletions */
  command?: string;
  error?: string;
}

/** Pre-flight verdict for a cleanup request. */
export interface CleanupValidation {
  valid: boolean;
  error?: string;
}

/**
 * Complete disk analysis: volume usage plus aggregated category results.
 */
export interface Analysis {
  timestamp: Date;
  diskUsage: DiskUsage;
  scanResults: ScanResult[];
}

/**
 * Progress callback for category scans. Invoked once per completed
 * category, in completion order.
 */
export type ScanProgressCallback = (categoryName: string, completed: number, total: number) => void;

/**
 * Options for a full scan.
 */
export interface ScanAllOptions {
  /** Include recursive developer categories (node_modules, venvs, ...) */
  includeDev?: boolean;

  /** Size of the worker pool for fixed-path categories */
  maxWorkers?: number;

  onProgress?: ScanProgressCallback;
}

/**
 * Category detail used by `explain`-style views.
 */
export interface CategoryExplanation {
  id: string;
  name: string;
  riskLevel: RiskLevel;
  paths: string[];
  isRecursive: boolean;
  globPatterns: string[];
  searchRoots: string[];
  minSizeBytes: number;
  cleanupCommand?: string;
  description?: string;
  consequences?: string;
  recovery?: string;
}

/**
 * Limits applied by the scanner and the cleaner.
 */
export const LIMITS = {
  /** Default depth for size walks */
  SIZE_MAX_DEPTH: 20,
  /** Default depth for pattern discovery */
  DISCOVERY_MAX_DEPTH: 15,
  /** Default worker pool size */
  DEFAULT_WORKERS: 4,
  /** Pool size for drill-down breakdowns */
  BREAKDOWN_WORKERS: 6,
  /** Largest cleanup accepted in one request (decimal, like macOS) */
  MAX_CLEANUP_BYTES: 100 * 1000 ** 3,
  /** Size cache time-to-live */
  CACHE_TTL_MS: 5 * 60 * 1000,
  /** Timeout for bulk native cleanup commands */
  BULK_COMMAND_TIMEOUT_MS: 300 * 1000,
  /** Timeout for single-item deletions */
  ITEM_COMMAND_TIMEOUT_MS: 60 * 1000,
} as const;
