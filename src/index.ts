/**
 * diskward - Public API
 *
 * The CLI is a thin layer over these modules; the same scanner and
 * cleaner can be driven from other tools.
 *
 * @example
 * ```typescript
 * import { Scanner, Cleaner, safeItems } from 'diskward';
 *
 * const scanner = new Scanner();
 * const results = await scanner.scanAll({ includeDev: true });
 *
 * const cleaner = new Cleaner({ registry: scanner.registry, sizer: scanner.sizer });
 * for (const item of safeItems(results)) {
 *   console.log(await cleaner.cleanCategory(item.categoryId, true));
 * }
 * ```
 */

// Core types
export type {
  RiskLevel,
  ExternalTool,
  Category,
  FixedCategory,
  RecursiveCategory,
  ScanResult,
  SizeTotals,
  DiskUsage,
  CleanupResult,
  PathDeletion,
  ItemDeletionResult,
  CleanupValidation,
  Analysis,
  ScanProgressCallback,
  ScanAllOptions,
  CategoryExplanation,
} from './types.js';
export { RISK_LEVELS, LIMITS } from './types.js';

// Core modules
export { expandPath, homeDirectory, isSameOrDescendant, isStrictDescendant } from './paths.js';
export { SizeCache, type SizeCacheEntry, type SizeCacheOptions } from './size-cache.js';
export { DirectorySizer, computeDirectorySize } from './directory-size.js';
export {
  findMatchingDirectories,
  collectMatchingDirectories,
  patternNameFromGlob,
  SKIP_DIRECTORIES,
} from './pattern-discovery.js';
export { CategoryRegistry, loadCategories, parseCategory } from './categories.js';
export {
  Scanner,
  aggregate,
  aggregateRecursive,
  type ScannerOptions,
  type DockerBreakdownSource,
  type DiskUsageProvider,
} from './scanner.js';
export {
  Cleaner,
  BLOCKED_PATHS,
  isDockerItemType,
  isDockerPruneType,
  type CleanerOptions,
  type DockerItemType,
  type DockerPruneType,
  type CleanupProgressCallback,
  type PathCleanedCallback,
} from './cleaner.js';
export {
  ProtectionStore,
  parseProtectionConfig,
  type ProtectionConfig,
  type ProtectionUpdate,
  type ProtectionList,
  type ProtectedPathInfo,
} from './protection.js';

// Collaborators
export { getDiskUsage, parseDiskutilInfo, totalGb, usedGb, freeGb, usedPercent } from './disk-usage.js';
export {
  DockerClient,
  parseDockerSize,
  type DockerBreakdown,
  type DockerImage,
  type DockerContainer,
  type DockerVolume,
} from './docker.js';
export { createCommandRunner, type CommandRunner, type CommandOutcome, type CommandOptions } from './exec.js';

// Analysis and drill-down
export {
  safeItems,
  reviewItems,
  riskyItems,
  totalSafeBytes,
  totalReviewBytes,
  totalCleanableBytes,
  getRecommendations,
  getSafeCleanupTargets,
  estimateCleanupSavings,
  filterByMinimumSize,
  getTopCategories,
  summarizeCleanup,
  type Recommendations,
  type CleanupSummary,
} from './analyzer.js';
export {
  BreakdownService,
  PROJECT_SEARCH_PATHS,
  appNameFromBundleId,
  modelNameFromCacheDir,
  type BreakdownOptions,
  type AppCachesBreakdown,
  type AppCacheInfo,
  type HuggingFaceBreakdown,
  type HuggingFaceModel,
  type NodeModulesBreakdown,
  type NodeModulesProject,
  type StorageBreakdown,
  type StorageEntry,
  type DirectoryAnalysis,
  type DirectoryChild,
} from './breakdown.js';
export { findLargeFiles, findOldFiles, type FoundFile, type OldFile } from './finders.js';

// Ambient
export { DiskwardError, classifyError, errorMessage, describeDeletionError, type ErrorKind } from './errors.js';
export { loadSettings, type DiskwardSettings } from './config.js';
export { formatBytes, parseSize, sortBySize, totalSize, toGigabytes, fileExists, isDirectory } from './utils.js';
