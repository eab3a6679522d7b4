/**
 * Analysis helpers
 *
 * Pure functions over an Analysis or a list of cleanup results. Nothing
 * here touches the filesystem.
 */

import type { Analysis, CleanupResult, RiskLevel, ScanResult } from './types.js';
import { sortBySize, totalSize } from './utils.js';

function itemsAt(results: readonly ScanResult[], level: RiskLevel): ScanResult[] {
  return results.filter(r => r.riskLevel === level && r.sizeBytes > 0);
}

/** Safe results that hold something */
export function safeItems(results: readonly ScanResult[]): ScanResult[] {
  return itemsAt(results, 'safe');
}

export function reviewItems(results: readonly ScanResult[]): ScanResult[] {
  return itemsAt(results, 'review');
}

export function riskyItems(results: readonly ScanResult[]): ScanResult[] {
  return itemsAt(results, 'risky');
}

export function totalSafeBytes(analysis: Analysis): number {
  return totalSize(safeItems(analysis.scanResults));
}

export function totalReviewBytes(analysis: Analysis): number {
  return totalSize(reviewItems(analysis.scanResults));
}

/** Everything found, whatever its risk */
export function totalCleanableBytes(analysis: Analysis): number {
  return totalSize(analysis.scanResults.filter(r => r.sizeBytes > 0));
}

export interface Recommendations {
  safe: ScanResult[];
  review: ScanResult[];
  risky: ScanResult[];
}

export function getRecommendations(analysis: Analysis): Recommendations {
  return {
    safe: safeItems(analysis.scanResults),
    review: reviewItems(analysis.scanResults),
    risky: riskyItems(analysis.scanResults),
  };
}

/** Safe targets, largest first */
export function getSafeCleanupTargets(analysis: Analysis): ScanResult[] {
  return sortBySize(safeItems(analysis.scanResults));
}

/**
 * Bytes a cleanup could free: safe items, plus review items when asked.
 */
export function estimateCleanupSavings(analysis: Analysis, includeReview = false): number {
  const safe = totalSafeBytes(analysis);
  return includeReview ? safe + totalReviewBytes(analysis) : safe;
}

export function filterByMinimumSize(results: readonly ScanResult[], minBytes: number): ScanResult[] {
  return results.filter(r => r.sizeBytes >= minBytes);
}

/** The `topN` largest non-empty categories */
export function getTopCategories(analysis: Analysis, topN = 10): ScanResult[] {
  return sortBySize(analysis.scanResults.filter(r => r.sizeBytes > 0)).slice(0, topN);
}

export interface CleanupSummary {
  /** Bytes freed by successful cleanups only */
  totalBytesFreed: number;
  successCount: number;
  failureCount: number;
}

export function summarizeCleanup(results: readonly CleanupResult[]): CleanupSummary {
  const succeeded = results.filter(r => r.success);
  return {
    totalBytesFreed: succeeded.reduce((sum, r) => sum + r.bytesFreed, 0),
    successCount: succeeded.length,
    failureCount: results.length - succeeded.length,
  };
}
