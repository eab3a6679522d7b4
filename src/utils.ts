/**
 * Utility functions for diskward
 *
 * Pure helpers for formatting and parsing sizes, plus a couple of
 * filesystem checks that never throw.
 */

import { promises as fs } from 'fs';
import type { ScanResult } from './types.js';

const DECIMAL_UNITS = [
  { unit: 'TB', factor: 1000 ** 4 },
  { unit: 'GB', factor: 1000 ** 3 },
  { unit: 'MB', factor: 1000 ** 2 },
  { unit: 'KB', factor: 1000 },
] as const;

/**
 * Format bytes into a human-readable string.
 * Uses decimal units (1 GB = 1000³ bytes) to match Finder and System Settings.
 *
 * @param bytes - Number of bytes to format
 * @returns Formatted string like "1.2 GB" or "456 B"
 */
export function formatBytes(bytes: number): string {
  for (const { unit, factor } of DECIMAL_UNITS) {
    if (bytes >= factor) {
      return `${(bytes / factor).toFixed(1)} ${unit}`;
    }
  }
  return `${Math.max(0, Math.round(bytes))} B`;
}

/**
 * Parse a human-readable size string into bytes.
 * Supports "1gb", "500MB", "10 kb", plain numbers are bytes.
 *
 * @param sizeStr - Size string to parse
 * @returns Size in bytes, or undefined if invalid
 */
export function parseSize(sizeStr: string): number | undefined {
  const match = sizeStr.trim().toLowerCase().match(/^(\d+(?:\.\d+)?)\s*(b|kb|mb|gb|tb)?$/);
  if (!match) return undefined;

  const value = parseFloat(match[1] ?? '0');
  const unit = match[2] ?? 'b';

  const multipliers: Record<string, number> = {
    b: 1,
    kb: 1000,
    mb: 1000 ** 2,
    gb: 1000 ** 3,
    tb: 1000 ** 4,
  };

  return Math.floor(value * (multipliers[unit] ?? 1));
}

/**
 * Size in decimal gigabytes.
 */
export function toGigabytes(bytes: number): number {
  return bytes / 1000 ** 3;
}

/**
 * Sort scan results largest first.
 * Returns a new array; the input is left untouched.
 */
export function sortBySize<T extends { sizeBytes: number }>(items: readonly T[]): T[] {
  return [...items].sort((a, b) => b.sizeBytes - a.sizeBytes);
}

/**
 * Sum the sizes of a list of results.
 */
export function totalSize(items: readonly Pick<ScanResult, 'sizeBytes'>[]): number {
  return items.reduce((sum, item) => sum + item.sizeBytes, 0);
}

/**
 * Truncate a string to fit within a maximum length.
 * Adds ellipsis if truncated.
 */
export function truncate(str: string, maxLength: number): string {
  if (str.length <= maxLength) return str;
  if (maxLength <= 3) return str.slice(0, maxLength);
  return str.slice(0, maxLength - 3) + '...';
}

/**
 * Safe existence check that doesn't throw. Follows symlinks.
 *
 * @param path - Path to check
 * @returns True if something exists at the path
 */
export async function fileExists(path: string): Promise<boolean> {
  try {
    await fs.access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * True when the path exists and is a directory (symlinks followed).
 */
export async function isDirectory(path: string): Promise<boolean> {
  try {
    const stats = await fs.stat(path);
    return stats.isDirectory();
  } catch {
    return false;
  }
}

/**
 * Whole days elapsed since a timestamp in milliseconds.
 */
export function daysSince(timestampMs: number, now: number = Date.now()): number {
  return Math.floor((now - timestampMs) / (1000 * 60 * 60 * 24));
}
