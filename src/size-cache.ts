/**
 * Time-bounded cache of directory sizes
 *
 * Walking ~/Library/Caches twice in one session is slow, so measured
 * totals are kept for a few minutes keyed by absolute path. Entries are
 * overwritten when they expire and the path is measured again.
 *
 * Workers share one cache. Map operations run on the event loop and never
 * interleave, so reads and writes need no further locking; concurrent
 * requests for the same key share a single in-flight walk.
 */

import { isSameOrDescendant } from './paths.js';
import { LIMITS, type SizeTotals } from './types.js';

export interface SizeCacheEntry extends SizeTotals {
  /** Epoch milliseconds when the totals were measured */
  computedAt: number;
}

export interface SizeCacheOptions {
  /** Entry lifetime in milliseconds (default 5 minutes) */
  ttlMs?: number;

  /** Clock, replaceable in tests */
  now?: () => number;
}

export class SizeCache {
  private readonly entries = new Map<string, SizeCacheEntry>();
  private readonly pending = new Map<string, Promise<SizeTotals>>();
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: SizeCacheOptions = {}) {
    this.ttlMs = options.ttlMs ?? LIMITS.CACHE_TTL_MS;
    this.now = options.now ?? Date.now;
  }

  /** Number of stored entries, fresh or not */
  get size(): number {
    return this.entries.size;
  }

  /**
   * Fresh totals for a key, or undefined when missing or expired.
   */
  get(key: string): SizeTotals | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (this.now() - entry.computedAt >= this.ttlMs) return undefined;
    return { sizeBytes: entry.sizeBytes, fileCount: entry.fileCount, dirCount: entry.dirCount };
  }

  /**
   * Store totals for a key, replacing any previous entry.
   */
  set(key: string, totals: SizeTotals): void {
    this.entries.set(key, {
      sizeBytes: totals.sizeBytes,
      fileCount: totals.fileCount,
      dirCount: totals.dirCount,
      computedAt: this.now(),
    });
  }

  /**
   * Return fresh totals, or run `compute` and store its result.
   * Callers asking for the same key while a computation runs get its promise.
   */
  async getOrCompute(key: string, compute: () => Promise<SizeTotals>): Promise<SizeTotals> {
    const cached = this.get(key);
    if (cached) return cached;

    const inFlight = this.pending.get(key);
    if (inFlight) return inFlight;

    const task = compute()
      .then(totals => {
        this.set(key, totals);
        return totals;
      })
      .finally(() => {
        this.pending.delete(key);
      });

    this.pending.set(key, task);
    return task;
  }

  /**
   * Age an entry past its TTL so the next lookup recomputes it.
   */
  expire(key: string): void {
    const entry = this.entries.get(key);
    if (entry) {
      this.entries.set(key, { ...entry, computedAt: this.now() - this.ttlMs });
    }
  }

  /**
   * Drop the entry for a path and every entry below it.
   */
  invalidate(path: string): void {
    for (const key of [...this.entries.keys()]) {
      if (isSameOrDescendant(key, path)) {
        this.entries.delete(key);
      }
    }
  }

  clear(): void {
    this.entries.clear();
  }
}
