import { describe, it, expect, vi } from 'vitest';
import { SizeCache } from '../src/size-cache.js';
import type { SizeTotals } from '../src/types.js';

const totals = (sizeBytes: number): SizeTotals => ({ sizeBytes, fileCount: 1, dirCount: 0 });

function clockedCache(ttlMs = 1000): { cache: SizeCache; advance: (ms: number) => void } {
  let now = 0;
  const cache = new SizeCache({ ttlMs, now: () => now });
  return {
    cache,
    advance: ms => {
      now += ms;
    },
  };
}

describe('SizeCache', () => {
  it('returns stored totals until the TTL has elapsed', () => {
    const { cache, advance } = clockedCache(1000);
    cache.set('/a', totals(10));

    advance(999);
    expect(cache.get('/a')).toEqual(totals(10));

    advance(1);
    expect(cache.get('/a')).toBeUndefined();
  });

  it('returns undefined for unknown keys', () => {
    const { cache } = clockedCache();
    expect(cache.get('/missing')).toBeUndefined();
  });

  it('overwrites an entry on set', () => {
    const { cache } = clockedCache();
    cache.set('/a', totals(1));
    cache.set('/a', totals(2));

    expect(cache.get('/a')).toEqual(totals(2));
    expect(cache.size).toBe(1);
  });

  it('expire makes the next lookup miss', () => {
    const { cache } = clockedCache();
    cache.set('/a', totals(1));
    cache.expire('/a');

    expect(cache.get('/a')).toBeUndefined();
  });

  it('invalidate drops the path and its descendants only', () => {
    const { cache } = clockedCache();
    cache.set('/a', totals(1));
    cache.set('/a/b', totals(2));
    cache.set('/ab', totals(3));

    cache.invalidate('/a');

    expect(cache.get('/a')).toBeUndefined();
    expect(cache.get('/a/b')).toBeUndefined();
    expect(cache.get('/ab')).toEqual(totals(3));
  });

  it('getOrCompute stores the computed totals', async () => {
    const { cache } = clockedCache();
    const compute = vi.fn(async () => totals(42));

    expect(await cache.getOrCompute('/a', compute)).toEqual(totals(42));
    expect(await cache.getOrCompute('/a', compute)).toEqual(totals(42));
    expect(compute).toHaveBeenCalledTimes(1);
  });

  it('shares one computation between concurrent callers', async () => {
    const { cache } = clockedCache();
    let release: (value: SizeTotals) => void = () => undefined;
    const compute = vi.fn(
      () =>
        new Promise<SizeTotals>(resolve => {
          release = resolve;
        })
    );

    const first = cache.getOrCompute('/a', compute);
    const second = cache.getOrCompute('/a', compute);
    release(totals(7));

    expect(await first).toEqual(totals(7));
    expect(await second).toEqual(totals(7));
    expect(compute).toHaveBeenCalledTimes(1);
  });

  it('recomputes after a failed computation', async () => {
    const { cache } = clockedCache();
    const failing = vi.fn(async (): Promise<SizeTotals> => {
      throw new Error('boom');
    });

    await expect(cache.getOrCompute('/a', failing)).rejects.toThrow('boom');
    expect(await cache.getOrCompute('/a', async () => totals(5))).toEqual(totals(5));
  });
});
