import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { utimesSync } from 'fs';
import { join } from 'path';
import { findLargeFiles, findOldFiles } from '../src/finders.js';
import { cleanupTestDir, createTestDir, writeSizedFile } from './helpers.js';

const DAY_MS = 24 * 60 * 60 * 1000;

describe('findLargeFiles', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = createTestDir();
    writeSizedFile(join(testDir, 'big.bin'), 2000);
    writeSizedFile(join(testDir, 'small.bin'), 10);
    writeSizedFile(join(testDir, 'nested', 'deep', 'mid.bin'), 500);
  });

  afterEach(() => {
    cleanupTestDir(testDir);
  });

  it('returns files at or above the threshold, largest first', async () => {
    const found = await findLargeFiles({ root: testDir, minSizeBytes: 500 });

    expect(found).toEqual([
      { path: join(testDir, 'big.bin'), sizeBytes: 2000 },
      { path: join(testDir, 'nested', 'deep', 'mid.bin'), sizeBytes: 500 },
    ]);
  });

  it('caps the number of results', async () => {
    const found = await findLargeFiles({ root: testDir, minSizeBytes: 1, maxResults: 1 });

    expect(found.map(file => file.sizeBytes)).toEqual([2000]);
  });

  it('returns nothing for a missing root', async () => {
    expect(await findLargeFiles({ root: join(testDir, 'missing'), minSizeBytes: 1 })).toEqual([]);
  });
});

describe('findOldFiles', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = createTestDir();
  });

  afterEach(() => {
    cleanupTestDir(testDir);
  });

  it('returns files not accessed within the window', async () => {
    const now = Date.now();
    const stale = join(testDir, 'installer.dmg');
    const fresh = join(testDir, 'today.pdf');
    writeSizedFile(stale, 300);
    writeSizedFile(fresh, 900);
    const accessed = Math.floor((now - 400 * DAY_MS) / 1000) - 60;
    utimesSync(stale, accessed, accessed);

    const found = await findOldFiles({ root: testDir, days: 180, now: () => now });

    expect(found).toEqual([{ path: stale, sizeBytes: 300, lastAccessedDays: 400 }]);
  });
});
