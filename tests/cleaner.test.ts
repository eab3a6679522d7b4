/**
 * Test suite for cleanup execution
 *
 * Every test works inside a temporary directory with an injected category
 * table, protection file and command runner.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync, mkdirSync, realpathSync, writeFileSync } from 'fs';
import { homedir } from 'os';
import { join } from 'path';
import { CategoryRegistry } from '../src/categories.js';
import { Cleaner } from '../src/cleaner.js';
import { DirectorySizer } from '../src/directory-size.js';
import { expandPath } from '../src/paths.js';
import { ProtectionStore } from '../src/protection.js';
import { SizeCache } from '../src/size-cache.js';
import type { DockerBreakdown } from '../src/docker.js';
import {
  cleanupTestDir,
  createTestDir,
  dockerBreakdown,
  fakeDocker,
  FakeRunner,
  outcome,
  scanResult,
  writeSizedFile,
} from './helpers.js';

let testDir: string;

beforeEach(() => {
  testDir = createTestDir();
});

afterEach(() => {
  vi.unstubAllEnvs();
  cleanupTestDir(testDir);
});

interface Setup {
  categories?: unknown[];
  runner?: FakeRunner;
  docker?: DockerBreakdown;
}

function createCleaner(setup: Setup = {}): Cleaner {
  const sizer = new DirectorySizer(new SizeCache());
  return new Cleaner({
    registry: new CategoryRegistry(setup.categories ?? []),
    sizer,
    protection: new ProtectionStore(join(testDir, 'settings', 'config.json'), sizer),
    runner: setup.runner ?? new FakeRunner(),
    docker: fakeDocker(setup.docker ?? dockerBreakdown({ available: false, error: 'Docker is not running' })),
    cachesDir: join(testDir, 'Caches'),
    huggingFaceDir: join(testDir, 'hub'),
  });
}

// Helper: a cache directory holding one six-byte file
function npmCache(): { dir: string; file: string } {
  const dir = join(testDir, 'npm', '_cacache');
  const file = join(dir, 'index-v5', 'blob');
  mkdirSync(join(dir, 'index-v5'), { recursive: true });
  writeFileSync(file, 'abcdef');
  return { dir, file };
}

// ============================================
// cleanCategory Tests
// ============================================

describe('cleanCategory', () => {
  it('measures without deleting on a dry run', async () => {
    const { dir, file } = npmCache();
    const cleaner = createCleaner({
      categories: [{ id: 'npm_cache', name: 'npm Cache', riskLevel: 'safe', paths: [dir] }],
    });

    const result = await cleaner.cleanCategory('npm_cache', true);

    expect(result).toEqual({
      categoryId: 'npm_cache',
      path: dir,
      bytesFreed: 6,
      filesDeleted: 1,
      success: true,
      error: undefined,
      dryRun: true,
    });
    expect(existsSync(file)).toBe(true);
  });

  it('deletes the files on a real run', async () => {
    const { dir, file } = npmCache();
    const cleaner = createCleaner({
      categories: [{ id: 'npm_cache', name: 'npm Cache', riskLevel: 'safe', paths: [dir] }],
    });

    const result = await cleaner.cleanCategory('npm_cache', false);

    expect(result.success).toBe(true);
    expect(result.bytesFreed).toBe(6);
    expect(result.filesDeleted).toBe(1);
    expect(existsSync(file)).toBe(false);
    expect(existsSync(dir)).toBe(false);
  });

  it('reports each cleaned path', async () => {
    const { dir } = npmCache();
    const cleaner = createCleaner({
      categories: [{ id: 'npm_cache', name: 'npm Cache', riskLevel: 'safe', paths: [dir] }],
    });
    const onPath = vi.fn();

    await cleaner.cleanCategory('npm_cache', true, onPath);

    expect(onPath).toHaveBeenCalledWith(dir, 6);
  });

  it('skips declared paths that do not exist', async () => {
    const { dir } = npmCache();
    const missing = join(testDir, 'npm', '_logs');
    const cleaner = createCleaner({
      categories: [{ id: 'npm_cache', name: 'npm Cache', riskLevel: 'safe', paths: [missing, dir] }],
    });

    const result = await cleaner.cleanCategory('npm_cache', true);

    expect(result).toMatchObject({ path: dir, bytesFreed: 6, success: true });
  });

  it('refuses to delete the home directory', async () => {
    const home = join(testDir, 'home');
    writeSizedFile(join(home, 'keep.txt'), 3);
    vi.stubEnv('HOME', home);
    const cleaner = createCleaner({
      categories: [{ id: 'everything', name: 'Everything', riskLevel: 'risky', paths: ['~'] }],
    });

    const result = await cleaner.cleanCategory('everything', false);

    expect(result.success).toBe(false);
    expect(result.error).toBe(`Blocked path: ${home}`);
    expect(result.bytesFreed).toBe(0);
    expect(existsSync(join(home, 'keep.txt'))).toBe(true);
  });

  it('fails for an unknown category', async () => {
    const result = await createCleaner().cleanCategory('nope', true);

    expect(result).toMatchObject({ categoryId: 'nope', path: '', success: false, error: 'Unknown category: nope' });
  });

  it('refuses a protected category', async () => {
    const { dir, file } = npmCache();
    const cleaner = createCleaner({
      categories: [{ id: 'npm_cache', name: 'npm Cache', riskLevel: 'safe', paths: [dir] }],
    });
    await cleaner.protection.addCategory('npm_cache');

    const result = await cleaner.cleanCategory('npm_cache', false);

    expect(result).toMatchObject({ path: dir, success: false, error: "Category 'npm_cache' is protected" });
    expect(existsSync(file)).toBe(true);
  });

  it('skips protected paths and reports them', async () => {
    const { dir, file } = npmCache();
    const other = join(testDir, 'npm', '_logs');
    writeSizedFile(join(other, 'debug.log'), 4);
    const cleaner = createCleaner({
      categories: [{ id: 'npm_cache', name: 'npm Cache', riskLevel: 'safe', paths: [dir, other] }],
    });
    await cleaner.protection.addPath(dir);

    const result = await cleaner.cleanCategory('npm_cache', false);

    expect(result.success).toBe(false);
    expect(result.error).toBe(`Protected path: ${dir}`);
    expect(result.bytesFreed).toBe(4);
    expect(result.path).toBe(other);
    expect(existsSync(file)).toBe(true);
    expect(existsSync(other)).toBe(false);
  });

  it('refuses a directory that holds a protected path', async () => {
    const caches = join(testDir, 'Caches');
    const keep = join(caches, 'keep');
    writeSizedFile(join(keep, 'data.bin'), 3);
    writeSizedFile(join(caches, 'other', 'tmp.bin'), 2);
    const cleaner = createCleaner({
      categories: [{ id: 'application_caches', name: 'Application Caches', riskLevel: 'safe', paths: [caches] }],
    });
    await cleaner.protection.addPath(keep);

    const result = await cleaner.cleanCategory('application_caches', false);

    expect(result).toEqual({
      categoryId: 'application_caches',
      path: caches,
      bytesFreed: 0,
      filesDeleted: 0,
      success: false,
      error: `Protected path inside ${caches}: ${keep}`,
      dryRun: false,
    });
    expect(existsSync(join(keep, 'data.bin'))).toBe(true);
    expect(existsSync(join(caches, 'other', 'tmp.bin'))).toBe(true);
  });

  describe('native cleanup commands', () => {
    const npm = (paths: string[]): unknown[] => [
      { id: 'npm_cache', name: 'npm Cache', riskLevel: 'safe', paths, cleanupCommand: 'npm cache clean --force' },
    ];

    it('previews by measuring the declared paths', async () => {
      const { dir, file } = npmCache();
      const runner = new FakeRunner();
      const cleaner = createCleaner({ categories: npm([dir]), runner });

      const result = await cleaner.cleanCategory('npm_cache', true);

      expect(result).toMatchObject({ path: dir, bytesFreed: 6, filesDeleted: 1, success: true, dryRun: true });
      expect(runner.shellCalls).toEqual([]);
      expect(existsSync(file)).toBe(true);
    });

    it('previews the command when nothing is on disk', async () => {
      const cleaner = createCleaner({ categories: npm([join(testDir, 'absent')]) });

      const result = await cleaner.cleanCategory('npm_cache', true);

      expect(result).toMatchObject({
        path: '[native command: npm cache clean --force]',
        bytesFreed: 0,
        success: true,
      });
    });

    it('runs the command instead of deleting files', async () => {
      const { file } = npmCache();
      const runner = new FakeRunner();
      const cleaner = createCleaner({ categories: npm([join(testDir, 'npm', '_cacache')]), runner });

      const result = await cleaner.cleanCategory('npm_cache', false);

      expect(result).toEqual({
        categoryId: 'npm_cache',
        path: '[native command: npm cache clean --force]',
        bytesFreed: 0,
        filesDeleted: 0,
        success: true,
        dryRun: false,
      });
      expect(runner.shellCalls).toEqual([{ command: 'npm cache clean --force', timeoutMs: 300_000 }]);
      expect(existsSync(file)).toBe(true);
    });

    it('does not run the command when a declared path holds a protected path', async () => {
      const { dir, file } = npmCache();
      const runner = new FakeRunner();
      const cleaner = createCleaner({ categories: npm([dir]), runner });
      await cleaner.protection.addPath(file);

      const result = await cleaner.cleanCategory('npm_cache', false);

      expect(result).toMatchObject({ success: false, error: `Protected path inside ${dir}: ${file}` });
      expect(runner.shellCalls).toEqual([]);
      expect(existsSync(file)).toBe(true);
    });

    it('reports the command stderr on failure', async () => {
      const runner = new FakeRunner(undefined, outcome({ exitCode: 1, stderr: 'npm ERR! busy\n' }));
      const cleaner = createCleaner({ categories: npm([testDir]), runner });

      const result = await cleaner.cleanCategory('npm_cache', false);

      expect(result.success).toBe(false);
      expect(result.error).toBe('npm ERR! busy');
    });

    it('reports a timeout', async () => {
      const runner = new FakeRunner(undefined, outcome({ exitCode: -1, timedOut: true }));
      const cleaner = createCleaner({ categories: npm([testDir]), runner });

      const result = await cleaner.cleanCategory('npm_cache', false);

      expect(result.error).toBe('Command timed out after 300 seconds');
    });
  });

  it('cleans the matches of a recursive category above its minimum', async () => {
    writeSizedFile(join(testDir, 'projects', 'small', 'node_modules', 'a.bin'), 5);
    writeSizedFile(join(testDir, 'projects', 'big', 'node_modules', 'a.bin'), 50);
    const cleaner = createCleaner({
      categories: [
        {
          id: 'node_modules',
          name: 'Node Modules',
          riskLevel: 'safe',
          isRecursive: true,
          globPatterns: ['**/node_modules'],
          searchRoots: [join(testDir, 'projects')],
          minSizeBytes: 10,
        },
      ],
    });

    const result = await cleaner.cleanCategory('node_modules', false);

    expect(result).toMatchObject({
      path: join(testDir, 'projects', 'big', 'node_modules'),
      bytesFreed: 50,
      success: true,
    });
    expect(existsSync(join(testDir, 'projects', 'big', 'node_modules'))).toBe(false);
    expect(existsSync(join(testDir, 'projects', 'small', 'node_modules'))).toBe(true);
  });
});

// ============================================
// cleanSafeItems Tests
// ============================================

describe('cleanSafeItems', () => {
  it('cleans only safe results that hold something', async () => {
    const { dir } = npmCache();
    const cleaner = createCleaner({
      categories: [
        { id: 'npm_cache', name: 'npm Cache', riskLevel: 'safe', paths: [dir] },
        { id: 'empty', name: 'Empty', riskLevel: 'safe', paths: [join(testDir, 'empty')] },
        { id: 'trash', name: 'Trash', riskLevel: 'review', paths: [join(testDir, 'trash')] },
      ],
    });
    const onProgress = vi.fn();
    const scan = [
      scanResult('trash', 500, 'review'),
      scanResult('npm_cache', 6, 'safe', { categoryName: 'npm Cache' }),
      scanResult('empty', 0, 'safe'),
    ];

    const results = await cleaner.cleanSafeItems(scan, true, onProgress);

    expect(results.map(r => r.categoryId)).toEqual(['npm_cache']);
    expect(results[0].bytesFreed).toBe(6);
    expect(onProgress.mock.calls).toEqual([['npm Cache', 1, 1]]);
  });
});

// ============================================
// Safety Tests
// ============================================

describe('isPathSafe', () => {
  const cleaner = (): Cleaner => createCleaner();

  it('blocks the home directory and system roots', () => {
    expect(cleaner().isPathSafe(homedir())).toBe(false);
    expect(cleaner().isPathSafe('~')).toBe(false);
    expect(cleaner().isPathSafe('/usr')).toBe(false);
    expect(cleaner().isPathSafe('/Library')).toBe(false);
    expect(cleaner().isPathSafe('~/Documents')).toBe(false);
  });

  it('allows paths below blocked ones', () => {
    expect(cleaner().isPathSafe('~/Library/Caches/com.example.app')).toBe(true);
    expect(cleaner().isPathSafe('/usr/local/Caskroom/.cache')).toBe(true);
    expect(cleaner().isPathSafe('~/Documents/old-export')).toBe(true);
  });

  it('compares expanded paths', () => {
    expect(cleaner().isPathSafe('/usr/local/..')).toBe(false);
    expect(cleaner().isPathSafe(expandPath('~/Desktop'))).toBe(false);
  });
});

describe('isInsideAllowedPath', () => {
  it('accepts descendants of declared paths only', () => {
    const cleaner = createCleaner({
      categories: [{ id: 'logs', name: 'Logs', riskLevel: 'safe', paths: ['/var/log'] }],
    });

    expect(cleaner.isInsideAllowedPath('/var/log/system.log', 'logs')).toBe(true);
    expect(cleaner.isInsideAllowedPath('/var/logs', 'logs')).toBe(false);
    expect(cleaner.isInsideAllowedPath('/var/log/x', 'unknown')).toBe(false);
  });
});

describe('validateCleanupRequest', () => {
  const cleaner = (): Cleaner =>
    createCleaner({ categories: [{ id: 'npm_cache', name: 'npm Cache', riskLevel: 'safe', paths: ['~/.npm'] }] });

  it('accepts known ids under the limit', () => {
    expect(cleaner().validateCleanupRequest(['npm_cache'], 100 * 1000 ** 3 - 1)).toEqual({ valid: true });
  });

  it('rejects requests at or over 100 GB', () => {
    expect(cleaner().validateCleanupRequest(['npm_cache'], 100 * 1000 ** 3)).toEqual({
      valid: false,
      error: 'Cleanup exceeds safety limit (100.0 GB > 100 GB)',
    });
  });

  it('names the first unknown id', () => {
    expect(cleaner().validateCleanupRequest(['npm_cache', 'nope', 'other'], 0)).toEqual({
      valid: false,
      error: 'Unknown category: nope',
    });
  });
});

// ============================================
// deletePath Tests
// ============================================

describe('deletePath', () => {
  it('returns zeros for a missing path', async () => {
    expect(await createCleaner().deletePath(join(testDir, 'missing'), false)).toEqual({
      bytesFreed: 0,
      filesDeleted: 0,
    });
  });

  it('deletes a single file', async () => {
    const file = join(testDir, 'single.bin');
    writeSizedFile(file, 12);

    expect(await createCleaner().deletePath(file, false)).toEqual({ bytesFreed: 12, filesDeleted: 1 });
    expect(existsSync(file)).toBe(false);
  });

  it('reports the same totals on a dry run as on a real run', async () => {
    const dir = join(testDir, 'tree');
    writeSizedFile(join(dir, 'a.bin'), 7);
    writeSizedFile(join(dir, 'sub', 'b.bin'), 8);
    const cleaner = createCleaner();

    const preview = await cleaner.deletePath(dir, true);
    const actual = await cleaner.deletePath(dir, false);

    expect(preview).toEqual({ bytesFreed: 15, filesDeleted: 2 });
    expect(actual).toEqual(preview);
  });

  it('drops cached sizes for deleted trees', async () => {
    const dir = join(testDir, 'tree');
    writeSizedFile(join(dir, 'a.bin'), 7);
    const cleaner = createCleaner();
    await cleaner.sizer.computeSizeCached(dir);

    await cleaner.deletePath(dir, false);

    expect(cleaner.sizer.cache.get(dir)).toBeUndefined();
  });
});

// ============================================
// Drill-down deletion Tests
// ============================================

describe('deleteAppCache', () => {
  beforeEach(() => {
    writeSizedFile(join(testDir, 'Caches', 'com.example.Foo', 'data.bin'), 5);
    writeSizedFile(join(testDir, 'outside', 'keep.bin'), 9);
  });

  it('finds a cache by name fragment', async () => {
    const result = await createCleaner().deleteAppCache('example', true);

    expect(result).toEqual({
      success: true,
      dryRun: true,
      path: realpathSync(join(testDir, 'Caches', 'com.example.Foo')),
      bytesFreed: 5,
      filesDeleted: 1,
    });
  });

  it('refuses paths outside the caches directory', async () => {
    const result = await createCleaner().deleteAppCache(`${join(testDir, 'Caches')}/../outside`, false);

    expect(result.success).toBe(false);
    expect(result.error).toBe(`Path not inside ${join(testDir, 'Caches')}: ${join(testDir, 'outside')}`);
    expect(existsSync(join(testDir, 'outside', 'keep.bin'))).toBe(true);
  });

  it('refuses the caches directory itself', async () => {
    const result = await createCleaner().deleteAppCache(join(testDir, 'Caches'), false);
    expect(result.success).toBe(false);
    expect(existsSync(join(testDir, 'Caches'))).toBe(true);
  });

  it('reports an unknown name', async () => {
    const result = await createCleaner().deleteAppCache('missing-app', true);
    expect(result.error).toBe('Cache not found for: missing-app');
  });
});

describe('deleteHuggingFaceModel', () => {
  it('resolves an org/model id to its cache directory', async () => {
    writeSizedFile(join(testDir, 'hub', 'models--org--tiny', 'blobs', 'weights'), 7);

    const result = await createCleaner().deleteHuggingFaceModel('org/tiny', false);

    expect(result).toMatchObject({ success: true, bytesFreed: 7, path: join(testDir, 'hub', 'models--org--tiny') });
    expect(existsSync(join(testDir, 'hub', 'models--org--tiny'))).toBe(false);
  });

  it('refuses names that escape the hub directory', async () => {
    mkdirSync(join(testDir, 'hub'), { recursive: true });
    writeSizedFile(join(testDir, 'precious', 'file'), 1);

    const result = await createCleaner().deleteHuggingFaceModel('../precious', false);

    expect(result).toMatchObject({ success: false, error: 'Model not found: ../precious' });
    expect(existsSync(join(testDir, 'precious', 'file'))).toBe(true);
  });
});

describe('deleteArtifactDirectory', () => {
  it('accepts the project directory', async () => {
    writeSizedFile(join(testDir, 'app', 'node_modules', 'lib.js'), 11);

    const result = await createCleaner().deleteArtifactDirectory(join(testDir, 'app'));

    expect(result).toMatchObject({ success: true, bytesFreed: 11, path: join(testDir, 'app', 'node_modules') });
    expect(existsSync(join(testDir, 'app', 'node_modules'))).toBe(false);
  });

  it('keeps an artifact directory that holds a protected path', async () => {
    const target = join(testDir, 'app', 'node_modules');
    const lib = join(target, 'lib');
    writeSizedFile(join(lib, 'index.js'), 4);
    const cleaner = createCleaner();
    await cleaner.protection.addPath(lib);

    const result = await cleaner.deleteArtifactDirectory(join(testDir, 'app'));

    expect(result).toEqual({
      success: false,
      dryRun: false,
      path: target,
      bytesFreed: 0,
      filesDeleted: 0,
      error: `Protected path inside ${target}: ${lib}`,
    });
    expect(existsSync(join(lib, 'index.js'))).toBe(true);
  });

  it('reports a missing artifact', async () => {
    const target = join(testDir, 'app', '.venv');
    const result = await createCleaner().deleteArtifactDirectory(join(testDir, 'app'), '.venv', true);

    expect(result.error).toBe(`.venv not found at ${target}`);
  });
});

describe('Docker deletions', () => {
  const docker = dockerBreakdown({
    images: [
      { repository: 'node', tag: '20', id: 'abc123def456', sizeBytes: 1000, sizeHuman: '1kB', status: 'available' },
    ],
    containers: [
      { name: 'web', id: 'fff000fff000', status: 'exited', statusDetail: 'Exited (0)', sizeBytes: 20, sizeHuman: '20B' },
    ],
    volumes: [{ name: 'data', driver: 'local' }],
  });

  it('previews removing an image without running docker', async () => {
    const runner = new FakeRunner();
    const result = await createCleaner({ runner, docker }).deleteDockerItem('image', 'node:20', true);

    expect(result).toEqual({
      success: true,
      dryRun: true,
      command: 'docker rmi node:20',
      bytesFreed: 1000,
      filesDeleted: 0,
    });
    expect(runner.calls).toEqual([]);
  });

  it('removes a container by name', async () => {
    const runner = new FakeRunner();
    const result = await createCleaner({ runner, docker }).deleteDockerItem('container', 'web', false);

    expect(result).toMatchObject({ success: true, bytesFreed: 20, command: 'docker rm web' });
    expect(runner.calls).toEqual([{ file: 'docker', args: ['rm', 'web'], timeoutMs: 60_000 }]);
  });

  it('reports unknown items', async () => {
    const result = await createCleaner({ docker }).deleteDockerItem('volume', 'cache', true);
    expect(result.error).toBe('Docker volume not found: cache');
  });

  it('rejects an empty id', async () => {
    const result = await createCleaner({ docker }).deleteDockerItem('image', '', true);
    expect(result.success).toBe(false);
  });

  it('reports docker being unavailable', async () => {
    const result = await createCleaner().deleteDockerItem('image', 'abc', true);
    expect(result.error).toBe('Docker is not running');
  });

  it('prunes everything unused', async () => {
    const runner = new FakeRunner(() => outcome({ exitCode: 1, stderr: 'daemon gone' }));
    const result = await createCleaner({ runner }).deleteDockerUnused(undefined, false);

    expect(result).toMatchObject({ success: false, command: 'docker system prune -f', error: 'daemon gone' });
    expect(runner.calls[0].timeoutMs).toBe(300_000);
  });

  it('previews a typed prune', async () => {
    const result = await createCleaner().deleteDockerUnused('images', true);
    expect(result.command).toBe('docker image prune -f');
  });
});
