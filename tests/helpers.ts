/**
 * Shared fixtures for the test suite
 */

import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from 'fs';
import { dirname, join } from 'path';
import { tmpdir } from 'os';
import type { CommandOptions, CommandOutcome, CommandRunner } from '../src/exec.js';
import type { DockerBreakdown } from '../src/docker.js';
import type { DockerBreakdownSource } from '../src/scanner.js';
import type { RiskLevel, ScanResult } from '../src/types.js';

// Helper to create test directory structure
export function createTestDir(): string {
  return mkdtempSync(join(tmpdir(), 'diskward-test-'));
}

export function cleanupTestDir(dir: string): void {
  try {
    rmSync(dir, { recursive: true, force: true });
  } catch {
    // Ignore cleanup errors
  }
}

/** Write a file of `size` bytes, creating parent directories */
export function writeSizedFile(path: string, size: number): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, Buffer.alloc(size));
}

export function outcome(overrides: Partial<CommandOutcome> = {}): CommandOutcome {
  return { exitCode: 0, stdout: '', stderr: '', timedOut: false, ...overrides };
}

type Responder = (file: string, args: readonly string[]) => CommandOutcome;

/**
 * CommandRunner that records calls and answers from a callback.
 */
export class FakeRunner implements CommandRunner {
  readonly calls: Array<{ file: string; args: string[]; timeoutMs: number }> = [];
  readonly shellCalls: Array<{ command: string; timeoutMs: number }> = [];
  private readonly respond: Responder;
  private readonly shellOutcome: CommandOutcome;

  constructor(respond: Responder = () => outcome(), shellOutcome: CommandOutcome = outcome()) {
    this.respond = respond;
    this.shellOutcome = shellOutcome;
  }

  async run(file: string, args: readonly string[], options: CommandOptions): Promise<CommandOutcome> {
    this.calls.push({ file, args: [...args], timeoutMs: options.timeoutMs });
    return this.respond(file, args);
  }

  async runShell(command: string, options: CommandOptions): Promise<CommandOutcome> {
    this.shellCalls.push({ command, timeoutMs: options.timeoutMs });
    return this.shellOutcome;
  }
}

export function dockerBreakdown(overrides: Partial<DockerBreakdown> = {}): DockerBreakdown {
  return {
    available: true,
    images: [],
    containers: [],
    volumes: [],
    buildCacheBytes: 0,
    totalBytes: 0,
    unusedBytes: 0,
    ...overrides,
  };
}

export function fakeDocker(breakdown: DockerBreakdown): DockerBreakdownSource & { calls: number } {
  const source = {
    calls: 0,
    async getBreakdown(): Promise<DockerBreakdown> {
      source.calls++;
      return breakdown;
    },
  };
  return source;
}

export function scanResult(
  categoryId: string,
  sizeBytes: number,
  riskLevel: RiskLevel = 'safe',
  overrides: Partial<ScanResult> = {}
): ScanResult {
  return {
    categoryId,
    categoryName: categoryId,
    path: `/tmp/${categoryId}`,
    sizeBytes,
    fileCount: 1,
    dirCount: 0,
    riskLevel,
    exists: sizeBytes > 0,
    ...overrides,
  };
}
