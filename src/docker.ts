/**
 * Docker usage breakdown
 *
 * Docker Desktop keeps everything inside a VM disk image that grows but
 * never shrinks, so walking its directory overstates real usage. The
 * Docker CLI reports what images, containers and build cache actually hold.
 */

import { createCommandRunner, type CommandRunner } from './exec.js';

export interface DockerImage {
  repository: string;
  tag: string;
  /** Short (12 character) image id */
  id: string;
  sizeBytes: number;
  sizeHuman: string;
  status: 'dangling' | 'available';
}

export interface DockerContainer {
  name: string;
  /** Short (12 character) container id */
  id: string;
  status: 'running' | 'exited';
  statusDetail: string;
  sizeBytes: number;
  sizeHuman: string;
}

export interface DockerVolume {
  name: string;
  driver: string;
}

export interface DockerBreakdown {
  available: boolean;
  images: DockerImage[];
  containers: DockerContainer[];
  volumes: DockerVolume[];
  buildCacheBytes: number;

  /** Images + containers + build cache */
  totalBytes: number;

  /** Dangling images + exited containers + build cache */
  unusedBytes: number;

  error?: string;
}

const INFO_TIMEOUT_MS = 10_000;
const LIST_TIMEOUT_MS = 30_000;

const DOCKER_UNITS: Record<string, number> = {
  B: 1,
  K: 1024,
  KB: 1024,
  M: 1024 ** 2,
  MB: 1024 ** 2,
  G: 1024 ** 3,
  GB: 1024 ** 3,
  T: 1024 ** 4,
  TB: 1024 ** 4,
};

/**
 * Parse a size as the Docker CLI prints it ("1.2GB", "890MB", "0B").
 * Docker prints these with binary multipliers despite the SI suffixes.
 *
 * @returns Byte count, 0 for anything unparseable
 */
export function parseDockerSize(sizeStr: string): number {
  const match = sizeStr.trim().match(/^([\d.]+)\s*([KMGT]?B?)/i);
  if (!match) return 0;

  const num = parseFloat(match[1]);
  if (Number.isNaN(num)) return 0;

  const unit = match[2].toUpperCase();
  return Math.floor(num * (DOCKER_UNITS[unit] ?? 1));
}

function lines(stdout: string): string[] {
  return stdout
    .trim()
    .split('\n')
    .filter(line => line.length > 0);
}

/**
 * Parse `docker images --format "{{.Repository}}\t{{.Tag}}\t{{.ID}}\t{{.Size}}"`.
 */
export function parseImages(stdout: string): DockerImage[] {
  const images: DockerImage[] = [];
  for (const line of lines(stdout)) {
    const parts = line.split('\t');
    if (parts.length < 4) continue;
    const [repository, tag, id, sizeHuman] = parts;
    images.push({
      repository,
      tag,
      id: id.slice(0, 12),
      sizeBytes: parseDockerSize(sizeHuman),
      sizeHuman,
      status: repository === '<none>' ? 'dangling' : 'available',
    });
  }
  return images;
}

/**
 * Parse `docker ps -a --format "{{.Names}}\t{{.ID}}\t{{.Status}}\t{{.Size}}"`.
 * The size column reads like "0B (virtual 890MB)"; only the writable layer counts.
 */
export function parseContainers(stdout: string): DockerContainer[] {
  const containers: DockerContainer[] = [];
  for (const line of lines(stdout)) {
    const parts = line.split('\t');
    if (parts.length < 3) continue;
    const [name, id, statusDetail] = parts;
    const sizeHuman = (parts[3] ?? '').trim().split(/\s+/)[0] || '0B';
    containers.push({
      name,
      id: id.slice(0, 12),
      status: statusDetail.startsWith('Up') ? 'running' : 'exited',
      statusDetail,
      sizeBytes: parseDockerSize(sizeHuman),
      sizeHuman,
    });
  }
  return containers;
}

/**
 * Parse `docker volume ls --format "{{.Name}}\t{{.Driver}}"`.
 */
export function parseVolumes(stdout: string): DockerVolume[] {
  return lines(stdout).map(line => {
    const [name, driver] = line.split('\t');
    return { name, driver: driver || 'local' };
  });
}

/**
 * Build cache size from the `docker system df` table.
 *
 * TYPE            TOTAL     ACTIVE    SIZE      RECLAIMABLE
 * Build Cache     12        0         1.2GB     1.2GB
 */
export function parseBuildCacheBytes(stdout: string): number {
  for (const line of lines(stdout).slice(1)) {
    const parts = line.trim().split(/\s+/);
    if (parts[0] === 'Build' && parts[1] === 'Cache' && parts.length >= 5) {
      return parseDockerSize(parts[4]);
    }
  }
  return 0;
}

function emptyBreakdown(error?: string): DockerBreakdown {
  return {
    available: false,
    images: [],
    containers: [],
    volumes: [],
    buildCacheBytes: 0,
    totalBytes: 0,
    unusedBytes: 0,
    error,
  };
}

/**
 * Queries the Docker CLI.
 */
export class DockerClient {
  private readonly runner: CommandRunner;

  constructor(runner: CommandRunner = createCommandRunner()) {
    this.runner = runner;
  }

  /**
   * Images, containers, volumes and build cache, with totals.
   * `available` is false when Docker is not installed or not running;
   * a failing listing leaves its section empty and sets `error`.
   */
  async getBreakdown(): Promise<DockerBreakdown> {
    const info = await this.runner.run('docker', ['info'], { timeoutMs: INFO_TIMEOUT_MS });
    if (info.error || info.timedOut) {
      return emptyBreakdown('Docker is not installed or not running');
    }
    if (info.exitCode !== 0) {
      return emptyBreakdown('Docker is not running');
    }

    const breakdown = emptyBreakdown();
    breakdown.available = true;

    const [images, containers, volumes, systemDf] = await Promise.all([
      this.list(['images', '--format', '{{.Repository}}\t{{.Tag}}\t{{.ID}}\t{{.Size}}']),
      this.list(['ps', '-a', '--format', '{{.Names}}\t{{.ID}}\t{{.Status}}\t{{.Size}}']),
      this.list(['volume', 'ls', '--format', '{{.Name}}\t{{.Driver}}']),
      this.list(['system', 'df']),
    ]);

    if (images.ok) breakdown.images = parseImages(images.stdout);
    else breakdown.error = `Failed to get images: ${images.message}`;

    if (containers.ok) breakdown.containers = parseContainers(containers.stdout);
    else breakdown.error = `Failed to get containers: ${containers.message}`;

    if (volumes.ok) breakdown.volumes = parseVolumes(volumes.stdout);
    else breakdown.error = `Failed to get volumes: ${volumes.message}`;

    // Totals still make sense without the build cache line
    if (systemDf.ok) breakdown.buildCacheBytes = parseBuildCacheBytes(systemDf.stdout);

    const imageBytes = breakdown.images.reduce((sum, image) => sum + image.sizeBytes, 0);
    const containerBytes = breakdown.containers.reduce((sum, c) => sum + c.sizeBytes, 0);

    breakdown.totalBytes = imageBytes + containerBytes + breakdown.buildCacheBytes;
    breakdown.unusedBytes =
      breakdown.images
        .filter(image => image.status === 'dangling')
        .reduce((sum, image) => sum + image.sizeBytes, 0) +
      breakdown.containers
        .filter(c => c.status === 'exited')
        .reduce((sum, c) => sum + c.sizeBytes, 0) +
      breakdown.buildCacheBytes;

    return breakdown;
  }

  private async list(
    args: string[]
  ): Promise<{ ok: true; stdout: string } | { ok: false; message: string }> {
    const outcome = await this.runner.run('docker', args, { timeoutMs: LIST_TIMEOUT_MS });
    if (outcome.exitCode === 0 && !outcome.timedOut) {
      return { ok: true, stdout: outcome.stdout };
    }
    if (outcome.timedOut) return { ok: false, message: 'timed out' };
    return { ok: false, message: outcome.error ?? (outcome.stderr.trim() || 'command failed') };
  }
}
