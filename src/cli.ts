#!/usr/bin/env node
import { Command } from 'commander';
import { intro, outro, spinner, confirm, isCancel, cancel } from '@clack/prompts';
import pc from 'picocolors';
import { readFileSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { CategoryRegistry } from './categories.js';
import { Cleaner, isDockerItemType, isDockerPruneType } from './cleaner.js';
import { BreakdownService } from './breakdown.js';
import { DirectorySizer } from './directory-size.js';
import { DockerClient } from './docker.js';
import { getDiskUsage, usedPercent } from './disk-usage.js';
import { errorMessage } from './errors.js';
import { findLargeFiles, findOldFiles } from './finders.js';
import { loadSettings } from './config.js';
import { logger, setVerbose } from './logger.js';
import { ProtectionStore } from './protection.js';
import { Scanner } from './scanner.js';
import { SizeCache } from './size-cache.js';
import { estimateCleanupSavings, safeItems, summarizeCleanup } from './analyzer.js';
import type { CleanupResult, ItemDeletionResult, RiskLevel, ScanResult } from './types.js';
import { formatBytes, parseSize, totalSize, truncate } from './utils.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

function getVersion(): string {
  try {
    const pkg: unknown = JSON.parse(readFileSync(join(__dirname, '../package.json'), 'utf-8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  } catch {
    // Running from an unusual layout - fall through to the default
  }
  return '0.0.0';
}

const settings = loadSettings();
setVerbose(settings.verbose);

const registry = new CategoryRegistry();
const sizer = new DirectorySizer(new SizeCache({ ttlMs: settings.cacheTtlMs }));
const docker = new DockerClient();
const protection = new ProtectionStore(settings.protectionFile, sizer);
const scanner = new Scanner({ registry, sizer, docker });
const cleaner = new Cleaner({ registry, sizer, protection, docker });
const breakdowns = new BreakdownService({ sizer });

const RISK_COLORS: Record<RiskLevel, (text: string) => string> = {
  safe: pc.green,
  review: pc.yellow,
  risky: pc.red,
};

function formatRow(result: ScanResult): string {
  const size = pc.cyan(formatBytes(result.sizeBytes).padStart(9));
  const risk = RISK_COLORS[result.riskLevel](result.riskLevel.padEnd(6));
  return `${size}  ${risk}  ${result.categoryName}  ${pc.gray(truncate(result.path, 60))}`;
}

function formatCleanup(result: CleanupResult): string {
  const status = result.success ? pc.green('✓') : pc.red('✗');
  const freed = result.dryRun ? `would free ${formatBytes(result.bytesFreed)}` : `freed ${formatBytes(result.bytesFreed)}`;
  const error = result.error ? pc.red(`  ${result.error}`) : '';
  return `${status} ${result.categoryId}: ${freed}${error}`;
}

async function analyzeCommand(options: { dev?: boolean; json?: boolean }): Promise<void> {
  const s = spinner();
  if (!options.json) s.start('Scanning...');

  try {
    const analysis = await scanner.analyzeDisk({
      includeDev: options.dev === true,
      maxWorkers: settings.maxWorkers,
      onProgress: (name, completed, total) => {
        if (!options.json) s.message(`Scanning ${name} (${completed}/${total})`);
      },
    });

    if (options.json) {
      console.log(JSON.stringify(analysis, null, 2));
      return;
    }

    s.stop(`Scanned ${analysis.scanResults.length} categories`);

    const { diskUsage } = analysis;
    console.log(
      `\n${pc.gray('Disk:')} ${formatBytes(diskUsage.usedBytes)} of ${formatBytes(diskUsage.totalBytes)} used ` +
        `(${usedPercent(diskUsage).toFixed(1)}%), ${pc.green(formatBytes(diskUsage.freeBytes))} free\n`
    );

    const found = analysis.scanResults.filter(r => r.sizeBytes > 0);
    if (found.length === 0) {
      console.log(pc.yellow('Nothing to clean.'));
      return;
    }

    for (const result of found) {
      console.log(formatRow(result));
      if (result.error) logger.debug(`${result.categoryId}: ${result.error}`);
    }

    console.log(`\n${pc.gray('Safe to clean:')} ${pc.green(formatBytes(estimateCleanupSavings(analysis)))}`);
    console.log(`${pc.gray('Including review items:')} ${pc.yellow(formatBytes(estimateCleanupSavings(analysis, true)))}`);
  } catch (error) {
    if (!options.json) s.stop('Scan failed');
    logger.error(errorMessage(error));
    process.exit(1);
  }
}

async function cleanCommand(
  ids: string[],
  options: { safe?: boolean; dryRun?: boolean; yes?: boolean }
): Promise<void> {
  const dryRun = options.dryRun === true;
  intro(pc.cyan(dryRun ? 'diskward clean (dry run)' : 'diskward clean'));

  if (ids.length === 0 && !options.safe) {
    cancel('Name categories to clean, or pass --safe');
    process.exitCode = 1;
    return;
  }

  const s = spinner();
  s.start('Measuring...');
  let targets: ScanResult[];
  try {
    targets = options.safe ? safeItems(await scanner.scanAll({ maxWorkers: settings.maxWorkers })) : await scanner.quickScan(ids);
  } catch (error) {
    s.stop('Scan failed');
    logger.error(errorMessage(error));
    process.exit(1);
  }
  s.stop(`Measured ${targets.length} categories`);

  const categoryIds = options.safe ? targets.map(t => t.categoryId) : ids;
  const validation = cleaner.validateCleanupRequest(categoryIds, totalSize(targets));
  if (!validation.valid) {
    cancel(validation.error ?? 'Invalid cleanup request');
    process.exitCode = 1;
    return;
  }

  if (targets.length === 0) {
    outro(pc.yellow('Nothing to clean.'));
    return;
  }

  for (const target of targets) console.log(formatRow(target));

  if (!dryRun && !options.yes) {
    const proceed = await confirm({
      message: `Clean ${targets.length} categories (${formatBytes(totalSize(targets))})?`,
    });
    if (isCancel(proceed) || !proceed) {
      cancel('Cancelled');
      return;
    }
  }

  const ds = spinner();
  ds.start(dryRun ? 'Simulating...' : 'Cleaning...');
  const results: CleanupResult[] = [];
  for (const [index, target] of targets.entries()) {
    ds.message(`${target.categoryName} (${index + 1}/${targets.length})`);
    results.push(await cleaner.cleanCategory(target.categoryId, dryRun));
  }
  ds.stop('Done');

  for (const result of results) console.log(formatCleanup(result));

  const summary = summarizeCleanup(results);
  const verb = dryRun ? 'Would free' : 'Freed';
  outro(
    summary.failureCount > 0
      ? pc.yellow(`${verb} ${formatBytes(summary.totalBytesFreed)}, ${summary.failureCount} failed`)
      : pc.green(`${verb} ${formatBytes(summary.totalBytesFreed)}`)
  );
  if (summary.failureCount > 0) process.exitCode = 1;
}

function listCommand(): void {
  for (const level of ['safe', 'review', 'risky'] as const) {
    console.log(`\n${RISK_COLORS[level](level.toUpperCase())}`);
    for (const category of registry.byRisk(level)) {
      console.log(`  ${category.id.padEnd(22)} ${pc.gray(category.name)}`);
    }
  }
}

function explainCommand(id: string): void {
  const explanation = registry.explain(id);
  if (!explanation) {
    logger.error(`Unknown category: ${id}`);
    process.exitCode = 1;
    return;
  }

  console.log(`${pc.bold(explanation.name)} ${pc.gray(`(${explanation.id})`)}`);
  console.log(`Risk: ${RISK_COLORS[explanation.riskLevel](explanation.riskLevel)}`);
  if (explanation.description) console.log(`\n${explanation.description}`);
  if (explanation.isRecursive) {
    console.log(`\nSearches ${explanation.searchRoots.join(', ')} for ${explanation.globPatterns.join(', ')}`);
    console.log(`Ignores matches under ${formatBytes(explanation.minSizeBytes)}`);
  } else {
    console.log(`\nPaths:\n${explanation.paths.map(p => `  ${p}`).join('\n')}`);
  }
  if (explanation.cleanupCommand) console.log(`\nCleaned with: ${pc.cyan(explanation.cleanupCommand)}`);
  if (explanation.consequences) console.log(`\n${pc.yellow('After cleaning:')} ${explanation.consequences}`);
  if (explanation.recovery) console.log(`${pc.green('Recovery:')} ${explanation.recovery}`);
}

async function statusCommand(): Promise<void> {
  const usage = await getDiskUsage('/');
  console.log(`Total: ${formatBytes(usage.totalBytes)}`);
  console.log(`Used:  ${formatBytes(usage.usedBytes)} (${usedPercent(usage).toFixed(1)}%)`);
  console.log(`Free:  ${pc.green(formatBytes(usage.freeBytes))}`);
}

async function protectCommand(path: string | undefined, options: { category?: string }): Promise<void> {
  const update = options.category
    ? await protection.addCategory(options.category)
    : path
      ? await protection.addPath(path)
      : undefined;

  if (!update) {
    logger.error('Give a path or --category <id>');
    process.exitCode = 1;
  } else if (!update.success) {
    logger.error(update.error ?? 'Failed to update protections');
    process.exitCode = 1;
  } else {
    logger.success(`Protected ${options.category ?? path}`);
  }
}

async function unprotectCommand(path: string | undefined, options: { category?: string }): Promise<void> {
  const update = options.category
    ? await protection.removeCategory(options.category)
    : path
      ? await protection.removePath(path)
      : undefined;

  if (!update) {
    logger.error('Give a path or --category <id>');
    process.exitCode = 1;
  } else if (!update.success) {
    logger.error(update.error ?? 'Failed to update protections');
    process.exitCode = 1;
  } else {
    logger.success(`No longer protected: ${options.category ?? path}`);
  }
}

async function protectionsCommand(): Promise<void> {
  const list = await protection.list();
  if (list.protectedPaths.length === 0 && list.protectedCategories.length === 0) {
    console.log(pc.gray('Nothing is protected.'));
    return;
  }
  for (const entry of list.protectedPaths) {
    const detail = entry.error
      ? pc.red(entry.error)
      : entry.exists
        ? pc.cyan(formatBytes(entry.sizeBytes ?? 0))
        : pc.gray('missing');
    console.log(`  ${entry.path}  ${detail}`);
  }
  for (const id of list.protectedCategories) {
    console.log(`  ${pc.yellow('category')} ${id}`);
  }
}

async function breakdownCommand(kind: string): Promise<void> {
  switch (kind) {
    case 'caches': {
      const { apps, totalBytes } = await breakdowns.getAppCachesBreakdown();
      for (const app of apps.slice(0, 30)) {
        console.log(`${pc.cyan(formatBytes(app.sizeBytes).padStart(9))}  ${app.name} ${pc.gray(app.bundleId)}`);
      }
      console.log(`\n${pc.gray('Total:')} ${formatBytes(totalBytes)}`);
      return;
    }
    case 'node-modules': {
      const { projects, totalBytes, inactiveCount, inactiveBytes } = await breakdowns.getNodeModulesBreakdown();
      for (const project of projects) {
        const status = project.status === 'inactive' ? pc.yellow('inactive') : pc.green('active');
        console.log(`${pc.cyan(formatBytes(project.sizeBytes).padStart(9))}  ${project.projectName} ${status} ${pc.gray(project.projectPath)}`);
      }
      console.log(`\n${pc.gray('Total:')} ${formatBytes(totalBytes)}, ${inactiveCount} inactive (${formatBytes(inactiveBytes)})`);
      return;
    }
    case 'huggingface': {
      const { models, totalBytes } = await breakdowns.getHuggingFaceBreakdown();
      for (const model of models) {
        console.log(`${pc.cyan(formatBytes(model.sizeBytes).padStart(9))}  ${model.name}`);
      }
      console.log(`\n${pc.gray('Total:')} ${formatBytes(totalBytes)}`);
      return;
    }
    case 'docker': {
      const info = await docker.getBreakdown();
      if (!info.available) {
        logger.warn(info.error ?? 'Docker is not available');
        return;
      }
      for (const image of info.images) {
        console.log(`${pc.cyan(image.sizeHuman.padStart(9))}  image      ${image.repository}:${image.tag} ${pc.gray(image.id)}`);
      }
      for (const container of info.containers) {
        console.log(`${pc.cyan(container.sizeHuman.padStart(9))}  container  ${container.name} ${pc.gray(container.status)}`);
      }
      console.log(`\n${pc.gray('Total:')} ${formatBytes(info.totalBytes)}, ${formatBytes(info.unusedBytes)} unused`);
      return;
    }
    case 'storage': {
      const { categories } = await breakdowns.getStorageBreakdown();
      for (const entry of categories) {
        console.log(`${pc.cyan(formatBytes(entry.sizeBytes).padStart(9))}  ${entry.name} ${pc.gray(`${entry.percent}%`)}`);
      }
      return;
    }
    default:
      logger.error(`Unknown breakdown: ${kind} (caches, node-modules, huggingface, docker, storage)`);
      process.exitCode = 1;
  }
}

async function removeCommand(kind: string, target: string, options: { dryRun?: boolean }): Promise<void> {
  const dryRun = options.dryRun === true;
  let result: ItemDeletionResult;

  if (kind === 'app-cache') {
    result = await cleaner.deleteAppCache(target, dryRun);
  } else if (kind === 'model') {
    result = await cleaner.deleteHuggingFaceModel(target, dryRun);
  } else if (kind === 'artifact') {
    result = await cleaner.deleteArtifactDirectory(target, 'node_modules', dryRun);
  } else if (isDockerItemType(kind)) {
    result = await cleaner.deleteDockerItem(kind, target, dryRun);
  } else if (kind === 'docker-unused') {
    if (target !== 'all' && !isDockerPruneType(target)) {
      logger.error(`Unknown prune target: ${target} (all, images, containers, volumes)`);
      process.exitCode = 1;
      return;
    }
    result = await cleaner.deleteDockerUnused(target === 'all' ? undefined : target, dryRun);
  } else {
    logger.error(`Unknown item kind: ${kind} (app-cache, model, artifact, image, container, volume, docker-unused)`);
    process.exitCode = 1;
    return;
  }

  if (!result.success) {
    logger.error(result.error ?? 'Deletion failed');
    process.exitCode = 1;
    return;
  }
  const what = result.path ?? result.command ?? target;
  logger.success(`${dryRun ? 'Would free' : 'Freed'} ${formatBytes(result.bytesFreed)} (${what})`);
}

async function findCommand(kind: string, options: { min?: string; days?: string; path?: string }): Promise<void> {
  if (kind === 'large') {
    const minSizeBytes = options.min ? parseSize(options.min) : undefined;
    if (options.min && minSizeBytes === undefined) {
      logger.error(`Invalid size: ${options.min}`);
      process.exitCode = 1;
      return;
    }
    const files = await findLargeFiles({ minSizeBytes, root: options.path });
    for (const file of files) console.log(`${pc.cyan(formatBytes(file.sizeBytes).padStart(9))}  ${file.path}`);
    return;
  }
  if (kind === 'old') {
    const days = options.days ? Number(options.days) : undefined;
    if (days !== undefined && !(days >= 0)) {
      logger.error(`Invalid number of days: ${options.days}`);
      process.exitCode = 1;
      return;
    }
    const files = await findOldFiles({ days, root: options.path });
    for (const file of files) {
      console.log(`${pc.cyan(formatBytes(file.sizeBytes).padStart(9))}  ${pc.gray(`${file.lastAccessedDays}d`)}  ${file.path}`);
    }
    return;
  }
  logger.error(`Unknown search: ${kind} (large, old)`);
  process.exitCode = 1;
}

const program = new Command();

program
  .name('diskward')
  .description('Find and clean up caches, logs and developer artifacts on macOS')
  .version(getVersion())
  .option('--verbose', 'print debug output')
  .hook('preAction', thisCommand => {
    if (thisCommand.opts().verbose) setVerbose(true);
  });

program
  .command('analyze')
  .description('scan all categories and report reclaimable space')
  .option('--dev', 'include node_modules, virtualenvs and build directories (slower)')
  .option('--json', 'output as JSON')
  .action(analyzeCommand);

program
  .command('clean')
  .description('clean the named categories')
  .argument('[ids...]', 'category ids')
  .option('--safe', 'clean every safe category that has something in it')
  .option('--dry-run', 'report what would be freed without deleting')
  .option('-y, --yes', 'do not ask for confirmation')
  .action(cleanCommand);

program.command('list').description('list categories by risk level').action(listCommand);

program
  .command('explain')
  .description('describe a category')
  .argument('<id>', 'category id')
  .action(explainCommand);

program.command('status').description('show disk usage').action(statusCommand);

program
  .command('protect')
  .description('exclude a path or category from cleanup')
  .argument('[path]', 'path to protect')
  .option('--category <id>', 'protect a category instead')
  .action(protectCommand);

program
  .command('unprotect')
  .description('remove a protection')
  .argument('[path]', 'path to unprotect')
  .option('--category <id>', 'unprotect a category instead')
  .action(unprotectCommand);

program.command('protections').description('list protected paths and categories').action(protectionsCommand);

program
  .command('breakdown')
  .description('itemise a category: caches, node-modules, huggingface, docker, storage')
  .argument('<kind>')
  .action(breakdownCommand);

program
  .command('remove')
  .description('delete one item: app-cache, model, artifact, image, container, volume, docker-unused')
  .argument('<kind>')
  .argument('<target>', 'name, id or path')
  .option('--dry-run', 'report what would be freed without deleting')
  .action(removeCommand);

program
  .command('find')
  .description('find large or old files')
  .argument('<kind>', 'large or old')
  .option('--min <size>', 'minimum size for large files, e.g. 500mb')
  .option('--days <days>', 'minimum days since last access for old files')
  .option('--path <path>', 'directory to search')
  .action(findCommand);

try {
  await program.parseAsync();
} catch (error) {
  logger.error(errorMessage(error));
  process.exit(1);
}
