/**
 * Recursive discovery of developer artifacts
 *
 * Finds directories with a given name (node_modules, .venv, target, ...)
 * below a root. Matches are yielded lazily and never descended into, so a
 * vendored node_modules inside another one is not counted twice.
 */

import { promises as fs, type Dirent } from 'fs';
import { join } from 'path';
import { LIMITS } from './types.js';

/**
 * Directory names not worth descending into while searching. Each one is
 * still reported when it is exactly the name being searched for.
 */
export const SKIP_DIRECTORIES: ReadonlySet<string> = new Set([
  '.git',
  '.svn',
  '.hg',
  'Library',
  'Applications',
  '.Trash',
  'node_modules',
  '.venv',
  'venv',
  '__pycache__',
]);

const VIRTUALENV_NAMES: ReadonlySet<string> = new Set(['.venv', '.virtualenv']);

/**
 * Turn a glob such as "**\/node_modules" into the directory name to match.
 */
export function patternNameFromGlob(glob: string): string {
  return glob.replace(/\*\*\//g, '').replace(/\*\//g, '').replace(/^\/+|\/+$/g, '');
}

function shouldSkip(name: string, pattern: string): boolean {
  if (name.startsWith('.') && name !== pattern) {
    // .venv and .virtualenv are searched for together
    if (!(VIRTUALENV_NAMES.has(name) && VIRTUALENV_NAMES.has(pattern))) {
      return true;
    }
  }
  return SKIP_DIRECTORIES.has(name) && name !== pattern;
}

/**
 * Find directories named `pattern` anywhere below `root`.
 *
 * Depth-first. A direct child of `root` is at depth 1, and a match is
 * found only at depth <= maxDepth. Symlinks are skipped. A directory that
 * cannot be listed ends its own branch and nothing else.
 *
 * @param root - Directory to search from
 * @param pattern - Exact directory name to match
 * @param maxDepth - Levels to descend
 */
export async function* findMatchingDirectories(
  root: string,
  pattern: string,
  maxDepth: number = LIMITS.DISCOVERY_MAX_DEPTH
): AsyncGenerator<string, void, undefined> {
  if (maxDepth <= 0) return;

  let entries: Dirent[];
  try {
    entries = await fs.readdir(root, { withFileTypes: true });
  } catch {
    return;
  }

  for (const entry of entries) {
    // Dirent types come from lstat, so symlinked directories are not directories here
    if (!entry.isDirectory()) continue;

    const name = entry.name;
    if (shouldSkip(name, pattern)) continue;

    const entryPath = join(root, name);

    if (name === pattern) {
      yield entryPath;
      continue;
    }

    yield* findMatchingDirectories(entryPath, pattern, maxDepth - 1);
  }
}

/**
 * Collect every match into an array.
 */
export async function collectMatchingDirectories(
  root: string,
  pattern: string,
  maxDepth: number = LIMITS.DISCOVERY_MAX_DEPTH
): Promise<string[]> {
  const found: string[] = [];
  for await (const match of findMatchingDirectories(root, pattern, maxDepth)) {
    found.push(match);
  }
  return found;
}
