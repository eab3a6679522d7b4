/**
 * Path resolution helpers
 *
 * Category data is written with `~` and environment variables so it reads
 * like what users type in a shell. Everything is expanded here before it
 * touches the filesystem.
 */

import { homedir } from 'os';
import { isAbsolute, relative, resolve, sep } from 'path';

/**
 * The current user's home directory.
 */
export function homeDirectory(): string {
  return homedir();
}

/**
 * Expand `~` and environment variables into an absolute, normalised path.
 *
 * `$VAR` and `${VAR}` are replaced by their values; unknown variables are
 * left as written. The result is not checked for existence.
 *
 * @param raw - Path as written in category data or typed by a user
 * @returns Absolute path
 */
export function expandPath(raw: string): string {
  const withVars = raw.replace(
    /\$(?:\{([A-Za-z_][A-Za-z0-9_]*)\}|([A-Za-z_][A-Za-z0-9_]*))/g,
    (match: string, braced: string | undefined, bare: string | undefined) => {
      const name = braced ?? bare ?? '';
      const value = process.env[name];
      return value === undefined ? match : value;
    }
  );

  let expanded = withVars;
  if (expanded === '~') {
    expanded = homeDirectory();
  } else if (expanded.startsWith('~/')) {
    expanded = homeDirectory() + expanded.slice(1);
  }

  return resolve(expanded);
}

/**
 * True when `child` is `parent` itself or lies somewhere below it.
 * Both paths are compared in expanded form.
 */
export function isSameOrDescendant(child: string, parent: string): boolean {
  const rel = relative(expandPath(parent), expandPath(child));
  return rel === '' || (rel.split(sep)[0] !== '..' && !isAbsolute(rel));
}

/**
 * True when `child` lies strictly below `parent`.
 */
export function isStrictDescendant(child: string, parent: string): boolean {
  const rel = relative(expandPath(parent), expandPath(child));
  return rel !== '' && rel.split(sep)[0] !== '..' && !isAbsolute(rel);
}
