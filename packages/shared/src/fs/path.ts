import path from 'node:path';
import os from 'node:os';

/**
 * Normalizes a path to use forward slashes.
 * Cache keys and trace files use this form on every platform.
 *
 * @param p The path to normalize.
 * @returns The normalized path with forward slashes.
 */
export function normalizePath(p: string): string {
  return p.replace(/\\/g, '/');
}

/**
 * Joins all given path segments together using the platform-specific separator as a delimiter,
 * then normalizes the resulting path to use forward slashes.
 */
export function join(...paths: string[]): string {
  return normalizePath(path.join(...paths));
}

/**
 * A platform-agnostic version of `path.dirname`.
 */
export function dirname(p: string): string {
  return normalizePath(path.dirname(p));
}

/**
 * Replaces a leading `~` with the home directory.
 */
export function expandHome(p: string, home: string = os.homedir()): string {
  if (p === '~') return normalizePath(home);
  if (p.startsWith('~/')) return join(home, p.slice(2));
  return p;
}
