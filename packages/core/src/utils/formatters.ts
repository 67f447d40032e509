import { relative, isAbsolute } from 'path';
import { normalizePathWithTilde } from './home-directory.js';

/**
 * Formatting utilities for consistent display across commands
 */

/**
 * Format a file system path for display to the user.
 *
 * - paths inside cwd are shown relative to it
 * - paths under the home directory use tilde notation
 * - anything else stays absolute
 *
 * @example
 * formatPathForDisplay('/home/dev/.modkit/registry.json') // => '~/.modkit/registry.json'
 * formatPathForDisplay('/work/src/a.sac', '/work') // => 'src/a.sac'
 */
export function formatPathForDisplay(path: string, cwd: string = process.cwd()): string {
  if (path.startsWith('~') || !isAbsolute(path)) {
    return path;
  }

  const relativePath = relative(cwd, path);
  if (relativePath && !relativePath.startsWith('..') && !isAbsolute(relativePath)) {
    return relativePath;
  }

  return normalizePathWithTilde(path);
}

/**
 * Format tree connector symbols
 */
export function getTreeConnector(isLast: boolean): string {
  return isLast ? '└── ' : '├── ';
}

/**
 * Format tree prefix for nested items
 */
export function getTreePrefix(prefix: string, isLast: boolean): string {
  return prefix + (isLast ? '    ' : '│   ');
}

/**
 * `1 module`, `3 modules`
 */
export function formatCount(count: number, singular: string, plural: string = `${singular}s`): string {
  return `${count} ${count === 1 ? singular : plural}`;
}

export function formatPackageLabel(identifier: string, version: string): string {
  return `${identifier}@${version}`;
}
