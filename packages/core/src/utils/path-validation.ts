import { isAbsolute, relative, resolve, sep } from 'path';
import { ValidationError } from './errors.js';
import { exists, isDirectory } from './fs.js';

/**
 * Location checks shared by registry operations.
 * All of them run before anything is mutated.
 */

export function assertAbsolute(path: string, label: string): void {
  if (!isAbsolute(path)) {
    throw new ValidationError(`${label} must be an absolute path: ${path}`, { path });
  }
}

export async function assertExistingDirectory(path: string, label: string): Promise<void> {
  assertAbsolute(path, label);
  if (!(await exists(path))) {
    throw new ValidationError(`${label} does not exist: ${path}`, { path });
  }
  if (!(await isDirectory(path))) {
    throw new ValidationError(`${label} is not a directory: ${path}`, { path });
  }
}

/**
 * Path of `path` relative to `root`, or undefined when `path` is not inside `root`.
 */
export function relativeToRoot(root: string, path: string): string | undefined {
  const rel = relative(resolve(root), resolve(path));
  if (rel === '' || rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
    return undefined;
  }
  return rel;
}

export function isUnderRoot(root: string, path: string): boolean {
  return relativeToRoot(root, path) !== undefined;
}
