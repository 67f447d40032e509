/**
 * Recognizing git remote locations.
 * Accepts URLs with a scheme git understands and scp-like `user@host:path`.
 */

import { posix } from 'path';
import { ValidationError } from '../../utils/errors.js';

const REMOTE_PROTOCOLS = new Set(['https:', 'http:', 'ssh:', 'git:', 'file:']);
const SCP_LIKE = /^[\w.-]+@[\w.-]+:(?!\/\/)(.+)$/;

export function isRemoteUrl(input: string): boolean {
  if (SCP_LIKE.test(input)) {
    return true;
  }
  let url: URL;
  try {
    url = new URL(input);
  } catch {
    return false;
  }
  return REMOTE_PROTOCOLS.has(url.protocol) && url.pathname.replace(/\/+$/, '').length > 0;
}

/**
 * Directory name `git clone` picks for `url`:
 * the last path segment without a trailing `.git`.
 */
export function repositoryNameFromUrl(input: string): string {
  const scp = SCP_LIKE.exec(input);
  let path: string;
  if (scp) {
    path = scp[1];
  } else {
    try {
      path = new URL(input).pathname;
    } catch {
      throw new ValidationError(`Not a git remote URL: ${input}`, { url: input });
    }
  }

  const name = posix.basename(path.replace(/\/+$/, '')).replace(/\.git$/, '');
  if (!name) {
    throw new ValidationError(`Cannot derive a repository name from ${input}`, { url: input });
  }
  return name;
}
