import * as path from 'path';
import { ModkitDirectories } from '../types/index.js';
import { DIR_PATTERNS, ENV_VARS, FILE_PATTERNS } from '../constants/index.js';
import { ensureDir } from '../utils/fs.js';
import { expandTilde, getHomeDirectory } from '../utils/home-directory.js';
import { logger } from '../utils/logger.js';

/**
 * Get modkit directories.
 * Uses ~/.modkit on all platforms; MODKIT_HOME replaces the whole directory.
 */
export function getModkitDirectories(): ModkitDirectories {
  const override = process.env[ENV_VARS.HOME];
  const modkitDir = override
    ? path.resolve(expandTilde(override))
    : path.join(getHomeDirectory(), DIR_PATTERNS.MODKIT);

  return {
    config: modkitDir,
    data: modkitDir
  };
}

/**
 * Ensure the modkit directories exist
 */
export async function ensureModkitDirectories(): Promise<ModkitDirectories> {
  const dirs = getModkitDirectories();
  await Promise.all([ensureDir(dirs.config), ensureDir(dirs.data)]);
  logger.debug('modkit directories ensured', { directories: dirs });
  return dirs;
}

/**
 * Registry file used when neither config nor environment names one
 */
export function getDefaultRegistryPath(): string {
  return path.join(getModkitDirectories().data, FILE_PATTERNS.REGISTRY_JSON);
}
