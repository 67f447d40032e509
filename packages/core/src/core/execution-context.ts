/**
 * Execution Context Module
 *
 * Resolves the working directory and configuration a command runs against.
 */

import { resolve } from 'path';
import type { ExecutionContext, ExecutionOptions } from '../types/execution-context.js';
import type { OutputPort } from './ports/output.js';
import { ValidationError } from '../utils/errors.js';
import { isDirectory } from '../utils/fs.js';
import { expandTilde } from '../utils/home-directory.js';
import { logger } from '../utils/logger.js';
import { ConfigManager, configManager } from './config.js';

/**
 * Create an ExecutionContext from command options.
 *
 * Priority for the registry path:
 * 1. --registry
 * 2. MODKIT_REGISTRY
 * 3. `registryPath` from config.jsonc
 * 4. ~/.modkit/registry.json
 */
export async function createExecutionContext(
  options: ExecutionOptions = {},
  output?: OutputPort,
  manager: ConfigManager = configManager
): Promise<ExecutionContext> {
  const cwd = options.cwd ? resolve(process.cwd(), expandTilde(options.cwd)) : process.cwd();
  if (!(await isDirectory(cwd))) {
    throw new ValidationError(`Working directory does not exist: ${cwd}`, { cwd });
  }

  const config = await manager.resolve();
  if (options.registryPath) {
    config.registryPath = resolve(cwd, expandTilde(options.registryPath));
  }

  const context: ExecutionContext = { cwd, config, output };
  logger.debug('Created execution context', { cwd, registryPath: config.registryPath });
  return context;
}

/**
 * Resolve a path argument against the context's working directory.
 */
export function resolveArgumentPath(context: ExecutionContext, path: string): string {
  return resolve(context.cwd, expandTilde(path));
}
