/**
 * Execution Context Types
 *
 * The state a command runs against: the working directory its path
 * arguments resolve from, the loaded configuration, and the output port.
 */

import type { OutputPort } from '../core/ports/output.js';
import type { ResolvedModkitConfig } from './index.js';

export interface ExecutionContext {
  /**
   * Absolute path that relative path arguments are resolved against.
   */
  cwd: string;

  /**
   * Configuration after defaults and environment overrides were applied.
   */
  config: ResolvedModkitConfig;

  /**
   * Output port for all user-facing messages.
   * When not provided, defaults to consoleOutput (plain console.log).
   */
  output?: OutputPort;
}

/**
 * Options for creating an ExecutionContext
 */
export interface ExecutionOptions {
  /** Working directory override (--cwd) */
  cwd?: string;
  /** Registry file override (--registry) */
  registryPath?: string;
}
