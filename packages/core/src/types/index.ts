/**
 * Common types and interfaces shared by the modkit core and CLI
 */

export * from './execution-context.js';

// Core application types
export interface ModkitDirectories {
  config: string;
  data: string;
}

export interface LanguageConfig {
  /** Executable invoked once per module on build, e.g. `sac2c` */
  compilerCommand: string;
  /** Flag that precedes the output path, e.g. `-o` */
  outputOption: string;
}

export interface ModkitConfig {
  /** Registry file location; `~/` is expanded */
  registryPath?: string;
  /** Branch pushed to on upload */
  defaultBranch?: string;
  /** Compiler used for packages created without explicit language options */
  language?: LanguageConfig;
}

export interface ResolvedModkitConfig {
  registryPath: string;
  defaultBranch: string;
  language: LanguageConfig;
}

export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  warnings?: string[];
}

// Error types
export class ModkitError extends Error {
  public code: ErrorCodes;
  public details?: Record<string, unknown>;

  constructor(message: string, code: ErrorCodes, details?: Record<string, unknown>) {
    super(message);
    this.name = 'ModkitError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  PACKAGE_NOT_FOUND = 'PACKAGE_NOT_FOUND',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR',
  CYCLIC_DEPENDENCY = 'CYCLIC_DEPENDENCY',
  NO_SUCH_DEPENDENCY = 'NO_SUCH_DEPENDENCY',
  MODULE_ALREADY_IN_REGISTRY = 'MODULE_ALREADY_IN_REGISTRY',
  PACKAGE_ALREADY_IN_REGISTRY = 'PACKAGE_ALREADY_IN_REGISTRY',
  REFERENCED_UNIT_MISSING = 'REFERENCED_UNIT_MISSING',
  PACKAGING_ERROR = 'PACKAGING_ERROR',
  REGISTRY_PATH_INVALID = 'REGISTRY_PATH_INVALID',
  INVALID_REGISTRY = 'INVALID_REGISTRY',
  INVALID_MANIFEST = 'INVALID_MANIFEST',
  COMPILER_ERROR = 'COMPILER_ERROR',
  VCS_ERROR = 'VCS_ERROR',
  NO_REMOTE_LOCATION = 'NO_REMOTE_LOCATION',
  NOT_A_PACKAGE = 'NOT_A_PACKAGE'
}

// Logger types
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}
