import { ModkitError, ErrorCodes, CommandResult } from '../types/index.js';
import { logger } from './logger.js';

/**
 * Error classes for the failure kinds modkit distinguishes.
 * Graph errors are raised before any in-memory state changes.
 */

export class ValidationError extends ModkitError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Validation error: ${message}`, ErrorCodes.VALIDATION_ERROR, details);
    this.name = 'ValidationError';
  }
}

export class FileSystemError extends ModkitError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`File system error: ${message}`, ErrorCodes.FILE_SYSTEM_ERROR, details);
    this.name = 'FileSystemError';
  }
}

export class ConfigError extends ModkitError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
    this.name = 'ConfigError';
  }
}

// Graph errors

export class CyclicDependencyError extends ModkitError {
  constructor(owner: string, target: string) {
    super(
      `Adding ${target} as a dependency of ${owner} would create a cycle`,
      ErrorCodes.CYCLIC_DEPENDENCY,
      { owner, target }
    );
    this.name = 'CyclicDependencyError';
  }
}

export class NoSuchDependencyError extends ModkitError {
  constructor(owner: string, dependencyId: string) {
    super(
      `${owner} has no matching dependency '${dependencyId}'`,
      ErrorCodes.NO_SUCH_DEPENDENCY,
      { owner, dependencyId }
    );
    this.name = 'NoSuchDependencyError';
  }
}

export class ModuleAlreadyInRegistryError extends ModkitError {
  constructor(identifier: string, sourcePath?: string) {
    super(
      sourcePath
        ? `Module '${identifier}' (${sourcePath}) conflicts with a registered module`
        : `Module '${identifier}' is already registered`,
      ErrorCodes.MODULE_ALREADY_IN_REGISTRY,
      { identifier, sourcePath }
    );
    this.name = 'ModuleAlreadyInRegistryError';
  }
}

export class PackageAlreadyInRegistryError extends ModkitError {
  constructor(identifier: string) {
    super(`Package '${identifier}' is already registered`, ErrorCodes.PACKAGE_ALREADY_IN_REGISTRY, { identifier });
    this.name = 'PackageAlreadyInRegistryError';
  }
}

export class ReferencedUnitMissingError extends ModkitError {
  constructor(unit: string) {
    super(`${unit} is not registered`, ErrorCodes.REFERENCED_UNIT_MISSING, { unit });
    this.name = 'ReferencedUnitMissingError';
  }
}

export class PackageNotFoundError extends ModkitError {
  constructor(packageId: string) {
    super(`Package '${packageId}' not found`, ErrorCodes.PACKAGE_NOT_FOUND, { packageId });
    this.name = 'PackageNotFoundError';
  }
}

export class PackagingError extends ModkitError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Cannot create package: ${message}`, ErrorCodes.PACKAGING_ERROR, details);
    this.name = 'PackagingError';
  }
}

// Persistence errors

export class RegistryPathError extends ModkitError {
  constructor(message: string, path: string) {
    super(`${message}: ${path}`, ErrorCodes.REGISTRY_PATH_INVALID, { path });
    this.name = 'RegistryPathError';
  }
}

export class InvalidRegistryError extends ModkitError {
  constructor(reason: string, details?: Record<string, unknown>) {
    super(`Invalid registry: ${reason}`, ErrorCodes.INVALID_REGISTRY, details);
    this.name = 'InvalidRegistryError';
  }
}

export class InvalidManifestError extends ModkitError {
  constructor(reason: string, details?: Record<string, unknown>) {
    super(`Invalid package manifest: ${reason}`, ErrorCodes.INVALID_MANIFEST, details);
    this.name = 'InvalidManifestError';
  }
}

// Collaborator errors

export class CompilerError extends ModkitError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Compilation failed: ${message}`, ErrorCodes.COMPILER_ERROR, details);
    this.name = 'CompilerError';
  }
}

export class VcsError extends ModkitError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Git command failed: ${message}`, ErrorCodes.VCS_ERROR, details);
    this.name = 'VcsError';
  }
}

export type PackageErrorCode = ErrorCodes.NO_REMOTE_LOCATION | ErrorCodes.NOT_A_PACKAGE;

export class PackageError extends ModkitError {
  constructor(message: string, code: PackageErrorCode, details?: Record<string, unknown>) {
    super(message, code, details);
    this.name = 'PackageError';
  }
}

export class UserCancellationError extends Error {
  constructor(message: string = 'Operation cancelled by user') {
    super(message);
    this.name = 'UserCancellationError';
  }
}

/**
 * Error handler function that provides consistent error handling across commands
 */
export function handleError<T = unknown>(error: unknown): CommandResult<T> {
  if (error instanceof ModkitError) {
    // Details only surface in verbose mode
    logger.debug(error.message, { code: error.code, details: error.details });
    return {
      success: false,
      error: error.message
    };
  } else if (error instanceof Error) {
    logger.debug('Unexpected error occurred', { message: error.message, stack: error.stack });
    return {
      success: false,
      error: error.message
    };
  } else {
    logger.debug('Unknown error occurred', { error });
    return {
      success: false,
      error: 'An unknown error occurred'
    };
  }
}
