/**
 * Shared constants for modkit
 * Single source of truth for directory names, file names and defaults.
 */

export const DIR_PATTERNS = {
  MODKIT: '.modkit'
} as const;

export const FILE_PATTERNS = {
  REGISTRY_JSON: 'registry.json',
  PACKAGE_MANIFEST_JSON: 'manifest.json',
  CONFIG_JSONC: 'config.jsonc',
  CONFIG_JSON: 'config.json',
  JSON_EXTENSION: '.json'
} as const;

/**
 * Layout of a package root.
 */
export const PACKAGE_PATHS = {
  /** <package-root>/manifest.json */
  MANIFEST_RELATIVE: FILE_PATTERNS.PACKAGE_MANIFEST_JSON,
  /** <package-root>/<module-id>/output */
  MODULE_OUTPUT_DIR: 'output'
} as const;

export const ENV_VARS = {
  VERBOSE: 'MODKIT_VERBOSE',
  LOG_LEVEL: 'MODKIT_LOG_LEVEL',
  REGISTRY: 'MODKIT_REGISTRY',
  HOME: 'MODKIT_HOME'
} as const;

export const DEFAULTS = {
  BRANCH: 'master',
  REMOTE: 'origin',
  COMPILER_COMMAND: 'sac2c',
  OUTPUT_OPTION: '-o'
} as const;

export const NOT_VERSIONED_LABEL = 'not_versioned';

export const COMMIT_MESSAGES = {
  PUBLISH_PREFIX: 'updated to version: '
} as const;
