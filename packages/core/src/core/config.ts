import { join, resolve } from 'path';
import { LanguageConfig, ModkitConfig, ModkitDirectories, ResolvedModkitConfig } from '../types/index.js';
import { DEFAULTS, ENV_VARS, FILE_PATTERNS } from '../constants/index.js';
import { exists, parseJsoncText, readTextFile } from '../utils/fs.js';
import { expandTilde } from '../utils/home-directory.js';
import { logger } from '../utils/logger.js';
import { ConfigError } from '../utils/errors.js';
import { getModkitDirectories } from './directory.js';

/**
 * Configuration management for the modkit CLI
 * Supports both JSON and JSONC formats
 */

const CONFIG_FILE_NAMES = [FILE_PATTERNS.CONFIG_JSONC, FILE_PATTERNS.CONFIG_JSON];

const DEFAULT_LANGUAGE: LanguageConfig = {
  compilerCommand: DEFAULTS.COMPILER_COMMAND,
  outputOption: DEFAULTS.OUTPUT_OPTION
};

class ConfigManager {
  private config: ModkitConfig | null = null;
  private configPath: string | null = null;

  constructor(
    private readonly directories: ModkitDirectories = getModkitDirectories(),
    private readonly env: NodeJS.ProcessEnv = process.env
  ) {}

  /**
   * Find the existing config file (supports both .json and .jsonc)
   */
  private async findConfigFile(): Promise<string | null> {
    for (const fileName of CONFIG_FILE_NAMES) {
      const path = join(this.directories.config, fileName);
      if (await exists(path)) {
        return path;
      }
    }
    return null;
  }

  /**
   * Load the config file as written; an absent file is an empty config.
   */
  async load(): Promise<ModkitConfig> {
    if (this.config) {
      return this.config;
    }

    const configPath = await this.findConfigFile();
    if (!configPath) {
      logger.debug('Config file not found, using defaults');
      this.config = {};
      return this.config;
    }

    logger.debug(`Loading config from: ${configPath}`);
    let parsed: unknown;
    try {
      parsed = parseJsoncText(await readTextFile(configPath));
    } catch (error) {
      throw new ConfigError(`Failed to load configuration from ${configPath}: ${error instanceof Error ? error.message : String(error)}`, { configPath });
    }
    this.configPath = configPath;
    this.config = readConfig(parsed, configPath);
    return this.config;
  }

  /**
   * Configuration with defaults filled in and environment overrides applied.
   * MODKIT_REGISTRY beats `registryPath` from the file.
   */
  async resolve(): Promise<ResolvedModkitConfig> {
    const config = await this.load();
    const registryPath = this.env[ENV_VARS.REGISTRY] || config.registryPath;

    return {
      registryPath: registryPath
        ? resolve(expandTilde(registryPath))
        : join(this.directories.data, FILE_PATTERNS.REGISTRY_JSON),
      defaultBranch: config.defaultBranch ?? DEFAULTS.BRANCH,
      language: { ...DEFAULT_LANGUAGE, ...config.language }
    };
  }

  getConfigFilePath(): string | null {
    return this.configPath;
  }

  getDirectories(): ModkitDirectories {
    return this.directories;
  }
}

function readConfig(value: unknown, configPath: string): ModkitConfig {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new ConfigError(`Invalid configuration structure in ${configPath}`, { configPath });
  }

  const config: ModkitConfig = {};
  if ('registryPath' in value && value.registryPath !== undefined) {
    config.registryPath = readConfigString(value.registryPath, 'registryPath', configPath);
  }
  if ('defaultBranch' in value && value.defaultBranch !== undefined) {
    config.defaultBranch = readConfigString(value.defaultBranch, 'defaultBranch', configPath);
  }
  if ('language' in value && value.language !== undefined) {
    const language = value.language;
    if (typeof language !== 'object' || language === null) {
      throw new ConfigError(`'language' must be an object in ${configPath}`, { configPath });
    }
    config.language = {
      compilerCommand: 'compilerCommand' in language
        ? readConfigString(language.compilerCommand, 'language.compilerCommand', configPath)
        : DEFAULT_LANGUAGE.compilerCommand,
      outputOption: 'outputOption' in language
        ? readConfigString(language.outputOption, 'language.outputOption', configPath)
        : DEFAULT_LANGUAGE.outputOption
    };
  }
  return config;
}

function readConfigString(value: unknown, key: string, configPath: string): string {
  if (typeof value !== 'string' || value.length === 0) {
    throw new ConfigError(`'${key}' must be a non-empty string in ${configPath}`, { configPath, key });
  }
  return value;
}

// Create and export a singleton instance
export const configManager = new ConfigManager();

// Export the class for testing purposes
export { ConfigManager };
