import { join } from 'path';
import type { LanguageConfig } from '../../types/index.js';
import { ValidationError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { relativeToRoot } from '../../utils/path-validation.js';
import type { Compiler } from '../collaborators/compiler.js';
import { PackageModule, type PackageModuleData } from '../units/package-module.js';
import {
  NOT_VERSIONED,
  formatVersion,
  incrementVersion,
  parseVersion,
  type Version,
  type VersionIncrement
} from '../version.js';

export interface PackageModuleEntry {
  /** Source file, relative to the package root */
  sourcePath: string;
  module: PackageModule;
}

export interface PackageData {
  identifier: string;
  root: string;
  version: string;
  language: LanguageConfig;
  remoteLocation: string | null;
  modules: Record<string, { sourcePath: string; module: PackageModuleData }>;
}

/**
 * A versioned set of modules sharing one root directory and one compiler.
 */
export class Package {
  private readonly modules = new Map<string, PackageModuleEntry>();

  constructor(
    readonly identifier: string,
    readonly root: string,
    readonly language: LanguageConfig,
    private currentVersion: Version = NOT_VERSIONED,
    private remote: string | undefined = undefined
  ) {}

  static fromData(data: PackageData): Package {
    const pkg = new Package(
      data.identifier,
      data.root,
      { ...data.language },
      parseVersion(data.version),
      data.remoteLocation ?? undefined
    );
    for (const { sourcePath, module } of Object.values(data.modules)) {
      pkg.addModule(sourcePath, PackageModule.fromData(module));
    }
    return pkg;
  }

  toData(): PackageData {
    const modules: PackageData['modules'] = {};
    for (const [identifier, entry] of [...this.modules.entries()].sort(([a], [b]) => a.localeCompare(b))) {
      modules[identifier] = { sourcePath: entry.sourcePath, module: entry.module.toData() };
    }
    return {
      identifier: this.identifier,
      root: this.root,
      version: formatVersion(this.currentVersion),
      language: { ...this.language },
      remoteLocation: this.remote ?? null,
      modules
    };
  }

  get version(): Version {
    return this.currentVersion;
  }

  get remoteLocation(): string | undefined {
    return this.remote;
  }

  /**
   * A package with a remote is "registered"; without one it is only "known".
   */
  isRegistered(): boolean {
    return this.remote !== undefined;
  }

  /**
   * Set the remote once; an existing remote is kept.
   * Returns whether the remote changed.
   */
  setRemoteLocation(url: string): boolean {
    if (this.remote !== undefined) {
      return false;
    }
    this.remote = url;
    return true;
  }

  /**
   * Compile every module, one compiler call each, in identifier order.
   * The first failure aborts the build.
   */
  async build(compiler: Compiler): Promise<void> {
    for (const [identifier, { sourcePath, module }] of this.sortedModules()) {
      logger.debug(`Building ${this.identifier}/${identifier}`);
      await compiler.compile({
        command: this.language.compilerCommand,
        sourcePath: join(this.root, sourcePath),
        outputOption: this.language.outputOption,
        outputPath: join(this.root, module.outputLocation)
      });
    }
  }

  addModule(relativePath: string, module: PackageModule): void {
    this.modules.set(module.identifier, { sourcePath: relativePath, module });
  }

  removeModule(identifier: string): PackageModuleEntry | undefined {
    const entry = this.modules.get(identifier);
    this.modules.delete(identifier);
    return entry;
  }

  getModule(identifier: string): PackageModule | undefined {
    return this.modules.get(identifier)?.module;
  }

  getModuleEntry(identifier: string): PackageModuleEntry | undefined {
    return this.modules.get(identifier);
  }

  hasModuleId(identifier: string): boolean {
    return this.modules.has(identifier);
  }

  /**
   * All modules registered under `identifier`, with their relative source paths.
   */
  searchModules(identifier: string): Array<[string, PackageModule]> {
    return [...this.modules.entries()]
      .filter(([id]) => id === identifier)
      .map(([, entry]) => [entry.sourcePath, entry.module]);
  }

  listModules(): PackageModule[] {
    return this.sortedModules().map(([, entry]) => entry.module);
  }

  incrementVersion(increment: VersionIncrement): Version {
    this.currentVersion = incrementVersion(this.currentVersion, increment);
    return this.currentVersion;
  }

  /**
   * Whether `path` is the source of one of this package's modules.
   * Throws when `path` does not lie under `root`.
   */
  hasModuleSource(root: string, path: string): boolean {
    const stripped = relativeToRoot(root, path);
    if (stripped === undefined) {
      throw new ValidationError(`${path} is not inside ${root}`, { root, path });
    }
    return [...this.modules.values()].some(entry => entry.sourcePath === stripped);
  }

  /**
   * Relative source and output paths of every module.
   */
  moduleFiles(): string[] {
    return this.sortedModules().flatMap(([, entry]) => [entry.sourcePath, entry.module.outputLocation]);
  }

  private sortedModules(): Array<[string, PackageModuleEntry]> {
    return [...this.modules.entries()].sort(([a], [b]) => a.localeCompare(b));
  }
}
