/**
 * On-disk shape of the registry and the package manifest, with the checks
 * that turn parsed JSON back into typed data.
 */

import type { LanguageConfig } from '../../types/index.js';
import type { Dependency } from '../dependency.js';
import type { PackageData } from '../package/package.js';
import type { ExecutableData } from '../units/executable.js';
import type { PackageModuleData } from '../units/package-module.js';
import type { StandaloneModuleData } from '../units/standalone-module.js';
import { parseVersion } from '../version.js';

export interface RegistryDocument {
  modules: Record<string, StandaloneModuleData>;
  executables: Record<string, ExecutableData>;
  packages: Record<string, PackageData>;
}

export type PackageManifest = Omit<PackageData, 'root'>;

export function emptyRegistryDocument(): RegistryDocument {
  return { modules: {}, executables: {}, packages: {} };
}

/**
 * Raised by the readers below; callers rewrap it into the error
 * matching the document being read.
 */
export class SchemaError extends Error {
  constructor(readonly path: string, readonly reason: string) {
    super(`${path}: ${reason}`);
    this.name = 'SchemaError';
  }
}

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readObject(value: unknown, path: string): JsonObject {
  if (!isObject(value)) {
    throw new SchemaError(path, 'expected an object');
  }
  return value;
}

function readString(value: unknown, path: string): string {
  if (typeof value !== 'string' || value.length === 0) {
    throw new SchemaError(path, 'expected a non-empty string');
  }
  return value;
}

function readRecord<T>(value: unknown, path: string, readEntry: (entry: unknown, entryPath: string) => T): Record<string, T> {
  const object = readObject(value, path);
  const result: Record<string, T> = {};
  for (const [key, entry] of Object.entries(object)) {
    result[key] = readEntry(entry, `${path}.${key}`);
  }
  return result;
}

export function readDependency(value: unknown, path: string): Dependency {
  const object = readObject(value, path);
  switch (object.type) {
    case 'stray':
      return {
        type: 'stray',
        identifier: readString(object.identifier, `${path}.identifier`),
        outputLocation: readString(object.outputLocation, `${path}.outputLocation`)
      };
    case 'standalone':
      return { type: 'standalone', sourcePath: readString(object.sourcePath, `${path}.sourcePath`) };
    case 'package':
      return {
        type: 'package',
        packageId: readString(object.packageId, `${path}.packageId`),
        moduleId: readString(object.moduleId, `${path}.moduleId`)
      };
    default:
      throw new SchemaError(`${path}.type`, `unknown dependency type ${JSON.stringify(object.type)}`);
  }
}

function readDependencies(value: unknown, path: string): Record<string, Dependency> {
  return readRecord(value ?? {}, path, readDependency);
}

function readStandaloneModule(value: unknown, path: string): StandaloneModuleData {
  const object = readObject(value, path);
  return {
    identifier: readString(object.identifier, `${path}.identifier`),
    sourcePath: readString(object.sourcePath, `${path}.sourcePath`),
    outputLocation: readString(object.outputLocation, `${path}.outputLocation`),
    dependencies: readDependencies(object.dependencies, `${path}.dependencies`)
  };
}

function readExecutable(value: unknown, path: string): ExecutableData {
  const object = readObject(value, path);
  return { dependencies: readDependencies(object.dependencies, `${path}.dependencies`) };
}

function readPackageModule(value: unknown, path: string): PackageModuleData {
  const object = readObject(value, path);
  return {
    identifier: readString(object.identifier, `${path}.identifier`),
    outputLocation: readString(object.outputLocation, `${path}.outputLocation`),
    dependencies: readDependencies(object.dependencies, `${path}.dependencies`)
  };
}

function readLanguage(value: unknown, path: string): LanguageConfig {
  const object = readObject(value, path);
  return {
    compilerCommand: readString(object.compilerCommand, `${path}.compilerCommand`),
    outputOption: readString(object.outputOption, `${path}.outputOption`)
  };
}

function readVersionText(value: unknown, path: string): string {
  const text = readString(value, path);
  try {
    parseVersion(text);
  } catch (error) {
    throw new SchemaError(path, error instanceof Error ? error.message : String(error));
  }
  return text;
}

function readRemote(value: unknown, path: string): string | null {
  return value === undefined || value === null ? null : readString(value, path);
}

export function readPackageManifest(value: unknown, path: string = 'manifest'): PackageManifest {
  const object = readObject(value, path);
  return {
    identifier: readString(object.identifier, `${path}.identifier`),
    version: readVersionText(object.version, `${path}.version`),
    language: readLanguage(object.language, `${path}.language`),
    remoteLocation: readRemote(object.remoteLocation, `${path}.remoteLocation`),
    modules: readRecord(object.modules ?? {}, `${path}.modules`, (entry, entryPath) => {
      const moduleEntry = readObject(entry, entryPath);
      return {
        sourcePath: readString(moduleEntry.sourcePath, `${entryPath}.sourcePath`),
        module: readPackageModule(moduleEntry.module, `${entryPath}.module`)
      };
    })
  };
}

function readPackage(value: unknown, path: string): PackageData {
  const object = readObject(value, path);
  return {
    ...readPackageManifest(object, path),
    root: readString(object.root, `${path}.root`)
  };
}

export function readRegistryDocument(value: unknown): RegistryDocument {
  const object = readObject(value, 'registry');
  return {
    modules: readRecord(object.modules ?? {}, 'modules', readStandaloneModule),
    executables: readRecord(object.executables ?? {}, 'executables', readExecutable),
    packages: readRecord(object.packages ?? {}, 'packages', readPackage)
  };
}
