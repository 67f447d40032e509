/**
 * @modkit/core - modkit Core Library
 *
 * The registry of build units, the dependency graph between them, and the
 * package pipelines. No terminal dependencies: all user-facing output goes
 * through OutputPort.
 */

// ============================================================================
// Port Interfaces
// ============================================================================

export type { OutputPort, UnifiedSpinner } from './core/ports/output.js';
export { consoleOutput, createRecordingOutput, type RecordingOutput } from './core/ports/console-output.js';
export { resolveOutput } from './core/ports/resolve.js';

// ============================================================================
// Execution Context & Configuration
// ============================================================================

export { createExecutionContext, resolveArgumentPath } from './core/execution-context.js';
export { ConfigManager, configManager } from './core/config.js';
export { getModkitDirectories, ensureModkitDirectories, getDefaultRegistryPath } from './core/directory.js';

// ============================================================================
// Graph Model
// ============================================================================

export {
  strayDependency,
  standaloneDependency,
  packageDependency,
  dependencyEquals,
  describeDependency,
  isPackageReference,
  type Dependency,
  type DependencyType,
  type StrayDependency,
  type StandaloneDependency,
  type PackageDependency
} from './core/dependency.js';
export {
  NOT_VERSIONED,
  VERSION_INCREMENTS,
  semVer,
  incrementVersion,
  formatVersion,
  parseVersion,
  versionEquals,
  isVersionIncrement,
  type Version,
  type VersionIncrement
} from './core/version.js';
export { DependencyHolder } from './core/units/build-unit.js';
export { StandaloneModule, type StandaloneModuleData } from './core/units/standalone-module.js';
export { Executable, type ExecutableData } from './core/units/executable.js';
export { PackageModule, type PackageModuleData } from './core/units/package-module.js';
export { Package, type PackageData, type PackageModuleEntry } from './core/package/package.js';
export {
  getPackageManifestPath,
  loadPackageManifest,
  savePackageManifest,
  packageFromManifest,
  toPackageManifest
} from './core/package/package-manifest.js';

// ============================================================================
// Registry
// ============================================================================

export { Registry, type RegistryOptions, type PackageModuleMatch } from './core/registry/registry.js';
export { JsonFileRegistryStore, MemoryRegistryStore, type RegistryStore } from './core/registry/store.js';
export { emptyRegistryDocument, type RegistryDocument, type PackageManifest } from './core/registry/schema.js';
export {
  moduleRef,
  executableRef,
  packageModuleRef,
  describeUnitRef,
  unitRefKey,
  type UnitRef
} from './core/registry/unit-ref.js';
export { canReach, findCycle, type DependencyGraphView } from './core/registry/graph.js';
export { isRemoteUrl, repositoryNameFromUrl } from './core/registry/remote-url.js';

// ============================================================================
// Collaborators
// ============================================================================

export { ProcessCompiler, type Compiler, type CompileRequest } from './core/collaborators/compiler.js';
export { GitVersionControl, type VersionControl, type CommitOptions } from './core/collaborators/vcs.js';
export { runProcess, type ProcessRunner, type ProcessOutput } from './core/collaborators/process.js';

// ============================================================================
// Pipelines
// ============================================================================

export {
  runCreatePackagePipeline,
  runBuildPipeline,
  type CreatePackageData,
  type CreatePackageOptions,
  type BuildPackageData
} from './core/package/package-pipeline.js';
export { runPublishPipeline, runUploadPipeline, runDownloadPipeline } from './core/publish/publish-pipeline.js';
export type {
  PipelineOptions,
  PublishOptions,
  PublishData,
  UploadData,
  DownloadData,
  PublishResult
} from './core/publish/publish-types.js';
export {
  buildRegistryReport,
  renderRegistryTree,
  type RegistryReport,
  type ListPackageReport,
  type ListUnitReport
} from './core/list/list-pipeline.js';

// ============================================================================
// Types & Errors
// ============================================================================

export type { ExecutionContext, ExecutionOptions } from './types/execution-context.js';
export {
  ModkitError,
  ErrorCodes,
  LogLevel,
  type CommandResult,
  type LanguageConfig,
  type ModkitConfig,
  type ResolvedModkitConfig,
  type ModkitDirectories
} from './types/index.js';
export * from './utils/errors.js';
export { logger } from './utils/logger.js';
export { formatPathForDisplay } from './utils/formatters.js';
