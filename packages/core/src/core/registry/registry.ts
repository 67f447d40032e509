import { basename, join } from 'path';
import { COMMIT_MESSAGES, DEFAULTS, PACKAGE_PATHS } from '../../constants/index.js';
import { ErrorCodes, type LanguageConfig } from '../../types/index.js';
import {
  CyclicDependencyError,
  InvalidRegistryError,
  ModuleAlreadyInRegistryError,
  NoSuchDependencyError,
  PackageAlreadyInRegistryError,
  PackageError,
  PackageNotFoundError,
  PackagingError,
  ReferencedUnitMissingError,
  ValidationError,
  VcsError
} from '../../utils/errors.js';
import { ensureDir, exists, remove } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { assertAbsolute, assertExistingDirectory, isUnderRoot, relativeToRoot } from '../../utils/path-validation.js';
import { ProcessCompiler, type Compiler } from '../collaborators/compiler.js';
import { GitVersionControl, type VersionControl } from '../collaborators/vcs.js';
import {
  assertNever,
  dependencyEquals,
  describeDependency,
  isPackageReference,
  packageDependency,
  type Dependency
} from '../dependency.js';
import { Package } from '../package/package.js';
import {
  getPackageManifestPath,
  loadPackageManifest,
  packageFromManifest,
  savePackageManifest
} from '../package/package-manifest.js';
import type { DependencyHolder } from '../units/build-unit.js';
import { Executable } from '../units/executable.js';
import { PackageModule } from '../units/package-module.js';
import { StandaloneModule } from '../units/standalone-module.js';
import { formatVersion, type Version, type VersionIncrement } from '../version.js';
import { canReach, findCycle, type DependencyGraphView } from './graph.js';
import { emptyRegistryDocument, type RegistryDocument } from './schema.js';
import type { RegistryStore } from './store.js';
import {
  describeUnitRef,
  moduleRef,
  packageModuleRef,
  type UnitRef
} from './unit-ref.js';
import { isRemoteUrl, repositoryNameFromUrl } from './remote-url.js';

export interface RegistryOptions {
  compiler?: Compiler;
  vcs?: VersionControl;
  /** Branch pushed on upload */
  defaultBranch?: string;
}

export interface PackageModuleMatch {
  packageId: string;
  sourcePath: string;
  module: PackageModule;
}

/**
 * The registry of build units and the dependency graph between them.
 *
 * Every public mutator validates first, then changes the in-memory graph and
 * writes the complete document to the store. If the write fails the in-memory
 * graph is put back to what it was, so a failed call leaves no trace.
 *
 * Invariants after each successful mutation:
 * - identifiers are unique per namespace (modules, packages, modules of a package)
 * - every standalone/package edge resolves to a registered unit
 * - standalone/package edges form no cycle
 * - package modules carry only package or stray edges
 */
export class Registry implements DependencyGraphView {
  private readonly modules = new Map<string, StandaloneModule>();
  private readonly executables = new Map<string, Executable>();
  private readonly packages = new Map<string, Package>();

  private readonly compiler: Compiler;
  private readonly vcs: VersionControl;
  private readonly defaultBranch: string;

  private constructor(private readonly store: RegistryStore, options: RegistryOptions = {}) {
    this.compiler = options.compiler ?? new ProcessCompiler();
    this.vcs = options.vcs ?? new GitVersionControl();
    this.defaultBranch = options.defaultBranch ?? DEFAULTS.BRANCH;
  }

  /**
   * Load the registry from `store`. Nothing stored yet means an empty registry.
   */
  static async load(store: RegistryStore, options: RegistryOptions = {}): Promise<Registry> {
    const registry = new Registry(store, options);
    const document = await store.load();
    if (document) {
      registry.hydrate(document);
    }
    logger.debug(`Loaded registry from ${store.location}`, {
      modules: registry.modules.size,
      executables: registry.executables.size,
      packages: registry.packages.size
    });
    return registry;
  }

  get location(): string {
    return this.store.location;
  }

  toDocument(): RegistryDocument {
    const document = emptyRegistryDocument();
    for (const [identifier, module] of sortedEntries(this.modules)) {
      document.modules[identifier] = module.toData();
    }
    for (const [sourcePath, executable] of sortedEntries(this.executables)) {
      document.executables[sourcePath] = executable.toData();
    }
    for (const [identifier, pkg] of sortedEntries(this.packages)) {
      document.packages[identifier] = pkg.toData();
    }
    return document;
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  getModule(identifier: string): StandaloneModule | undefined {
    return this.modules.get(identifier);
  }

  getModuleBySource(sourcePath: string): StandaloneModule | undefined {
    for (const module of this.modules.values()) {
      if (module.sourcePath === sourcePath) {
        return module;
      }
    }
    return undefined;
  }

  getExecutable(sourcePath: string): Executable | undefined {
    return this.executables.get(sourcePath);
  }

  getPackage(identifier: string): Package | undefined {
    return this.packages.get(identifier);
  }

  getPackageModule(packageId: string, moduleId: string): PackageModule | undefined {
    return this.packages.get(packageId)?.getModule(moduleId);
  }

  hasModule(identifier: string): boolean {
    return this.modules.has(identifier);
  }

  hasExecutable(sourcePath: string): boolean {
    return this.executables.has(sourcePath);
  }

  hasPackage(identifier: string): boolean {
    return this.packages.has(identifier);
  }

  listModules(): StandaloneModule[] {
    return sortedEntries(this.modules).map(([, module]) => module);
  }

  listExecutables(): Array<[string, Executable]> {
    return sortedEntries(this.executables);
  }

  listPackages(): Package[] {
    return sortedEntries(this.packages).map(([, pkg]) => pkg);
  }

  /**
   * Standalone modules whose source file lies under `root`.
   */
  searchModulesBySourcePrefix(root: string): StandaloneModule[] {
    return this.listModules().filter(module => isUnderRoot(root, module.sourcePath));
  }

  /**
   * Modules named `identifier` across all packages.
   */
  searchPackageModules(identifier: string): PackageModuleMatch[] {
    return this.listPackages().flatMap(pkg =>
      pkg.searchModules(identifier).map(([sourcePath, module]) => ({ packageId: pkg.identifier, sourcePath, module }))
    );
  }

  /**
   * Whether the unit an edge points at is registered. Stray edges always are.
   */
  dependencyExists(dependency: Dependency): boolean {
    switch (dependency.type) {
      case 'stray':
        return true;
      case 'standalone':
        return this.getModuleBySource(dependency.sourcePath) !== undefined;
      case 'package':
        return this.packages.get(dependency.packageId)?.hasModuleId(dependency.moduleId) ?? false;
      default:
        return assertNever(dependency);
    }
  }

  /**
   * The edge of `owner` under `identifier`, if it still resolves.
   */
  getDependency(owner: UnitRef, identifier: string): Dependency | undefined {
    const dependency = this.findUnit(owner)?.getDependency(identifier);
    return dependency && this.dependencyExists(dependency) ? dependency : undefined;
  }

  hasDependency(owner: UnitRef, identifier: string): boolean {
    return this.findUnit(owner)?.hasDependency(identifier) ?? false;
  }

  hasUnit(ref: UnitRef): boolean {
    return this.findUnit(ref) !== undefined;
  }

  edgesOf(ref: UnitRef): Dependency[] {
    return this.findUnit(ref)?.listDependencies().map(([, dependency]) => dependency) ?? [];
  }

  resolve(dependency: Dependency): UnitRef | undefined {
    switch (dependency.type) {
      case 'stray':
        return undefined;
      case 'standalone': {
        const module = this.getModuleBySource(dependency.sourcePath);
        return module ? moduleRef(module.identifier) : undefined;
      }
      case 'package':
        return this.dependencyExists(dependency)
          ? packageModuleRef(dependency.packageId, dependency.moduleId)
          : undefined;
      default:
        return assertNever(dependency);
    }
  }

  // ---------------------------------------------------------------------------
  // Units
  // ---------------------------------------------------------------------------

  async addModule(sourcePath: string, identifier: string, outputLocation: string): Promise<StandaloneModule> {
    if (!identifier.trim()) {
      throw new ValidationError('Module identifier must not be empty');
    }
    assertAbsolute(sourcePath, 'Module source path');
    await assertExistingDirectory(outputLocation, 'Module output location');

    if (this.modules.has(identifier)) {
      throw new ModuleAlreadyInRegistryError(identifier);
    }
    if (this.getModuleBySource(sourcePath)) {
      throw new ModuleAlreadyInRegistryError(identifier, sourcePath);
    }

    const module = new StandaloneModule(identifier, sourcePath, outputLocation);
    await this.mutate(`add module '${identifier}'`, () => {
      this.modules.set(identifier, module);
    });
    return module;
  }

  /**
   * Register an executable. Adding one that is already registered keeps it as is.
   */
  async addExecutable(sourcePath: string): Promise<Executable> {
    assertAbsolute(sourcePath, 'Executable source path');

    const existing = this.executables.get(sourcePath);
    if (existing) {
      logger.debug(`Executable already registered: ${sourcePath}`);
      return existing;
    }

    const executable = new Executable();
    await this.mutate(`add executable ${sourcePath}`, () => {
      this.executables.set(sourcePath, executable);
    });
    return executable;
  }

  // ---------------------------------------------------------------------------
  // Dependencies
  // ---------------------------------------------------------------------------

  async addDependency(owner: UnitRef, identifier: string, dependency: Dependency): Promise<void> {
    const unit = this.requireUnit(owner);

    if (owner.kind === 'package-module' && dependency.type === 'standalone') {
      throw new ValidationError(
        `${describeUnitRef(owner)} can only depend on package modules or stray artifacts`,
        { owner, dependency }
      );
    }

    if (!this.dependencyExists(dependency)) {
      throw new ReferencedUnitMissingError(describeDependency(dependency));
    }

    const target = this.resolve(dependency);
    if (target) {
      const expected = this.dependencyIdentifier(dependency);
      if (identifier !== expected) {
        throw new ValidationError(
          `Dependency identifier '${identifier}' does not match the module it points at ('${expected}')`,
          { identifier, expected }
        );
      }
      if (canReach(this, target, owner)) {
        throw new CyclicDependencyError(describeUnitRef(owner), describeDependency(dependency));
      }
    }

    const current = unit.getDependency(identifier);
    if (current && dependencyEquals(current, dependency)) {
      logger.debug(`${describeUnitRef(owner)} already depends on ${describeDependency(dependency)}`);
      return;
    }

    await this.mutate(`add dependency '${identifier}' to ${describeUnitRef(owner)}`, () => {
      unit.addDependency(identifier, dependency);
    });
    await this.saveOwningManifest(owner);
  }

  /**
   * Remove an edge, provided `owner` still holds exactly `dependency` under `identifier`.
   */
  async removeDependency(owner: UnitRef, identifier: string, dependency: Dependency): Promise<void> {
    const unit = this.requireUnit(owner);
    const current = unit.getDependency(identifier);
    if (!current || !dependencyEquals(current, dependency)) {
      throw new NoSuchDependencyError(describeUnitRef(owner), identifier);
    }

    await this.mutate(`remove dependency '${identifier}' from ${describeUnitRef(owner)}`, () => {
      unit.removeDependency(identifier, dependency);
    });
    await this.saveOwningManifest(owner);
  }

  // ---------------------------------------------------------------------------
  // Removal with cascade
  // ---------------------------------------------------------------------------

  async removeItem(ref: UnitRef): Promise<void> {
    switch (ref.kind) {
      case 'module':
        return this.removeModule(ref.identifier);
      case 'executable':
        return this.removeExecutable(ref.sourcePath);
      case 'package-module':
        return this.removePackageModule(ref.packageId, ref.moduleId);
      default:
        return assertNever(ref);
    }
  }

  /**
   * Remove a standalone module along with every edge pointing at it.
   */
  async removeModule(identifier: string): Promise<void> {
    const module = this.modules.get(identifier);
    if (!module) {
      throw new ReferencedUnitMissingError(describeUnitRef(moduleRef(identifier)));
    }

    let touched: Package[] = [];
    await this.mutate(`remove module '${identifier}'`, () => {
      this.modules.delete(identifier);
      touched = this.cascade(dependency =>
        (dependency.type === 'standalone' && dependency.sourcePath === module.sourcePath) ||
        (dependency.type === 'stray' &&
          dependency.identifier === module.identifier &&
          dependency.outputLocation === module.outputLocation)
      );
    });
    await this.saveManifests(touched);
  }

  async removeExecutable(sourcePath: string): Promise<void> {
    if (!this.executables.has(sourcePath)) {
      throw new ReferencedUnitMissingError(`Executable '${sourcePath}'`);
    }
    // Executables are never dependency targets, nothing to cascade
    await this.mutate(`remove executable ${sourcePath}`, () => {
      this.executables.delete(sourcePath);
    });
  }

  async removePackageModule(packageId: string, moduleId: string): Promise<void> {
    const pkg = this.requirePackage(packageId);
    if (!pkg.hasModuleId(moduleId)) {
      throw new ReferencedUnitMissingError(describeUnitRef(packageModuleRef(packageId, moduleId)));
    }

    let touched: Package[] = [];
    await this.mutate(`remove module '${moduleId}' from package '${packageId}'`, () => {
      pkg.removeModule(moduleId);
      touched = this.cascade(dependency =>
        isPackageReference(dependency) && dependency.packageId === packageId && dependency.moduleId === moduleId
      );
    });
    await this.saveManifests(uniquePackages([pkg, ...touched]));
  }

  /**
   * Remove a package and every edge pointing at one of its modules.
   */
  async removePackage(packageId: string): Promise<void> {
    const pkg = this.requirePackage(packageId);

    let touched: Package[] = [];
    await this.mutate(`remove package '${packageId}'`, () => {
      this.packages.delete(packageId);
      touched = this.cascade(dependency =>
        isPackageReference(dependency) && dependency.packageId === packageId && pkg.hasModuleId(dependency.moduleId)
      );
    });
    await this.saveManifests(touched);
  }

  // ---------------------------------------------------------------------------
  // Packaging
  // ---------------------------------------------------------------------------

  /**
   * Turn every standalone module under `root` into a module of a new package.
   *
   * Edges between the promoted modules and edges pointing at them from the
   * rest of the registry become package edges. A promoted module that still
   * depends on a standalone module outside `root` aborts the whole operation.
   */
  async package(packageId: string, root: string, language: LanguageConfig): Promise<Package> {
    if (this.packages.has(packageId)) {
      throw new PackageAlreadyInRegistryError(packageId);
    }
    await assertExistingDirectory(root, 'Package root');

    const promoted = this.searchModulesBySourcePrefix(root);
    if (promoted.length === 0) {
      throw new PackagingError(`no registered modules under ${root}`, { packageId, root });
    }

    const promotedIds = new Map(promoted.map(module => [module.sourcePath, module.identifier]));
    const toPackageEdge = (dependency: Dependency): Dependency | undefined => {
      if (dependency.type !== 'standalone') {
        return undefined;
      }
      const moduleId = promotedIds.get(dependency.sourcePath);
      return moduleId ? packageDependency(packageId, moduleId) : undefined;
    };

    const candidates = promoted.map(module => {
      const packageModule = new PackageModule(
        module.identifier,
        moduleOutputLocation(module.identifier),
        module.listDependencies()
      );
      packageModule.rewriteDependencies(toPackageEdge);
      return { module, packageModule };
    });
    for (const { module, packageModule } of candidates) {
      const foreign = packageModule.standaloneDependencyIds();
      if (foreign.length > 0) {
        throw new PackagingError(
          `module '${module.identifier}' @ '${module.sourcePath}' still depends on modules that are not package modules: ${foreign.join(', ')}`,
          { packageId, module: module.identifier, dependencies: foreign }
        );
      }
    }

    await this.ensureRepository(root);
    for (const module of promoted) {
      await ensureDir(join(root, moduleOutputLocation(module.identifier)));
    }

    const pkg = new Package(packageId, root, { ...language });
    await this.mutate(`package ${promoted.length} module(s) into '${packageId}'`, () => {
      for (const { module, packageModule } of candidates) {
        pkg.addModule(relativeToRoot(root, module.sourcePath) ?? module.sourcePath, packageModule);
        this.modules.delete(module.identifier);
      }
      this.packages.set(packageId, pkg);

      let rewritten = 0;
      for (const unit of this.allUnits()) {
        rewritten += unit.rewriteDependencies(toPackageEdge);
      }
      logger.debug(`Rewrote ${rewritten} edge(s) to point at package '${packageId}'`);
    });

    await savePackageManifest(pkg);
    return pkg;
  }

  // ---------------------------------------------------------------------------
  // Build and distribution
  // ---------------------------------------------------------------------------

  async build(packageId: string): Promise<void> {
    const pkg = this.requirePackage(packageId);
    await pkg.build(this.compiler);
    logger.debug(`Built package '${packageId}'`);
  }

  /**
   * Bump the version, then commit and tag it in the package's repository.
   *
   * The bump is persisted before git runs; a git failure leaves the
   * registry on the new version.
   */
  async publish(packageId: string, increment: VersionIncrement): Promise<Version> {
    const pkg = this.requirePackage(packageId);

    let version: Version = pkg.version;
    await this.mutate(`publish '${packageId}'`, () => {
      version = pkg.incrementVersion(increment);
    });
    await savePackageManifest(pkg);

    const label = formatVersion(version);
    const repository = await this.requireRepository(pkg);
    await this.vcs.add(repository, [
      getPackageManifestPath(pkg.root),
      ...pkg.moduleFiles().map(file => join(pkg.root, file))
    ]);
    await this.vcs.commit(repository, `${COMMIT_MESSAGES.PUBLISH_PREFIX}${label}`);
    await this.vcs.tag(repository, label);

    logger.debug(`Published '${packageId}' at ${label}`);
    return version;
  }

  /**
   * Record the remote (when the package has none yet) and push the package there.
   */
  async upload(packageId: string, remoteUrl?: string): Promise<string> {
    const pkg = this.requirePackage(packageId);
    if (remoteUrl !== undefined && !isRemoteUrl(remoteUrl)) {
      throw new ValidationError(`Not a git remote URL: ${remoteUrl}`, { remoteUrl });
    }

    const remote = pkg.remoteLocation ?? remoteUrl;
    if (remote === undefined) {
      throw new PackageError(
        `Package '${packageId}' has no remote location; pass one to upload`,
        ErrorCodes.NO_REMOTE_LOCATION,
        { packageId }
      );
    }

    if (!pkg.isRegistered()) {
      await this.mutate(`set remote of '${packageId}'`, () => {
        pkg.setRemoteLocation(remote);
      });
      await savePackageManifest(pkg);
    } else if (remoteUrl !== undefined && remoteUrl !== remote) {
      logger.warn(`Package '${packageId}' already has remote ${remote}; ignoring ${remoteUrl}`);
    }

    const repository = await this.requireRepository(pkg);
    await this.vcs.add(repository, [getPackageManifestPath(pkg.root)]);
    await this.vcs.commit(repository, '', { amend: true });
    const remotes = await this.vcs.remotes(repository);
    if (!remotes.includes(DEFAULTS.REMOTE)) {
      await this.vcs.addRemote(repository, DEFAULTS.REMOTE, remote);
    }
    await this.vcs.push(repository, DEFAULTS.REMOTE, this.defaultBranch);

    logger.debug(`Uploaded '${packageId}' to ${remote}`);
    return remote;
  }

  /**
   * Clone a package repository into `destination` and register it.
   */
  async download(url: string, destination: string): Promise<Package> {
    if (!isRemoteUrl(url)) {
      throw new ValidationError(`Not a git remote URL: ${url}`, { url });
    }
    await assertExistingDirectory(destination, 'Download destination');

    const root = join(destination, repositoryNameFromUrl(url));
    if (await exists(root)) {
      throw new ValidationError(`${root} already exists`, { root });
    }

    try {
      await this.vcs.clone(url, root);
      const manifest = await loadPackageManifest(root);
      if (!manifest) {
        throw new PackageError(`${url} does not contain a package manifest`, ErrorCodes.NOT_A_PACKAGE, { url, root });
      }
      if (this.packages.has(manifest.identifier)) {
        throw new PackageAlreadyInRegistryError(manifest.identifier);
      }

      // The clone URL wins over whatever remote the manifest recorded
      const pkg = packageFromManifest(root, { ...manifest, remoteLocation: url });
      this.validateIncomingPackage(pkg);

      await this.mutate(`register downloaded package '${pkg.identifier}'`, () => {
        this.packages.set(pkg.identifier, pkg);
      });
      return pkg;
    } catch (error) {
      await remove(root);
      throw error;
    }
  }

  /**
   * Check a package that is not registered yet as if it were: its modules
   * may carry only package and stray edges, each must resolve, and the
   * combined graph must stay acyclic.
   */
  private validateIncomingPackage(pkg: Package): void {
    const view: DependencyGraphView = {
      edgesOf: ref =>
        ref.kind === 'package-module' && ref.packageId === pkg.identifier
          ? pkg.getModule(ref.moduleId)?.listDependencies().map(([, dependency]) => dependency) ?? []
          : this.edgesOf(ref),
      resolve: dependency => {
        if (isPackageReference(dependency) && dependency.packageId === pkg.identifier) {
          return pkg.hasModuleId(dependency.moduleId)
            ? packageModuleRef(dependency.packageId, dependency.moduleId)
            : undefined;
        }
        return this.resolve(dependency);
      }
    };

    for (const module of pkg.listModules()) {
      for (const [, dependency] of module.listDependencies()) {
        const dangling = dependency.type !== 'stray' && view.resolve(dependency) === undefined;
        if (dependency.type === 'standalone' || dangling) {
          throw new ReferencedUnitMissingError(describeDependency(dependency));
        }
      }
    }

    const cyclic = findCycle(view, pkg.listModules().map(module => packageModuleRef(pkg.identifier, module.identifier)));
    if (cyclic) {
      throw new CyclicDependencyError(describeUnitRef(cyclic), describeUnitRef(cyclic));
    }
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  /**
   * Apply `change` and persist. On any failure the graph is restored from
   * the snapshot taken before `change` ran.
   */
  private async mutate(description: string, change: () => void): Promise<void> {
    const snapshot = this.toDocument();
    try {
      change();
      await this.store.save(this.toDocument());
    } catch (error) {
      this.hydrate(snapshot);
      logger.debug(`Rolled back: ${description}`, { error });
      throw error;
    }
    logger.debug(`Registry saved after: ${description}`, { location: this.store.location });
  }

  private hydrate(document: RegistryDocument): void {
    this.modules.clear();
    this.executables.clear();
    this.packages.clear();

    for (const [identifier, data] of Object.entries(document.modules)) {
      if (data.identifier !== identifier) {
        throw new InvalidRegistryError(`module key '${identifier}' does not match identifier '${data.identifier}'`);
      }
      this.modules.set(identifier, StandaloneModule.fromData(data));
    }
    for (const [sourcePath, data] of Object.entries(document.executables)) {
      this.executables.set(sourcePath, Executable.fromData(data));
    }
    for (const [identifier, data] of Object.entries(document.packages)) {
      if (data.identifier !== identifier) {
        throw new InvalidRegistryError(`package key '${identifier}' does not match identifier '${data.identifier}'`);
      }
      this.packages.set(identifier, Package.fromData(data));
    }
  }

  /**
   * Drop edges matching `predicate` everywhere; returns the packages whose
   * modules lost an edge.
   */
  private cascade(predicate: (dependency: Dependency) => boolean): Package[] {
    let removed = 0;
    for (const module of this.modules.values()) {
      removed += module.removeDependenciesMatching(predicate).length;
    }
    for (const executable of this.executables.values()) {
      removed += executable.removeDependenciesMatching(predicate).length;
    }
    const touched: Package[] = [];
    for (const pkg of this.packages.values()) {
      let packageRemoved = 0;
      for (const module of pkg.listModules()) {
        packageRemoved += module.removeDependenciesMatching(predicate).length;
      }
      if (packageRemoved > 0) {
        touched.push(pkg);
      }
      removed += packageRemoved;
    }
    logger.debug(`Cascade removed ${removed} dependency edge(s)`);
    return touched;
  }

  private *allUnits(): Generator<DependencyHolder> {
    yield* this.modules.values();
    yield* this.executables.values();
    for (const pkg of this.packages.values()) {
      yield* pkg.listModules();
    }
  }

  private findUnit(ref: UnitRef): DependencyHolder | undefined {
    switch (ref.kind) {
      case 'module':
        return this.modules.get(ref.identifier);
      case 'executable':
        return this.executables.get(ref.sourcePath);
      case 'package-module':
        return this.packages.get(ref.packageId)?.getModule(ref.moduleId);
      default:
        return assertNever(ref);
    }
  }

  private requireUnit(ref: UnitRef): DependencyHolder {
    const unit = this.findUnit(ref);
    if (!unit) {
      throw new ReferencedUnitMissingError(describeUnitRef(ref));
    }
    return unit;
  }

  private requirePackage(packageId: string): Package {
    const pkg = this.packages.get(packageId);
    if (!pkg) {
      throw new PackageNotFoundError(packageId);
    }
    return pkg;
  }

  /**
   * Identifier an edge to `dependency` must be stored under.
   */
  dependencyIdentifier(dependency: Dependency): string {
    switch (dependency.type) {
      case 'stray':
        return dependency.identifier;
      case 'standalone':
        return this.getModuleBySource(dependency.sourcePath)?.identifier ?? basename(dependency.sourcePath);
      case 'package':
        return dependency.moduleId;
      default:
        return assertNever(dependency);
    }
  }

  private async ensureRepository(root: string): Promise<void> {
    const found = await this.vcs.discover(root);
    if (found !== root) {
      // `git init` on an existing repository only reinitializes it
      await this.vcs.init(root);
    }
  }

  private async requireRepository(pkg: Package): Promise<string> {
    const repository = await this.vcs.discover(pkg.root);
    if (!repository) {
      throw new VcsError(`${pkg.root} is not inside a git working tree`, { packageId: pkg.identifier });
    }
    return repository;
  }

  private async saveOwningManifest(owner: UnitRef): Promise<void> {
    if (owner.kind === 'package-module') {
      const pkg = this.packages.get(owner.packageId);
      if (pkg) {
        await savePackageManifest(pkg);
      }
    }
  }

  private async saveManifests(packages: Package[]): Promise<void> {
    for (const pkg of packages) {
      await savePackageManifest(pkg);
    }
  }
}

function moduleOutputLocation(moduleId: string): string {
  return join(moduleId, PACKAGE_PATHS.MODULE_OUTPUT_DIR);
}

function sortedEntries<T>(map: Map<string, T>): Array<[string, T]> {
  return [...map.entries()].sort(([a], [b]) => a.localeCompare(b));
}

function uniquePackages(packages: Package[]): Package[] {
  return [...new Set(packages)];
}
