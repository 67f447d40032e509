/**
 * Dependency edges.
 *
 * An edge points from a build unit to either a registered standalone module
 * (by source path), a module owned by a package, or an untracked artifact.
 */

export interface StrayDependency {
  type: 'stray';
  identifier: string;
  outputLocation: string;
}

export interface StandaloneDependency {
  type: 'standalone';
  sourcePath: string;
}

export interface PackageDependency {
  type: 'package';
  packageId: string;
  moduleId: string;
}

export type Dependency = StrayDependency | StandaloneDependency | PackageDependency;

export type DependencyType = Dependency['type'];

export function strayDependency(identifier: string, outputLocation: string): StrayDependency {
  return { type: 'stray', identifier, outputLocation };
}

export function standaloneDependency(sourcePath: string): StandaloneDependency {
  return { type: 'standalone', sourcePath };
}

export function packageDependency(packageId: string, moduleId: string): PackageDependency {
  return { type: 'package', packageId, moduleId };
}

export function isPackageReference(dependency: Dependency): dependency is PackageDependency {
  return dependency.type === 'package';
}

export function dependencyEquals(a: Dependency, b: Dependency): boolean {
  switch (a.type) {
    case 'stray':
      return b.type === 'stray' && a.identifier === b.identifier && a.outputLocation === b.outputLocation;
    case 'standalone':
      return b.type === 'standalone' && a.sourcePath === b.sourcePath;
    case 'package':
      return b.type === 'package' && a.packageId === b.packageId && a.moduleId === b.moduleId;
    default:
      return assertNever(a);
  }
}

export function describeDependency(dependency: Dependency): string {
  switch (dependency.type) {
    case 'stray':
      return `stray ${dependency.identifier} @ ${dependency.outputLocation}`;
    case 'standalone':
      return `standalone ${dependency.sourcePath}`;
    case 'package':
      return `package ${dependency.packageId}/${dependency.moduleId}`;
    default:
      return assertNever(dependency);
  }
}

export function cloneDependency(dependency: Dependency): Dependency {
  return { ...dependency };
}

export function assertNever(value: never): never {
  throw new Error(`Unexpected variant: ${JSON.stringify(value)}`);
}
