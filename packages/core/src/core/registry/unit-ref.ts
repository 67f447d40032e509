import { assertNever } from '../dependency.js';

/**
 * Address of a build unit inside the registry.
 */
export type UnitRef =
  | { kind: 'module'; identifier: string }
  | { kind: 'executable'; sourcePath: string }
  | { kind: 'package-module'; packageId: string; moduleId: string };

export function moduleRef(identifier: string): UnitRef {
  return { kind: 'module', identifier };
}

export function executableRef(sourcePath: string): UnitRef {
  return { kind: 'executable', sourcePath };
}

export function packageModuleRef(packageId: string, moduleId: string): UnitRef {
  return { kind: 'package-module', packageId, moduleId };
}

/**
 * Stable string form, unique across the three namespaces.
 */
export function unitRefKey(ref: UnitRef): string {
  switch (ref.kind) {
    case 'module':
      return `module:${ref.identifier}`;
    case 'executable':
      return `executable:${ref.sourcePath}`;
    case 'package-module':
      return `package-module:${ref.packageId}/${ref.moduleId}`;
    default:
      return assertNever(ref);
  }
}

export function describeUnitRef(ref: UnitRef): string {
  switch (ref.kind) {
    case 'module':
      return `Module '${ref.identifier}'`;
    case 'executable':
      return `Executable '${ref.sourcePath}'`;
    case 'package-module':
      return `Module '${ref.moduleId}' of package '${ref.packageId}'`;
    default:
      return assertNever(ref);
  }
}
