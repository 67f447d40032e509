import type { Dependency } from '../dependency.js';
import { DependencyHolder } from './build-unit.js';

export interface PackageModuleData {
  identifier: string;
  /** Relative to the owning package's root */
  outputLocation: string;
  dependencies: Record<string, Dependency>;
}

/**
 * A module owned by a package, addressed as (package id, module id).
 */
export class PackageModule extends DependencyHolder {
  constructor(
    readonly identifier: string,
    readonly outputLocation: string,
    dependencies?: Iterable<[string, Dependency]>
  ) {
    super(dependencies);
  }

  static fromData(data: PackageModuleData): PackageModule {
    return new PackageModule(data.identifier, data.outputLocation, Object.entries(data.dependencies));
  }

  toData(): PackageModuleData {
    return {
      identifier: this.identifier,
      outputLocation: this.outputLocation,
      dependencies: this.dependenciesToRecord()
    };
  }
}
