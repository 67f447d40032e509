import type { Dependency } from '../dependency.js';
import { DependencyHolder } from './build-unit.js';

export interface ExecutableData {
  dependencies: Record<string, Dependency>;
}

/**
 * An anonymous program, keyed by its source path in the registry.
 * Executables depend on modules but are never depended on.
 */
export class Executable extends DependencyHolder {
  static fromData(data: ExecutableData): Executable {
    return new Executable(Object.entries(data.dependencies));
  }

  toData(): ExecutableData {
    return { dependencies: this.dependenciesToRecord() };
  }
}
