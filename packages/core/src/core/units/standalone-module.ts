import type { Dependency } from '../dependency.js';
import { DependencyHolder } from './build-unit.js';

export interface StandaloneModuleData {
  identifier: string;
  sourcePath: string;
  outputLocation: string;
  dependencies: Record<string, Dependency>;
}

/**
 * A module registered on its own, outside any package.
 */
export class StandaloneModule extends DependencyHolder {
  constructor(
    readonly identifier: string,
    readonly sourcePath: string,
    readonly outputLocation: string,
    dependencies?: Iterable<[string, Dependency]>
  ) {
    super(dependencies);
  }

  static fromData(data: StandaloneModuleData): StandaloneModule {
    return new StandaloneModule(data.identifier, data.sourcePath, data.outputLocation, Object.entries(data.dependencies));
  }

  toData(): StandaloneModuleData {
    return {
      identifier: this.identifier,
      sourcePath: this.sourcePath,
      outputLocation: this.outputLocation,
      dependencies: this.dependenciesToRecord()
    };
  }
}
