import { Dependency, cloneDependency, dependencyEquals } from '../dependency.js';

/**
 * Dependency bookkeeping shared by every build unit.
 *
 * Edges are keyed by the identifier of what they point at. Nothing here
 * checks that a target exists or that an edge keeps the graph acyclic;
 * the registry does that before calling in.
 */
export abstract class DependencyHolder {
  protected readonly dependencies = new Map<string, Dependency>();

  constructor(dependencies?: Iterable<[string, Dependency]>) {
    for (const [identifier, dependency] of dependencies ?? []) {
      this.dependencies.set(identifier, cloneDependency(dependency));
    }
  }

  addDependency(identifier: string, dependency: Dependency): void {
    this.dependencies.set(identifier, cloneDependency(dependency));
  }

  getDependency(identifier: string): Dependency | undefined {
    return this.dependencies.get(identifier);
  }

  hasDependency(identifier: string): boolean {
    return this.dependencies.has(identifier);
  }

  /**
   * Remove the edge under `identifier` only if it still equals `dependency`.
   */
  removeDependency(identifier: string, dependency: Dependency): boolean {
    const current = this.dependencies.get(identifier);
    if (!current || !dependencyEquals(current, dependency)) {
      return false;
    }
    this.dependencies.delete(identifier);
    return true;
  }

  /**
   * Drop every edge matching `predicate`; returns the identifiers removed.
   */
  removeDependenciesMatching(predicate: (dependency: Dependency) => boolean): string[] {
    const removed: string[] = [];
    for (const [identifier, dependency] of this.dependencies) {
      if (predicate(dependency)) {
        removed.push(identifier);
      }
    }
    for (const identifier of removed) {
      this.dependencies.delete(identifier);
    }
    return removed;
  }

  /**
   * Replace edges for which `rewrite` returns a new value; returns how many changed.
   */
  rewriteDependencies(rewrite: (dependency: Dependency) => Dependency | undefined): number {
    let changed = 0;
    for (const [identifier, dependency] of this.dependencies) {
      const replacement = rewrite(dependency);
      if (replacement && !dependencyEquals(replacement, dependency)) {
        this.dependencies.set(identifier, cloneDependency(replacement));
        changed++;
      }
    }
    return changed;
  }

  /**
   * Identifiers of edges to standalone modules, which a package module may not carry.
   */
  standaloneDependencyIds(): string[] {
    return this.listDependencies()
      .filter(([, dependency]) => dependency.type === 'standalone')
      .map(([identifier]) => identifier);
  }

  listDependencies(): Array<[string, Dependency]> {
    return [...this.dependencies.entries()]
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([identifier, dependency]) => [identifier, cloneDependency(dependency)]);
  }

  get dependencyCount(): number {
    return this.dependencies.size;
  }

  protected dependenciesToRecord(): Record<string, Dependency> {
    return Object.fromEntries(this.listDependencies());
  }
}
