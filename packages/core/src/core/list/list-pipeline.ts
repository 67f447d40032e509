import type { Registry } from '../registry/registry.js';
import { describeDependency, type Dependency } from '../dependency.js';
import { formatVersion } from '../version.js';
import {
  formatCount,
  formatPackageLabel,
  formatPathForDisplay,
  getTreeConnector,
  getTreePrefix
} from '../../utils/formatters.js';

export interface ListDependencyEntry {
  identifier: string;
  dependency: Dependency;
}

export interface ListUnitReport {
  /** Module identifier, or the source path for executables */
  label: string;
  sourcePath: string;
  outputLocation?: string;
  dependencies: ListDependencyEntry[];
}

export interface ListPackageReport {
  identifier: string;
  version: string;
  root: string;
  remoteLocation?: string;
  modules: ListUnitReport[];
}

export interface RegistryReport {
  location: string;
  modules: ListUnitReport[];
  executables: ListUnitReport[];
  packages: ListPackageReport[];
}

function dependencyEntries(entries: Array<[string, Dependency]>): ListDependencyEntry[] {
  return entries.map(([identifier, dependency]) => ({ identifier, dependency }));
}

/**
 * Snapshot of everything in the registry, sorted for display.
 */
export function buildRegistryReport(registry: Registry): RegistryReport {
  return {
    location: registry.location,
    modules: registry.listModules().map(module => ({
      label: module.identifier,
      sourcePath: module.sourcePath,
      outputLocation: module.outputLocation,
      dependencies: dependencyEntries(module.listDependencies())
    })),
    executables: registry.listExecutables().map(([sourcePath, executable]) => ({
      label: sourcePath,
      sourcePath,
      dependencies: dependencyEntries(executable.listDependencies())
    })),
    packages: registry.listPackages().map(pkg => ({
      identifier: pkg.identifier,
      version: formatVersion(pkg.version),
      root: pkg.root,
      remoteLocation: pkg.remoteLocation,
      modules: pkg.listModules().map(module => ({
        label: module.identifier,
        sourcePath: pkg.getModuleEntry(module.identifier)?.sourcePath ?? '',
        outputLocation: module.outputLocation,
        dependencies: dependencyEntries(module.listDependencies())
      }))
    }))
  };
}

function renderDependencies(dependencies: ListDependencyEntry[], prefix: string, cwd: string): string[] {
  return dependencies.map(({ identifier, dependency }, index) => {
    const target = dependency.type === 'standalone'
      ? `standalone ${formatPathForDisplay(dependency.sourcePath, cwd)}`
      : describeDependency(dependency);
    return `${prefix}${getTreeConnector(index === dependencies.length - 1)}${identifier} → ${target}`;
  });
}

function renderUnits(units: ListUnitReport[], prefix: string, cwd: string, describe: (unit: ListUnitReport) => string): string[] {
  return units.flatMap((unit, index) => {
    const isLast = index === units.length - 1;
    return [
      `${prefix}${getTreeConnector(isLast)}${describe(unit)}`,
      ...renderDependencies(unit.dependencies, getTreePrefix(prefix, isLast), cwd)
    ];
  });
}

/**
 * Render a report as tree lines, one section per unit kind.
 * Empty sections are left out.
 */
export function renderRegistryTree(report: RegistryReport, cwd: string = process.cwd()): string[] {
  const lines: string[] = [];

  if (report.modules.length > 0) {
    lines.push(`Modules (${report.modules.length})`);
    lines.push(...renderUnits(report.modules, '', cwd, unit =>
      `${unit.label} (${formatPathForDisplay(unit.sourcePath, cwd)})`
    ));
  }

  if (report.executables.length > 0) {
    lines.push(`Executables (${report.executables.length})`);
    lines.push(...renderUnits(report.executables, '', cwd, unit => formatPathForDisplay(unit.sourcePath, cwd)));
  }

  if (report.packages.length > 0) {
    lines.push(`Packages (${report.packages.length})`);
    report.packages.forEach((pkg, index) => {
      const isLast = index === report.packages.length - 1;
      const remote = pkg.remoteLocation ? ` [${pkg.remoteLocation}]` : '';
      lines.push(
        `${getTreeConnector(isLast)}${formatPackageLabel(pkg.identifier, pkg.version)} ` +
        `${formatPathForDisplay(pkg.root, cwd)} (${formatCount(pkg.modules.length, 'module')})${remote}`
      );
      lines.push(...renderUnits(pkg.modules, getTreePrefix('', isLast), cwd, unit => `${unit.label} (${unit.sourcePath})`));
    });
  }

  return lines;
}
