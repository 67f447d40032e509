/**
 * Parsing of the unit and dependency arguments taken by `dep add` / `dep rm`.
 *
 *   units:        module:<id>  exec:<path>  pkg:<package>/<module>
 *   dependencies: standalone:<path>  package:<package>/<module>  stray:<id>=<path>
 *
 * Paths are resolved against `cwd`.
 */

import { resolve } from 'path';
import {
  packageDependency,
  standaloneDependency,
  strayDependency,
  type Dependency
} from '@modkit/core/core/dependency.js';
import { executableRef, moduleRef, packageModuleRef, type UnitRef } from '@modkit/core/core/registry/unit-ref.js';
import { ValidationError } from '@modkit/core/utils/errors.js';
import { expandTilde } from '@modkit/core/utils/home-directory.js';

const UNIT_ARGUMENT_HINT = 'expected module:<id>, exec:<path> or pkg:<package>/<module>';
const DEPENDENCY_ARGUMENT_HINT = 'expected standalone:<path>, package:<package>/<module> or stray:<id>=<path>';

function splitArgument(argument: string, hint: string): [string, string] {
  const colon = argument.indexOf(':');
  if (colon <= 0 || colon === argument.length - 1) {
    throw new ValidationError(`Invalid argument '${argument}': ${hint}`);
  }
  return [argument.slice(0, colon), argument.slice(colon + 1)];
}

function splitPackageModule(value: string, argument: string, hint: string): [string, string] {
  const slash = value.indexOf('/');
  if (slash <= 0 || slash === value.length - 1 || value.indexOf('/', slash + 1) !== -1) {
    throw new ValidationError(`Invalid argument '${argument}': ${hint}`);
  }
  return [value.slice(0, slash), value.slice(slash + 1)];
}

function resolvePath(path: string, cwd: string): string {
  return resolve(cwd, expandTilde(path));
}

export function parseUnitArgument(argument: string, cwd: string): UnitRef {
  const [kind, value] = splitArgument(argument, UNIT_ARGUMENT_HINT);
  switch (kind) {
    case 'module':
      return moduleRef(value);
    case 'exec':
      return executableRef(resolvePath(value, cwd));
    case 'pkg': {
      const [packageId, moduleId] = splitPackageModule(value, argument, UNIT_ARGUMENT_HINT);
      return packageModuleRef(packageId, moduleId);
    }
    default:
      throw new ValidationError(`Unknown unit kind '${kind}': ${UNIT_ARGUMENT_HINT}`);
  }
}

export function parseDependencyArgument(argument: string, cwd: string): Dependency {
  const [kind, value] = splitArgument(argument, DEPENDENCY_ARGUMENT_HINT);
  switch (kind) {
    case 'standalone':
      return standaloneDependency(resolvePath(value, cwd));
    case 'package': {
      const [packageId, moduleId] = splitPackageModule(value, argument, DEPENDENCY_ARGUMENT_HINT);
      return packageDependency(packageId, moduleId);
    }
    case 'stray': {
      const equals = value.indexOf('=');
      if (equals <= 0 || equals === value.length - 1) {
        throw new ValidationError(`Invalid argument '${argument}': ${DEPENDENCY_ARGUMENT_HINT}`);
      }
      return strayDependency(value.slice(0, equals), resolvePath(value.slice(equals + 1), cwd));
    }
    default:
      throw new ValidationError(`Unknown dependency kind '${kind}': ${DEPENDENCY_ARGUMENT_HINT}`);
  }
}
