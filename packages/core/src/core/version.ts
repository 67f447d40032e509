import * as semver from 'semver';
import { NOT_VERSIONED_LABEL } from '../constants/index.js';
import { ValidationError } from '../utils/errors.js';
import { assertNever } from './dependency.js';

export type Version =
  | { kind: 'not-versioned' }
  | { kind: 'semver'; major: number; minor: number; patch: number };

export type VersionIncrement = 'major' | 'minor' | 'patch';

export const VERSION_INCREMENTS: readonly VersionIncrement[] = ['major', 'minor', 'patch'];

export const NOT_VERSIONED: Version = { kind: 'not-versioned' };

export function semVer(major: number, minor: number, patch: number): Version {
  return { kind: 'semver', major, minor, patch };
}

export function isVersionIncrement(value: string): value is VersionIncrement {
  return (VERSION_INCREMENTS as readonly string[]).includes(value);
}

/**
 * Bump one component of a version.
 *
 * The first bump of an unversioned package yields 1.0.0, 0.1.0 or 0.0.1.
 * Later bumps add one to the targeted component only; sibling components
 * are kept (2.1.1 follows 1.1.1 on a major bump).
 */
export function incrementVersion(current: Version, increment: VersionIncrement): Version {
  switch (current.kind) {
    case 'not-versioned':
      switch (increment) {
        case 'major':
          return semVer(1, 0, 0);
        case 'minor':
          return semVer(0, 1, 0);
        case 'patch':
          return semVer(0, 0, 1);
        default:
          return assertNever(increment);
      }
    case 'semver': {
      const { major, minor, patch } = current;
      switch (increment) {
        case 'major':
          return semVer(major + 1, minor, patch);
        case 'minor':
          return semVer(major, minor + 1, patch);
        case 'patch':
          return semVer(major, minor, patch + 1);
        default:
          return assertNever(increment);
      }
    }
    default:
      return assertNever(current);
  }
}

export function formatVersion(version: Version): string {
  return version.kind === 'not-versioned'
    ? NOT_VERSIONED_LABEL
    : `${version.major}.${version.minor}.${version.patch}`;
}

export function parseVersion(text: string): Version {
  if (text === NOT_VERSIONED_LABEL) {
    return NOT_VERSIONED;
  }
  const parsed = semver.parse(text);
  if (!parsed || parsed.prerelease.length > 0 || parsed.build.length > 0 || parsed.version !== text) {
    throw new ValidationError(`Invalid version: ${text}. Must be '${NOT_VERSIONED_LABEL}' or MAJOR.MINOR.PATCH`);
  }
  return semVer(parsed.major, parsed.minor, parsed.patch);
}

export function versionEquals(a: Version, b: Version): boolean {
  return formatVersion(a) === formatVersion(b);
}
