import { join } from 'path';
import { PACKAGE_PATHS } from '../../constants/index.js';
import { InvalidManifestError } from '../../utils/errors.js';
import { readTextFileIfExists, writeJsonFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { readPackageManifest, SchemaError, type PackageManifest } from '../registry/schema.js';
import { Package } from './package.js';

/**
 * The manifest is a sidecar copy of a package's registry entry, kept in the
 * package root so the package can be cloned and registered elsewhere.
 */

export function getPackageManifestPath(root: string): string {
  return join(root, PACKAGE_PATHS.MANIFEST_RELATIVE);
}

export function toPackageManifest(pkg: Package): PackageManifest {
  const { root: _root, ...manifest } = pkg.toData();
  return manifest;
}

export async function savePackageManifest(pkg: Package): Promise<void> {
  const manifestPath = getPackageManifestPath(pkg.root);
  await writeJsonFile(manifestPath, toPackageManifest(pkg));
  logger.debug(`Saved manifest for package '${pkg.identifier}'`, { manifestPath });
}

/**
 * Read the manifest under `root`; undefined when there is none.
 */
export async function loadPackageManifest(root: string): Promise<PackageManifest | undefined> {
  const manifestPath = getPackageManifestPath(root);
  const content = await readTextFileIfExists(manifestPath);
  if (content === undefined) {
    return undefined;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new InvalidManifestError(`${manifestPath} is not valid JSON`, { manifestPath, error });
  }

  try {
    return readPackageManifest(parsed);
  } catch (error) {
    if (error instanceof SchemaError) {
      throw new InvalidManifestError(error.message, { manifestPath });
    }
    throw error;
  }
}

/**
 * Rebuild a package from the manifest stored under `root`.
 */
export function packageFromManifest(root: string, manifest: PackageManifest): Package {
  return Package.fromData({ ...manifest, root });
}
