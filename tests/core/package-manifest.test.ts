import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { Package } from '../../packages/core/src/core/package/package.js';
import {
  getPackageManifestPath,
  loadPackageManifest,
  packageFromManifest,
  savePackageManifest
} from '../../packages/core/src/core/package/package-manifest.js';
import { PackageModule } from '../../packages/core/src/core/units/package-module.js';
import { strayDependency } from '../../packages/core/src/core/dependency.js';
import { InvalidManifestError } from '../../packages/core/src/utils/errors.js';
import { makeTempDir, removeTempDir } from '../test-helpers.js';

describe('package manifest', () => {
  let root: string;

  beforeEach(async () => {
    root = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  it('writes manifest.json without the root path', async () => {
    const pkg = new Package('P', root, { compilerCommand: 'sac2c', outputOption: '-o' });
    pkg.addModule('a.sac', new PackageModule('a', 'a/output', [['lib', strayDependency('lib', '/opt/lib')]]));
    await savePackageManifest(pkg);

    const written: unknown = JSON.parse(await readFile(path.join(root, 'manifest.json'), 'utf8'));
    assert.deepEqual(written, {
      identifier: 'P',
      version: 'not_versioned',
      language: { compilerCommand: 'sac2c', outputOption: '-o' },
      remoteLocation: null,
      modules: {
        a: {
          sourcePath: 'a.sac',
          module: {
            identifier: 'a',
            outputLocation: 'a/output',
            dependencies: { lib: { type: 'stray', identifier: 'lib', outputLocation: '/opt/lib' } }
          }
        }
      }
    });
  });

  it('loads a package back under a new root', async () => {
    const pkg = new Package('P', root, { compilerCommand: 'cc', outputOption: '-o' });
    pkg.addModule('a.sac', new PackageModule('a', 'a/output'));
    pkg.incrementVersion('patch');
    await savePackageManifest(pkg);

    const manifest = await loadPackageManifest(root);
    assert.ok(manifest);
    const loaded = packageFromManifest('/moved/p', manifest);
    assert.equal(loaded.root, '/moved/p');
    assert.equal(loaded.toData().version, '0.0.1');
    assert.equal(loaded.getModule('a')?.outputLocation, 'a/output');
  });

  it('returns undefined when there is no manifest', async () => {
    assert.equal(await loadPackageManifest(root), undefined);
  });

  it('rejects malformed manifests', async () => {
    await writeFile(getPackageManifestPath(root), '{ not json');
    await assert.rejects(loadPackageManifest(root), InvalidManifestError);

    await writeFile(getPackageManifestPath(root), JSON.stringify({
      identifier: 'P',
      version: '1.0.0-rc.1',
      language: { compilerCommand: 'cc', outputOption: '-o' },
      modules: {}
    }));
    await assert.rejects(loadPackageManifest(root), InvalidManifestError);
  });
});
