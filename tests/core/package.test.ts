import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { Package } from '../../packages/core/src/core/package/package.js';
import { PackageModule } from '../../packages/core/src/core/units/package-module.js';
import { packageDependency } from '../../packages/core/src/core/dependency.js';
import { formatVersion } from '../../packages/core/src/core/version.js';
import { ValidationError, CompilerError } from '../../packages/core/src/utils/errors.js';
import { FakeCompiler } from '../test-helpers.js';

const LANGUAGE = { compilerCommand: 'sac2c', outputOption: '-o' };

function makePackage(): Package {
  const pkg = new Package('P', '/work/p', LANGUAGE);
  pkg.addModule('src/b.sac', new PackageModule('b', 'b/output'));
  pkg.addModule('src/a.sac', new PackageModule('a', 'a/output', [['b', packageDependency('P', 'b')]]));
  return pkg;
}

describe('Package', () => {
  it('starts unversioned and without a remote', () => {
    const pkg = makePackage();
    assert.equal(formatVersion(pkg.version), 'not_versioned');
    assert.equal(pkg.isRegistered(), false);
  });

  it('sets the remote only once', () => {
    const pkg = makePackage();
    assert.equal(pkg.setRemoteLocation('https://git.example.test/p.git'), true);
    assert.equal(pkg.setRemoteLocation('https://git.example.test/other.git'), false);
    assert.equal(pkg.remoteLocation, 'https://git.example.test/p.git');
    assert.equal(pkg.isRegistered(), true);
  });

  it('builds every module in identifier order with absolute paths', async () => {
    const compiler = new FakeCompiler();
    await makePackage().build(compiler);

    assert.deepEqual(compiler.requests, [
      { command: 'sac2c', sourcePath: '/work/p/src/a.sac', outputOption: '-o', outputPath: '/work/p/a/output' },
      { command: 'sac2c', sourcePath: '/work/p/src/b.sac', outputOption: '-o', outputPath: '/work/p/b/output' }
    ]);
  });

  it('stops at the first compiler failure', async () => {
    const compiler = new FakeCompiler();
    compiler.failing.add('/work/p/src/a.sac');

    await assert.rejects(makePackage().build(compiler), CompilerError);
    assert.equal(compiler.requests.length, 1);
  });

  it('finds module sources under a root', () => {
    const pkg = makePackage();
    assert.equal(pkg.hasModuleSource('/work/p', '/work/p/src/a.sac'), true);
    assert.equal(pkg.hasModuleSource('/work/p', '/work/p/src/c.sac'), false);
    assert.throws(() => pkg.hasModuleSource('/work/p', '/elsewhere/a.sac'), ValidationError);
  });

  it('lists module files as source then output, per module', () => {
    assert.deepEqual(makePackage().moduleFiles(), ['src/a.sac', 'a/output', 'src/b.sac', 'b/output']);
  });

  it('searches modules by identifier', () => {
    const matches = makePackage().searchModules('a');
    assert.equal(matches.length, 1);
    assert.equal(matches[0][0], 'src/a.sac');
    assert.equal(matches[0][1].identifier, 'a');
  });

  it('round-trips through data with version and remote', () => {
    const pkg = makePackage();
    pkg.incrementVersion('minor');
    pkg.setRemoteLocation('git@git.example.test:team/p.git');

    const copy = Package.fromData(pkg.toData());
    assert.deepEqual(copy.toData(), pkg.toData());
    assert.equal(copy.toData().version, '0.1.0');
    assert.deepEqual(Object.keys(copy.toData().modules), ['a', 'b']);
  });
});
