import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { mkdir, readFile } from 'node:fs/promises';
import path from 'node:path';

import { Registry } from '../../../packages/core/src/core/registry/registry.js';
import { MemoryRegistryStore } from '../../../packages/core/src/core/registry/store.js';
import { executableRef, moduleRef, packageModuleRef } from '../../../packages/core/src/core/registry/unit-ref.js';
import {
  packageDependency,
  standaloneDependency,
  strayDependency
} from '../../../packages/core/src/core/dependency.js';
import {
  CyclicDependencyError,
  NoSuchDependencyError,
  PackageNotFoundError,
  ReferencedUnitMissingError
} from '../../../packages/core/src/utils/errors.js';
import { FakeCompiler, FakeVersionControl, makeTempDir, removeTempDir } from '../../test-helpers.js';

const language = { compilerCommand: 'sac2c', outputOption: '-o' };

describe('Registry: removal', () => {
  let dir: string;
  let store: MemoryRegistryStore;
  let registry: Registry;

  const src = (name: string): string => path.join(dir, 'src', `${name}.sac`);

  beforeEach(async () => {
    dir = await makeTempDir();
    await mkdir(path.join(dir, 'a'));
    await mkdir(path.join(dir, 'b'));
    store = new MemoryRegistryStore();
    registry = await Registry.load(store, { compiler: new FakeCompiler(), vcs: new FakeVersionControl() });
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('removing a module drops the edges that pointed at it', async () => {
    await registry.addModule(src('a'), 'a', path.join(dir, 'a'));
    await registry.addModule(src('b'), 'b', path.join(dir, 'b'));

    await registry.addDependency(moduleRef('a'), 'b', standaloneDependency(src('b')));
    await assert.rejects(
      registry.addDependency(moduleRef('b'), 'a', standaloneDependency(src('a'))),
      CyclicDependencyError
    );

    await registry.removeModule('b');

    assert.equal(registry.hasModule('b'), false);
    assert.equal(registry.hasDependency(moduleRef('a'), 'b'), false);
    assert.deepEqual(store.snapshot?.modules.a.dependencies, {});
  });

  it('cascades into executables and stray edges naming the module', async () => {
    await registry.addModule(src('a'), 'a', path.join(dir, 'a'));
    await registry.addModule(src('b'), 'b', path.join(dir, 'b'));
    await registry.addExecutable(src('main'));
    await registry.addDependency(executableRef(src('main')), 'a', standaloneDependency(src('a')));
    await registry.addDependency(moduleRef('b'), 'a', strayDependency('a', path.join(dir, 'a')));
    await registry.addDependency(moduleRef('b'), 'libc', strayDependency('libc', '/usr/lib'));

    await registry.removeModule('a');

    assert.equal(registry.getExecutable(src('main'))?.dependencyCount, 0);
    assert.deepEqual(registry.edgesOf(moduleRef('b')), [strayDependency('libc', '/usr/lib')]);
  });

  it('keeps stray edges whose output location differs', async () => {
    await registry.addModule(src('a'), 'a', path.join(dir, 'a'));
    await registry.addModule(src('b'), 'b', path.join(dir, 'b'));
    await registry.addDependency(moduleRef('b'), 'a', strayDependency('a', '/elsewhere/a'));

    await registry.removeModule('a');

    assert.equal(registry.hasDependency(moduleRef('b'), 'a'), true);
  });

  it('reports units that are not registered', async () => {
    await assert.rejects(registry.removeModule('ghost'), ReferencedUnitMissingError);
    await assert.rejects(registry.removeExecutable(src('ghost')), ReferencedUnitMissingError);
    await assert.rejects(registry.removePackage('P'), PackageNotFoundError);
    await assert.rejects(registry.removeItem(packageModuleRef('P', 'm')), PackageNotFoundError);
    assert.equal(store.saveCount, 0);
  });

  it('removes an executable', async () => {
    await registry.addExecutable(src('main'));
    await registry.removeItem(executableRef(src('main')));

    assert.equal(registry.hasExecutable(src('main')), false);
    assert.deepEqual(store.snapshot?.executables, {});
  });

  describe('removeDependency', () => {
    beforeEach(async () => {
      await registry.addModule(src('a'), 'a', path.join(dir, 'a'));
      await registry.addModule(src('b'), 'b', path.join(dir, 'b'));
      await registry.addDependency(moduleRef('a'), 'b', standaloneDependency(src('b')));
    });

    it('removes an edge that matches exactly', async () => {
      await registry.removeDependency(moduleRef('a'), 'b', standaloneDependency(src('b')));
      assert.equal(registry.hasDependency(moduleRef('a'), 'b'), false);
    });

    it('rejects an edge that is not there or differs', async () => {
      await assert.rejects(
        registry.removeDependency(moduleRef('a'), 'b', standaloneDependency(src('other'))),
        NoSuchDependencyError
      );
      await assert.rejects(
        registry.removeDependency(moduleRef('b'), 'a', standaloneDependency(src('a'))),
        NoSuchDependencyError
      );
      assert.equal(registry.hasDependency(moduleRef('a'), 'b'), true);
    });
  });

  describe('packages', () => {
    let libRoot: string;

    beforeEach(async () => {
      libRoot = path.join(dir, 'lib');
      await mkdir(libRoot);
      await registry.addModule(path.join(libRoot, 'x.sac'), 'x', path.join(dir, 'a'));
      await registry.addModule(path.join(libRoot, 'y.sac'), 'y', path.join(dir, 'a'));
      await registry.addModule(src('app'), 'app', path.join(dir, 'b'));
      await registry.addDependency(moduleRef('y'), 'x', standaloneDependency(path.join(libRoot, 'x.sac')));
      await registry.addDependency(moduleRef('app'), 'x', standaloneDependency(path.join(libRoot, 'x.sac')));
      await registry.package('L', libRoot, language);
    });

    it('removing a package module cascades inside and outside the package', async () => {
      await registry.removePackageModule('L', 'x');

      assert.equal(registry.getPackageModule('L', 'x'), undefined);
      assert.equal(registry.hasDependency(packageModuleRef('L', 'y'), 'x'), false);
      assert.equal(registry.hasDependency(moduleRef('app'), 'x'), false);

      const manifest = JSON.parse(await readFile(path.join(libRoot, 'manifest.json'), 'utf8'));
      assert.deepEqual(Object.keys(manifest.modules), ['y']);
      assert.deepEqual(manifest.modules.y.module.dependencies, {});
    });

    it('removing a package drops every edge into it', async () => {
      await registry.removePackage('L');

      assert.equal(registry.hasPackage('L'), false);
      assert.equal(registry.getModule('app')?.dependencyCount, 0);
      assert.deepEqual(store.snapshot?.packages, {});
    });

    it('reports a package module that is not registered', async () => {
      await assert.rejects(registry.removePackageModule('L', 'z'), ReferencedUnitMissingError);
    });

    it('removes an edge owned by a package module and rewrites the manifest', async () => {
      await registry.removeDependency(packageModuleRef('L', 'y'), 'x', packageDependency('L', 'x'));

      const manifest = JSON.parse(await readFile(path.join(libRoot, 'manifest.json'), 'utf8'));
      assert.deepEqual(manifest.modules.y.module.dependencies, {});
    });
  });
});
