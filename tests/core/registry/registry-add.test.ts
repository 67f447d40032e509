import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { mkdir } from 'node:fs/promises';
import path from 'node:path';

import { Registry } from '../../../packages/core/src/core/registry/registry.js';
import { MemoryRegistryStore } from '../../../packages/core/src/core/registry/store.js';
import type { RegistryDocument } from '../../../packages/core/src/core/registry/schema.js';
import { executableRef, moduleRef } from '../../../packages/core/src/core/registry/unit-ref.js';
import {
  packageDependency,
  standaloneDependency,
  strayDependency
} from '../../../packages/core/src/core/dependency.js';
import {
  CyclicDependencyError,
  FileSystemError,
  ModuleAlreadyInRegistryError,
  ReferencedUnitMissingError,
  ValidationError
} from '../../../packages/core/src/utils/errors.js';
import { FakeCompiler, FakeVersionControl, makeTempDir, removeTempDir } from '../../test-helpers.js';

class FailingStore extends MemoryRegistryStore {
  failNext = false;

  async save(document: RegistryDocument): Promise<void> {
    if (this.failNext) {
      this.failNext = false;
      throw new FileSystemError('disk full');
    }
    await super.save(document);
  }
}

describe('Registry: adding units and dependencies', () => {
  let dir: string;
  let out: string;
  let store: FailingStore;
  let registry: Registry;

  const src = (name: string): string => path.join(dir, 'src', `${name}.sac`);

  beforeEach(async () => {
    dir = await makeTempDir();
    out = path.join(dir, 'out');
    await mkdir(out);
    store = new FailingStore();
    registry = await Registry.load(store, { compiler: new FakeCompiler(), vcs: new FakeVersionControl() });
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  describe('addModule', () => {
    it('registers and persists a module', async () => {
      await registry.addModule(src('a'), 'a', out);

      assert.equal(registry.getModule('a')?.sourcePath, src('a'));
      assert.equal(registry.getModuleBySource(src('a'))?.identifier, 'a');
      assert.equal(store.saveCount, 1);
      assert.deepEqual(Object.keys(store.snapshot?.modules ?? {}), ['a']);
    });

    it('rejects a second module with the same identifier or source', async () => {
      await registry.addModule(src('a'), 'a', out);

      await assert.rejects(registry.addModule(src('other'), 'a', out), ModuleAlreadyInRegistryError);
      await assert.rejects(registry.addModule(src('a'), 'renamed', out), ModuleAlreadyInRegistryError);
      assert.equal(store.saveCount, 1);
    });

    it('validates paths before touching the registry', async () => {
      await assert.rejects(registry.addModule('src/a.sac', 'a', out), ValidationError);
      await assert.rejects(registry.addModule(src('a'), 'a', path.join(dir, 'missing')), ValidationError);
      await assert.rejects(registry.addModule(src('a'), 'a', 'out'), ValidationError);
      assert.equal(registry.listModules().length, 0);
      assert.equal(store.saveCount, 0);
    });
  });

  describe('addExecutable', () => {
    it('is a no-op for a known executable', async () => {
      const first = await registry.addExecutable(src('main'));
      const second = await registry.addExecutable(src('main'));

      assert.equal(first, second);
      assert.equal(store.saveCount, 1);
    });
  });

  describe('addDependency', () => {
    beforeEach(async () => {
      await registry.addModule(src('a'), 'a', out);
      await registry.addModule(src('b'), 'b', out);
    });

    it('adds an edge between registered modules', async () => {
      await registry.addDependency(moduleRef('a'), 'b', standaloneDependency(src('b')));

      assert.deepEqual(registry.getDependency(moduleRef('a'), 'b'), standaloneDependency(src('b')));
      assert.deepEqual(store.snapshot?.modules.a.dependencies, {
        b: { type: 'standalone', sourcePath: src('b') }
      });
    });

    it('rejects the edge that would close a cycle and leaves the graph unchanged', async () => {
      await registry.addDependency(moduleRef('a'), 'b', standaloneDependency(src('b')));
      const saves = store.saveCount;

      await assert.rejects(
        registry.addDependency(moduleRef('b'), 'a', standaloneDependency(src('a'))),
        CyclicDependencyError
      );
      assert.equal(registry.hasDependency(moduleRef('b'), 'a'), false);
      assert.equal(store.saveCount, saves);
    });

    it('rejects a self edge', async () => {
      await assert.rejects(
        registry.addDependency(moduleRef('a'), 'a', standaloneDependency(src('a'))),
        CyclicDependencyError
      );
    });

    it('rejects longer cycles', async () => {
      await registry.addModule(src('c'), 'c', out);
      await registry.addDependency(moduleRef('a'), 'b', standaloneDependency(src('b')));
      await registry.addDependency(moduleRef('b'), 'c', standaloneDependency(src('c')));

      await assert.rejects(
        registry.addDependency(moduleRef('c'), 'a', standaloneDependency(src('a'))),
        CyclicDependencyError
      );
    });

    it('finds cycles through chains far deeper than the call stack', async () => {
      const length = 5000;
      const document: RegistryDocument = { modules: {}, executables: {}, packages: {} };
      for (let i = 0; i < length; i++) {
        const dependencies = i + 1 < length ? { [`m${i + 1}`]: standaloneDependency(src(`m${i + 1}`)) } : {};
        document.modules[`m${i}`] = { identifier: `m${i}`, sourcePath: src(`m${i}`), outputLocation: out, dependencies };
      }
      const chain = await Registry.load(new MemoryRegistryStore(document), {
        compiler: new FakeCompiler(),
        vcs: new FakeVersionControl()
      });

      await assert.rejects(
        chain.addDependency(moduleRef(`m${length - 1}`), 'm0', standaloneDependency(src('m0'))),
        CyclicDependencyError
      );
      assert.equal(chain.hasDependency(moduleRef(`m${length - 1}`), 'm0'), false);

      await chain.addDependency(moduleRef('m0'), `m${length - 1}`, standaloneDependency(src(`m${length - 1}`)));
      assert.equal(chain.hasDependency(moduleRef('m0'), `m${length - 1}`), true);
    });

    it('does not save when the same edge is added again', async () => {
      await registry.addDependency(moduleRef('a'), 'b', standaloneDependency(src('b')));
      const saves = store.saveCount;

      await registry.addDependency(moduleRef('a'), 'b', standaloneDependency(src('b')));
      assert.equal(store.saveCount, saves);
    });

    it('requires owner and target to exist', async () => {
      await assert.rejects(
        registry.addDependency(moduleRef('ghost'), 'b', standaloneDependency(src('b'))),
        ReferencedUnitMissingError
      );
      await assert.rejects(
        registry.addDependency(moduleRef('a'), 'ghost', standaloneDependency(src('ghost'))),
        ReferencedUnitMissingError
      );
      await assert.rejects(
        registry.addDependency(moduleRef('a'), 'm', packageDependency('P', 'm')),
        ReferencedUnitMissingError
      );
    });

    it('requires the identifier to name the target module', async () => {
      await assert.rejects(
        registry.addDependency(moduleRef('a'), 'not-b', standaloneDependency(src('b'))),
        ValidationError
      );
    });

    it('accepts stray edges without further checks', async () => {
      await registry.addDependency(moduleRef('a'), 'stdlib', strayDependency('stdlib', '/opt/stdlib'));
      assert.deepEqual(registry.getDependency(moduleRef('a'), 'stdlib'), strayDependency('stdlib', '/opt/stdlib'));
    });

    it('lets executables depend on modules', async () => {
      await registry.addExecutable(src('main'));
      await registry.addDependency(executableRef(src('main')), 'a', standaloneDependency(src('a')));

      assert.equal(registry.hasDependency(executableRef(src('main')), 'a'), true);
    });

    it('restores the graph when saving fails', async () => {
      store.failNext = true;

      await assert.rejects(
        registry.addDependency(moduleRef('a'), 'b', standaloneDependency(src('b'))),
        FileSystemError
      );
      assert.equal(registry.hasDependency(moduleRef('a'), 'b'), false);
      assert.equal(registry.getModule('a')?.dependencyCount, 0);
    });
  });
});
