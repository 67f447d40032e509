import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { mkdir, readFile, stat } from 'node:fs/promises';
import path from 'node:path';

import { Registry } from '../../../packages/core/src/core/registry/registry.js';
import { MemoryRegistryStore } from '../../../packages/core/src/core/registry/store.js';
import { moduleRef, packageModuleRef } from '../../../packages/core/src/core/registry/unit-ref.js';
import {
  packageDependency,
  standaloneDependency,
  strayDependency
} from '../../../packages/core/src/core/dependency.js';
import { runBuildPipeline, runCreatePackagePipeline } from '../../../packages/core/src/core/package/package-pipeline.js';
import { createRecordingOutput } from '../../../packages/core/src/core/ports/console-output.js';
import {
  CompilerError,
  CyclicDependencyError,
  PackageAlreadyInRegistryError,
  PackageNotFoundError,
  PackagingError,
  ValidationError
} from '../../../packages/core/src/utils/errors.js';
import { FakeCompiler, FakeVersionControl, makeTempDir, removeTempDir } from '../../test-helpers.js';

const language = { compilerCommand: 'sac2c', outputOption: '-o' };

describe('Registry: packaging', () => {
  let dir: string;
  let libRoot: string;
  let out: string;
  let store: MemoryRegistryStore;
  let compiler: FakeCompiler;
  let vcs: FakeVersionControl;
  let registry: Registry;

  const lib = (name: string): string => path.join(libRoot, `${name}.sac`);

  beforeEach(async () => {
    dir = await makeTempDir();
    libRoot = path.join(dir, 'lib');
    out = path.join(dir, 'out');
    await mkdir(libRoot);
    await mkdir(out);
    store = new MemoryRegistryStore();
    compiler = new FakeCompiler();
    vcs = new FakeVersionControl();
    registry = await Registry.load(store, { compiler, vcs });

    await registry.addModule(lib('x'), 'x', out);
    await registry.addModule(lib('y'), 'y', out);
    await registry.addModule(path.join(dir, 'app.sac'), 'app', out);
    await registry.addDependency(moduleRef('y'), 'x', standaloneDependency(lib('x')));
    await registry.addDependency(moduleRef('app'), 'x', standaloneDependency(lib('x')));
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('promotes the modules under the root and rewrites every edge into them', async () => {
    const pkg = await registry.package('L', libRoot, language);

    assert.deepEqual(pkg.listModules().map(module => module.identifier), ['x', 'y']);
    assert.equal(registry.hasModule('x'), false);
    assert.equal(registry.hasModule('y'), false);
    assert.equal(registry.hasModule('app'), true);

    assert.deepEqual(registry.getDependency(packageModuleRef('L', 'y'), 'x'), packageDependency('L', 'x'));
    assert.deepEqual(registry.getDependency(moduleRef('app'), 'x'), packageDependency('L', 'x'));
    assert.equal(pkg.getModuleEntry('x')?.sourcePath, 'x.sac');
    assert.equal(pkg.getModule('x')?.outputLocation, path.join('x', 'output'));
  });

  it('prepares the package root', async () => {
    await registry.package('L', libRoot, language);

    assert.deepEqual(vcs.callsOf('init'), [{ op: 'init', path: libRoot }]);
    assert.equal((await stat(path.join(libRoot, 'x', 'output'))).isDirectory(), true);
    assert.equal((await stat(path.join(libRoot, 'y', 'output'))).isDirectory(), true);

    const manifest = JSON.parse(await readFile(path.join(libRoot, 'manifest.json'), 'utf8'));
    assert.equal(manifest.identifier, 'L');
    assert.equal(manifest.version, 'not_versioned');
    assert.equal(manifest.remoteLocation, null);
    assert.equal(manifest.root, undefined);
    assert.deepEqual(manifest.modules.y, {
      sourcePath: 'y.sac',
      module: {
        identifier: 'y',
        outputLocation: path.join('y', 'output'),
        dependencies: { x: { type: 'package', packageId: 'L', moduleId: 'x' } }
      }
    });
  });

  it('does not re-initialise a root that already is a repository', async () => {
    vcs.repositories.add(libRoot);
    await registry.package('L', libRoot, language);
    assert.deepEqual(vcs.callsOf('init'), []);
  });

  it('persists the promoted graph', async () => {
    await registry.package('L', libRoot, language);

    const document = store.snapshot;
    assert.deepEqual(Object.keys(document?.modules ?? {}), ['app']);
    assert.deepEqual(Object.keys(document?.packages.L.modules ?? {}), ['x', 'y']);
    assert.equal(document?.packages.L.root, libRoot);
  });

  it('keeps stray edges of promoted modules', async () => {
    await registry.addDependency(moduleRef('x'), 'libc', strayDependency('libc', '/usr/lib'));
    await registry.package('L', libRoot, language);

    assert.deepEqual(registry.edgesOf(packageModuleRef('L', 'x')), [strayDependency('libc', '/usr/lib')]);
  });

  it('refuses modules that depend on standalone modules outside the root', async () => {
    await registry.addModule(path.join(dir, 'util.sac'), 'util', out);
    await registry.addDependency(moduleRef('x'), 'util', standaloneDependency(path.join(dir, 'util.sac')));
    const saves = store.saveCount;

    await assert.rejects(registry.package('L', libRoot, language), PackagingError);
    assert.equal(registry.hasPackage('L'), false);
    assert.equal(registry.hasModule('x'), true);
    assert.equal(store.saveCount, saves);
    assert.deepEqual(vcs.callsOf('init'), []);
  });

  it('refuses a root without registered modules', async () => {
    const empty = path.join(dir, 'empty');
    await mkdir(empty);
    await assert.rejects(registry.package('E', empty, language), PackagingError);
  });

  it('refuses a root that is not an existing directory', async () => {
    await assert.rejects(registry.package('L', path.join(dir, 'missing'), language), ValidationError);
    await assert.rejects(registry.package('L', 'lib', language), ValidationError);
  });

  it('refuses a second package with the same identifier', async () => {
    await registry.package('L', libRoot, language);
    await assert.rejects(registry.package('L', libRoot, language), PackageAlreadyInRegistryError);
  });

  describe('package modules', () => {
    beforeEach(async () => {
      await registry.package('L', libRoot, language);
    });

    it('take package and stray edges only', async () => {
      await assert.rejects(
        registry.addDependency(packageModuleRef('L', 'x'), 'app', standaloneDependency(path.join(dir, 'app.sac'))),
        ValidationError
      );
      await registry.addDependency(packageModuleRef('L', 'x'), 'm', strayDependency('m', '/opt/m'));
      assert.equal(registry.hasDependency(packageModuleRef('L', 'x'), 'm'), true);
    });

    it('cannot close a cycle through the package', async () => {
      await assert.rejects(
        registry.addDependency(packageModuleRef('L', 'x'), 'y', packageDependency('L', 'y')),
        CyclicDependencyError
      );
    });

    it('are found by identifier', () => {
      const matches = registry.searchPackageModules('y');
      assert.deepEqual(matches.map(match => [match.packageId, match.sourcePath]), [['L', 'y.sac']]);
    });
  });

  describe('build', () => {
    it('compiles each module once, in identifier order', async () => {
      await registry.package('L', libRoot, language);
      await registry.build('L');

      assert.deepEqual(compiler.requests, [
        { command: 'sac2c', sourcePath: lib('x'), outputOption: '-o', outputPath: path.join(libRoot, 'x', 'output') },
        { command: 'sac2c', sourcePath: lib('y'), outputOption: '-o', outputPath: path.join(libRoot, 'y', 'output') }
      ]);
    });

    it('stops at the first compiler failure', async () => {
      await registry.package('L', libRoot, language);
      compiler.failing.add(lib('x'));

      await assert.rejects(registry.build('L'), CompilerError);
      assert.equal(compiler.requests.length, 1);
    });

    it('reports an unknown package', async () => {
      await assert.rejects(registry.build('nope'), PackageNotFoundError);
    });
  });

  describe('pipelines', () => {
    it('reports the promoted modules', async () => {
      const output = createRecordingOutput();
      const result = await runCreatePackagePipeline(registry, 'L', libRoot, language, { output, cwd: dir });

      assert.equal(result.success, true);
      assert.deepEqual(result.data, { packageId: 'L', root: libRoot, modules: ['x', 'y'] });
      assert.deepEqual(output.lines, [
        "success: Created package 'L' at lib",
        'info: Promoted 2 modules: x, y'
      ]);
    });

    it('builds the new package when asked to', async () => {
      const output = createRecordingOutput();
      const result = await runCreatePackagePipeline(registry, 'L', libRoot, language, { output, cwd: dir, build: true });

      assert.equal(result.success, true);
      assert.deepEqual(compiler.requests.map(request => request.sourcePath), [lib('x'), lib('y')]);
      assert.deepEqual(output.lines, [
        "success: Created package 'L' at lib",
        'info: Promoted 2 modules: x, y',
        'spinner: Building L',
        'spinner done: Built L (2 modules)'
      ]);
    });

    it('keeps the package when the build after creation fails', async () => {
      compiler.failing.add(lib('y'));
      const output = createRecordingOutput();
      const result = await runCreatePackagePipeline(registry, 'L', libRoot, language, { output, build: true });

      assert.equal(result.success, false);
      assert.equal(result.error, `Compilation failed: sac2c ${lib('y')}: syntax error`);
      assert.equal(registry.hasPackage('L'), true);
      assert.equal(output.lines.at(-1), 'spinner done: Building L failed');
    });

    it('turns failures into a result', async () => {
      const output = createRecordingOutput();
      const result = await runBuildPipeline(registry, 'nope', { output });

      assert.equal(result.success, false);
      assert.equal(result.error, "Package 'nope' not found");
      assert.deepEqual(output.lines, ['spinner: Building nope', 'spinner done: Building nope failed']);
    });

    it('builds through the pipeline', async () => {
      await registry.package('L', libRoot, language);
      const output = createRecordingOutput();
      const result = await runBuildPipeline(registry, 'L', { output });

      assert.deepEqual(result, { success: true, data: { packageId: 'L', modules: ['x', 'y'] } });
      assert.deepEqual(output.lines, ['spinner: Building L', 'spinner done: Built L (2 modules)']);
    });
  });
});
