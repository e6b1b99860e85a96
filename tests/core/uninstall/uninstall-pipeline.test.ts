import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';

import type { PkgsetDirectories } from '../../../src/types/index.js';
import { runUninstallPipeline } from '../../../src/core/uninstall/uninstall-pipeline.js';
import { SetNotFoundError } from '../../../src/utils/errors.js';
import {
  FakePackageManager,
  cleanup,
  createTempRoot,
  createTestContext,
  isMarked,
  readSetFile,
  writeSet
} from '../../test-helpers.js';

let dirs: PkgsetDirectories;

beforeEach(async () => {
  dirs = await createTempRoot('uninstall');
  await writeSet(dirs, 'base', ['a', 'b', 'c'], { installed: true });
  await writeSet(dirs, 'apps', ['b', 'd'], { installed: true });
});

afterEach(async () => {
  await cleanup(dirs);
});

describe('uninstall pipeline', () => {
  it('demotes packages no remaining installed set declares', async () => {
    const pm = new FakePackageManager(['a', 'b', 'c', 'd']);

    const result = await runUninstallPipeline(['base'], createTestContext(dirs, pm));

    assert.equal(result.success, true);
    assert.deepEqual(result.data, { sets: ['base'], skipped: [], packages: ['a', 'c'] });
    assert.deepEqual(pm.calls, [{ op: 'uninstall', pkgs: ['a', 'c'] }]);
    assert.equal(await isMarked(dirs, 'base'), false);
    assert.equal(await isMarked(dirs, 'apps'), true);
    assert.equal(await readSetFile(dirs, 'base'), 'a\nb\nc\n');
  });

  it('uninstalls several sets together', async () => {
    const pm = new FakePackageManager(['a', 'b', 'c', 'd']);

    const result = await runUninstallPipeline(['base', 'apps'], createTestContext(dirs, pm));

    assert.equal(result.success, true);
    assert.deepEqual(pm.calls, [{ op: 'uninstall', pkgs: ['a', 'b', 'c', 'd'] }]);
    assert.equal(await isMarked(dirs, 'apps'), false);
  });

  it('warns about sets that are not installed', async () => {
    await writeSet(dirs, 'extra', ['e']);
    const pm = new FakePackageManager();
    const ctx = createTestContext(dirs, pm);

    const result = await runUninstallPipeline(['extra'], ctx);

    assert.equal(result.success, true);
    assert.deepEqual(result.warnings, ["Set 'extra' is not installed"]);
    assert.deepEqual(result.data, { sets: [], skipped: ['extra'], packages: [] });
    assert.deepEqual(pm.calls, []);
    assert.deepEqual(ctx.output.lines, ["warn: Set 'extra' is not installed"]);
  });

  it('keeps the markers when demoting fails', async () => {
    const pm = new FakePackageManager(['a', 'b', 'c', 'd']);
    pm.failUninstall = true;

    const result = await runUninstallPipeline(['base'], createTestContext(dirs, pm));

    assert.equal(result.success, false);
    assert.equal(await isMarked(dirs, 'base'), true);
  });

  it('rejects unknown sets', async () => {
    await assert.rejects(
      runUninstallPipeline(['missing'], createTestContext(dirs, new FakePackageManager())),
      SetNotFoundError
    );
  });
});
