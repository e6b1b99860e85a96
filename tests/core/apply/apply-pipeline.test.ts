import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';

import type { PkgsetDirectories } from '../../../src/types/index.js';
import { runApplyPipeline } from '../../../src/core/apply/apply-pipeline.js';
import {
  FakePackageManager,
  cleanup,
  createTempRoot,
  createTestContext,
  writeSet
} from '../../test-helpers.js';

let dirs: PkgsetDirectories;

beforeEach(async () => {
  dirs = await createTempRoot('apply');
  await writeSet(dirs, 'base', ['a', 'b'], { installed: true });
  await writeSet(dirs, 'spare', ['z']);
});

afterEach(async () => {
  await cleanup(dirs);
});

describe('apply pipeline', () => {
  it('demotes undeclared packages, then installs missing ones', async () => {
    const pm = new FakePackageManager(['b', 'c']);

    const result = await runApplyPipeline({}, createTestContext(dirs, pm));

    assert.equal(result.success, true);
    assert.deepEqual(result.data, { uninstalled: ['c'], installed: ['a'], dryRun: false });
    assert.deepEqual(pm.calls, [
      { op: 'uninstall', pkgs: ['c'] },
      { op: 'install', pkgs: ['a'] }
    ]);
    assert.deepEqual([...pm.explicit].sort(), ['a', 'b']);
  });

  it('does nothing when the system already matches', async () => {
    const pm = new FakePackageManager(['a', 'b']);
    const ctx = createTestContext(dirs, pm);

    const result = await runApplyPipeline({}, ctx);

    assert.equal(result.success, true);
    assert.deepEqual(pm.calls, []);
    assert.deepEqual(ctx.output.lines, ['success: System already matches the installed sets']);
  });

  it('stops before installing when demoting fails', async () => {
    const pm = new FakePackageManager(['b', 'c']);
    pm.failUninstall = true;

    const result = await runApplyPipeline({}, createTestContext(dirs, pm));

    assert.equal(result.success, false);
    assert.equal(result.error, 'fake failed to mark c as dependencies');
    assert.deepEqual(pm.calls, [{ op: 'uninstall', pkgs: ['c'] }]);
  });

  it('reports a failed install', async () => {
    const pm = new FakePackageManager(['b']);
    pm.failInstall = true;

    const result = await runApplyPipeline({}, createTestContext(dirs, pm));

    assert.equal(result.success, false);
    assert.equal(result.error, 'fake failed to install a');
  });

  it('prints the plan without changes on a dry run', async () => {
    const pm = new FakePackageManager(['b', 'c']);
    const ctx = createTestContext(dirs, pm);

    const result = await runApplyPipeline({ dryRun: true }, ctx);

    assert.deepEqual(result.data, { uninstalled: ['c'], installed: ['a'], dryRun: true });
    assert.deepEqual(pm.calls, []);
    assert.deepEqual(ctx.output.lines, ['note: Planned changes\nuninstall: c\ninstall:   a']);
  });

  it('demotes everything when no set is installed', async () => {
    await cleanup(dirs);
    dirs = await createTempRoot('apply-empty');
    const pm = new FakePackageManager(['x', 'y']);

    const result = await runApplyPipeline({}, createTestContext(dirs, pm, { lock: true }));

    assert.equal(result.success, true);
    assert.deepEqual(pm.calls, [{ op: 'uninstall', pkgs: ['x', 'y'] }]);
  });
});
