import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';

import type { PkgsetDirectories } from '../../../src/types/index.js';
import { runUnaddedPipeline } from '../../../src/core/unadded/unadded-pipeline.js';
import {
  FakePackageManager,
  cleanup,
  createTempRoot,
  createTestContext,
  writeSet
} from '../../test-helpers.js';

let dirs: PkgsetDirectories;

beforeEach(async () => {
  dirs = await createTempRoot('unadded');
});

afterEach(async () => {
  await cleanup(dirs);
});

describe('unadded pipeline', () => {
  it('reports every explicit package on an empty root', async () => {
    const result = await runUnaddedPipeline(createTestContext(dirs, new FakePackageManager(['c', 'a', 'b'])));
    assert.deepEqual(result.data, { packages: ['a', 'b', 'c'] });
  });

  it('counts members of uninstalled sets as added', async () => {
    await writeSet(dirs, 'base', ['a'], { installed: true });
    await writeSet(dirs, 'later', ['b', '# c']);
    const pm = new FakePackageManager(['a', 'b', 'c']);

    const result = await runUnaddedPipeline(createTestContext(dirs, pm));

    assert.deepEqual(result.data, { packages: ['c'] });
    assert.deepEqual(pm.calls, []);
  });
});
