import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import path from 'node:path';

import type { PkgsetDirectories } from '../../../src/types/index.js';
import { PackageSet, parseMemberLine, validateSetName } from '../../../src/core/sets/package-set.js';
import { FileSystemError, InvalidSetNameError, SetExistsError } from '../../../src/utils/errors.js';
import { cleanup, createTempRoot, readSetFile, writeSet } from '../../test-helpers.js';

let dirs: PkgsetDirectories;

before(async () => {
  dirs = await createTempRoot('package-set');
});

after(async () => {
  await cleanup(dirs);
});

describe('parseMemberLine', () => {
  it('strips whitespace and ignores blanks and comments', () => {
    assert.equal(parseMemberLine('  vim  '), 'vim');
    assert.equal(parseMemberLine('   '), null);
    assert.equal(parseMemberLine('  # vim'), null);
  });
});

describe('validateSetName', () => {
  it('rejects path separators, dot names and empty names', () => {
    assert.throws(() => validateSetName('a/b'), InvalidSetNameError);
    assert.throws(() => validateSetName('a\\b'), InvalidSetNameError);
    assert.throws(() => validateSetName('..'), InvalidSetNameError);
    assert.throws(() => validateSetName('.hidden'), InvalidSetNameError);
    assert.throws(() => validateSetName(''), InvalidSetNameError);
  });

  it('accepts ordinary names', () => {
    assert.doesNotThrow(() => validateSetName('base-devel'));
  });
});

describe('PackageSet', () => {
  it('compares by name only', () => {
    const a = new PackageSet('base', dirs);
    const b = new PackageSet('base', dirs);
    assert.equal(a.equals(b), true);
    assert.equal(a.equals(new PackageSet('apps', dirs)), false);
  });

  it('reads members, skipping blanks and comments', async () => {
    await writeSet(dirs, 'read', ['vim', '', '  # editors', '  git  ', 'vim']);
    const members = await new PackageSet('read', dirs).get();
    assert.deepEqual([...members], ['vim', 'git']);
  });

  it('raises when reading a set whose file is missing', async () => {
    await assert.rejects(new PackageSet('missing', dirs).get(), FileSystemError);
  });

  it('merge appends only new packages and returns them', async () => {
    const set = new PackageSet('merge', dirs);
    const first = await set.merge(['a', 'b']);
    assert.deepEqual([...first], ['a', 'b']);

    const second = await set.merge(['b', 'c']);
    assert.deepEqual([...second], ['c']);
    assert.equal(await readSetFile(dirs, 'merge'), 'a\nb\nc\n');
  });

  it('merge is idempotent', async () => {
    const set = new PackageSet('idempotent', dirs);
    await set.merge(['x', 'y']);
    const again = await set.merge(['x', 'y']);

    assert.equal(again.size, 0);
    assert.deepEqual([...(await set.get())].sort(), ['x', 'y']);
  });

  it('merge treats commented-out packages as already present', async () => {
    await writeSet(dirs, 'commented', ['#foo', 'bar']);
    const set = new PackageSet('commented', dirs);

    const added = await set.merge(['foo', 'baz']);

    assert.deepEqual([...added], ['baz']);
    assert.equal(await readSetFile(dirs, 'commented'), '#foo\nbar\nbaz\n');
  });

  it('merge compares against stripped lines', async () => {
    await writeSet(dirs, 'indented', ['  vim  ']);
    const added = await new PackageSet('indented', dirs).merge(['vim']);
    assert.equal(added.size, 0);
  });

  it('merge starts a new line when the file lacks a final newline', async () => {
    await fs.writeFile(path.join(dirs.sets, 'no-newline'), 'a', 'utf8');
    await new PackageSet('no-newline', dirs).merge(['b']);
    assert.equal(await readSetFile(dirs, 'no-newline'), 'a\nb\n');
  });

  it('round-trips merged members through get', async () => {
    const set = new PackageSet('round-trip', dirs);
    await set.merge(['z', 'a', 'm']);
    assert.deepEqual([...(await set.get())].sort(), ['a', 'm', 'z']);
  });

  it('create fails when the set exists', async () => {
    await writeSet(dirs, 'exists', ['a']);
    await assert.rejects(new PackageSet('exists', dirs).create(['b']), SetExistsError);
  });

  it('create writes the initial members', async () => {
    const set = new PackageSet('created', dirs);
    assert.equal(await set.exists(), false);
    await set.create(['a', 'b']);
    assert.equal(await set.exists(), true);
    assert.equal(await readSetFile(dirs, 'created'), 'a\nb\n');
  });

  it('remove drops member lines but never comments', async () => {
    await writeSet(dirs, 'remove', ['a', '# a', '  b', 'c']);
    const set = new PackageSet('remove', dirs);

    await set.remove(['a', 'b']);

    assert.equal(await readSetFile(dirs, 'remove'), '# a\nc\n');
    assert.deepEqual([...(await set.get())], ['c']);
  });

  it('remove of absent packages leaves the file as is', async () => {
    await writeSet(dirs, 'remove-noop', ['a']);
    const changed = await new PackageSet('remove-noop', dirs).remove(['zzz']);
    assert.equal(changed, false);
  });

  it('replace only rewrites exact member matches', async () => {
    await writeSet(dirs, 'replace', ['vim', 'neovim', '# vim', '  vim  ', 'vim-plugins']);
    const set = new PackageSet('replace', dirs);

    const changed = await set.replace('vim', 'helix');

    assert.equal(changed, true);
    assert.equal(await readSetFile(dirs, 'replace'), 'helix\nneovim\n# vim\nhelix\nvim-plugins\n');
  });

  it('replace without a match is a no-op', async () => {
    await writeSet(dirs, 'replace-noop', ['neovim', '# vim']);
    assert.equal(await new PackageSet('replace-noop', dirs).replace('vim', 'helix'), false);
    assert.equal(await readSetFile(dirs, 'replace-noop'), 'neovim\n# vim\n');
  });

  it('marks installed and uninstalled idempotently', async () => {
    await writeSet(dirs, 'marker', ['a']);
    const set = new PackageSet('marker', dirs);

    assert.equal(await set.installed(), false);
    await set.markInstalled();
    await set.markInstalled();
    assert.equal(await set.installed(), true);

    await set.markUninstalled();
    await set.markUninstalled();
    assert.equal(await set.installed(), false);
  });

  it('treats a symlink marker as installed', async () => {
    await writeSet(dirs, 'linked', ['a']);
    await fs.symlink(path.join(dirs.sets, 'linked'), path.join(dirs.installedSets, 'linked'));
    assert.equal(await new PackageSet('linked', dirs).installed(), true);
  });
});
