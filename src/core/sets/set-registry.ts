/**
 * Set Registry
 *
 * Resolves set names to existing Package Sets, enumerates the sets and
 * installed sets under a configuration root, and accumulates membership
 * across any group of sets.
 */

import type { PkgsetDirectories } from '../../types/index.js';
import { entryExists, listEntries } from '../../utils/fs.js';
import { CorruptStateError, SetNotFoundError } from '../../utils/errors.js';
import { PackageSet } from './package-set.js';

/**
 * Resolve `name` to an existing set.
 *
 * @throws CorruptStateError when only the installed marker is present
 * @throws SetNotFoundError when neither the set nor a marker exists
 */
export async function getSet(dirs: PkgsetDirectories, name: string): Promise<PackageSet> {
  const set = new PackageSet(name, dirs);
  if (await set.exists()) {
    return set;
  }
  if (await entryExists(set.markerPath)) {
    throw new CorruptStateError(name, set.markerPath);
  }
  throw new SetNotFoundError(name);
}

/**
 * Resolve several names, keeping the first occurrence of each.
 */
export async function getSets(dirs: PkgsetDirectories, names: Iterable<string>): Promise<PackageSet[]> {
  const resolved: PackageSet[] = [];
  for (const name of new Set(names)) {
    resolved.push(await getSet(dirs, name));
  }
  return resolved;
}

/**
 * Every set under the sets root. Entries that do not resolve raise.
 */
export async function allSets(dirs: PkgsetDirectories): Promise<PackageSet[]> {
  return getSets(dirs, visibleEntries(await listEntries(dirs.sets)));
}

/**
 * Every set that has an installed marker. A marker without its set raises.
 */
export async function allInstalledSets(dirs: PkgsetDirectories): Promise<PackageSet[]> {
  return getSets(dirs, visibleEntries(await listEntries(dirs.installedSets)));
}

// Dot-files are never sets (editor swap files, the lock, ...)
function visibleEntries(entries: string[]): string[] {
  return entries.filter(entry => !entry.startsWith('.')).sort();
}

/**
 * Union of the members of every given set.
 */
export async function accumulate(sets: Iterable<PackageSet>): Promise<Set<string>> {
  const packages = new Set<string>();
  for (const set of uniqueSets(sets)) {
    for (const pkg of await set.get()) {
      packages.add(pkg);
    }
  }
  return packages;
}

/**
 * De-duplicate sets by name, keeping the first occurrence.
 */
export function uniqueSets(sets: Iterable<PackageSet>): PackageSet[] {
  const byName = new Map<string, PackageSet>();
  for (const set of sets) {
    if (!byName.has(set.name)) {
      byName.set(set.name, set);
    }
  }
  return [...byName.values()];
}

/**
 * The sets whose name does not appear in `excluded`.
 */
export function excludeSets(sets: Iterable<PackageSet>, excluded: Iterable<PackageSet>): PackageSet[] {
  const excludedNames = new Set([...excluded].map(set => set.name));
  return uniqueSets(sets).filter(set => !excludedNames.has(set.name));
}

export function sortSets(sets: Iterable<PackageSet>): PackageSet[] {
  return uniqueSets(sets).sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
}
