/**
 * Add pipeline: put packages into a set, optionally creating it, installing
 * it, or moving the packages out of every other set.
 *
 * Ordering:
 *   1. If the set is (or is about to become) installed, install the packages
 *      on the system first.
 *   2. Only then write them into the set file and create the marker.
 *   3. For a move, demote packages that no installed set wants any more,
 *      then strip them from the other set files.
 */

import type { CommandResult, ExecutionContext } from '../../types/index.js';
import { PackageSet } from '../sets/package-set.js';
import { accumulate, allInstalledSets, allSets, excludeSets, getSet } from '../sets/set-registry.js';
import { withRootLock } from '../lock.js';
import { resolveOutput } from '../ports/index.js';
import { SetExistsError, ValidationError } from '../../utils/errors.js';
import { formatPackageList, intersection, sorted } from '../../utils/package-sets.js';
import { logger } from '../../utils/logger.js';

export interface AddOptions {
  /** Create the set; it must not exist yet */
  new?: boolean;
  /** Mark the newly created set installed (requires `new`) */
  installed?: boolean;
  /** Remove the packages from every other set */
  move?: boolean;
}

export interface AddResult {
  set: string;
  created: boolean;
  installed: boolean;
  /** Packages appended to the set file */
  added: string[];
  /** Packages taken out of other sets (move only) */
  moved: string[];
  /** Sets the moved packages were taken from */
  movedFrom: string[];
}

export async function runAddPipeline(
  setName: string,
  pkgs: ReadonlySet<string>,
  options: AddOptions,
  ctx: ExecutionContext
): Promise<CommandResult<AddResult>> {
  if (options.installed && !options.new) {
    throw new ValidationError(`--installed only applies together with --new; run 'pkgset install ${setName}' for an existing set`);
  }

  const out = resolveOutput(ctx);

  return withRootLock(ctx, async () => {
    let set: PackageSet;
    if (options.new) {
      set = new PackageSet(setName, ctx.dirs);
      if (await set.exists()) {
        throw new SetExistsError(setName);
      }
    } else {
      set = await getSet(ctx.dirs, setName);
    }

    const alreadyInstalled = await set.installed();
    const newlyInstalling = Boolean(options.new && options.installed) && !alreadyInstalled;
    const willBeInstalled = alreadyInstalled || newlyInstalling;

    if (willBeInstalled) {
      logger.debug(`Set '${setName}' is installed, installing packages first`, { pkgs });
      if (!(await ctx.packageManager.install(pkgs))) {
        return {
          success: false,
          error: `${ctx.packageManager.name} failed to install ${formatPackageList(pkgs)}; set '${setName}' was not changed`
        };
      }
    }

    const added = options.new ? await set.create(pkgs) : await set.merge(pkgs);
    if (newlyInstalling) {
      await set.markInstalled();
    }

    if (options.new) {
      out.success(`Created set '${setName}'${newlyInstalling ? ' (installed)' : ''}`);
    }
    if (added.size > 0) {
      out.info(`Added to '${setName}': ${formatPackageList(added)}`);
    } else if (!options.new) {
      out.info(`Nothing new to add to '${setName}'`);
    }

    const result: AddResult = {
      set: setName,
      created: Boolean(options.new),
      installed: willBeInstalled,
      added: [...added],
      moved: [],
      movedFrom: []
    };

    if (!options.move) {
      return { success: true, data: result };
    }

    const others = excludeSets(await allSets(ctx.dirs), [set]);
    const moved = intersection(pkgs, await accumulate(others));
    if (moved.size === 0) {
      return { success: true, data: result };
    }

    if (!willBeInstalled) {
      // The destination does not keep them explicit, so whatever an installed
      // set held until now is no longer wanted on the system.
      const otherInstalled = excludeSets(await allInstalledSets(ctx.dirs), [set]);
      const demoted = intersection(moved, await accumulate(otherInstalled));
      logger.debug('Demoting moved packages', { demoted });
      if (!(await ctx.packageManager.uninstall(demoted))) {
        return {
          success: false,
          error: `${ctx.packageManager.name} failed to mark ${formatPackageList(demoted)} as dependencies; packages were added to '${setName}' but not removed from other sets`
        };
      }
    }

    const movedFrom: string[] = [];
    for (const other of others) {
      const members = await other.get();
      if (intersection(moved, members).size > 0) {
        await other.remove(moved);
        movedFrom.push(other.name);
      }
    }

    out.info(`Moved ${formatPackageList(moved)} from ${movedFrom.join(', ')}`);
    return {
      success: true,
      data: { ...result, moved: sorted(moved), movedFrom }
    };
  });
}
