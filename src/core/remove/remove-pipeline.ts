/**
 * Remove pipeline: take packages out of one set.
 *
 * When the set is installed, packages no other installed set still wants
 * are demoted to dependencies first; the set file is only rewritten after
 * that succeeds.
 */

import type { CommandResult, ExecutionContext } from '../../types/index.js';
import { accumulate, allInstalledSets, excludeSets, getSet } from '../sets/set-registry.js';
import { withRootLock } from '../lock.js';
import { resolveOutput } from '../ports/index.js';
import { ValidationError } from '../../utils/errors.js';
import { difference, formatPackageList, intersection, sorted } from '../../utils/package-sets.js';
import { logger } from '../../utils/logger.js';

export interface RemoveResult {
  set: string;
  /** Packages that were members and are gone from the set file */
  removed: string[];
  /** Packages marked as dependencies on the system */
  uninstalled: string[];
}

export async function runRemovePipeline(
  setName: string,
  pkgs: ReadonlySet<string>,
  ctx: ExecutionContext
): Promise<CommandResult<RemoveResult>> {
  if (pkgs.size === 0) {
    throw new ValidationError('no packages specified');
  }

  const out = resolveOutput(ctx);

  return withRootLock(ctx, async () => {
    const set = await getSet(ctx.dirs, setName);
    const removed = intersection(pkgs, await set.get());
    let excess = new Set<string>();

    if (await set.installed()) {
      const otherInstalled = excludeSets(await allInstalledSets(ctx.dirs), [set]);
      excess = difference(removed, await accumulate(otherInstalled));
      logger.debug(`Set '${setName}' is installed, demoting packages no other set wants`, { excess });

      if (!(await ctx.packageManager.uninstall(excess))) {
        return {
          success: false,
          error: `${ctx.packageManager.name} failed to mark ${formatPackageList(excess)} as dependencies; set '${setName}' was not changed`
        };
      }
    }

    await set.remove(pkgs);

    const notMembers = difference(pkgs, removed);
    if (notMembers.size > 0) {
      out.warn(`Not in '${setName}': ${formatPackageList(notMembers)}`);
    }
    if (removed.size > 0) {
      out.success(`Removed from '${setName}': ${formatPackageList(removed)}`);
    }

    return {
      success: true,
      data: { set: setName, removed: sorted(removed), uninstalled: sorted(excess) }
    };
  });
}
