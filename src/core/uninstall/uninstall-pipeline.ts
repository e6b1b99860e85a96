/**
 * Uninstall pipeline: stop treating sets as installed.
 *
 * Packages only the target sets wanted are demoted to dependencies; anything
 * still declared by a remaining installed set stays explicit. Set files are
 * never touched, only the installed markers.
 */

import type { CommandResult, ExecutionContext } from '../../types/index.js';
import type { PackageSet } from '../sets/package-set.js';
import { accumulate, allInstalledSets, excludeSets, getSets } from '../sets/set-registry.js';
import { withRootLock } from '../lock.js';
import { resolveOutput } from '../ports/index.js';
import { ValidationError } from '../../utils/errors.js';
import { difference, formatPackageList, sorted } from '../../utils/package-sets.js';
import { logger } from '../../utils/logger.js';

export interface UninstallSetsResult {
  sets: string[];
  /** Named sets that were not installed */
  skipped: string[];
  packages: string[];
}

export async function runUninstallPipeline(
  setNames: readonly string[],
  ctx: ExecutionContext
): Promise<CommandResult<UninstallSetsResult>> {
  if (setNames.length === 0) {
    throw new ValidationError('no sets specified');
  }

  const out = resolveOutput(ctx);

  return withRootLock(ctx, async () => {
    const requested = await getSets(ctx.dirs, setNames);
    const targets: PackageSet[] = [];
    const skipped: string[] = [];

    for (const set of requested) {
      if (await set.installed()) {
        targets.push(set);
      } else {
        skipped.push(set.name);
      }
    }

    const warnings = skipped.map(name => `Set '${name}' is not installed`);
    warnings.forEach(warning => out.warn(warning));

    if (targets.length === 0) {
      return { success: true, data: { sets: [], skipped, packages: [] }, warnings };
    }

    const remaining = excludeSets(await allInstalledSets(ctx.dirs), targets);
    const toUninstall = difference(await accumulate(targets), await accumulate(remaining));
    logger.debug('Uninstalling sets', { sets: targets.map(set => set.name), packages: toUninstall });

    if (!(await ctx.packageManager.uninstall(toUninstall))) {
      return {
        success: false,
        error: `${ctx.packageManager.name} failed to mark ${formatPackageList(toUninstall)} as dependencies`,
        warnings
      };
    }

    for (const set of targets) {
      await set.markUninstalled();
    }

    const names = targets.map(set => set.name);
    out.success(`Uninstalled ${names.join(', ')}`);
    return {
      success: true,
      data: { sets: names, skipped, packages: sorted(toUninstall) },
      warnings
    };
  });
}
