/**
 * Apply pipeline: make the system's explicitly-installed packages equal the
 * accumulation of every installed set.
 *
 * Demotions run before installs; each phase must succeed before the next.
 */

import type { CommandResult, ExecutionContext } from '../../types/index.js';
import { accumulate, allInstalledSets } from '../sets/set-registry.js';
import { withRootLock } from '../lock.js';
import { resolveOutput } from '../ports/index.js';
import { difference, formatPackageList, sorted } from '../../utils/package-sets.js';
import { logger } from '../../utils/logger.js';

export interface ApplyOptions {
  /** Report the plan without changing the system */
  dryRun?: boolean;
}

export interface ApplyResult {
  /** Explicit on the system but declared by no installed set */
  uninstalled: string[];
  /** Declared by an installed set but not explicit on the system */
  installed: string[];
  dryRun: boolean;
}

export async function runApplyPipeline(
  options: ApplyOptions,
  ctx: ExecutionContext
): Promise<CommandResult<ApplyResult>> {
  const out = resolveOutput(ctx);
  const dryRun = Boolean(options.dryRun);

  return withRootLock(ctx, async () => {
    const declared = await accumulate(await allInstalledSets(ctx.dirs));
    const live = await ctx.packageManager.explicitlyInstalled();

    const toUninstall = difference(live, declared);
    const toInstall = difference(declared, live);
    const plan: ApplyResult = {
      uninstalled: sorted(toUninstall),
      installed: sorted(toInstall),
      dryRun
    };

    logger.debug('Apply plan', plan);

    if (toUninstall.size === 0 && toInstall.size === 0) {
      out.success('System already matches the installed sets');
      return { success: true, data: plan };
    }

    if (dryRun) {
      out.note(
        [`uninstall: ${formatPackageList(toUninstall)}`, `install:   ${formatPackageList(toInstall)}`].join('\n'),
        'Planned changes'
      );
      return { success: true, data: plan };
    }

    if (toUninstall.size > 0) {
      out.step(`Marking as dependencies: ${formatPackageList(toUninstall)}`);
    }
    if (!(await ctx.packageManager.uninstall(toUninstall))) {
      return {
        success: false,
        error: `${ctx.packageManager.name} failed to mark ${formatPackageList(toUninstall)} as dependencies`
      };
    }

    if (toInstall.size > 0) {
      out.step(`Installing: ${formatPackageList(toInstall)}`);
    }
    if (!(await ctx.packageManager.install(toInstall))) {
      return {
        success: false,
        error: `${ctx.packageManager.name} failed to install ${formatPackageList(toInstall)}`
      };
    }

    out.success('System now matches the installed sets');
    return { success: true, data: plan };
  });
}
