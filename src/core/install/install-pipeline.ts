/**
 * Install pipeline: install every package the named sets declare, then mark
 * the sets installed.
 *
 * The live install happens first, so a failure (or crash) never leaves a
 * set recorded as installed when its packages are not.
 */

import type { CommandResult, ExecutionContext } from '../../types/index.js';
import { accumulate, getSets } from '../sets/set-registry.js';
import { withRootLock } from '../lock.js';
import { resolveOutput } from '../ports/index.js';
import { ValidationError } from '../../utils/errors.js';
import { formatPackageList, sorted } from '../../utils/package-sets.js';
import { logger } from '../../utils/logger.js';

export interface InstallSetsResult {
  sets: string[];
  packages: string[];
}

export async function runInstallPipeline(
  setNames: readonly string[],
  ctx: ExecutionContext
): Promise<CommandResult<InstallSetsResult>> {
  if (setNames.length === 0) {
    throw new ValidationError('no sets specified');
  }

  const out = resolveOutput(ctx);

  return withRootLock(ctx, async () => {
    const sets = await getSets(ctx.dirs, setNames);
    const wanted = await accumulate(sets);

    logger.debug('Installing sets', { sets: sets.map(set => set.name), packages: wanted });
    out.step(`Installing ${formatPackageList(wanted)}`);

    if (!(await ctx.packageManager.install(wanted))) {
      return {
        success: false,
        error: `${ctx.packageManager.name} failed to install packages for ${sets.map(set => set.name).join(', ')}`
      };
    }

    for (const set of sets) {
      await set.markInstalled();
    }

    const names = sets.map(set => set.name);
    out.success(`Installed ${names.join(', ')}`);
    return { success: true, data: { sets: names, packages: sorted(wanted) } };
  });
}
