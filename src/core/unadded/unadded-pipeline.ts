/**
 * Unadded pipeline: explicitly-installed packages that no set declares.
 * Read-only; handy for bootstrapping sets from an existing system.
 */

import type { CommandResult, ExecutionContext } from '../../types/index.js';
import { accumulate, allSets } from '../sets/set-registry.js';
import { difference, sorted } from '../../utils/package-sets.js';

export interface UnaddedResult {
  packages: string[];
}

export async function runUnaddedPipeline(ctx: ExecutionContext): Promise<CommandResult<UnaddedResult>> {
  const declared = await accumulate(await allSets(ctx.dirs));
  const live = await ctx.packageManager.explicitlyInstalled();
  return { success: true, data: { packages: sorted(difference(live, declared)) } };
}
