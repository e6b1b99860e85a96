/**
 * Replace-all pipeline: rename a package in every set file, installed or not.
 * No package manager interaction.
 */

import type { CommandResult, ExecutionContext } from '../../types/index.js';
import { allSets } from '../sets/set-registry.js';
import { withRootLock } from '../lock.js';
import { resolveOutput } from '../ports/index.js';
import { ValidationError } from '../../utils/errors.js';

export interface ReplaceAllResult {
  /** Sets whose file changed */
  changed: string[];
}

export async function runReplaceAllPipeline(
  oldName: string,
  newName: string,
  ctx: ExecutionContext
): Promise<CommandResult<ReplaceAllResult>> {
  const from = oldName.trim();
  const to = newName.trim();
  if (!from || !to) {
    throw new ValidationError('both the old and the new package name are required');
  }

  const out = resolveOutput(ctx);

  return withRootLock(ctx, async () => {
    const changed: string[] = [];
    for (const set of await allSets(ctx.dirs)) {
      if (await set.replace(from, to)) {
        changed.push(set.name);
      }
    }

    if (changed.length === 0) {
      out.info(`'${from}' is not a member of any set`);
    } else {
      out.success(`Replaced '${from}' with '${to}' in ${changed.join(', ')}`);
    }

    return { success: true, data: { changed } };
  });
}
