/**
 * List pipeline: every set with its installed state and, optionally, members.
 */

import type { CommandResult, ExecutionContext } from '../../types/index.js';
import { allSets, sortSets } from '../sets/set-registry.js';
import { sorted } from '../../utils/package-sets.js';

export interface ListOptions {
  /** Include each set's members */
  tree?: boolean;
}

export interface ListedSet {
  name: string;
  installed: boolean;
  /** Sorted members; present only when requested */
  members?: string[];
}

export async function runListPipeline(
  options: ListOptions,
  ctx: ExecutionContext
): Promise<CommandResult<ListedSet[]>> {
  const listed: ListedSet[] = [];

  for (const set of sortSets(await allSets(ctx.dirs))) {
    const entry: ListedSet = { name: set.name, installed: await set.installed() };
    if (options.tree) {
      entry.members = sorted(await set.get());
    }
    listed.push(entry);
  }

  return { success: true, data: listed };
}
