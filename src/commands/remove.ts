import { Command } from 'commander';
import { withErrorHandling } from '../utils/errors.js';
import { normalizePackageArgs } from '../utils/package-sets.js';
import { createCommandContext } from '../cli/context.js';
import { runRemovePipeline } from '../core/remove/remove-pipeline.js';

/**
 * Setup the 'pkgset remove' command
 */
export function setupRemoveCommand(program: Command): void {
  program
    .command('remove')
    .argument('<set>', 'set to remove the packages from')
    .argument('<packages...>', 'package names')
    .description(
      'Remove packages from a set. If the set is installed, packages no other\n' +
      'installed set declares are marked as dependencies.'
    )
    .action(
      withErrorHandling(async (setName: string, packages: string[], _options: Record<string, never>, command: Command) => {
        const ctx = await createCommandContext(command);
        const result = await runRemovePipeline(setName, normalizePackageArgs(packages), ctx);
        if (!result.success) {
          throw new Error(result.error || 'Remove failed');
        }
      })
    );
}
