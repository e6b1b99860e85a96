import { Command } from 'commander';
import { withErrorHandling } from '../utils/errors.js';
import { normalizePackageArgs } from '../utils/package-sets.js';
import { createCommandContext } from '../cli/context.js';
import { runAddPipeline, type AddOptions } from '../core/add/add-pipeline.js';

/**
 * Setup the 'pkgset add' command
 */
export function setupAddCommand(program: Command): void {
  program
    .command('add')
    .argument('<set>', 'set to add the packages to')
    .argument('[packages...]', 'package names')
    .description(
      'Add packages to a set. If the set is installed, the packages are installed first.\n' +
      'With --move, the packages are taken out of every other set.'
    )
    .option('-n, --new', 'create the set (it must not exist yet)')
    .option('-i, --installed', 'with --new, install the packages and mark the new set installed')
    .option('-m, --move', 'remove the packages from all other sets')
    .action(
      withErrorHandling(async (setName: string, packages: string[], options: AddOptions, command: Command) => {
        const ctx = await createCommandContext(command);
        const result = await runAddPipeline(setName, normalizePackageArgs(packages), options, ctx);
        if (!result.success) {
          throw new Error(result.error || 'Add failed');
        }
      })
    );
}
