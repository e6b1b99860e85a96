import { Command } from 'commander';
import { withErrorHandling } from '../utils/errors.js';
import { createCommandContext } from '../cli/context.js';
import { runUninstallPipeline } from '../core/uninstall/uninstall-pipeline.js';

/**
 * Setup the 'pkgset uninstall' command
 */
export function setupUninstallCommand(program: Command): void {
  program
    .command('uninstall')
    .argument('<sets...>', 'names of the sets to uninstall')
    .description(
      'Mark sets uninstalled. Packages no remaining installed set declares are\n' +
      'marked as dependencies; nothing is removed from the system.'
    )
    .action(
      withErrorHandling(async (setNames: string[], _options: Record<string, never>, command: Command) => {
        const ctx = await createCommandContext(command);
        const result = await runUninstallPipeline(setNames, ctx);
        if (!result.success) {
          throw new Error(result.error || 'Uninstall failed');
        }
      })
    );
}
