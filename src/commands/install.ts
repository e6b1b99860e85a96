import { Command } from 'commander';
import { withErrorHandling } from '../utils/errors.js';
import { createCommandContext } from '../cli/context.js';
import { runInstallPipeline } from '../core/install/install-pipeline.js';

/**
 * Setup the 'pkgset install' command
 */
export function setupInstallCommand(program: Command): void {
  program
    .command('install')
    .argument('<sets...>', 'names of the sets to install')
    .description('Install every package of the given sets and mark the sets installed')
    .action(
      withErrorHandling(async (setNames: string[], _options: Record<string, never>, command: Command) => {
        const ctx = await createCommandContext(command);
        const result = await runInstallPipeline(setNames, ctx);
        if (!result.success) {
          throw new Error(result.error || 'Install failed');
        }
      })
    );
}
