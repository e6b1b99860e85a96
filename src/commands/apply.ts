import { Command } from 'commander';
import { withErrorHandling } from '../utils/errors.js';
import { createCommandContext } from '../cli/context.js';
import { runApplyPipeline, type ApplyOptions } from '../core/apply/apply-pipeline.js';

/**
 * Setup the 'pkgset apply' command
 */
export function setupApplyCommand(program: Command): void {
  program
    .command('apply')
    .description(
      'Reconcile the system with the installed sets: packages explicitly installed\n' +
      'but declared by no installed set are marked as dependencies, then declared\n' +
      'packages that are missing are installed.'
    )
    .option('--dry-run', 'show what would change without touching the system')
    .action(
      withErrorHandling(async (options: ApplyOptions, command: Command) => {
        const ctx = await createCommandContext(command);
        const result = await runApplyPipeline(options, ctx);
        if (!result.success) {
          throw new Error(result.error || 'Apply failed');
        }
      })
    );
}
