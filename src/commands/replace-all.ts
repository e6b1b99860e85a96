import { Command } from 'commander';
import { withErrorHandling } from '../utils/errors.js';
import { createCommandContext } from '../cli/context.js';
import { runReplaceAllPipeline } from '../core/replace/replace-all-pipeline.js';

/**
 * Setup the 'pkgset replace-all' command
 */
export function setupReplaceAllCommand(program: Command): void {
  program
    .command('replace-all')
    .argument('<old>', 'package name to replace')
    .argument('<new>', 'replacement package name')
    .description('Rename a package in every set file (the system is not touched)')
    .action(
      withErrorHandling(async (oldName: string, newName: string, _options: Record<string, never>, command: Command) => {
        const ctx = await createCommandContext(command);
        const result = await runReplaceAllPipeline(oldName, newName, ctx);
        if (!result.success) {
          throw new Error(result.error || 'Replace failed');
        }
      })
    );
}
