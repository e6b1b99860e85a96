import { Command } from 'commander';
import { withErrorHandling } from '../utils/errors.js';
import { createCommandContext, detectInteractive } from '../cli/context.js';
import { runListPipeline, type ListOptions } from '../core/list/list-pipeline.js';
import { renderSetList } from '../core/list/list-printers.js';

/**
 * Setup the 'pkgset list' command
 */
export function setupListCommand(program: Command): void {
  program
    .command('list')
    .alias('ls')
    .description('List sets and whether they are installed')
    .option('-t, --tree', 'show the packages of each set')
    .action(
      withErrorHandling(async (options: ListOptions, command: Command) => {
        const ctx = await createCommandContext(command);
        const result = await runListPipeline(options, ctx);
        if (!result.success || !result.data) {
          throw new Error(result.error || 'List failed');
        }
        if (result.data.length === 0) {
          console.log('No sets found.');
          return;
        }
        for (const line of renderSetList(result.data, { color: detectInteractive() })) {
          console.log(line);
        }
      })
    );
}
