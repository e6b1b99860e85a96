import { Command } from 'commander';
import { withErrorHandling } from '../utils/errors.js';
import { createCommandContext } from '../cli/context.js';
import { runUnaddedPipeline } from '../core/unadded/unadded-pipeline.js';

/**
 * Setup the 'pkgset unadded' command
 */
export function setupUnaddedCommand(program: Command): void {
  program
    .command('unadded')
    .description(
      'Print explicitly installed packages that belong to no set, one per line.\n' +
      'Useful for bootstrapping: pkgset add -n -i base $(pkgset unadded)'
    )
    .action(
      withErrorHandling(async (_options: Record<string, never>, command: Command) => {
        const ctx = await createCommandContext(command);
        const result = await runUnaddedPipeline(ctx);
        if (!result.success || !result.data) {
          throw new Error(result.error || 'Unadded failed');
        }
        // Plain stdout so the list can be piped
        for (const pkg of result.data.packages) {
          console.log(pkg);
        }
      })
    );
}
