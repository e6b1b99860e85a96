#!/usr/bin/env node

import { Command } from 'commander';
import { logger } from './utils/logger.js';
import { getVersion } from './utils/package.js';
import { ENV_VARS } from './constants/index.js';

// Import command setup functions
import { setupInstallCommand } from './commands/install.js';
import { setupAddCommand } from './commands/add.js';
import { setupRemoveCommand } from './commands/remove.js';
import { setupUninstallCommand } from './commands/uninstall.js';
import { setupUnaddedCommand } from './commands/unadded.js';
import { setupApplyCommand } from './commands/apply.js';
import { setupReplaceAllCommand } from './commands/replace-all.js';
import { setupListCommand } from './commands/list.js';

/**
 * pkgset CLI - Main entry point
 *
 * Declarative package sets, reconciled against the system package manager.
 */

// Create the main program
const program = new Command();

// Configure the main program
program
  .name('pkgset')
  .description('Track wanted OS packages in named sets and keep the system in line with them')
  .version(getVersion())
  .option('--root <dir>', `configuration root (default: $${ENV_VARS.ROOT} or ~/.config/pkgset)`)
  .showSuggestionAfterError()
  .configureHelp({
    sortSubcommands: true
  })
  .addHelpText('after', [
    '',
    'Environment:',
    `  ${ENV_VARS.ROOT}              configuration root directory`,
    `  ${ENV_VARS.PACKAGE_MANAGER}   backend to use (pacman, apt); detected when unset`,
    `  ${ENV_VARS.PM_PROGRAM}        program used for installs (e.g. paru, yay)`,
    `  ${ENV_VARS.NO_LOCK}=1         do not lock the configuration root`,
    `  ${ENV_VARS.VERBOSE}=1         debug logging`
  ].join('\n'));

// === SET COMMANDS ===
setupInstallCommand(program);
setupAddCommand(program);
setupRemoveCommand(program);
setupUninstallCommand(program);
setupReplaceAllCommand(program);
setupListCommand(program);

// === SYSTEM COMMANDS ===
setupApplyCommand(program);
setupUnaddedCommand(program);

// === GLOBAL ERROR HANDLING ===

/**
 * Handle uncaught exceptions gracefully
 */
process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception occurred', { error: error.message, stack: error.stack });
  console.error('❌ An unexpected error occurred. Run with PKGSET_VERBOSE=1 for details.');
  process.exit(1);
});

/**
 * Handle unhandled promise rejections
 */
process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', { reason });
  console.error('❌ An unexpected error occurred. Run with PKGSET_VERBOSE=1 for details.');
  process.exit(1);
});

/**
 * Main execution function
 */
export async function run(argv: string[] = process.argv): Promise<void> {
  try {
    // If no arguments provided (just 'pkgset'), show help and exit successfully
    if (argv.length <= 2) {
      program.outputHelp();
      process.exit(0);
    }

    // Parse command line arguments
    await program.parseAsync(argv);

  } catch (error) {
    logger.error('CLI execution failed', { error });
    console.error('❌ Command execution failed. Use --help for usage information.');
    process.exit(1);
  }
}

// Only run main if this file is executed directly
if (process.argv[1] && (
    process.argv[1].endsWith('index.js') ||
    process.argv[1].endsWith('index.ts') ||
    process.argv[1].endsWith('pkgset')
  )) {
  run().catch((error) => {
    logger.error('Fatal error in main execution', { error });
    console.error('❌ Fatal error occurred. Exiting.');
    process.exit(1);
  });
}

// Export the program for testing purposes
export { program };
