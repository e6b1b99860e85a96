/**
 * Execution Context Module
 *
 * Builds the ExecutionContext every reconciliation pipeline receives:
 * resolved directories, the package manager port, output, and the lock flag.
 */

import type { ExecutionContext, ExecutionOptions } from '../types/execution-context.js';
import { loadConfig } from './config.js';
import { ensurePkgsetDirectories } from './directory.js';
import { resolvePackageManager } from './package-managers/index.js';
import { logger } from '../utils/logger.js';

/**
 * Create an ExecutionContext from command options.
 *
 * Package manager detection happens here, so a missing package manager is
 * reported before any workflow runs.
 */
export async function createExecutionContext(options: ExecutionOptions = {}): Promise<ExecutionContext> {
  const config = await loadConfig({ root: options.root });
  await ensurePkgsetDirectories(config.dirs);

  const packageManager = options.packageManager ?? await resolvePackageManager(config);

  const context: ExecutionContext = {
    dirs: config.dirs,
    packageManager,
    output: options.output,
    lock: config.lock,
    lockOptions: { waitMs: config.lockWaitMs }
  };

  logger.debug('Created execution context', {
    root: context.dirs.root,
    packageManager: packageManager.name,
    lock: context.lock
  });

  return context;
}
