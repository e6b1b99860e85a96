/**
 * Execution Context Types
 *
 * Everything a reconciliation pipeline needs for one invocation: where the
 * sets live, which package manager to drive, where to report, and whether
 * to hold the configuration-root lock.
 */

import type { PkgsetDirectories } from './index.js';
import type { OutputPort } from '../core/ports/output.js';
import type { PackageManagerPort } from '../core/ports/package-manager.js';
import type { LockOptions } from '../core/lock.js';

export interface ExecutionContext {
  /** Resolved configuration-root layout */
  dirs: PkgsetDirectories;

  /**
   * Package manager driven by this invocation.
   * Passed explicitly so tests can substitute an in-process fake.
   */
  packageManager: PackageManagerPort;

  /** User-facing output. Falls back to plain console output when absent. */
  output?: OutputPort;

  /** Hold the advisory lock on the configuration root for mutating workflows */
  lock: boolean;

  lockOptions?: LockOptions;
}

/**
 * Options accepted by createExecutionContext()
 */
export interface ExecutionOptions {
  /** Override the configuration root (otherwise PKGSET_ROOT or the default) */
  root?: string;

  /** Use this port instead of detecting one from configuration */
  packageManager?: PackageManagerPort;

  output?: OutputPort;
}
