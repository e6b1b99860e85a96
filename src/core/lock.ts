/**
 * Advisory lock over the configuration root.
 *
 * Mutating workflows touch several set files and markers; holding one lock
 * for the whole workflow keeps two concurrent invocations from interleaving
 * their reads and appends.
 */

import { promises as fs } from 'fs';
import lockfile from 'proper-lockfile';

import type { ExecutionContext } from '../types/execution-context.js';
import { ensureDir, exists } from '../utils/fs.js';
import { LockError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export interface LockOptions {
  /** Stale lock threshold in milliseconds */
  stale?: number;
  /** How long to keep retrying a held lock, in milliseconds */
  waitMs?: number;
}

const DEFAULT_STALE_MS = 10000;
const DEFAULT_WAIT_MS = 30000;
const RETRY_INTERVAL_MS = 100;

export type ReleaseFn = () => Promise<void>;

async function ensureLockFile(lockPath: string, root: string): Promise<void> {
  await ensureDir(root);
  if (!(await exists(lockPath))) {
    await fs.writeFile(lockPath, '', { flag: 'a' });
  }
}

/**
 * Acquire the lock on `lockPath`, creating the file if needed.
 */
export async function acquireLock(lockPath: string, root: string, options: LockOptions = {}): Promise<ReleaseFn> {
  const waitMs = options.waitMs ?? DEFAULT_WAIT_MS;

  try {
    await ensureLockFile(lockPath, root);
    const release = await lockfile.lock(lockPath, {
      stale: options.stale ?? DEFAULT_STALE_MS,
      retries: {
        retries: Math.max(1, Math.ceil(waitMs / RETRY_INTERVAL_MS)),
        minTimeout: RETRY_INTERVAL_MS,
        maxTimeout: RETRY_INTERVAL_MS * 2,
        factor: 1
      }
    });
    logger.debug(`Acquired lock: ${lockPath}`);
    return release;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    if (message.includes('ELOCKED') || message.includes('already being held')) {
      throw new LockError('another pkgset process is modifying this configuration root', lockPath);
    }
    throw new LockError(message, lockPath);
  }
}

/**
 * Run `fn` between `acquire` and its release. A failed release is logged;
 * the workflow's own outcome stands.
 */
export async function runLocked<T>(
  lockPath: string,
  acquire: () => Promise<ReleaseFn>,
  fn: () => Promise<T>
): Promise<T> {
  const release = await acquire();
  try {
    return await fn();
  } finally {
    try {
      await release();
      logger.debug(`Released lock: ${lockPath}`);
    } catch (error) {
      logger.debug(`Failed to release lock: ${lockPath}`, { error });
    }
  }
}

/**
 * Run `fn` while holding the configuration-root lock, when the context asks for it.
 */
export async function withRootLock<T>(ctx: ExecutionContext, fn: () => Promise<T>): Promise<T> {
  if (!ctx.lock) {
    return fn();
  }
  const { lockFile, root } = ctx.dirs;
  return runLocked(lockFile, () => acquireLock(lockFile, root, ctx.lockOptions), fn);
}
