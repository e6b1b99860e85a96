/**
 * Package manager selection.
 *
 * Uses the backend named in configuration, otherwise the first supported
 * package manager found on PATH.
 */

import { promises as fs, constants as fsConstants } from 'fs';
import * as path from 'path';

import type { PackageManagerName, PkgsetConfig } from '../../types/index.js';
import type { PackageManagerPort } from '../ports/package-manager.js';
import { PackageManagerNotFoundError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { createCommandRunner, type CommandRunner } from './command-runner.js';
import { PacmanPackageManager } from './pacman.js';
import { AptPackageManager } from './apt.js';

/** Executable probed on PATH for each backend, in detection order */
const DETECTION_ORDER: ReadonlyArray<{ name: PackageManagerName; executable: string }> = [
  { name: 'pacman', executable: 'pacman' },
  { name: 'apt', executable: 'apt-get' }
];

async function isExecutable(candidate: string): Promise<boolean> {
  try {
    await fs.access(candidate, fsConstants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Locate `executable` on the given PATH string.
 */
export async function findExecutable(
  executable: string,
  searchPath: string = process.env.PATH ?? ''
): Promise<string | null> {
  for (const dir of searchPath.split(path.delimiter)) {
    if (!dir) continue;
    const candidate = path.join(dir, executable);
    if (await isExecutable(candidate)) {
      return candidate;
    }
  }
  return null;
}

export async function detectPackageManagerName(
  searchPath: string = process.env.PATH ?? ''
): Promise<PackageManagerName> {
  for (const { name, executable } of DETECTION_ORDER) {
    const found = await findExecutable(executable, searchPath);
    if (found) {
      logger.debug(`Detected package manager '${name}' at ${found}`);
      return name;
    }
  }
  throw new PackageManagerNotFoundError(DETECTION_ORDER.map(entry => entry.executable));
}

export function createPackageManager(
  name: PackageManagerName,
  options: { runner: CommandRunner; program?: string; useSudo?: boolean }
): PackageManagerPort {
  switch (name) {
    case 'pacman':
      return new PacmanPackageManager(options);
    case 'apt':
      return new AptPackageManager(options);
  }
}

/**
 * Build the port for this invocation from resolved configuration.
 */
export async function resolvePackageManager(config: PkgsetConfig): Promise<PackageManagerPort> {
  const name = config.packageManager ?? await detectPackageManagerName();
  return createPackageManager(name, {
    runner: createCommandRunner({ timeoutMs: config.commandTimeoutMs }),
    program: config.program
  });
}
