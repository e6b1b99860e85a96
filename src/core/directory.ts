import * as os from 'os';
import * as path from 'path';
import { PkgsetDirectories } from '../types/index.js';
import { DIR_PATTERNS, ENV_VARS, FILE_PATTERNS, PKGSET_DIRS } from '../constants/index.js';
import { ensureDir } from '../utils/fs.js';
import { logger } from '../utils/logger.js';

/**
 * Configuration-root directory resolution
 */

/**
 * Default configuration root, following the XDG base directory convention:
 * $XDG_CONFIG_HOME/pkgset, or ~/.config/pkgset when it is unset.
 */
export function getDefaultRoot(env: NodeJS.ProcessEnv = process.env): string {
  const xdgConfigHome = env[ENV_VARS.XDG_CONFIG_HOME];
  const configHome = xdgConfigHome && path.isAbsolute(xdgConfigHome)
    ? xdgConfigHome
    : path.join(os.homedir(), DIR_PATTERNS.XDG_CONFIG_FALLBACK);
  return path.join(configHome, DIR_PATTERNS.PKGSET);
}

/**
 * Resolve the configuration root: explicit override, then PKGSET_ROOT, then the default.
 */
export function resolveRoot(override?: string, env: NodeJS.ProcessEnv = process.env): string {
  const fromEnv = env[ENV_VARS.ROOT];
  if (override) {
    return path.resolve(override);
  }
  if (fromEnv) {
    return path.resolve(fromEnv);
  }
  return getDefaultRoot(env);
}

/**
 * Lay out every path pkgset uses under a configuration root
 */
export function getPkgsetDirectories(root: string): PkgsetDirectories {
  return {
    root,
    sets: path.join(root, PKGSET_DIRS.SETS),
    installedSets: path.join(root, PKGSET_DIRS.INSTALLED_SETS),
    lockFile: path.join(root, FILE_PATTERNS.LOCK_FILE),
    configFile: path.join(root, FILE_PATTERNS.CONFIG_JSONC)
  };
}

/**
 * Ensure the sets and installed-sets directories exist
 */
export async function ensurePkgsetDirectories(dirs: PkgsetDirectories): Promise<PkgsetDirectories> {
  try {
    await Promise.all([
      ensureDir(dirs.sets),
      ensureDir(dirs.installedSets)
    ]);

    logger.debug('pkgset directories ensured', { directories: dirs });
    return dirs;
  } catch (error) {
    logger.error('Failed to create pkgset directories', { error, directories: dirs });
    throw error;
  }
}
