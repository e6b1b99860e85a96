/**
 * Shared constants for the pkgset CLI application
 * This file provides a single source of truth for directory names,
 * file names and environment variables used throughout the application.
 */

export const DIR_PATTERNS = {
  PKGSET: 'pkgset',
  XDG_CONFIG_FALLBACK: '.config'
} as const;

export const PKGSET_DIRS = {
  SETS: 'sets',
  INSTALLED_SETS: 'installed-sets'
} as const;

export const FILE_PATTERNS = {
  CONFIG_JSONC: 'config.jsonc',
  LOCK_FILE: 'pkgset.lock'
} as const;

export const ENV_VARS = {
  ROOT: 'PKGSET_ROOT',
  PACKAGE_MANAGER: 'PKGSET_PACKAGE_MANAGER',
  PM_PROGRAM: 'PKGSET_PM_PROGRAM',
  NO_LOCK: 'PKGSET_NO_LOCK',
  VERBOSE: 'PKGSET_VERBOSE',
  XDG_CONFIG_HOME: 'XDG_CONFIG_HOME'
} as const;

/**
 * Set files treat lines starting with this prefix (after trimming) as comments.
 */
export const COMMENT_PREFIX = '#' as const;

export const PACKAGE_MANAGERS = ['pacman', 'apt'] as const;
