/**
 * Common types and interfaces for the pkgset CLI application
 */

export * from './execution-context.js';

// Core application types
export interface PkgsetDirectories {
  /** Configuration root holding every other path below */
  root: string;
  /** One file per set */
  sets: string;
  /** One marker per installed set */
  installedSets: string;
  /** Advisory lock target for mutating workflows */
  lockFile: string;
  /** Optional configuration file */
  configFile: string;
}

export type PackageManagerName = 'pacman' | 'apt';

/**
 * Shape of `<root>/config.jsonc`. Every key is optional.
 */
export interface PkgsetConfigFile {
  packageManager?: PackageManagerName;
  program?: string;
  lock?: boolean;
  lockWaitMs?: number;
  commandTimeoutMs?: number;
}

/**
 * Configuration after defaults, the config file and the environment are merged.
 */
export interface PkgsetConfig {
  dirs: PkgsetDirectories;
  /** Undefined means "detect from PATH" */
  packageManager?: PackageManagerName;
  /** Program alias used for mutating commands (e.g. paru instead of pacman) */
  program?: string;
  lock: boolean;
  /** How long to wait for a held lock before giving up */
  lockWaitMs?: number;
  commandTimeoutMs?: number;
}

export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  warnings?: string[];
}

// Error types
export class PkgsetError extends Error {
  public code: string;
  public details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'PkgsetError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  SET_NOT_FOUND = 'SET_NOT_FOUND',
  SET_EXISTS = 'SET_EXISTS',
  CORRUPT_STATE = 'CORRUPT_STATE',
  INVALID_SET_NAME = 'INVALID_SET_NAME',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR',
  PACKAGE_MANAGER_ERROR = 'PACKAGE_MANAGER_ERROR',
  PACKAGE_MANAGER_NOT_FOUND = 'PACKAGE_MANAGER_NOT_FOUND',
  LOCK_ERROR = 'LOCK_ERROR'
}

// Logger types
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}
