import { PkgsetError, ErrorCodes, CommandResult } from '../types/index.js';
import { logger } from './logger.js';

/**
 * Custom error classes for the different failure kinds of the pkgset CLI
 */

export class SetNotFoundError extends PkgsetError {
  constructor(setName: string) {
    super(`Set '${setName}' does not exist`, ErrorCodes.SET_NOT_FOUND, { setName });
    this.name = 'SetNotFoundError';
  }
}

export class SetExistsError extends PkgsetError {
  constructor(setName: string) {
    super(`Set '${setName}' already exists`, ErrorCodes.SET_EXISTS, { setName });
    this.name = 'SetExistsError';
  }
}

/**
 * An installed marker is present but the set it points at is gone.
 */
export class CorruptStateError extends PkgsetError {
  constructor(setName: string, markerPath: string) {
    super(
      `Set '${setName}' is marked installed but its set file is missing (remove ${markerPath} or recreate the set)`,
      ErrorCodes.CORRUPT_STATE,
      { setName, markerPath }
    );
    this.name = 'CorruptStateError';
  }
}

export class InvalidSetNameError extends PkgsetError {
  constructor(setName: string, reason: string) {
    super(`Invalid set name '${setName}': ${reason}`, ErrorCodes.INVALID_SET_NAME, { setName });
    this.name = 'InvalidSetNameError';
  }
}

export class FileSystemError extends PkgsetError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`File system error: ${message}`, ErrorCodes.FILE_SYSTEM_ERROR, details);
    this.name = 'FileSystemError';
  }
}

export class ValidationError extends PkgsetError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Validation error: ${message}`, ErrorCodes.VALIDATION_ERROR, details);
    this.name = 'ValidationError';
  }
}

export class ConfigError extends PkgsetError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
    this.name = 'ConfigError';
  }
}

export class PackageManagerError extends PkgsetError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Package manager error: ${message}`, ErrorCodes.PACKAGE_MANAGER_ERROR, details);
    this.name = 'PackageManagerError';
  }
}

export class PackageManagerNotFoundError extends PkgsetError {
  constructor(searched: readonly string[]) {
    super(
      `No supported package manager found (looked for: ${searched.join(', ')})`,
      ErrorCodes.PACKAGE_MANAGER_NOT_FOUND,
      { searched: [...searched] }
    );
    this.name = 'PackageManagerNotFoundError';
  }
}

export class LockError extends PkgsetError {
  constructor(message: string, lockPath: string) {
    super(`Lock error: ${message}`, ErrorCodes.LOCK_ERROR, { lockPath });
    this.name = 'LockError';
  }
}

/**
 * Error handler function that provides consistent error handling across commands
 */
export function handleError(error: unknown): CommandResult {
  if (error instanceof PkgsetError) {
    // For CLI UX, avoid noisy error logs by default; surface details only in verbose mode
    logger.debug(error.message, { code: error.code, details: error.details });
    return {
      success: false,
      error: error.message
    };
  } else if (error instanceof Error) {
    logger.debug('Unexpected error occurred', { message: error.message, stack: error.stack });
    return {
      success: false,
      error: error.message
    };
  } else {
    logger.debug('Unknown error occurred', { error });
    return {
      success: false,
      error: 'An unknown error occurred'
    };
  }
}

/**
 * Wraps an async function with error handling for Commander.js actions
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      const result = handleError(error);
      console.error(result.error);
      process.exit(1);
    }
  };
}
