import { PkgsetConfig, PkgsetConfigFile, PackageManagerName } from '../types/index.js';
import { ENV_VARS, PACKAGE_MANAGERS } from '../constants/index.js';
import { exists, readJsoncFile } from '../utils/fs.js';
import { logger } from '../utils/logger.js';
import { ConfigError } from '../utils/errors.js';
import { getPkgsetDirectories, resolveRoot } from './directory.js';

/**
 * Configuration loading for the pkgset CLI.
 *
 * Precedence, later wins: built-in defaults, `<root>/config.jsonc`, environment.
 */

const DEFAULT_CONFIG_FILE: Required<Pick<PkgsetConfigFile, 'lock'>> = {
  lock: true
};

export function isPackageManagerName(value: unknown): value is PackageManagerName {
  return typeof value === 'string' && (PACKAGE_MANAGERS as readonly string[]).includes(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

/**
 * Validate the parsed contents of config.jsonc
 */
export function parseConfigFile(raw: unknown, source: string): PkgsetConfigFile {
  if (!isRecord(raw)) {
    throw new ConfigError(`${source}: expected an object at the top level`);
  }

  const config: PkgsetConfigFile = {};

  if (raw.packageManager !== undefined) {
    if (!isPackageManagerName(raw.packageManager)) {
      throw new ConfigError(
        `${source}: packageManager must be one of ${PACKAGE_MANAGERS.join(', ')}`,
        { value: raw.packageManager }
      );
    }
    config.packageManager = raw.packageManager;
  }

  if (raw.program !== undefined) {
    if (typeof raw.program !== 'string' || raw.program.trim() === '') {
      throw new ConfigError(`${source}: program must be a non-empty string`);
    }
    config.program = raw.program.trim();
  }

  if (raw.lock !== undefined) {
    if (typeof raw.lock !== 'boolean') {
      throw new ConfigError(`${source}: lock must be a boolean`);
    }
    config.lock = raw.lock;
  }

  if (raw.lockWaitMs !== undefined) {
    if (!isPositiveInteger(raw.lockWaitMs)) {
      throw new ConfigError(`${source}: lockWaitMs must be a positive integer`);
    }
    config.lockWaitMs = raw.lockWaitMs;
  }

  if (raw.commandTimeoutMs !== undefined) {
    if (!isPositiveInteger(raw.commandTimeoutMs)) {
      throw new ConfigError(`${source}: commandTimeoutMs must be a positive integer`);
    }
    config.commandTimeoutMs = raw.commandTimeoutMs;
  }

  return config;
}

async function loadConfigFile(configPath: string): Promise<PkgsetConfigFile> {
  if (!(await exists(configPath))) {
    logger.debug(`Config file not found, using defaults: ${configPath}`);
    return {};
  }

  logger.debug(`Loading config from: ${configPath}`);
  let raw: unknown;
  try {
    raw = await readJsoncFile(configPath);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Failed to load configuration: ${message}`, { configPath });
  }
  return parseConfigFile(raw, configPath);
}

/**
 * Resolve the effective configuration for one invocation
 */
export async function loadConfig(
  options: { root?: string; env?: NodeJS.ProcessEnv } = {}
): Promise<PkgsetConfig> {
  const env = options.env ?? process.env;
  const dirs = getPkgsetDirectories(resolveRoot(options.root, env));
  const fileConfig = { ...DEFAULT_CONFIG_FILE, ...(await loadConfigFile(dirs.configFile)) };

  let packageManager = fileConfig.packageManager;
  const envManager = env[ENV_VARS.PACKAGE_MANAGER];
  if (envManager) {
    if (!isPackageManagerName(envManager)) {
      throw new ConfigError(
        `${ENV_VARS.PACKAGE_MANAGER} must be one of ${PACKAGE_MANAGERS.join(', ')}`,
        { value: envManager }
      );
    }
    packageManager = envManager;
  }

  const envProgram = env[ENV_VARS.PM_PROGRAM]?.trim();
  const program = envProgram ? envProgram : fileConfig.program;
  const lock = env[ENV_VARS.NO_LOCK] === '1' ? false : fileConfig.lock;

  const config: PkgsetConfig = {
    dirs,
    packageManager,
    program,
    lock,
    lockWaitMs: fileConfig.lockWaitMs,
    commandTimeoutMs: fileConfig.commandTimeoutMs
  };

  logger.debug('Resolved configuration', config);
  return config;
}
