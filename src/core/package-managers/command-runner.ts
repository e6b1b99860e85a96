/**
 * Runs package-manager commands.
 *
 * Queries capture stdout; mutating commands inherit the terminal so that
 * sudo and the package manager itself can prompt the user.
 */

import { execFile, spawn } from 'child_process';
import { promisify } from 'util';

import { logger } from '../../utils/logger.js';
import { PackageManagerError } from '../../utils/errors.js';

const execFileAsync = promisify(execFile);

export interface CommandSpec {
  command: string;
  args: string[];
}

export interface CommandRunner {
  /** Run a query and return its stdout; a non-zero exit throws PackageManagerError */
  capture(spec: CommandSpec): Promise<string>;
  /** Run with the terminal attached; resolves to whether the command exited 0 */
  run(spec: CommandSpec): Promise<boolean>;
}

export interface CommandRunnerOptions {
  /** Kill a command that runs longer than this; the kill counts as failure */
  timeoutMs?: number;
}

export function formatCommand(spec: CommandSpec): string {
  return [spec.command, ...spec.args].join(' ');
}

export function createCommandRunner(options: CommandRunnerOptions = {}): CommandRunner {
  return {
    async capture(spec: CommandSpec): Promise<string> {
      logger.debug(`Running query: ${formatCommand(spec)}`);
      try {
        const { stdout } = await execFileAsync(spec.command, spec.args, {
          encoding: 'utf8',
          maxBuffer: 16 * 1024 * 1024,
          timeout: options.timeoutMs
        });
        return stdout;
      } catch (error) {
        const stderr = error instanceof Error && 'stderr' in error && typeof error.stderr === 'string'
          ? error.stderr.trim()
          : '';
        const message = stderr || (error instanceof Error ? error.message : String(error));
        throw new PackageManagerError(`'${formatCommand(spec)}' failed: ${message}`, { command: spec.command });
      }
    },

    run(spec: CommandSpec): Promise<boolean> {
      logger.debug(`Running: ${formatCommand(spec)}`);
      return new Promise<boolean>(resolve => {
        const child = spawn(spec.command, spec.args, {
          stdio: 'inherit',
          timeout: options.timeoutMs
        });

        child.on('error', error => {
          logger.error(`Failed to start '${spec.command}'`, { error: error.message });
          resolve(false);
        });

        child.on('close', (code, signal) => {
          if (code !== 0) {
            logger.debug(`'${formatCommand(spec)}' exited unsuccessfully`, { code, signal });
          }
          resolve(code === 0);
        });
      });
    }
  };
}
