/**
 * Base class for system package-manager backends.
 *
 * Subclasses describe which commands to run; this class owns the shared
 * behaviour: empty calls succeed without running anything, commands run in
 * order and stop at the first failure, and stock privileged programs are
 * prefixed with sudo when not running as root.
 */

import type { PackageManagerPort } from '../ports/package-manager.js';
import { logger } from '../../utils/logger.js';
import { sorted } from '../../utils/package-sets.js';
import { type CommandRunner, type CommandSpec, formatCommand } from './command-runner.js';

export interface PackageManagerOptions {
  runner: CommandRunner;
  /** Program alias for installs (e.g. an AUR helper); defaults to the backend's stock program */
  program?: string;
  /** Prefix privileged commands with sudo; defaults to "not running as root" */
  useSudo?: boolean;
}

function runningAsRoot(): boolean {
  return typeof process.getuid === 'function' && process.getuid() === 0;
}

export abstract class BasePackageManager implements PackageManagerPort {
  abstract readonly name: string;

  protected readonly runner: CommandRunner;
  protected readonly programOverride?: string;
  private readonly useSudo: boolean;

  constructor(options: PackageManagerOptions) {
    this.runner = options.runner;
    this.programOverride = options.program;
    this.useSudo = options.useSudo ?? !runningAsRoot();
  }

  /** Stock program installs run through when no alias is configured */
  protected abstract get defaultProgram(): string;

  /** Programs that need root; aliases such as AUR helpers escalate on their own */
  protected abstract get privilegedPrograms(): readonly string[];

  protected abstract explicitQuery(): CommandSpec;

  protected abstract parseExplicit(stdout: string): Set<string>;

  protected abstract installCommands(pkgs: string[]): CommandSpec[];

  protected abstract uninstallCommands(pkgs: string[]): CommandSpec[];

  protected get program(): string {
    return this.programOverride ?? this.defaultProgram;
  }

  async explicitlyInstalled(): Promise<Set<string>> {
    const stdout = await this.runner.capture(this.explicitQuery());
    return this.parseExplicit(stdout);
  }

  async install(pkgs: Iterable<string>): Promise<boolean> {
    return this.runAll(sorted(new Set(pkgs)), list => this.installCommands(list));
  }

  async uninstall(pkgs: Iterable<string>): Promise<boolean> {
    return this.runAll(sorted(new Set(pkgs)), list => this.uninstallCommands(list));
  }

  private async runAll(pkgs: string[], build: (pkgs: string[]) => CommandSpec[]): Promise<boolean> {
    if (pkgs.length === 0) {
      return true;
    }

    for (const spec of build(pkgs)) {
      const command = this.withPrivileges(spec);
      if (!(await this.runner.run(command))) {
        logger.debug(`${this.name}: command failed, stopping`, { command: formatCommand(command) });
        return false;
      }
    }
    return true;
  }

  private withPrivileges(spec: CommandSpec): CommandSpec {
    if (this.useSudo && this.privilegedPrograms.includes(spec.command)) {
      return { command: 'sudo', args: [spec.command, ...spec.args] };
    }
    return spec;
  }
}

/**
 * Non-empty trimmed lines of command output.
 */
export function outputLines(stdout: string): Set<string> {
  const lines = new Set<string>();
  for (const line of stdout.split('\n')) {
    const trimmed = line.trim();
    if (trimmed !== '') {
      lines.add(trimmed);
    }
  }
  return lines;
}
