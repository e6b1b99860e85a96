import { BasePackageManager, outputLines } from './base.js';
import type { CommandSpec } from './command-runner.js';

/**
 * apt backend (Debian, Ubuntu and derivatives).
 *
 * Installs go through apt-get (or the configured alias); manual/auto marks
 * always go through apt-mark.
 */
export class AptPackageManager extends BasePackageManager {
  readonly name = 'apt';

  protected get defaultProgram(): string {
    return 'apt-get';
  }

  protected get privilegedPrograms(): readonly string[] {
    return ['apt-get', 'apt', 'apt-mark'];
  }

  protected explicitQuery(): CommandSpec {
    return { command: 'apt-mark', args: ['showmanual'] };
  }

  protected parseExplicit(stdout: string): Set<string> {
    return outputLines(stdout);
  }

  protected installCommands(pkgs: string[]): CommandSpec[] {
    return [
      { command: this.program, args: ['install', '--no-upgrade', '-y', ...pkgs] },
      { command: 'apt-mark', args: ['manual', ...pkgs] }
    ];
  }

  protected uninstallCommands(pkgs: string[]): CommandSpec[] {
    return [{ command: 'apt-mark', args: ['auto', ...pkgs] }];
  }
}
