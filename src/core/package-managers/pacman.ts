import { BasePackageManager, outputLines } from './base.js';
import type { CommandSpec } from './command-runner.js';

/**
 * pacman backend (Arch Linux and derivatives).
 *
 * The program alias may be an AUR helper such as paru or yay; both accept
 * pacman's -S and -D operations.
 */
export class PacmanPackageManager extends BasePackageManager {
  readonly name = 'pacman';

  protected get defaultProgram(): string {
    return 'pacman';
  }

  protected get privilegedPrograms(): readonly string[] {
    return ['pacman'];
  }

  protected explicitQuery(): CommandSpec {
    return { command: 'pacman', args: ['-Qqe'] };
  }

  protected parseExplicit(stdout: string): Set<string> {
    return outputLines(stdout);
  }

  protected installCommands(pkgs: string[]): CommandSpec[] {
    return [
      // --needed skips reinstalling (and upgrading) what is already present
      { command: this.program, args: ['-S', '--needed', ...pkgs] },
      { command: this.program, args: ['-D', '--asexplicit', ...pkgs] }
    ];
  }

  protected uninstallCommands(pkgs: string[]): CommandSpec[] {
    return [{ command: this.program, args: ['-D', '--asdeps', ...pkgs] }];
  }
}
