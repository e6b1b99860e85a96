export { BasePackageManager, type PackageManagerOptions } from './base.js';
export { PacmanPackageManager } from './pacman.js';
export { AptPackageManager } from './apt.js';
export { createCommandRunner, formatCommand, type CommandRunner, type CommandSpec } from './command-runner.js';
export { createPackageManager, detectPackageManagerName, findExecutable, resolvePackageManager } from './detect.js';
