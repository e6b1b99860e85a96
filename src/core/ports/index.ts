/**
 * Core Ports
 *
 * Re-exports all port interfaces and default implementations.
 * These ports define the boundary between core business logic
 * and external concerns (terminal output, the OS package manager).
 */

export type { OutputPort } from './output.js';
export type { PackageManagerPort } from './package-manager.js';
export { consoleOutput } from './console-output.js';
export { resolveOutput } from './resolve.js';
