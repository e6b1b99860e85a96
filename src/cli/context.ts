/**
 * CLI Context Factory
 *
 * Creates ExecutionContext instances with the CLI's output adapter injected.
 * Command handlers use this instead of calling createExecutionContext()
 * directly.
 */

import type { Command } from 'commander';
import type { ExecutionContext, ExecutionOptions } from '../types/execution-context.js';
import { createExecutionContext } from '../core/execution-context.js';
import { createClackOutput, createPlainOutput } from './clack-output-adapter.js';
import type { OutputPort } from '../core/ports/index.js';

export interface CliContextOptions extends ExecutionOptions {
  /** Override interactive mode detection (undefined = auto-detect from TTY) */
  interactive?: boolean;
}

/** Detect whether the current session is interactive (TTY, no CI). */
export function detectInteractive(override?: boolean): boolean {
  if (override !== undefined) return override;
  const isTTY = process.stdout.isTTY === true;
  return isTTY && process.env.CI !== 'true';
}

let cachedClackOutput: OutputPort | undefined;

export function getCliOutput(interactive?: boolean): OutputPort {
  if (detectInteractive(interactive)) {
    cachedClackOutput ??= createClackOutput();
    return cachedClackOutput;
  }
  return createPlainOutput();
}

/**
 * Create an ExecutionContext with the CLI output adapter injected.
 */
export async function createCliExecutionContext(options: CliContextOptions = {}): Promise<ExecutionContext> {
  return createExecutionContext({
    ...options,
    output: options.output ?? getCliOutput(options.interactive)
  });
}

/**
 * Context for a subcommand, honouring the program-level --root option.
 */
export async function createCommandContext(command: Command): Promise<ExecutionContext> {
  const programOpts = command.parent?.opts<{ root?: string }>() ?? {};
  return createCliExecutionContext({ root: programOpts.root });
}
