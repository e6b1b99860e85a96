/**
 * Port Resolution Helpers
 *
 * Resolve the OutputPort from an ExecutionContext, falling back to
 * plain console output when none was provided.
 */

import type { ExecutionContext } from '../../types/execution-context.js';
import type { OutputPort } from './output.js';
import { consoleOutput } from './console-output.js';

export function resolveOutput(ctx?: ExecutionContext | { output?: OutputPort }): OutputPort {
  return ctx?.output ?? consoleOutput;
}
