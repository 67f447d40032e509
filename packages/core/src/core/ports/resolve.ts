/**
 * Port Resolution Helpers
 */

import type { ExecutionContext } from '../../types/execution-context.js';
import type { OutputPort } from './output.js';
import { consoleOutput } from './console-output.js';

/**
 * Resolve the OutputPort from an ExecutionContext.
 * Falls back to consoleOutput (plain console.log) if not provided.
 */
export function resolveOutput(ctx?: ExecutionContext | { output?: OutputPort }): OutputPort {
  return ctx?.output ?? consoleOutput;
}
