/**
 * CLI Context Factory
 *
 * Builds the ExecutionContext for a command with the CLI's output port,
 * then opens the registry it names.
 */

import type { Command } from 'commander';
import type { ExecutionContext } from '@modkit/core/types/execution-context.js';
import { createExecutionContext } from '@modkit/core/core/execution-context.js';
import type { OutputPort } from '@modkit/core/core/ports/output.js';
import { Registry } from '@modkit/core/core/registry/registry.js';
import { JsonFileRegistryStore } from '@modkit/core/core/registry/store.js';
import { createClackOutput, createPlainOutput } from './clack-output-adapter.js';

export interface GlobalOptions {
  cwd?: string;
  registry?: string;
}

export interface CliSession {
  context: ExecutionContext;
  output: OutputPort;
  registry: Registry;
}

/** Detect whether the current session is interactive (TTY, no CI). */
function detectInteractive(): boolean {
  return process.stdout.isTTY === true && process.env.CI !== 'true';
}

/**
 * Create the context for `command` from the program-wide options.
 */
export async function createCliExecutionContext(command: Command): Promise<ExecutionContext> {
  const { cwd, registry } = command.optsWithGlobals<GlobalOptions>();
  const output = detectInteractive() ? createClackOutput() : createPlainOutput();
  return createExecutionContext({ cwd, registryPath: registry }, output);
}

/**
 * Context plus the loaded registry.
 */
export async function openCliSession(command: Command): Promise<CliSession> {
  const context = await createCliExecutionContext(command);
  const registry = await Registry.load(new JsonFileRegistryStore(context.config.registryPath), {
    defaultBranch: context.config.defaultBranch
  });
  return {
    context,
    output: context.output ?? createPlainOutput(),
    registry
  };
}
