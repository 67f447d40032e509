/**
 * `modkit module add|rm`: standalone modules.
 */

import type { Command } from 'commander';
import { resolveArgumentPath } from '@modkit/core/core/execution-context.js';
import { formatPathForDisplay } from '@modkit/core/utils/formatters.js';
import { openCliSession } from '../cli/context.js';

interface ModuleAddOptions {
  output: string;
}

export async function setupModuleAddCommand(
  source: string,
  identifier: string,
  options: ModuleAddOptions,
  command: Command
): Promise<void> {
  const { context, output, registry } = await openCliSession(command);
  const sourcePath = resolveArgumentPath(context, source);
  const outputLocation = resolveArgumentPath(context, options.output);

  await registry.addModule(sourcePath, identifier, outputLocation);
  output.success(`Added module '${identifier}' (${formatPathForDisplay(sourcePath, context.cwd)})`);
}

export async function setupModuleRemoveCommand(identifier: string, _options: object, command: Command): Promise<void> {
  const { output, registry } = await openCliSession(command);
  await registry.removeModule(identifier);
  output.success(`Removed module '${identifier}'`);
}
