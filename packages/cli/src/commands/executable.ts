/**
 * `modkit exec add|rm`: executables, keyed by source path.
 */

import type { Command } from 'commander';
import { resolveArgumentPath } from '@modkit/core/core/execution-context.js';
import { formatPathForDisplay } from '@modkit/core/utils/formatters.js';
import { openCliSession } from '../cli/context.js';

export async function setupExecutableAddCommand(source: string, _options: object, command: Command): Promise<void> {
  const { context, output, registry } = await openCliSession(command);
  const sourcePath = resolveArgumentPath(context, source);
  const alreadyKnown = registry.hasExecutable(sourcePath);

  await registry.addExecutable(sourcePath);
  const display = formatPathForDisplay(sourcePath, context.cwd);
  if (alreadyKnown) {
    output.info(`Executable ${display} is already registered`);
  } else {
    output.success(`Added executable ${display}`);
  }
}

export async function setupExecutableRemoveCommand(source: string, _options: object, command: Command): Promise<void> {
  const { context, output, registry } = await openCliSession(command);
  const sourcePath = resolveArgumentPath(context, source);
  await registry.removeExecutable(sourcePath);
  output.success(`Removed executable ${formatPathForDisplay(sourcePath, context.cwd)}`);
}
