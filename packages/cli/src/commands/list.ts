/**
 * `modkit list`: everything in the registry as a tree.
 */

import type { Command } from 'commander';
import pc from 'picocolors';
import { buildRegistryReport, renderRegistryTree } from '@modkit/core/core/list/list-pipeline.js';
import { formatPathForDisplay } from '@modkit/core/utils/formatters.js';
import { openCliSession } from '../cli/context.js';

export async function setupListCommand(_options: object, command: Command): Promise<void> {
  const { context, registry } = await openCliSession(command);
  const report = buildRegistryReport(registry);

  console.log(pc.dim(`Registry: ${formatPathForDisplay(report.location, context.cwd)}`));
  const lines = renderRegistryTree(report, context.cwd);
  if (lines.length === 0) {
    console.log(pc.dim('The registry is empty.'));
    return;
  }
  for (const line of lines) {
    console.log(/^(Modules|Executables|Packages) \(/.test(line) ? pc.bold(line) : line);
  }
}
