/**
 * `modkit dep add|rm <owner> <dependency>`
 */

import type { Command } from 'commander';
import { describeDependency } from '@modkit/core/core/dependency.js';
import { describeUnitRef } from '@modkit/core/core/registry/unit-ref.js';
import { openCliSession } from '../cli/context.js';
import { parseDependencyArgument, parseUnitArgument } from '../utils/arguments.js';

export async function setupDependencyAddCommand(
  ownerArgument: string,
  dependencyArgument: string,
  _options: object,
  command: Command
): Promise<void> {
  const { context, output, registry } = await openCliSession(command);
  const owner = parseUnitArgument(ownerArgument, context.cwd);
  const dependency = parseDependencyArgument(dependencyArgument, context.cwd);
  const identifier = registry.dependencyIdentifier(dependency);

  await registry.addDependency(owner, identifier, dependency);
  output.success(`${describeUnitRef(owner)} now depends on ${describeDependency(dependency)}`);
}

export async function setupDependencyRemoveCommand(
  ownerArgument: string,
  dependencyArgument: string,
  _options: object,
  command: Command
): Promise<void> {
  const { context, output, registry } = await openCliSession(command);
  const owner = parseUnitArgument(ownerArgument, context.cwd);
  const dependency = parseDependencyArgument(dependencyArgument, context.cwd);
  const identifier = registry.dependencyIdentifier(dependency);

  await registry.removeDependency(owner, identifier, dependency);
  output.success(`${describeUnitRef(owner)} no longer depends on ${describeDependency(dependency)}`);
}
