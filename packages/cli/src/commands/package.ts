/**
 * `modkit pkg ...`: packaging, build and distribution.
 */

import type { Command } from 'commander';
import { resolveArgumentPath } from '@modkit/core/core/execution-context.js';
import { runBuildPipeline, runCreatePackagePipeline } from '@modkit/core/core/package/package-pipeline.js';
import {
  runDownloadPipeline,
  runPublishPipeline,
  runUploadPipeline
} from '@modkit/core/core/publish/publish-pipeline.js';
import { isVersionIncrement, VERSION_INCREMENTS } from '@modkit/core/core/version.js';
import { ValidationError } from '@modkit/core/utils/errors.js';
import { openCliSession } from '../cli/context.js';
import { exitOnFailure } from '../utils/error-handling.js';

interface CreateOptions {
  compiler?: string;
  outputOption?: string;
  build?: boolean;
}

interface RemoveOptions {
  yes?: boolean;
}

interface PublishCommandOptions {
  bump: string;
}

export async function setupPackageCreateCommand(
  identifier: string,
  root: string,
  options: CreateOptions,
  command: Command
): Promise<void> {
  const { context, output, registry } = await openCliSession(command);
  const language = {
    compilerCommand: options.compiler ?? context.config.language.compilerCommand,
    outputOption: options.outputOption ?? context.config.language.outputOption
  };
  const result = await runCreatePackagePipeline(
    registry,
    identifier,
    resolveArgumentPath(context, root),
    language,
    { output, cwd: context.cwd, build: options.build }
  );
  exitOnFailure(result);
}

export async function setupPackageRemoveCommand(identifier: string, options: RemoveOptions, command: Command): Promise<void> {
  const { output, registry } = await openCliSession(command);
  const confirmed = options.yes || await output.confirm(
    `Remove package '${identifier}' and every dependency on its modules?`,
    { initial: false }
  );
  if (!confirmed) {
    output.info('Nothing removed (pass --yes to skip the question)');
    return;
  }
  await registry.removePackage(identifier);
  output.success(`Removed package '${identifier}'`);
}

export async function setupPackageBuildCommand(identifier: string, _options: object, command: Command): Promise<void> {
  const { context, output, registry } = await openCliSession(command);
  exitOnFailure(await runBuildPipeline(registry, identifier, { output, cwd: context.cwd }));
}

export async function setupPackagePublishCommand(
  identifier: string,
  options: PublishCommandOptions,
  command: Command
): Promise<void> {
  const increment = options.bump;
  if (!isVersionIncrement(increment)) {
    throw new ValidationError(`--bump must be one of ${VERSION_INCREMENTS.join(', ')}; got '${increment}'`);
  }
  const { context, output, registry } = await openCliSession(command);
  exitOnFailure(await runPublishPipeline(registry, identifier, { increment, output, cwd: context.cwd }));
}

export async function setupPackageUploadCommand(
  identifier: string,
  url: string | undefined,
  _options: object,
  command: Command
): Promise<void> {
  const { context, output, registry } = await openCliSession(command);
  exitOnFailure(await runUploadPipeline(registry, identifier, url, { output, cwd: context.cwd }));
}

export async function setupPackageDownloadCommand(
  url: string,
  destination: string | undefined,
  _options: object,
  command: Command
): Promise<void> {
  const { context, output, registry } = await openCliSession(command);
  const target = destination ? resolveArgumentPath(context, destination) : context.cwd;
  exitOnFailure(await runDownloadPipeline(registry, url, target, { output, cwd: context.cwd }));
}
