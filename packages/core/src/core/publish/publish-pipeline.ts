import type { Registry } from '../registry/registry.js';
import { formatVersion } from '../version.js';
import { resolveOutput } from '../ports/resolve.js';
import { handleError } from '../../utils/errors.js';
import { formatCount, formatPackageLabel, formatPathForDisplay } from '../../utils/formatters.js';
import { logger } from '../../utils/logger.js';
import type {
  DownloadData,
  PipelineOptions,
  PublishData,
  PublishOptions,
  PublishResult,
  UploadData
} from './publish-types.js';

/**
 * Bump a package's version, then commit and tag it.
 */
export async function runPublishPipeline(
  registry: Registry,
  packageId: string,
  options: PublishOptions
): Promise<PublishResult> {
  const out = resolveOutput(options);
  const previousVersion = registry.getPackage(packageId)?.version;
  const spinner = out.spinner();
  spinner.start(`Publishing ${packageId} (${options.increment} bump)`);

  try {
    const version = await registry.publish(packageId, options.increment);
    const label = formatVersion(version);
    spinner.stop(`Published ${formatPackageLabel(packageId, label)}`);

    const data: PublishData = {
      packageId,
      version: label,
      previousVersion: previousVersion ? formatVersion(previousVersion) : label
    };
    logger.debug('Publish finished', data);
    return { success: true, data };
  } catch (error) {
    spinner.stop(`Publishing ${packageId} failed`);
    return handleError(error);
  }
}

/**
 * Push a package to its remote, recording `remoteUrl` if it has none.
 */
export async function runUploadPipeline(
  registry: Registry,
  packageId: string,
  remoteUrl: string | undefined,
  options: PipelineOptions = {}
): Promise<PublishResult<UploadData>> {
  const out = resolveOutput(options);
  const spinner = out.spinner();
  spinner.start(`Uploading ${packageId}`);

  try {
    const remoteLocation = await registry.upload(packageId, remoteUrl);
    spinner.stop(`Uploaded ${packageId} to ${remoteLocation}`);
    return { success: true, data: { packageId, remoteLocation } };
  } catch (error) {
    spinner.stop(`Uploading ${packageId} failed`);
    return handleError(error);
  }
}

/**
 * Clone a package repository into `destination` and register it.
 */
export async function runDownloadPipeline(
  registry: Registry,
  url: string,
  destination: string,
  options: PipelineOptions = {}
): Promise<PublishResult<DownloadData>> {
  const out = resolveOutput(options);
  const spinner = out.spinner();
  spinner.start(`Downloading ${url}`);

  try {
    const pkg = await registry.download(url, destination);
    const data: DownloadData = {
      packageId: pkg.identifier,
      root: pkg.root,
      version: formatVersion(pkg.version),
      moduleCount: pkg.listModules().length
    };
    spinner.stop(`Downloaded ${formatPackageLabel(data.packageId, data.version)}`);
    out.info(`Location: ${formatPathForDisplay(data.root, options.cwd)}`);
    out.info(`Contains ${formatCount(data.moduleCount, 'module')}`);
    return { success: true, data };
  } catch (error) {
    spinner.stop(`Downloading ${url} failed`);
    return handleError(error);
  }
}
