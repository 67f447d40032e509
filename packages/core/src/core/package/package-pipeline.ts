import type { CommandResult, LanguageConfig } from '../../types/index.js';
import type { Registry } from '../registry/registry.js';
import type { PipelineOptions } from '../publish/publish-types.js';
import type { OutputPort } from '../ports/output.js';
import { resolveOutput } from '../ports/resolve.js';
import { handleError } from '../../utils/errors.js';
import { formatCount, formatPathForDisplay } from '../../utils/formatters.js';

export interface CreatePackageData {
  packageId: string;
  root: string;
  modules: string[];
}

export interface BuildPackageData {
  packageId: string;
  modules: string[];
}

export interface CreatePackageOptions extends PipelineOptions {
  /** Compile the new package right after promoting its modules */
  build?: boolean;
}

/**
 * Promote the standalone modules under `root` into a new package.
 *
 * With `build` set the package is compiled as well; a compiler failure is
 * reported as a failed result, but the package stays registered.
 */
export async function runCreatePackagePipeline(
  registry: Registry,
  packageId: string,
  root: string,
  language: LanguageConfig,
  options: CreatePackageOptions = {}
): Promise<CommandResult<CreatePackageData>> {
  const out = resolveOutput(options);
  try {
    const pkg = await registry.package(packageId, root, language);
    const modules = pkg.listModules().map(module => module.identifier);
    out.success(`Created package '${packageId}' at ${formatPathForDisplay(root, options.cwd)}`);
    out.info(`Promoted ${formatCount(modules.length, 'module')}: ${modules.join(', ')}`);
    if (options.build) {
      await buildWithSpinner(out, registry, packageId, modules);
    }
    return { success: true, data: { packageId, root: pkg.root, modules } };
  } catch (error) {
    return handleError(error);
  }
}

/**
 * Compile every module of a package with the package's compiler.
 */
export async function runBuildPipeline(
  registry: Registry,
  packageId: string,
  options: PipelineOptions = {}
): Promise<CommandResult<BuildPackageData>> {
  const out = resolveOutput(options);
  const modules = registry.getPackage(packageId)?.listModules().map(module => module.identifier) ?? [];

  try {
    await buildWithSpinner(out, registry, packageId, modules);
    return { success: true, data: { packageId, modules } };
  } catch (error) {
    return handleError(error);
  }
}

async function buildWithSpinner(out: OutputPort, registry: Registry, packageId: string, modules: string[]): Promise<void> {
  const spinner = out.spinner();
  spinner.start(`Building ${packageId}`);
  try {
    await registry.build(packageId);
  } catch (error) {
    spinner.stop(`Building ${packageId} failed`);
    throw error;
  }
  spinner.stop(`Built ${packageId} (${formatCount(modules.length, 'module')})`);
}
