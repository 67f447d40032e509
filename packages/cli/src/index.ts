import { Command } from 'commander';
import { logger } from '@modkit/core/utils/logger.js';
import { DEFAULTS } from '@modkit/core/constants/index.js';
import { LogLevel } from '@modkit/core/types/index.js';
import { withErrorHandling } from './utils/error-handling.js';
import { getVersion } from './utils/package-info.js';

/**
 * modkit CLI - Main entry point
 *
 * Command handlers are loaded with import() when their command runs.
 */

const program = new Command();

program
  .name('modkit')
  .description('modkit - registry and packaging for compiled modules')
  .version(getVersion())
  .option('--cwd <dir>', 'set working directory')
  .option('--registry <path>', 'registry file to use (default: ~/.modkit/registry.json)')
  .option('--verbose', 'log debug output to stderr')
  .configureHelp({ sortSubcommands: true })
  .showHelpAfterError();

program.hook('preAction', () => {
  if (program.opts().verbose) {
    logger.setLevel(LogLevel.DEBUG);
  }
});

// === STANDALONE MODULES ===

const moduleCommand = program
  .command('module')
  .description('Register and remove standalone modules');

moduleCommand
  .command('add')
  .argument('<source>', 'module source file')
  .argument('<identifier>', 'module identifier')
  .requiredOption('-o, --output <dir>', 'existing directory the compiled module is written to')
  .description('Register a standalone module')
  .action(withErrorHandling(async (source: string, identifier: string, options: { output: string }, command: Command) => {
    const { setupModuleAddCommand } = await import('./commands/module.js');
    await setupModuleAddCommand(source, identifier, options, command);
  }));

moduleCommand
  .command('rm')
  .alias('remove')
  .argument('<identifier>', 'module identifier')
  .description('Remove a module and every dependency on it')
  .action(withErrorHandling(async (identifier: string, options: object, command: Command) => {
    const { setupModuleRemoveCommand } = await import('./commands/module.js');
    await setupModuleRemoveCommand(identifier, options, command);
  }));

// === EXECUTABLES ===

const executableCommand = program
  .command('exec')
  .description('Register and remove executables');

executableCommand
  .command('add')
  .argument('<source>', 'program source file')
  .description('Register an executable (no-op when already registered)')
  .action(withErrorHandling(async (source: string, options: object, command: Command) => {
    const { setupExecutableAddCommand } = await import('./commands/executable.js');
    await setupExecutableAddCommand(source, options, command);
  }));

executableCommand
  .command('rm')
  .alias('remove')
  .argument('<source>', 'program source file')
  .description('Remove an executable')
  .action(withErrorHandling(async (source: string, options: object, command: Command) => {
    const { setupExecutableRemoveCommand } = await import('./commands/executable.js');
    await setupExecutableRemoveCommand(source, options, command);
  }));

// === DEPENDENCIES ===

const dependencyCommand = program
  .command('dep')
  .description('Add and remove dependency edges');

dependencyCommand
  .command('add')
  .argument('<owner>', 'module:<id>, exec:<path> or pkg:<package>/<module>')
  .argument('<dependency>', 'standalone:<path>, package:<package>/<module> or stray:<id>=<path>')
  .description('Make <owner> depend on <dependency>')
  .action(withErrorHandling(async (owner: string, dependency: string, options: object, command: Command) => {
    const { setupDependencyAddCommand } = await import('./commands/dependency.js');
    await setupDependencyAddCommand(owner, dependency, options, command);
  }));

dependencyCommand
  .command('rm')
  .alias('remove')
  .argument('<owner>', 'module:<id>, exec:<path> or pkg:<package>/<module>')
  .argument('<dependency>', 'standalone:<path>, package:<package>/<module> or stray:<id>=<path>')
  .description('Remove the dependency of <owner> on <dependency>')
  .action(withErrorHandling(async (owner: string, dependency: string, options: object, command: Command) => {
    const { setupDependencyRemoveCommand } = await import('./commands/dependency.js');
    await setupDependencyRemoveCommand(owner, dependency, options, command);
  }));

// === PACKAGES ===

const packageCommand = program
  .command('pkg')
  .alias('package')
  .description('Create, build and distribute packages');

packageCommand
  .command('create')
  .argument('<identifier>', 'package identifier')
  .argument('<root>', 'package root; every module registered below it joins the package')
  .option('--compiler <command>', 'compiler command (default from config)')
  .option('--output-option <flag>', 'compiler flag preceding the output path (default from config)')
  .option('--build', 'compile the package once it is created')
  .description('Promote the standalone modules under <root> into a package')
  .action(withErrorHandling(async (identifier: string, root: string, options: { compiler?: string; outputOption?: string; build?: boolean }, command: Command) => {
    const { setupPackageCreateCommand } = await import('./commands/package.js');
    await setupPackageCreateCommand(identifier, root, options, command);
  }));

packageCommand
  .command('rm')
  .alias('remove')
  .argument('<identifier>', 'package identifier')
  .option('-y, --yes', 'skip the confirmation')
  .description('Remove a package and every dependency on its modules')
  .action(withErrorHandling(async (identifier: string, options: { yes?: boolean }, command: Command) => {
    const { setupPackageRemoveCommand } = await import('./commands/package.js');
    await setupPackageRemoveCommand(identifier, options, command);
  }));

packageCommand
  .command('build')
  .argument('<identifier>', 'package identifier')
  .description('Compile every module of a package')
  .action(withErrorHandling(async (identifier: string, options: object, command: Command) => {
    const { setupPackageBuildCommand } = await import('./commands/package.js');
    await setupPackageBuildCommand(identifier, options, command);
  }));

packageCommand
  .command('publish')
  .argument('<identifier>', 'package identifier')
  .option('--bump <increment>', 'major, minor or patch', 'patch')
  .description('Bump the version, commit and tag it')
  .action(withErrorHandling(async (identifier: string, options: { bump: string }, command: Command) => {
    const { setupPackagePublishCommand } = await import('./commands/package.js');
    await setupPackagePublishCommand(identifier, options, command);
  }));

packageCommand
  .command('upload')
  .argument('<identifier>', 'package identifier')
  .argument('[url]', 'remote to record when the package has none')
  .description(`Push a package to its remote (branch from config, default ${DEFAULTS.BRANCH})`)
  .action(withErrorHandling(async (identifier: string, url: string | undefined, options: object, command: Command) => {
    const { setupPackageUploadCommand } = await import('./commands/package.js');
    await setupPackageUploadCommand(identifier, url, options, command);
  }));

packageCommand
  .command('download')
  .argument('<url>', 'git remote of a package')
  .argument('[dest]', 'directory to clone into (default: working directory)')
  .description('Clone a package and register it')
  .action(withErrorHandling(async (url: string, destination: string | undefined, options: object, command: Command) => {
    const { setupPackageDownloadCommand } = await import('./commands/package.js');
    await setupPackageDownloadCommand(url, destination, options, command);
  }));

// === INSPECTION ===

program
  .command('list')
  .alias('ls')
  .description('Show modules, executables and packages with their dependencies')
  .action(withErrorHandling(async (options: object, command: Command) => {
    const { setupListCommand } = await import('./commands/list.js');
    await setupListCommand(options, command);
  }));

/**
 * Main execution function
 */
export async function run(argv: string[] = process.argv): Promise<void> {
  if (argv.length <= 2) {
    program.outputHelp();
    return;
  }
  await program.parseAsync(argv);
}

run().catch((error: unknown) => {
  logger.error('Fatal error in main execution', { error });
  console.error('Fatal error occurred. Exiting.');
  process.exit(1);
});

export { program };
