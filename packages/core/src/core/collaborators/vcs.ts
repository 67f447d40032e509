import { logger } from '../../utils/logger.js';
import { VcsError } from '../../utils/errors.js';
import { describeProcessFailure, runProcess, type ProcessRunner } from './process.js';

export interface CommitOptions {
  /** Fold the staged changes into the previous commit, keeping its message */
  amend?: boolean;
}

/**
 * Version control operations used by packaging, publish, upload and download.
 * `repository` arguments are working-tree roots.
 */
export interface VersionControl {
  discover(path: string): Promise<string | undefined>;
  init(path: string): Promise<string>;
  clone(url: string, destination: string): Promise<string>;
  remotes(repository: string): Promise<string[]>;
  addRemote(repository: string, name: string, url: string): Promise<void>;
  add(repository: string, paths: string[]): Promise<void>;
  commit(repository: string, message: string, options?: CommitOptions): Promise<void>;
  tag(repository: string, name: string): Promise<void>;
  push(repository: string, remote: string, branch: string): Promise<void>;
}

export class GitVersionControl implements VersionControl {
  constructor(private readonly run: ProcessRunner = runProcess) {}

  private async git(args: string[], cwd?: string): Promise<string> {
    logger.debug(`git ${args.join(' ')}`, { cwd });
    try {
      const { stdout } = await this.run('git', args, cwd);
      return stdout.trim();
    } catch (error) {
      throw new VcsError(describeProcessFailure(error), { args, cwd, error });
    }
  }

  async discover(path: string): Promise<string | undefined> {
    try {
      const root = await this.git(['rev-parse', '--show-toplevel'], path);
      return root || undefined;
    } catch (error) {
      // Not a repository (or a bare one): there is no working tree to report
      logger.debug(`No git working tree at ${path}`, { error });
      return undefined;
    }
  }

  async init(path: string): Promise<string> {
    await this.git(['init'], path);
    return path;
  }

  async clone(url: string, destination: string): Promise<string> {
    await this.git(['clone', url, destination]);
    return destination;
  }

  async remotes(repository: string): Promise<string[]> {
    const output = await this.git(['remote'], repository);
    return output.split('\n').map(line => line.trim()).filter(Boolean);
  }

  async addRemote(repository: string, name: string, url: string): Promise<void> {
    await this.git(['remote', 'add', name, url], repository);
  }

  async add(repository: string, paths: string[]): Promise<void> {
    if (paths.length === 0) {
      return;
    }
    await this.git(['add', '--', ...paths], repository);
  }

  async commit(repository: string, message: string, options: CommitOptions = {}): Promise<void> {
    const args = options.amend
      ? ['commit', '--amend', '--no-edit']
      : ['commit', '-m', message];
    await this.git(args, repository);
  }

  async tag(repository: string, name: string): Promise<void> {
    await this.git(['tag', name], repository);
  }

  async push(repository: string, remote: string, branch: string): Promise<void> {
    await this.git(['push', '-u', remote, branch], repository);
  }
}
