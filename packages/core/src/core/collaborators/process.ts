import { execFile } from 'child_process';
import { promisify } from 'util';

export const execFileAsync = promisify(execFile);

export interface ProcessOutput {
  stdout: string;
  stderr: string;
}

/**
 * Signature of the process runner the collaborators shell out through.
 * Swappable so tests never spawn anything.
 */
export type ProcessRunner = (command: string, args: string[], cwd?: string) => Promise<ProcessOutput>;

export const runProcess: ProcessRunner = async (command, args, cwd) => {
  const { stdout, stderr } = await execFileAsync(command, args, { cwd, encoding: 'utf8' });
  return { stdout, stderr };
};

/**
 * Best message for a failed spawn: trimmed stderr, else the error message.
 */
export function describeProcessFailure(error: unknown): string {
  if (error && typeof error === 'object' && 'stderr' in error) {
    const stderr = String(error.stderr ?? '').trim();
    if (stderr) {
      return stderr;
    }
  }
  return error instanceof Error ? error.message : String(error);
}
