/**
 * CLI error handling for commander actions.
 *
 * Lives in the CLI package because it exits the process and writes to
 * stderr; core only turns errors into CommandResults.
 */

import pc from 'picocolors';
import type { CommandResult } from '@modkit/core/types/index.js';
import { handleError, UserCancellationError } from '@modkit/core/utils/errors.js';

function fail(message: string | undefined): never {
  console.error(pc.red(message ?? 'An unknown error occurred'));
  process.exit(1);
}

/**
 * Wraps an async action: errors are printed and the process exits with 1.
 * A cancelled prompt exits quietly with 0.
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      if (error instanceof UserCancellationError) {
        process.exit(0);
      }
      fail(handleError(error).error);
    }
  };
}

/**
 * Exit with 1 when a pipeline reported failure.
 */
export function exitOnFailure(result: CommandResult): void {
  if (!result.success) {
    fail(result.error);
  }
}
