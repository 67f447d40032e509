/**
 * Clack Output Adapter
 *
 * CLI implementations of the core OutputPort: @clack/prompts for
 * interactive terminals, plain console output with an ora spinner otherwise.
 */

import { log, spinner as clackSpinner, confirm as clackConfirm, note as clackNote, isCancel, cancel } from '@clack/prompts';
import pc from 'picocolors';
import type { OutputPort, UnifiedSpinner } from '@modkit/core/core/ports/output.js';
import { UserCancellationError } from '@modkit/core/utils/errors.js';
import { Spinner } from '../utils/spinner.js';

/**
 * Create a Clack-based OutputPort for interactive terminal sessions.
 */
export function createClackOutput(): OutputPort {
  return {
    info(message: string): void {
      log.info(message);
    },

    step(message: string): void {
      log.step(message);
    },

    message(message: string): void {
      log.message(message);
    },

    success(message: string): void {
      log.success(message);
    },

    error(message: string): void {
      log.error(message);
    },

    warn(message: string): void {
      log.warn(message);
    },

    note(content: string, title?: string): void {
      clackNote(content, title ?? '');
    },

    async confirm(message: string, options?: { initial?: boolean }): Promise<boolean> {
      const result = await clackConfirm({
        message,
        initialValue: options?.initial ?? false
      });
      if (isCancel(result)) {
        cancel('Operation cancelled.');
        throw new UserCancellationError();
      }
      return result;
    },

    spinner(): UnifiedSpinner {
      const s = clackSpinner();
      let isStarted = false;

      return {
        start(message: string) {
          if (!isStarted) {
            s.start(message);
            isStarted = true;
          }
        },
        stop(finalMessage?: string) {
          if (isStarted) {
            s.stop(finalMessage);
            isStarted = false;
          }
        },
        message(text: string) {
          if (isStarted) {
            s.message(text);
          }
        }
      };
    }
  };
}

/**
 * Create a plain console OutputPort for non-interactive sessions (CI, piped output).
 */
export function createPlainOutput(): OutputPort {
  return {
    info(message: string): void {
      console.log(message);
    },

    step(message: string): void {
      console.log(message);
    },

    message(message: string): void {
      console.log(message);
    },

    success(message: string): void {
      console.log(`${pc.green('✓')} ${message}`);
    },

    error(message: string): void {
      console.error(`${pc.red('✗')} ${message}`);
    },

    warn(message: string): void {
      console.warn(`${pc.yellow('⚠')} ${message}`);
    },

    note(content: string, title?: string): void {
      console.log(title ? `\n${pc.bold(title)}\n${content}` : `\n${content}`);
    },

    async confirm(_message: string, options?: { initial?: boolean }): Promise<boolean> {
      // No terminal to ask on: take the default
      return options?.initial ?? false;
    },

    spinner(): UnifiedSpinner {
      let s: Spinner | null = null;

      return {
        start(message: string) {
          s = new Spinner(message);
          s.start();
        },
        stop(finalMessage?: string) {
          if (s) {
            if (finalMessage) {
              s.succeed(finalMessage);
            } else {
              s.stop();
            }
            s = null;
          }
        },
        message(text: string) {
          s?.update(text);
        }
      };
    }
  };
}
