/**
 * Console Output Adapter (Default/CI)
 *
 * Plain console.log-based implementation of OutputPort.
 */

import type { OutputPort, UnifiedSpinner } from './output.js';

export const consoleOutput: OutputPort = {
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
    console.log(`✓ ${message}`);
  },

  error(message: string): void {
    console.log(`✗ ${message}`);
  },

  warn(message: string): void {
    console.log(`⚠ ${message}`);
  },

  note(content: string, title?: string): void {
    console.log(title ? `\n${title}\n${content}` : `\n${content}`);
  },

  async confirm(_message: string, options?: { initial?: boolean }): Promise<boolean> {
    // Non-interactive: take the default
    return options?.initial ?? false;
  },

  spinner(): UnifiedSpinner {
    let msg = '';
    return {
      start(message: string) {
        msg = message;
        console.log(`… ${message}`);
      },
      stop(finalMessage?: string) {
        console.log(`✓ ${finalMessage ?? msg}`);
      },
      message(text: string) {
        msg = text;
      }
    };
  }
};

/**
 * Output adapter that records everything instead of printing.
 */
export interface RecordingOutput extends OutputPort {
  readonly lines: string[];
}

export function createRecordingOutput(confirmAnswer: boolean = false): RecordingOutput {
  const lines: string[] = [];
  return {
    lines,
    info: message => { lines.push(`info: ${message}`); },
    step: message => { lines.push(`step: ${message}`); },
    message: message => { lines.push(message); },
    success: message => { lines.push(`success: ${message}`); },
    error: message => { lines.push(`error: ${message}`); },
    warn: message => { lines.push(`warn: ${message}`); },
    note: (content, title) => { lines.push(title ? `note: ${title}: ${content}` : `note: ${content}`); },
    confirm: async () => confirmAnswer,
    spinner: () => ({
      start: message => { lines.push(`spinner: ${message}`); },
      stop: finalMessage => { lines.push(`spinner done: ${finalMessage ?? ''}`); },
      message: () => undefined
    })
  };
}
