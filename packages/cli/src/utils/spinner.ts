/**
 * ora-backed spinner used by the plain output adapter.
 */

import ora, { type Ora } from 'ora';

export class Spinner {
  private readonly spinner: Ora;

  constructor(message: string = 'Working...') {
    // Animates on stderr only when stderr is a terminal
    this.spinner = ora({ text: message, spinner: 'dots', isEnabled: process.stderr.isTTY === true });
  }

  start(): void {
    this.spinner.start();
  }

  update(message: string): void {
    this.spinner.text = message;
  }

  /**
   * Stop and clear the line
   */
  stop(): void {
    this.spinner.stop();
  }

  succeed(message: string): void {
    this.spinner.succeed(message);
  }
}
