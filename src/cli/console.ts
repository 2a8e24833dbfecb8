/**
 * Operator Console
 *
 * Line-based local input for a session. Each `read` asks one question and can
 * be cancelled through its signal when a remote event wins the race.
 */

import * as readline from 'node:readline/promises';
import type { Readable, Writable } from 'node:stream';
import type { InputSource } from '../agent/types';

export interface OperatorConsoleOptions {
  input?: Readable;
  output?: Writable;
}

export class OperatorConsole implements InputSource {
  private readonly rl: readline.Interface;
  private readonly output: Writable;
  private closed = false;

  constructor(options: OperatorConsoleOptions = {}) {
    this.output = options.output ?? process.stdout;
    this.rl = readline.createInterface({
      input: options.input ?? process.stdin,
      output: this.output,
      terminal: false,
    });
    this.rl.once('close', () => {
      this.closed = true;
    });
  }

  /**
   * Resolves with the entered line, or null once the signal aborts or input
   * ends.
   */
  async read(prompt: string, signal: AbortSignal): Promise<string | null> {
    if (this.closed || signal.aborted) return null;

    let onClose: (() => void) | undefined;
    const ended = new Promise<null>(resolve => {
      onClose = () => resolve(null);
      this.rl.once('close', onClose);
    });

    try {
      return await Promise.race([this.rl.question(prompt, { signal }), ended]);
    } catch (error) {
      if (signal.aborted || this.closed) return null;
      throw error;
    } finally {
      if (onClose) this.rl.off('close', onClose);
    }
  }

  write(text: string): void {
    this.output.write(`${text}\n`);
  }

  close(): void {
    this.rl.close();
  }
}
