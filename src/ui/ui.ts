/**
 * The interaction surface shared by every part of refsync that talks to the
 * user: prompts, labeled diagnostics and the progress display.
 *
 * Prompts are drawn on stderr so stdout stays free for answers consumed by
 * git (credential helper and askpass output).
 */

import chalk from 'chalk';
import inquirer from 'inquirer';
import { Writable } from 'stream';
import * as tty from 'tty';

import { AppError, ErrorCode } from '../errors/types';
import { ProgressOutput, SpinnerProgressOutput } from './progress';

type Colors = InstanceType<typeof chalk.Instance>;

export type OutputLabel = 'warning' | 'hint' | 'error' | 'branch';

export interface UiOptions {
  stdout?: Writable;
  stderr?: Writable;
  /** Defaults to chalk's own color detection. */
  color?: boolean;
  /** Suppress status messages and the progress display. */
  quiet?: boolean;
  /** Defaults to stdin and stderr both being terminals. */
  interactive?: boolean;
  /** Defaults to stderr being a terminal. */
  progress?: boolean;
}

function isTTY(stream: Writable | NodeJS.ReadStream): boolean {
  return 'isTTY' in stream && stream.isTTY === true;
}

export class Ui {
  private readonly out: Writable;
  private readonly err: Writable;
  private readonly colors: Colors;
  private readonly quiet: boolean;
  private readonly interactive: boolean;
  private readonly showProgress: boolean;
  private promptModule: inquirer.PromptModule | null = null;

  constructor(options: UiOptions = {}) {
    this.out = options.stdout ?? process.stdout;
    this.err = options.stderr ?? process.stderr;
    this.colors = options.color === false ? new chalk.Instance({ level: 0 }) : chalk;
    this.quiet = options.quiet ?? false;
    this.interactive = options.interactive ?? (isTTY(process.stdin) && isTTY(this.err));
    this.showProgress = options.progress ?? isTTY(this.err);
  }

  isInteractive(): boolean {
    return this.interactive;
  }

  /** Ask for a line of plaintext input. */
  async prompt(message: string): Promise<string> {
    return this.ask('input', message);
  }

  /** Ask for a line of input without echoing it. */
  async promptPassword(message: string): Promise<string> {
    return this.ask('password', message);
  }

  /** Style `text` for the given label. */
  label(label: OutputLabel, text: string): string {
    switch (label) {
      case 'warning':
        return this.colors.yellow(text);
      case 'hint':
        return this.colors.cyan(text);
      case 'error':
        return this.colors.red(text);
      case 'branch':
        return this.colors.magenta(text);
    }
  }

  stdout(text: string): Promise<void> {
    return this.write(this.out, text);
  }

  stderr(text: string): Promise<void> {
    return this.write(this.err, text);
  }

  /** Informational message on stderr, dropped in quiet mode. */
  status(text: string): Promise<void> {
    if (this.quiet) {
      return Promise.resolve();
    }
    return this.write(this.err, text);
  }

  warning(text: string): Promise<void> {
    return this.write(this.err, this.label('warning', text));
  }

  hint(text: string): Promise<void> {
    return this.write(this.err, this.label('hint', text));
  }

  /**
   * Progress display, or undefined when progress cannot be shown (stderr is
   * not a terminal, or quiet mode).
   */
  progressOutput(): ProgressOutput | undefined {
    if (this.quiet || !this.showProgress) {
      return undefined;
    }
    return new SpinnerProgressOutput(this.err);
  }

  private async ask(type: 'input' | 'password', message: string): Promise<string> {
    if (!this.interactive) {
      throw new AppError(
        `Cannot prompt for "${message.trim()}" without a terminal`,
        ErrorCode.NOT_INTERACTIVE,
        {},
        false,
      );
    }

    const output = this.promptOutput();
    if (!output) {
      throw new AppError(
        `Cannot prompt for "${message.trim()}": stderr is not a terminal`,
        ErrorCode.NOT_INTERACTIVE,
        {},
        false,
      );
    }

    if (!this.promptModule) {
      this.promptModule = inquirer.createPromptModule({ output });
    }

    try {
      const answers = await this.promptModule<{ value: string }>([
        type === 'password'
          ? { type: 'password', name: 'value', message, mask: '*' }
          : { type: 'input', name: 'value', message },
      ]);
      return answers.value;
    } catch (error) {
      throw new AppError(
        `Prompt failed: ${error instanceof Error ? error.message : String(error)}`,
        ErrorCode.PROMPT_FAILED,
        {},
        false,
        error,
      );
    }
  }

  /**
   * The Ui's stderr, when inquirer can draw on it: a terminal stream, or the
   * process stderr itself.
   */
  private promptOutput(): NodeJS.WriteStream | undefined {
    if (this.err instanceof tty.WriteStream) {
      return this.err;
    }
    if (this.err === process.stderr) {
      return process.stderr;
    }
    return undefined;
  }

  private write(stream: Writable, text: string): Promise<void> {
    return new Promise((resolve, reject) => {
      stream.write(text, (error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }
}
