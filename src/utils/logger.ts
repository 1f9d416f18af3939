import chalk from 'chalk';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

const PREFIXES: Record<Exclude<LogLevel, LogLevel.SILENT>, () => string> = {
  [LogLevel.DEBUG]: () => chalk.dim('[DEBUG]'),
  [LogLevel.INFO]: () => chalk.blue('[INFO]'),
  [LogLevel.WARN]: () => chalk.yellow('[WARN]'),
  [LogLevel.ERROR]: () => chalk.red('[ERROR]'),
};

/**
 * Leveled logger. Everything goes to stderr: stdout carries credential
 * helper and askpass answers.
 */
export class Logger {
  constructor(private level: LogLevel = LogLevel.WARN) {}

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  debug(...args: unknown[]): void {
    this.log(LogLevel.DEBUG, args);
  }

  info(...args: unknown[]): void {
    this.log(LogLevel.INFO, args);
  }

  warn(...args: unknown[]): void {
    this.log(LogLevel.WARN, args);
  }

  error(...args: unknown[]): void {
    this.log(LogLevel.ERROR, args);
  }

  private log(level: Exclude<LogLevel, LogLevel.SILENT>, args: unknown[]): void {
    if (this.level <= level) {
      console.error(PREFIXES[level](), ...args);
    }
  }
}

export const logger = new Logger();

// DEBUG=true (or any non-empty value) turns on debug output before --debug is parsed
if (process.env.DEBUG) {
  logger.setLevel(LogLevel.DEBUG);
}
