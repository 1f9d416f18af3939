import chalk from 'chalk';
import { AppError, ErrorCode } from './types';

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

const SYSTEM_ERRORS: Record<string, { code: ErrorCode; message: string }> = {
  ENOENT: { code: ErrorCode.FILE_NOT_FOUND, message: 'File or directory not found' },
  ENOTDIR: { code: ErrorCode.FILE_NOT_FOUND, message: 'A path component is not a directory' },
  EISDIR: { code: ErrorCode.INVALID_INPUT, message: 'Expected a file but found a directory' },
  EACCES: { code: ErrorCode.PERMISSION_DENIED, message: 'Permission denied' },
  EPERM: { code: ErrorCode.PERMISSION_DENIED, message: 'Permission denied' },
  EPIPE: { code: ErrorCode.OUTPUT_FAILED, message: 'Output stream closed' },
};

/**
 * Map Node.js system errors (reading an outcome file, writing an answer to a
 * closed pipe) to app errors.
 */
export function mapSystemError(error: NodeJS.ErrnoException): AppError {
  const known = error.code === undefined ? undefined : SYSTEM_ERRORS[error.code];
  if (known) {
    return new AppError(known.message, known.code, { path: error.path, syscall: error.syscall }, false);
  }
  return new AppError(
    error.message || 'System error',
    ErrorCode.UNKNOWN_ERROR,
    { originalCode: error.code, syscall: error.syscall },
    false,
  );
}

export function toAppError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }
  if (isErrnoException(error)) {
    return mapSystemError(error);
  }
  if (error instanceof Error) {
    return new AppError(error.message, ErrorCode.UNKNOWN_ERROR, { originalError: error.name }, false);
  }
  return new AppError(String(error), ErrorCode.UNKNOWN_ERROR, {}, false);
}

/**
 * Lines printed for a failed command. Details and the stack trace are only
 * included in debug mode; `error.cause` links are listed outermost first.
 */
export function formatError(error: AppError, debug: boolean): string[] {
  const lines = [`${chalk.red.bold('Error:')} ${error.toUserMessage()}`];

  const suggestion = error.getRecoverySuggestion();
  if (suggestion) {
    lines.push(`${chalk.yellow('Hint:')} ${suggestion}`);
  }

  if (!debug) {
    lines.push(chalk.dim('Run with --debug for detailed error information'));
    return lines;
  }

  lines.push(chalk.dim(`  Error Code: ${error.code}`));
  lines.push(chalk.dim(`  Technical Message: ${error.message}`));

  const details = Object.entries(error.details ?? {}).filter(([, value]) => value !== undefined);
  for (const [key, value] of details) {
    lines.push(chalk.dim(`  ${key}: ${value}`));
  }

  let cause: unknown = error.cause;
  while (cause !== undefined) {
    lines.push(chalk.dim(`  Caused by: ${cause instanceof Error ? cause.message : String(cause)}`));
    cause = cause instanceof Error ? cause.cause : undefined;
  }

  if (error.stack) {
    lines.push(chalk.dim(error.stack));
  }
  return lines;
}

/**
 * Print a failed command's error on stderr.
 */
export function handleError(error: unknown, debug: boolean = false): void {
  for (const line of formatError(toAppError(error), debug)) {
    console.error(line);
  }
}
