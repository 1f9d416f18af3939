/**
 * Failure categories reported by refsync commands.
 */
export enum ErrorCode {
  // Credentials
  CREDENTIAL_UNAVAILABLE = 'CREDENTIAL_UNAVAILABLE',
  NOT_INTERACTIVE = 'NOT_INTERACTIVE',
  PROMPT_FAILED = 'PROMPT_FAILED',

  // Repository
  UNSUPPORTED_BACKEND = 'UNSUPPORTED_BACKEND',

  // Input
  INVALID_INPUT = 'INVALID_INPUT',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  FILE_NOT_FOUND = 'FILE_NOT_FOUND',
  PERMISSION_DENIED = 'PERMISSION_DENIED',

  // Output
  OUTPUT_FAILED = 'OUTPUT_FAILED',

  UNKNOWN_ERROR = 'UNKNOWN_ERROR',
}

export type ErrorDetails = Record<string, string | number | boolean | undefined>;

/**
 * Error carrying a code, structured details for `--debug`, and an optional
 * underlying `cause`.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public code: ErrorCode,
    public details?: ErrorDetails,
    public isRecoverable: boolean = false,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * One-line message for the terminal.
   */
  toUserMessage(): string {
    switch (this.code) {
      case ErrorCode.CREDENTIAL_UNAVAILABLE:
        return `No credential could be obtained for ${this.details?.url || 'the remote'}.`;

      case ErrorCode.NOT_INTERACTIVE:
        return 'Cannot prompt for input: no interactive terminal is available.';

      case ErrorCode.PROMPT_FAILED:
        return 'The prompt was closed before a value was entered.';

      case ErrorCode.FILE_NOT_FOUND:
        return `File not found: ${this.details?.path || 'unknown'}`;

      case ErrorCode.PERMISSION_DENIED:
        return `Permission denied: ${this.details?.path || 'unknown'}`;

      case ErrorCode.OUTPUT_FAILED:
        return 'Failed to write output.';

      case ErrorCode.UNSUPPORTED_BACKEND:
      case ErrorCode.INVALID_INPUT:
      case ErrorCode.VALIDATION_ERROR:
      default:
        return this.message || 'An unknown error occurred.';
    }
  }

  getRecoverySuggestion(): string | null {
    switch (this.code) {
      case ErrorCode.CREDENTIAL_UNAVAILABLE:
        return 'Install pinentry, run from an interactive terminal, or load your key into ssh-agent';

      case ErrorCode.NOT_INTERACTIVE:
        return 'Run the command from a terminal, or configure REFSYNC_PINENTRY';

      case ErrorCode.UNSUPPORTED_BACKEND:
        return 'Run the command inside a git-backed repository';

      case ErrorCode.FILE_NOT_FOUND:
        return 'Check the path of the outcome file';

      case ErrorCode.PERMISSION_DENIED:
        return 'Check that the file is readable by the current user';

      default:
        return null;
    }
  }
}
