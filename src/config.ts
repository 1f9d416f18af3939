/**
 * Environment-driven configuration.
 *
 *   REFSYNC_PINENTRY          secure-entry helper program (default: pinentry)
 *   REFSYNC_PINENTRY_TIMEOUT  milliseconds before the helper is killed (0 = wait forever)
 *   REFSYNC_SSH_DIR           directory searched for private keys (default: ~/.ssh)
 *
 * Path values may start with "~/".
 */

import { DEFAULT_PINENTRY_PROGRAM, ENV_PINENTRY_PROGRAM, ENV_PINENTRY_TIMEOUT, ENV_SSH_DIR } from './constants';
import { AppError, ErrorCode } from './errors/types';
import { expandGitPath } from './utils/git-path';

export interface RefsyncConfig {
  pinentryProgram: string;
  pinentryTimeoutMs: number;
  sshDir?: string;
}

function parseTimeout(raw: string | undefined): number {
  const trimmed = raw?.trim();
  if (!trimmed) {
    return 0;
  }
  if (!/^\d+$/.test(trimmed)) {
    throw new AppError(
      `${ENV_PINENTRY_TIMEOUT} must be a non-negative integer (milliseconds), got "${trimmed}"`,
      ErrorCode.VALIDATION_ERROR,
      { variable: ENV_PINENTRY_TIMEOUT },
      false,
    );
  }
  return Number.parseInt(trimmed, 10);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): RefsyncConfig {
  const program = env[ENV_PINENTRY_PROGRAM]?.trim() || DEFAULT_PINENTRY_PROGRAM;
  const sshDir = env[ENV_SSH_DIR]?.trim();

  return {
    pinentryProgram: expandGitPath(program, env),
    pinentryTimeoutMs: parseTimeout(env[ENV_PINENTRY_TIMEOUT]),
    sshDir: sshDir ? expandGitPath(sshDir, env) : undefined,
  };
}
