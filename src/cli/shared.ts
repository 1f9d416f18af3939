/**
 * Wiring shared by the subcommands: the Ui, callback options from the
 * configuration, and the common failure exit.
 */

import { loadConfig } from '../config';
import type { RemoteCallbackOptions } from '../credentials';
import { handleError } from '../errors/handler';
import { Ui } from '../ui/ui';

/** Set by the global --debug flag or the DEBUG environment variable. */
export function isDebug(): boolean {
  return process.env.DEBUG === 'true';
}

/** Set by the global --quiet flag. */
export function isQuiet(): boolean {
  return process.env.QUIET === 'true';
}

export function createCliUi(): Ui {
  return new Ui({ quiet: isQuiet() });
}

export function callbackOptionsFromEnv(env: NodeJS.ProcessEnv = process.env): RemoteCallbackOptions {
  const config = loadConfig(env);
  return {
    pinentry: { program: config.pinentryProgram, timeoutMs: config.pinentryTimeoutMs },
    sshDir: config.sshDir,
  };
}

export function exitWithError(error: unknown): never {
  handleError(error, isDebug());
  process.exit(1);
}
