/**
 * Credential resolution for network operations.
 *
 * Builds the callback set handed to the transport:
 * - getSshKeys: default key files under ~/.ssh
 * - getPassword: pinentry, then a masked terminal prompt
 * - getUsername: terminal prompt
 * - getUsernamePassword: terminal prompts for both values
 * - progress: throttled progress display, when the Ui can show one
 *
 * The Ui is shared by every callback and guarded by one lock, so at most one
 * prompt is on screen at a time. The progress display is cleared before a
 * prompt is drawn and stays hidden while the prompt is open.
 */

import { Progress, ProgressOutput } from '../ui/progress';
import type { Ui } from '../ui/ui';
import { AsyncMutex } from '../utils/async-mutex';
import { logger } from '../utils/logger';
import { PinentryOptions, pinentryGetPassword } from './pinentry';
import { getSshKeys } from './ssh-keys';
import { terminalGetPassword, terminalGetUsername } from './terminal';
import type { Credentials, GitProgress, RemoteCallbacks } from './types';

export interface RemoteCallbackOptions {
  pinentry?: PinentryOptions;
  /** Directory searched for SSH keys instead of ~/.ssh. */
  sshDir?: string;
  /** Millisecond clock for the progress display. */
  clock?: () => number;
}

function buildCallbacks(ui: Ui, output: ProgressOutput | undefined, options: RemoteCallbackOptions): RemoteCallbacks {
  const lock = new AsyncMutex();
  const clock = options.clock ?? Date.now;

  const withUi = <T>(fn: () => Promise<T>): Promise<T> =>
    lock.withLock(() => {
      output?.clear();
      return fn();
    });

  const callbacks: RemoteCallbacks = {
    getSshKeys: (username: string) => getSshKeys(username, { sshDir: options.sshDir }),

    async getPassword(url: string, _username: string): Promise<string | undefined> {
      const fromPinentry = await pinentryGetPassword(url, options.pinentry);
      if (fromPinentry !== undefined) {
        return fromPinentry;
      }
      logger.debug(`Falling back to a terminal prompt for ${url}`);
      return withUi(() => terminalGetPassword(ui, url));
    },

    getUsername(url: string): Promise<string | undefined> {
      return withUi(() => terminalGetUsername(ui, url));
    },

    getUsernamePassword(url: string): Promise<Credentials | undefined> {
      return withUi(async () => {
        const username = await terminalGetUsername(ui, url);
        if (username === undefined) {
          return undefined;
        }
        const password = await terminalGetPassword(ui, url);
        if (password === undefined) {
          return undefined;
        }
        return { username, password };
      });
    },
  };

  if (output) {
    const progress = new Progress(clock());
    callbacks.progress = (event: GitProgress) => {
      if (lock.isLocked()) {
        return;
      }
      progress.update(clock(), event, output);
    };
  }

  return callbacks;
}

/**
 * Callback set for one network operation. Prefer withRemoteCallbacks, which
 * also takes down the progress display.
 */
export function createRemoteCallbacks(ui: Ui, options: RemoteCallbackOptions = {}): RemoteCallbacks {
  return buildCallbacks(ui, ui.progressOutput(), options);
}

/**
 * Run `operation` with a fresh callback set and clear the progress display
 * once it settles.
 */
export async function withRemoteCallbacks<T>(
  ui: Ui,
  operation: (callbacks: RemoteCallbacks) => Promise<T>,
  options: RemoteCallbackOptions = {},
): Promise<T> {
  const output = ui.progressOutput();
  const callbacks = buildCallbacks(ui, output, options);
  try {
    return await operation(callbacks);
  } finally {
    output?.clear();
  }
}
