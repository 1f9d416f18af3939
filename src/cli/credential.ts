/**
 * `refsync credential <get|store|erase>`: git credential helper.
 *
 * Configure with:
 *   git config --global credential.helper '!refsync credential'
 */

import { Argument, Command } from 'commander';

import {
  CREDENTIAL_ACTIONS,
  CredentialAction,
  RemoteCallbackOptions,
  credentialGet,
  credentialUrl,
  formatCredentialOutput,
  parseCredentialInput,
  withRemoteCallbacks,
} from '../credentials';
import { AppError, ErrorCode } from '../errors/types';
import type { Ui } from '../ui/ui';
import { logger } from '../utils/logger';
import { readStdin } from '../utils/stdin';
import { callbackOptionsFromEnv, createCliUi, exitWithError } from './shared';

function isCredentialAction(value: string): value is CredentialAction {
  return CREDENTIAL_ACTIONS.some((action) => action === value);
}

export async function runCredentialHelper(
  action: CredentialAction,
  input: string,
  ui: Ui,
  options: RemoteCallbackOptions,
): Promise<void> {
  if (action !== 'get') {
    logger.debug(`Ignoring credential ${action}: no credential store`);
    return;
  }

  const url = credentialUrl(parseCredentialInput(input));
  const credentials = await withRemoteCallbacks(ui, (callbacks) => credentialGet(callbacks, input), options);
  if (!credentials) {
    throw new AppError('No credential obtained', ErrorCode.CREDENTIAL_UNAVAILABLE, { url }, false);
  }
  await ui.stdout(formatCredentialOutput(credentials));
}

export function createCredentialCommand(): Command {
  const cmd = new Command('credential');

  cmd
    .description('git credential helper (reads the request from stdin)')
    .addArgument(new Argument('<action>', 'helper action').choices(CREDENTIAL_ACTIONS))
    .action(async (action: string) => {
      try {
        if (!isCredentialAction(action)) {
          throw new AppError(`Unknown credential action: ${action}`, ErrorCode.INVALID_INPUT, {}, false);
        }
        const input = await readStdin();
        await runCredentialHelper(action, input, createCliUi(), callbackOptionsFromEnv());
      } catch (error) {
        exitWithError(error);
      }
    });

  return cmd;
}
