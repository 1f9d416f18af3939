/**
 * `refsync askpass <prompt>`: GIT_ASKPASS / SSH_ASKPASS program.
 *
 *   export GIT_ASKPASS="refsync-askpass"   # a wrapper running `refsync askpass "$@"`
 */

import { Command } from 'commander';

import { RemoteCallbackOptions, askpassAnswer, withRemoteCallbacks } from '../credentials';
import { AppError, ErrorCode } from '../errors/types';
import type { Ui } from '../ui/ui';
import { callbackOptionsFromEnv, createCliUi, exitWithError } from './shared';

export async function runAskpass(prompt: string, ui: Ui, options: RemoteCallbackOptions): Promise<void> {
  const answer = await withRemoteCallbacks(ui, (callbacks) => askpassAnswer(prompt, callbacks), options);
  if (answer === undefined) {
    throw new AppError('No credential obtained', ErrorCode.CREDENTIAL_UNAVAILABLE, { url: prompt.trim() }, false);
  }
  await ui.stdout(`${answer}\n`);
}

export function createAskpassCommand(): Command {
  const cmd = new Command('askpass');

  cmd
    .description('Answer a git or ssh askpass prompt')
    .argument('<prompt>', 'prompt text passed by git or ssh')
    .action(async (prompt: string) => {
      try {
        await runAskpass(prompt, createCliUi(), callbackOptionsFromEnv());
      } catch (error) {
        exitWithError(error);
      }
    });

  return cmd;
}
