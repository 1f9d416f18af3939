import { Command } from 'commander';

import { RemoteCallbackOptions, createRemoteCallbacks } from '../credentials';
import type { Ui } from '../ui/ui';
import { callbackOptionsFromEnv, createCliUi, exitWithError } from './shared';

/**
 * Print the key files offered for SSH authentication, one per line.
 */
export async function runSshKeys(username: string, ui: Ui, options: RemoteCallbackOptions): Promise<void> {
  const keys = await createRemoteCallbacks(ui, options).getSshKeys(username);
  if (keys.length === 0) {
    await ui.status('No SSH keys found.\n');
    return;
  }
  await ui.stdout(keys.map((key) => `${key}\n`).join(''));
}

export function createSshKeysCommand(): Command {
  const cmd = new Command('ssh-keys');

  cmd
    .description('List the SSH private keys offered to remotes')
    .argument('[username]', 'remote user name', 'git')
    .action(async (username: string) => {
      try {
        await runSshKeys(username, createCliUi(), callbackOptionsFromEnv());
      } catch (error) {
        exitWithError(error);
      }
    });

  return cmd;
}
