import { Command } from 'commander';

import { expandGitPath } from '../utils/git-path';
import { createCliUi, exitWithError } from './shared';

export function createExpandPathCommand(): Command {
  const cmd = new Command('expand-path');

  cmd
    .description('Expand a leading "~/" in a configuration path')
    .argument('<path>', 'path as written in a configuration file')
    .action(async (pathStr: string) => {
      try {
        await createCliUi().stdout(`${expandGitPath(pathStr)}\n`);
      } catch (error) {
        exitWithError(error);
      }
    });

  return cmd;
}
