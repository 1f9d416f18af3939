#!/usr/bin/env node
import { program } from 'commander';
import chalk from 'chalk';
import { version as pkgVersion } from '../package.json';
import { createAskpassCommand } from './cli/askpass';
import { createCredentialCommand } from './cli/credential';
import { createExpandPathCommand } from './cli/expand-path';
import { createReportCommand } from './cli/report';
import { createSshKeysCommand } from './cli/ssh-keys';
import { PROGRAM_NAME } from './constants';
import { setupShutdownHandlers } from './utils/shutdown';
import { handleError } from './errors/handler';
import { logger, LogLevel } from './utils/logger';

// Kill a running pinentry on Ctrl+C
setupShutdownHandlers();

process.on('unhandledRejection', (error: unknown) => {
  handleError(error, process.env.DEBUG === 'true');
  process.exit(1);
});

process.on('uncaughtException', (error: unknown) => {
  handleError(error, process.env.DEBUG === 'true');
  process.exit(1);
});

program
  .name(PROGRAM_NAME)
  .description(
    chalk.blue.bold(PROGRAM_NAME) +
    '\n\nCredential helper and sync diagnostics for git remotes.'
  )
  .version(pkgVersion, '-v, --version', 'Display version')
  .option('-d, --debug', 'Enable debug output')
  .option('-q, --quiet', 'Suppress status output (warnings are still shown)')
  .option('--no-color', 'Disable colored output')
  .hook('preAction', (thisCommand) => {
    const opts = thisCommand.opts();

    if (opts.debug) {
      process.env.DEBUG = 'true';
      logger.setLevel(LogLevel.DEBUG);
    }

    if (opts.quiet) {
      process.env.QUIET = 'true';
    }

    // chalk reads FORCE_COLOR only at load time
    if (opts.color === false) {
      chalk.level = 0;
    }
  });

program.addCommand(createCredentialCommand());
program.addCommand(createAskpassCommand());
program.addCommand(createSshKeysCommand());
program.addCommand(createReportCommand());
program.addCommand(createExpandPathCommand());

program.on('--help', () => {
  console.log('');
  console.log(chalk.bold('Environment:'));
  console.log(`  ${chalk.cyan('REFSYNC_PINENTRY')}          pinentry program (default: pinentry)`);
  console.log(`  ${chalk.cyan('REFSYNC_PINENTRY_TIMEOUT')}  pinentry timeout in ms, 0 for none (default: 0)`);
  console.log(`  ${chalk.cyan('REFSYNC_SSH_DIR')}           directory searched for SSH keys (default: ~/.ssh)`);
  console.log('');
  console.log(chalk.bold('Examples:'));
  console.log(`  $ git config --global credential.helper '!${PROGRAM_NAME} credential'`);
  console.log(`  $ ${PROGRAM_NAME} ssh-keys`);
  console.log(`  $ ${PROGRAM_NAME} report outcome.json`);
  console.log('');
  console.log(chalk.dim('For more information on a specific command:'));
  console.log(`  $ ${PROGRAM_NAME} <command> --help`);
});

program.parse();
