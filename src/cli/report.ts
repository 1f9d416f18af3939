import { Command } from 'commander';
import * as fs from 'fs/promises';

import { AppError, ErrorCode } from '../errors/types';
import { parseSyncOutcome, printFailedGitExport, printGitImportStats } from '../sync';
import type { Ui } from '../ui/ui';
import { readStdin } from '../utils/stdin';
import { createCliUi, exitWithError } from './shared';

/**
 * Print import and export diagnostics for a JSON synchronization outcome.
 */
export async function runReport(json: string, ui: Ui): Promise<void> {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (error) {
    throw new AppError(
      `Invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
      ErrorCode.INVALID_INPUT,
      {},
      false,
      error,
    );
  }

  const outcome = parseSyncOutcome(data);
  await printGitImportStats(ui, outcome.importStats);
  await printFailedGitExport(ui, outcome.failedExports);
}

export function createReportCommand(): Command {
  const cmd = new Command('report');

  cmd
    .description('Print diagnostics for a synchronization outcome (JSON)')
    .argument('[file]', 'outcome file, or "-" for stdin', '-')
    .action(async (file: string) => {
      try {
        const json = file === '-' ? await readStdin() : await fs.readFile(file, 'utf8');
        await runReport(json, createCliUi());
      } catch (error) {
        exitWithError(error);
      }
    });

  return cmd;
}
