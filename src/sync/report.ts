/**
 * Diagnostics for git import/export results.
 *
 * Output errors are not caught here: a broken output stream is the caller's
 * problem.
 */

import type { Ui } from '../ui/ui';
import type { FailedRefExport, GitImportStats } from './types';

export const FAILED_TO_SET_HINT =
  "Hint: Git doesn't allow a branch name that looks like a parent directory of\n" +
  'another (e.g. `foo` and `foo/bar`). Try to rename the branches that failed to\n' +
  'export or their "parent" branches.\n';

/**
 * Messages of `error` and its nested causes, outermost first.
 */
export function causeChain(error: unknown): string[] {
  const messages: string[] = [];
  let current: unknown = error;
  while (current !== undefined && current !== null) {
    if (current instanceof Error) {
      messages.push(current.message);
      current = current.cause;
    } else {
      messages.push(String(current));
      break;
    }
  }
  return messages;
}

export function formatFailedRefExport(ui: Ui, failed: FailedRefExport): string {
  const segments = causeChain(failed.reason).map((message) => `: ${message}`);
  return `  ${ui.label('branch', failed.name)}${segments.join('')}\n`;
}

export async function printGitImportStats(ui: Ui, stats: GitImportStats): Promise<void> {
  if (stats.abandonedCommits.length > 0) {
    await ui.status(`Abandoned ${stats.abandonedCommits.length} commits that are no longer reachable.\n`);
  }
}

export async function printFailedGitExport(ui: Ui, failedBranches: FailedRefExport[]): Promise<void> {
  if (failedBranches.length === 0) {
    return;
  }

  await ui.warning('Failed to export some branches:\n');
  for (const failed of failedBranches) {
    await ui.stderr(formatFailedRefExport(ui, failed));
  }
  if (failedBranches.some((failed) => failed.reason.kind === 'failed-to-set')) {
    await ui.hint(FAILED_TO_SET_HINT);
  }
}
