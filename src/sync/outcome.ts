/**
 * JSON form of a synchronization outcome, as read by `refsync report`.
 *
 *   {
 *     "abandonedCommits": ["<commit id>", ...],
 *     "failedExports": [
 *       { "name": "foo/bar", "reason": "failed-to-set", "causes": ["outer", "root"] }
 *     ]
 *   }
 *
 * Both keys are optional. `causes` lists the nested errors below the reason,
 * outermost first.
 */

import { AppError, ErrorCode } from '../errors/types';
import {
  FAILED_REF_EXPORT_KINDS,
  FailedRefExport,
  FailedRefExportReason,
  GitImportStats,
  isFailedRefExportKind,
} from './types';

export interface SyncOutcome {
  importStats: GitImportStats;
  failedExports: FailedRefExport[];
}

function invalid(message: string): AppError {
  return new AppError(message, ErrorCode.INVALID_INPUT, {}, false);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readStringArray(value: unknown, field: string): string[] {
  if (value === undefined) {
    return [];
  }
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw invalid(`"${field}" must be an array of strings`);
  }
  return value;
}

/** Turn ["outer", "root"] into Error("outer", { cause: Error("root") }). */
function buildCauseChain(causes: string[]): Error | undefined {
  let cause: Error | undefined;
  for (const message of [...causes].reverse()) {
    cause = cause === undefined ? new Error(message) : new Error(message, { cause });
  }
  return cause;
}

function parseFailedExport(entry: unknown, index: number): FailedRefExport {
  if (!isRecord(entry)) {
    throw invalid(`failedExports[${index}] must be an object`);
  }
  const { name, reason } = entry;
  if (typeof name !== 'string' || name.length === 0) {
    throw invalid(`failedExports[${index}].name is required`);
  }
  if (typeof reason !== 'string' || !isFailedRefExportKind(reason)) {
    throw invalid(
      `failedExports[${index}].reason must be one of: ${FAILED_REF_EXPORT_KINDS.join(', ')}`,
    );
  }
  const causes = readStringArray(entry.causes, `failedExports[${index}].causes`);
  return { name, reason: new FailedRefExportReason(reason, buildCauseChain(causes)) };
}

export function parseSyncOutcome(data: unknown): SyncOutcome {
  if (!isRecord(data)) {
    throw invalid('Synchronization outcome must be a JSON object');
  }

  const abandonedCommits = readStringArray(data.abandonedCommits, 'abandonedCommits');

  const rawFailures = data.failedExports ?? [];
  if (!Array.isArray(rawFailures)) {
    throw invalid('"failedExports" must be an array');
  }

  return {
    importStats: { abandonedCommits },
    failedExports: rawFailures.map(parseFailedExport),
  };
}
