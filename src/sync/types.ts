/**
 * Outcome records handed over by the synchronization engine after an import
 * from or export to the git store.
 */

export interface GitImportStats {
  /** Commits no longer reachable after the import. */
  abandonedCommits: string[];
}

export const FAILED_REF_EXPORT_KINDS = [
  'invalid-git-name',
  'conflicted-old-state',
  'on-root-commit',
  'deleted-locally-modified-in-git',
  'added-locally-added-in-git',
  'modified-locally-deleted-in-git',
  'failed-to-delete',
  'failed-to-set',
] as const;

export type FailedRefExportKind = (typeof FAILED_REF_EXPORT_KINDS)[number];

const REASON_MESSAGES: Record<FailedRefExportKind, string> = {
  'invalid-git-name': 'Name is not allowed in Git',
  'conflicted-old-state': 'Ref was in a conflicted state from the last import',
  'on-root-commit': 'Ref cannot point to the root commit in Git',
  'deleted-locally-modified-in-git': 'Deleted ref had been modified in Git',
  'added-locally-added-in-git': 'Added ref had been added with a different target in Git',
  'modified-locally-deleted-in-git': 'Modified ref had been deleted in Git',
  'failed-to-delete': 'Failed to delete',
  'failed-to-set': 'Failed to set',
};

export function isFailedRefExportKind(value: string): value is FailedRefExportKind {
  return Object.prototype.hasOwnProperty.call(REASON_MESSAGES, value);
}

/**
 * Why a ref could not be exported. Store-level failures (failed-to-set,
 * failed-to-delete) carry the underlying error as `cause`.
 */
export class FailedRefExportReason extends Error {
  constructor(
    public readonly kind: FailedRefExportKind,
    cause?: unknown,
  ) {
    super(REASON_MESSAGES[kind], cause === undefined ? undefined : { cause });
    this.name = 'FailedRefExportReason';
  }
}

export interface FailedRefExport {
  name: string;
  reason: FailedRefExportReason;
}
