export type { GitImportStats, FailedRefExport, FailedRefExportKind } from './types';
export { FailedRefExportReason, FAILED_REF_EXPORT_KINDS, isFailedRefExportKind } from './types';
export { printGitImportStats, printFailedGitExport, causeChain, FAILED_TO_SET_HINT } from './report';
export { parseSyncOutcome } from './outcome';
export type { SyncOutcome } from './outcome';
export { getGitRepo } from './repo';
export type { GitRepositoryHandle, Store, StoreBackend } from './repo';
