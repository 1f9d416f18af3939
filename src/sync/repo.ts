/**
 * Access to the git repository behind a store.
 *
 * Backends advertise a native git repository through a capability query
 * instead of being inspected for their concrete type.
 */

import { AppError, ErrorCode } from '../errors/types';

export interface GitRepositoryHandle {
  /** Path of the git directory (e.g. `.git` or a bare repository). */
  readonly gitDir: string;
}

export interface StoreBackend {
  readonly name: string;
  /** The backing git repository, for backends that have one. */
  gitRepository(): GitRepositoryHandle | undefined;
}

export interface Store {
  readonly backend: StoreBackend;
}

export function getGitRepo(store: Store): GitRepositoryHandle {
  const repo = store.backend.gitRepository();
  if (!repo) {
    throw new AppError(
      'The repo is not backed by a git repo',
      ErrorCode.UNSUPPORTED_BACKEND,
      { backend: store.backend.name },
      false,
    );
  }
  return repo;
}
