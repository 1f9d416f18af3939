/**
 * Callback contract between the network transport and refsync.
 *
 * The transport decides when it needs a credential and calls the matching
 * callback; each may run any number of times during one operation. A
 * callback resolving to `undefined` means "no credential", and the transport
 * then fails the operation or tries another authentication method.
 */

export interface Credentials {
  username: string;
  password: string;
}

/** Raw progress event emitted by the transport. */
export interface GitProgress {
  /** Bytes received so far, when the transport knows it. */
  bytesDownloaded?: number;
  /** Overall completion as a fraction in [0, 1]. */
  overall: number;
}

export interface RemoteCallbacks {
  /** Private key files to offer for SSH authentication. */
  getSshKeys(username: string): Promise<string[]>;

  /** Passphrase (or password) for `url`. */
  getPassword(url: string, username: string): Promise<string | undefined>;

  /** Username alone for `url`, as asked by askpass. */
  getUsername(url: string): Promise<string | undefined>;

  /** Username and password for `url`, for HTTPS remotes. */
  getUsernamePassword(url: string): Promise<Credentials | undefined>;

  /** Present only when the UI can display progress. */
  progress?: (event: GitProgress) => void;
}
