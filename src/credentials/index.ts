/**
 * Credential resolution for network operations.
 *
 * Barrel export for the callback types, the resolver and its sources.
 */

export type { Credentials, GitProgress, RemoteCallbacks } from './types';

export { decodeAssuanData, encodeAssuanData } from './assuan';
export { getSshKeys } from './ssh-keys';
export type { SshKeyOptions } from './ssh-keys';
export { pinentryGetPassword, buildPinentryScript, parsePinentryOutput } from './pinentry';
export type { PinentryOptions } from './pinentry';
export { terminalGetUsername, terminalGetPassword } from './terminal';

export { createRemoteCallbacks, withRemoteCallbacks } from './remote-callbacks';
export type { RemoteCallbackOptions } from './remote-callbacks';

export {
  CREDENTIAL_ACTIONS,
  credentialGet,
  credentialUrl,
  formatCredentialOutput,
  parseCredentialInput,
} from './git-credential';
export type { CredentialAction } from './git-credential';
export { askpassAnswer, parseAskpassPrompt } from './askpass';
export type { AskpassRequest } from './askpass';
