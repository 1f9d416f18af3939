/**
 * git credential helper protocol.
 *
 * git runs `refsync credential get` with `key=value` lines on stdin
 * (protocol, host, optionally path and username) and reads the answer in
 * the same format from stdout. `store` and `erase` are accepted and ignored:
 * refsync keeps no credentials.
 *
 * See gitcredentials(7) and git-credential(1).
 */

import { AppError, ErrorCode } from '../errors/types';
import type { Credentials, RemoteCallbacks } from './types';

export type CredentialAction = 'get' | 'store' | 'erase';

export const CREDENTIAL_ACTIONS: readonly CredentialAction[] = ['get', 'store', 'erase'];

/**
 * Parse `key=value` lines. Input ends at the first blank line; array keys
 * such as `wwwauth[]` keep their last value.
 */
export function parseCredentialInput(input: string): Record<string, string> {
  const result: Record<string, string> = {};
  for (const line of input.split('\n')) {
    const trimmed = line.replace(/\r$/, '');
    if (!trimmed) break;
    const eqIndex = trimmed.indexOf('=');
    if (eqIndex < 1) continue;
    result[trimmed.substring(0, eqIndex)] = trimmed.substring(eqIndex + 1);
  }
  return result;
}

/**
 * Format credentials as `key=value\n` lines for git.
 */
export function formatCredentialOutput(credentials: Credentials): string {
  for (const value of [credentials.username, credentials.password]) {
    if (value.includes('\n') || value.includes('\0')) {
      throw new AppError(
        'Credential values cannot contain newlines or NUL bytes',
        ErrorCode.VALIDATION_ERROR,
        {},
        false,
      );
    }
  }
  return `username=${credentials.username}\npassword=${credentials.password}\n`;
}

/**
 * Remote URL described by the request attributes.
 */
export function credentialUrl(fields: Record<string, string>): string {
  if (fields.url) {
    return fields.url;
  }
  if (!fields.protocol || !fields.host) {
    throw new AppError(
      'Credential request needs "protocol" and "host" (or "url")',
      ErrorCode.INVALID_INPUT,
      {},
      false,
    );
  }
  const path = fields.path ? `/${fields.path.replace(/^\/+/, '')}` : '';
  return `${fields.protocol}://${fields.host}${path}`;
}

/**
 * Answer a `get` request. A username supplied by git is kept and only the
 * password is asked for; otherwise both are prompted.
 */
export async function credentialGet(callbacks: RemoteCallbacks, input: string): Promise<Credentials | undefined> {
  const fields = parseCredentialInput(input);
  const url = credentialUrl(fields);

  if (fields.username) {
    const password = await callbacks.getPassword(url, fields.username);
    return password === undefined ? undefined : { username: fields.username, password };
  }
  return callbacks.getUsernamePassword(url);
}
