/**
 * GIT_ASKPASS / SSH_ASKPASS entry point.
 *
 * git and ssh run the askpass program with a prompt as its only argument and
 * read one answer line from stdout. Typical prompts:
 *
 *   Username for 'https://example.com':
 *   Password for 'https://alice@example.com':
 *   Enter passphrase for key '/home/alice/.ssh/id_ed25519':
 */

import type { RemoteCallbacks } from './types';

export interface AskpassRequest {
  kind: 'username' | 'secret';
  /** The quoted URL or key path, or the whole prompt when nothing is quoted. */
  target: string;
}

export function parseAskpassPrompt(prompt: string): AskpassRequest {
  const kind = /^\s*username\b/i.test(prompt) ? 'username' : 'secret';
  const quoted = /'([^']+)'/.exec(prompt);
  const target = quoted ? quoted[1] : prompt.trim().replace(/:$/, '').trim();
  return { kind, target };
}

export async function askpassAnswer(prompt: string, callbacks: RemoteCallbacks): Promise<string | undefined> {
  const request = parseAskpassPrompt(prompt);
  if (request.kind === 'username') {
    return callbacks.getUsername(request.target);
  }
  return callbacks.getPassword(request.target, '');
}
