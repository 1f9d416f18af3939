/**
 * pinentry passphrase source.
 *
 * Runs the secure-entry helper as a child process, sends a fixed Assuan
 * request and decodes the `D` line of its answer. The helper draws its own
 * dialog, so this works without a terminal.
 *
 * Every failure (helper missing, no answer, malformed answer, timeout)
 * resolves to undefined so the caller can fall back to another source.
 */

import { spawn } from 'child_process';

import { DEFAULT_PINENTRY_PROGRAM, PROGRAM_NAME } from '../constants';
import { logger } from '../utils/logger';
import { onShutdown } from '../utils/shutdown';
import { ASSUAN_DATA_PREFIX, decodeAssuanData } from './assuan';

export interface PinentryOptions {
  /** Helper executable (default: pinentry). */
  program?: string;
  /** Kill the helper after this many milliseconds; 0 waits forever. */
  timeoutMs?: number;
}

export function buildPinentryScript(url: string): string {
  return [
    `SETTITLE ${PROGRAM_NAME} passphrase`,
    `SETDESC Enter passphrase for ${url}`,
    'SETPROMPT Passphrase:',
    'GETPIN',
    '',
  ].join('\n');
}

/**
 * Find the first data line and decode it. Later data lines are never
 * consulted, even when the first one fails to decode.
 */
export function parsePinentryOutput(output: string): string | undefined {
  for (const line of output.split('\n')) {
    if (!line.startsWith(ASSUAN_DATA_PREFIX)) {
      continue;
    }
    return decodeAssuanData(line.slice(ASSUAN_DATA_PREFIX.length));
  }
  return undefined;
}

/**
 * Helper output that is not valid UTF-8 counts as no answer at all.
 */
function decodeTranscript(program: string, output: Buffer): string | undefined {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(output);
  } catch {
    logger.debug(`${program} printed output that is not valid UTF-8`);
    return undefined;
  }
}

/**
 * Run the helper and collect everything it prints. Resolves to undefined
 * when there is no complete transcript to look at.
 */
function runPinentry(program: string, script: string, timeoutMs: number): Promise<string | undefined> {
  return new Promise((resolve) => {
    const child = spawn(program, [], { stdio: ['pipe', 'pipe', 'ignore'] });
    const chunks: Buffer[] = [];
    let settled = false;
    let writeFailed = false;
    let timer: NodeJS.Timeout | undefined;
    const unregister = onShutdown(() => {
      child.kill();
    });

    const finish = (result: string | undefined) => {
      if (settled) return;
      settled = true;
      if (timer) clearTimeout(timer);
      unregister();
      resolve(result);
    };

    if (timeoutMs > 0) {
      timer = setTimeout(() => {
        logger.debug(`${program} did not answer within ${timeoutMs} ms`);
        child.kill();
        finish(undefined);
      }, timeoutMs);
    }

    child.on('error', (error) => {
      logger.debug(`Cannot run ${program}:`, error.message);
      finish(undefined);
    });

    child.stdout?.on('data', (chunk: Buffer) => {
      chunks.push(chunk);
    });

    // Exit status carries no meaning; the answer lines do.
    child.on('close', () => {
      finish(writeFailed ? undefined : decodeTranscript(program, Buffer.concat(chunks)));
    });

    child.stdin?.on('error', (error) => {
      logger.debug(`Writing to ${program} failed:`, error.message);
      writeFailed = true;
    });
    child.stdin?.end(script);
  });
}

export async function pinentryGetPassword(url: string, options: PinentryOptions = {}): Promise<string | undefined> {
  const program = options.program || DEFAULT_PINENTRY_PROGRAM;
  const output = await runPinentry(program, buildPinentryScript(url), options.timeoutMs ?? 0);
  if (output === undefined) {
    return undefined;
  }

  const secret = parsePinentryOutput(output);
  if (secret === undefined) {
    logger.debug(`${program} returned no usable passphrase`);
  }
  return secret;
}
