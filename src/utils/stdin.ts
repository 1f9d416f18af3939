/**
 * Read everything piped to stdin.
 *
 * Rejects when stdin is a terminal (nothing piped) or nothing arrives within
 * the timeout.
 */

import { AppError, ErrorCode } from '../errors/types';

const STDIN_TIMEOUT_MS = 10_000;

export function readStdin(
  stream: NodeJS.ReadableStream & { isTTY?: boolean } = process.stdin,
  timeoutMs: number = STDIN_TIMEOUT_MS,
): Promise<string> {
  if (stream.isTTY) {
    return Promise.reject(
      new AppError('Expected input on stdin, but stdin is a terminal', ErrorCode.INVALID_INPUT, {}, false),
    );
  }

  return new Promise((resolve, reject) => {
    let data = '';
    const timeout = setTimeout(() => {
      reject(new AppError('Timeout reading from stdin', ErrorCode.INVALID_INPUT, { timeoutMs }, false));
    }, timeoutMs);

    stream.setEncoding('utf8');
    stream.on('data', (chunk: string) => {
      data += chunk;
    });
    stream.on('end', () => {
      clearTimeout(timeout);
      resolve(data);
    });
    stream.on('error', (err) => {
      clearTimeout(timeout);
      reject(err);
    });
    stream.resume();
  });
}
