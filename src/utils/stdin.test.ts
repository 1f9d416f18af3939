import { PassThrough } from 'stream';

import { readStdin } from './stdin';
import { ErrorCode } from '../errors/types';

describe('readStdin', () => {
  it('collects everything until the stream ends', async () => {
    const input = new PassThrough();
    const pending = readStdin(input);

    input.write('protocol=https\n');
    input.end('host=example.com\n\n');

    await expect(pending).resolves.toBe('protocol=https\nhost=example.com\n\n');
  });

  it('resolves to an empty string for empty input', async () => {
    const input = new PassThrough();
    const pending = readStdin(input);
    input.end();

    await expect(pending).resolves.toBe('');
  });

  it('rejects when stdin is a terminal', async () => {
    const input = Object.assign(new PassThrough(), { isTTY: true });

    await expect(readStdin(input)).rejects.toMatchObject({
      code: ErrorCode.INVALID_INPUT,
      message: 'Expected input on stdin, but stdin is a terminal',
    });
  });

  it('rejects when nothing arrives in time', async () => {
    jest.useFakeTimers();
    try {
      const pending = readStdin(new PassThrough(), 500);
      jest.advanceTimersByTime(500);

      await expect(pending).rejects.toMatchObject({ code: ErrorCode.INVALID_INPUT, details: { timeoutMs: 500 } });
    } finally {
      jest.useRealTimers();
    }
  });

  it('rejects on stream errors', async () => {
    const input = new PassThrough();
    const pending = readStdin(input);
    input.destroy(new Error('read failed'));

    await expect(pending).rejects.toThrow('read failed');
  });
});
