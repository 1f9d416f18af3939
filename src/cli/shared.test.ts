import { callbackOptionsFromEnv, exitWithError } from './shared';
import { AppError, ErrorCode } from '../errors/types';

describe('callbackOptionsFromEnv', () => {
  it('maps the environment to resolver options', () => {
    const options = callbackOptionsFromEnv({
      HOME: '/home/test',
      REFSYNC_PINENTRY: 'pinentry-curses',
      REFSYNC_PINENTRY_TIMEOUT: '30000',
      REFSYNC_SSH_DIR: '~/keys',
    });

    expect(options).toEqual({
      pinentry: { program: 'pinentry-curses', timeoutMs: 30000 },
      sshDir: '/home/test/keys',
    });
  });

  it('uses the defaults for an empty environment', () => {
    expect(callbackOptionsFromEnv({})).toEqual({
      pinentry: { program: 'pinentry', timeoutMs: 0 },
      sshDir: undefined,
    });
  });
});

describe('exitWithError', () => {
  it('prints the error and exits with status 1', () => {
    const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const exitSpy = jest.spyOn(process, 'exit').mockImplementation((code?: string | number | null) => {
      throw new Error(`exit ${code}`);
    });

    try {
      expect(() => exitWithError(new AppError('bad', ErrorCode.INVALID_INPUT))).toThrow('exit 1');
      expect(String(errorSpy.mock.calls[0][0])).toContain('bad');
    } finally {
      errorSpy.mockRestore();
      exitSpy.mockRestore();
    }
  });
});
