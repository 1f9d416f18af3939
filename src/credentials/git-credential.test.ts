import {
  credentialGet,
  credentialUrl,
  formatCredentialOutput,
  parseCredentialInput,
} from './git-credential';
import type { RemoteCallbacks } from './types';
import { AppError } from '../errors/types';

function fakeCallbacks(overrides: Partial<RemoteCallbacks> = {}): RemoteCallbacks {
  return {
    getSshKeys: jest.fn().mockResolvedValue([]),
    getPassword: jest.fn().mockResolvedValue(undefined),
    getUsername: jest.fn().mockResolvedValue(undefined),
    getUsernamePassword: jest.fn().mockResolvedValue(undefined),
    ...overrides,
  };
}

describe('parseCredentialInput', () => {
  it('parses key=value lines', () => {
    expect(parseCredentialInput('protocol=https\nhost=example.com\n\n')).toEqual({
      protocol: 'https',
      host: 'example.com',
    });
  });

  it('handles lines with = in the value', () => {
    expect(parseCredentialInput('path=a=b\n').path).toBe('a=b');
  });

  it('stops at the first blank line', () => {
    expect(parseCredentialInput('host=a\n\nhost=b\n')).toEqual({ host: 'a' });
  });

  it('strips carriage returns and skips malformed lines', () => {
    expect(parseCredentialInput('protocol=https\r\nnonsense\n=value\nhost=example.com\r\n')).toEqual({
      protocol: 'https',
      host: 'example.com',
    });
  });
});

describe('formatCredentialOutput', () => {
  it('formats username and password lines', () => {
    expect(formatCredentialOutput({ username: 'alice', password: 'test-secret' })).toBe(
      'username=alice\npassword=test-secret\n',
    );
  });

  it('rejects values that would break the protocol', () => {
    expect(() => formatCredentialOutput({ username: 'alice', password: 'two\nlines' })).toThrow(AppError);
  });
});

describe('credentialUrl', () => {
  it('joins protocol, host and path', () => {
    expect(credentialUrl({ protocol: 'https', host: 'example.com', path: 'team/repo.git' })).toBe(
      'https://example.com/team/repo.git',
    );
  });

  it('omits a missing path', () => {
    expect(credentialUrl({ protocol: 'https', host: 'example.com:8443' })).toBe('https://example.com:8443');
  });

  it('prefers an explicit url attribute', () => {
    expect(credentialUrl({ url: 'https://example.com/x', protocol: 'http', host: 'other' })).toBe(
      'https://example.com/x',
    );
  });

  it('requires protocol and host', () => {
    expect(() => credentialUrl({ host: 'example.com' })).toThrow('Credential request needs "protocol" and "host"');
  });
});

describe('credentialGet', () => {
  it('asks for username and password when git supplies neither', async () => {
    const callbacks = fakeCallbacks({
      getUsernamePassword: jest.fn().mockResolvedValue({ username: 'alice', password: 'test-secret' }),
    });

    await expect(credentialGet(callbacks, 'protocol=https\nhost=example.com\n\n')).resolves.toEqual({
      username: 'alice',
      password: 'test-secret',
    });
    expect(callbacks.getUsernamePassword).toHaveBeenCalledWith('https://example.com');
  });

  it('only asks for the password when git supplies the username', async () => {
    const callbacks = fakeCallbacks({ getPassword: jest.fn().mockResolvedValue('test-secret') });

    await expect(
      credentialGet(callbacks, 'protocol=https\nhost=example.com\nusername=bob\n\n'),
    ).resolves.toEqual({ username: 'bob', password: 'test-secret' });
    expect(callbacks.getPassword).toHaveBeenCalledWith('https://example.com', 'bob');
    expect(callbacks.getUsernamePassword).not.toHaveBeenCalled();
  });

  it('returns undefined when no password is obtained', async () => {
    const callbacks = fakeCallbacks();

    await expect(
      credentialGet(callbacks, 'protocol=https\nhost=example.com\nusername=bob\n\n'),
    ).resolves.toBeUndefined();
  });
});
