import { Writable } from 'stream';

import { createSshKeysCommand, runSshKeys } from './ssh-keys';
import { getSshKeys } from '../credentials/ssh-keys';
import { Ui } from '../ui/ui';

jest.mock('../credentials/ssh-keys');

const mockGetSshKeys = getSshKeys as jest.MockedFunction<typeof getSshKeys>;

function collector(): { stream: Writable; text: () => string } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk.toString());
      callback();
    },
  });
  return { stream, text: () => chunks.join('') };
}

describe('createSshKeysCommand', () => {
  it('defaults the username to git', () => {
    const cmd = createSshKeysCommand();
    expect(cmd.name()).toBe('ssh-keys');
    expect(cmd.registeredArguments[0].defaultValue).toBe('git');
  });
});

describe('runSshKeys', () => {
  beforeEach(() => {
    jest.resetAllMocks();
  });

  it('prints one key path per line', async () => {
    mockGetSshKeys.mockResolvedValue(['/keys/id_ed25519', '/keys/id_rsa']);
    const out = collector();
    const ui = new Ui({ stdout: out.stream, color: false, progress: false });

    await runSshKeys('git', ui, { sshDir: '/keys' });

    expect(out.text()).toBe('/keys/id_ed25519\n/keys/id_rsa\n');
    expect(mockGetSshKeys).toHaveBeenCalledWith('git', { sshDir: '/keys' });
  });

  it('reports on stderr when no key exists', async () => {
    mockGetSshKeys.mockResolvedValue([]);
    const out = collector();
    const err = collector();
    const ui = new Ui({ stdout: out.stream, stderr: err.stream, color: false, progress: false });

    await runSshKeys('git', ui, {});

    expect(out.text()).toBe('');
    expect(err.text()).toBe('No SSH keys found.\n');
  });
});
