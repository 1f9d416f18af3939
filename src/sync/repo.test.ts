import { Store, getGitRepo } from './repo';
import { AppError, ErrorCode } from '../errors/types';

function storeWith(name: string, gitDir?: string): Store {
  return {
    backend: {
      name,
      gitRepository: () => (gitDir === undefined ? undefined : { gitDir }),
    },
  };
}

describe('getGitRepo', () => {
  it('returns the handle of a git-backed store', () => {
    expect(getGitRepo(storeWith('git', '/work/repo/.git'))).toEqual({ gitDir: '/work/repo/.git' });
  });

  it('throws UNSUPPORTED_BACKEND for other backends', () => {
    let caught: unknown;
    try {
      getGitRepo(storeWith('local'));
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(AppError);
    expect(caught).toMatchObject({
      code: ErrorCode.UNSUPPORTED_BACKEND,
      message: 'The repo is not backed by a git repo',
      details: { backend: 'local' },
    });
  });
});
