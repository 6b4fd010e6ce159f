import path from 'node:path';
import { describe, expect, it, vi } from 'vitest';

import { discoverRepository, findRepositoryRoot, type GitRunner, resolveHooksDir } from './git.ts';

function gitStub(stdout: string, exitCode = 0): GitRunner {
  return vi.fn(async () => ({ exitCode, stdout, stderr: '' }));
}

describe('discoverRepository', () => {
  it('reads the top level and git dir', async () => {
    const run = gitStub('/work/repo\n.git\n');

    await expect(discoverRepository('/work/repo', run)).resolves.toEqual({
      root: '/work/repo',
      gitDir: '/work/repo/.git',
    });
    expect(run).toHaveBeenCalledWith(['rev-parse', '--show-toplevel', '--git-dir'], '/work/repo');
  });

  it('keeps absolute git dirs', async () => {
    const run = gitStub('/work/repo\n/work/repo/.git\n');

    await expect(discoverRepository('/work/repo/src', run)).resolves.toEqual({
      root: '/work/repo',
      gitDir: '/work/repo/.git',
    });
  });

  it('resolves relative git dirs against the starting directory', async () => {
    const run = gitStub('/work/repo\n../.git\n');

    const repo = await discoverRepository('/work/repo/src', run);

    expect(repo.gitDir).toBe(path.resolve('/work/repo/src', '../.git'));
  });

  it('rejects outside a repository', async () => {
    const run = gitStub('', 128);

    await expect(discoverRepository('/tmp', run)).rejects.toMatchObject({
      name: 'GitError',
      code: 'GIT_NOT_A_REPOSITORY',
    });
  });

  it('rejects incomplete output', async () => {
    await expect(discoverRepository('/tmp', gitStub('/only-root\n'))).rejects.toMatchObject({
      code: 'GIT_NOT_A_REPOSITORY',
    });
  });
});

describe('findRepositoryRoot', () => {
  it('returns the root inside a repository', async () => {
    await expect(findRepositoryRoot('/work/repo', gitStub('/work/repo\n.git\n'))).resolves.toBe(
      '/work/repo',
    );
  });

  it('returns undefined outside a repository', async () => {
    await expect(findRepositoryRoot('/tmp', gitStub('', 128))).resolves.toBeUndefined();
  });

  it('propagates other failures', async () => {
    const run: GitRunner = async () => {
      throw new Error('git missing');
    };

    await expect(findRepositoryRoot('/tmp', run)).rejects.toThrow('git missing');
  });
});

describe('resolveHooksDir', () => {
  const repo = { root: '/work/repo', gitDir: '/work/repo/.git' };

  it('defaults to the hooks directory inside the git dir', async () => {
    await expect(resolveHooksDir(repo, gitStub('', 1))).resolves.toBe('/work/repo/.git/hooks');
  });

  it('honours a relative core.hooksPath', async () => {
    const run = gitStub('.githooks\n');

    await expect(resolveHooksDir(repo, run)).resolves.toBe('/work/repo/.githooks');
    expect(run).toHaveBeenCalledWith(['config', '--get', 'core.hooksPath'], '/work/repo');
  });

  it('honours an absolute core.hooksPath', async () => {
    await expect(resolveHooksDir(repo, gitStub('/shared/hooks\n'))).resolves.toBe('/shared/hooks');
  });
});
