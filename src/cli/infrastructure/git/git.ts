/**
 * Git repository discovery.
 *
 * Git is invoked through an injectable `GitRunner` so callers and tests can
 * supply their own.
 */

import { execFile } from 'node:child_process';
import path from 'node:path';

import { GitError } from '../../../errors/errors.ts';

export interface GitCommandResult {
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;
}

export type GitRunner = (args: readonly string[], cwd: string) => Promise<GitCommandResult>;

export interface GitRepository {
  /** Working tree root. */
  readonly root: string;
  /** Absolute path of the `.git` directory. */
  readonly gitDir: string;
}

/**
 * Run `git` with `args` in `cwd`. A non-zero exit resolves; failing to start
 * git rejects with `GIT_OPERATION_FAILED`.
 */
export const runGit: GitRunner = (args, cwd) =>
  new Promise((resolve, reject) => {
    execFile('git', [...args], { cwd, encoding: 'utf8' }, (error, stdout, stderr) => {
      if (error === null) {
        resolve({ exitCode: 0, stdout, stderr });
        return;
      }
      if (typeof error.code === 'number') {
        resolve({ exitCode: error.code, stdout, stderr });
        return;
      }
      const command = ['git', ...args].join(' ');
      reject(
        new GitError('GIT_OPERATION_FAILED', `Failed to run ${command}: ${error.message}`, {
          cause: error,
          details: { args: [...args], cwd },
        }),
      );
    });
  });

function lines(text: string): string[] {
  return text.split(/\r?\n/).filter((line) => line.length > 0);
}

/**
 * Locate the repository containing `cwd`.
 *
 * @throws GitError with `GIT_NOT_A_REPOSITORY` outside a working tree.
 */
export async function discoverRepository(
  cwd: string = process.cwd(),
  run: GitRunner = runGit,
): Promise<GitRepository> {
  const result = await run(['rev-parse', '--show-toplevel', '--git-dir'], cwd);
  const [root, gitDir] = lines(result.stdout);
  if (result.exitCode !== 0 || root === undefined || gitDir === undefined) {
    throw new GitError('GIT_NOT_A_REPOSITORY', 'Not a git repository', { details: { cwd } });
  }
  return { root, gitDir: path.resolve(cwd, gitDir) };
}

/**
 * Repository root for `cwd`, or `undefined` when git cannot locate one
 * (outside a working tree, or git is unavailable).
 */
export async function findRepositoryRoot(
  cwd: string = process.cwd(),
  run: GitRunner = runGit,
): Promise<string | undefined> {
  try {
    return (await discoverRepository(cwd, run)).root;
  } catch (err: unknown) {
    if (err instanceof GitError) {
      return undefined;
    }
    throw err;
  }
}

/**
 * Hooks directory of `repo`, honouring `core.hooksPath` (relative values are
 * resolved against the working tree root).
 */
export async function resolveHooksDir(
  repo: GitRepository,
  run: GitRunner = runGit,
): Promise<string> {
  const result = await run(['config', '--get', 'core.hooksPath'], repo.root);
  const configured = result.stdout.trim();
  if (result.exitCode === 0 && configured.length > 0) {
    return path.resolve(repo.root, configured);
  }
  return path.join(repo.gitDir, 'hooks');
}
