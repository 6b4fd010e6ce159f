/**
 * Git Hook Management
 *
 * Role:
 *   Install and remove the pre-commit hook that runs `apc run`.
 *
 * Guarantees:
 *   - Only hooks carrying HOOK_MARKER are treated as ours
 *   - A foreign hook is never overwritten without `force`, and is backed up
 *     when it is
 */

import { chmod, mkdir, readFile, rename, rm, stat, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { formatErrorMessage, HookError } from '../../../errors/errors.ts';
import { HOOK_BACKUP_SUFFIX, HOOK_NAME } from '../../constants/paths.ts';

export const HOOK_MARKER = '# agent-precommit hook';

export const HOOK_SCRIPT = `#!/bin/sh
${HOOK_MARKER} - installed by \`apc install\`

# Skip if APC_SKIP is set
if [ "$APC_SKIP" = "1" ]; then
    exit 0
fi

exec apc run
`;

const HOOK_MODE = 0o755;

export type InstallResult =
  | { readonly status: 'installed'; readonly path: string; readonly backupPath?: string }
  | { readonly status: 'already-installed'; readonly path: string };

export type UninstallResult =
  | { readonly status: 'removed'; readonly path: string; readonly backupPath?: string }
  | { readonly status: 'not-installed'; readonly path: string }
  | { readonly status: 'foreign'; readonly path: string };

export function hookPath(hooksDir: string): string {
  return path.join(hooksDir, HOOK_NAME);
}

export function backupPath(hooksDir: string): string {
  return path.join(hooksDir, `${HOOK_NAME}${HOOK_BACKUP_SUFFIX}`);
}

async function exists(target: string): Promise<boolean> {
  try {
    await stat(target);
    return true;
  } catch {
    return false;
  }
}

async function readHook(target: string): Promise<string | undefined> {
  try {
    return await readFile(target, 'utf8');
  } catch (err: unknown) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return undefined;
    }
    throw new HookError('HOOK_INSTALL_FAILED', `Failed to read hook: ${formatErrorMessage(err)}`, {
      cause: err,
      details: { path: target },
    });
  }
}

/**
 * Whether `content` is a hook written by `installHook`.
 */
export function isManagedHook(content: string): boolean {
  return content.includes(HOOK_MARKER);
}

/**
 * Install the pre-commit hook into `hooksDir`, creating the directory.
 *
 * @throws HookError with `HOOK_EXISTS` when a foreign hook is present and
 *   `force` is not set; `HOOK_INSTALL_FAILED` for filesystem errors.
 */
export async function installHook(
  hooksDir: string,
  options: { readonly force?: boolean } = {},
): Promise<InstallResult> {
  const target = hookPath(hooksDir);
  const existing = await readHook(target);

  if (existing !== undefined && isManagedHook(existing)) {
    return { status: 'already-installed', path: target };
  }
  if (existing !== undefined && options.force !== true) {
    throw new HookError(
      'HOOK_EXISTS',
      `Hook already exists at ${target} (use --force to overwrite)`,
      { details: { path: target } },
    );
  }

  try {
    await mkdir(hooksDir, { recursive: true });
    let backup: string | undefined;
    if (existing !== undefined) {
      backup = backupPath(hooksDir);
      await rename(target, backup);
    }
    await writeFile(target, HOOK_SCRIPT, 'utf8');
    await chmod(target, HOOK_MODE);
    return backup === undefined
      ? { status: 'installed', path: target }
      : { status: 'installed', path: target, backupPath: backup };
  } catch (err: unknown) {
    throw new HookError(
      'HOOK_INSTALL_FAILED',
      `Failed to install hook: ${formatErrorMessage(err)}`,
      { cause: err, details: { path: target } },
    );
  }
}

/**
 * Remove the pre-commit hook from `hooksDir` if it is ours.
 */
export async function uninstallHook(hooksDir: string): Promise<UninstallResult> {
  const target = hookPath(hooksDir);
  const existing = await readHook(target);

  if (existing === undefined) {
    return { status: 'not-installed', path: target };
  }
  if (!isManagedHook(existing)) {
    return { status: 'foreign', path: target };
  }

  try {
    await rm(target);
  } catch (err: unknown) {
    throw new HookError('HOOK_INSTALL_FAILED', `Failed to remove hook: ${formatErrorMessage(err)}`, {
      cause: err,
      details: { path: target },
    });
  }

  const backup = backupPath(hooksDir);
  return (await exists(backup))
    ? { status: 'removed', path: target, backupPath: backup }
    : { status: 'removed', path: target };
}
