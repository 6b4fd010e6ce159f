/**
 * Infrastructure helpers for repository discovery and hook management.
 */

export {
  discoverRepository,
  findRepositoryRoot,
  type GitCommandResult,
  type GitRepository,
  type GitRunner,
  resolveHooksDir,
  runGit,
} from './git/git.ts';
export {
  backupPath,
  HOOK_MARKER,
  HOOK_SCRIPT,
  hookPath,
  type InstallResult,
  installHook,
  isManagedHook,
  type UninstallResult,
  uninstallHook,
} from './hooks/hooks.ts';
