/**
 * Executable lookup on PATH.
 */

import { constants } from 'node:fs';
import { access, stat } from 'node:fs/promises';
import path from 'node:path';

const WINDOWS_DEFAULT_EXTENSIONS = ['.COM', '.EXE', '.BAT', '.CMD'] as const;

/** Environment subset consulted during lookup. */
export type LookupEnv = Readonly<Record<string, string | undefined>>;

/**
 * Enumerate absolute PATH entries, in order, without duplicates.
 */
function getSearchDirs(env: LookupEnv): Set<string> {
  const entries = new Set<string>();
  const envPath = env['PATH'] ?? env['Path'];
  if (envPath === undefined || envPath.length === 0) {
    return entries;
  }
  for (const entry of envPath.split(path.delimiter)) {
    if (entry && path.isAbsolute(entry)) {
      entries.add(entry);
    }
  }
  return entries;
}

function getExtensions(isWindows: boolean, env: LookupEnv): readonly string[] {
  if (!isWindows) {
    return [''];
  }
  const pathext = env['PATHEXT'];
  const listed = pathext === undefined ? [...WINDOWS_DEFAULT_EXTENSIONS] : pathext.split(';');
  return ['', ...listed.filter((ext) => ext.length > 0)];
}

/**
 * Build candidate paths for a binary by combining search directories with extensions.
 */
function getCandidates(
  binary: string,
  dirs: ReadonlySet<string>,
  extensions: readonly string[],
): string[] {
  if (binary.includes('/') || binary.includes('\\')) {
    return extensions.map((ext) => `${binary}${ext}`);
  }

  const candidates: string[] = [];
  for (const dir of dirs) {
    for (const ext of extensions) {
      candidates.push(path.join(dir, `${binary}${ext}`));
    }
  }
  return candidates;
}

/**
 * Attempt to resolve a candidate path by ensuring it is an accessible file.
 */
async function isUsableFile(candidate: string, mode: number): Promise<boolean> {
  try {
    await access(candidate, mode);
    return (await stat(candidate)).isFile();
  } catch {
    return false;
  }
}

/**
 * Resolve a binary name to the first matching executable on PATH.
 *
 * Names containing a path separator are checked directly instead of being
 * searched for.
 *
 * @returns The matching path, or `null` if the binary cannot be located.
 */
export async function resolveBinary(
  binary: string,
  env: LookupEnv = process.env,
): Promise<string | null> {
  if (binary.length === 0) {
    return null;
  }

  const isWindows = process.platform === 'win32';
  const mode = isWindows ? constants.F_OK : constants.X_OK;
  const candidates = getCandidates(binary, getSearchDirs(env), getExtensions(isWindows, env));

  for (const candidate of candidates) {
    if (await isUsableFile(candidate, mode)) {
      return candidate;
    }
  }

  return null;
}

/**
 * Check whether the given command is available on PATH.
 */
export async function commandExists(binary: string, env: LookupEnv = process.env): Promise<boolean> {
  return (await resolveBinary(binary, env)) !== null;
}
