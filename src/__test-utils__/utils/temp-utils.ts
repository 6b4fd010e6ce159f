/**
 * Temporary filesystem helpers shared by tests.
 *
 * Usage:
 *   - createTempDir() for an isolated working directory
 *   - writeTree() to lay out files inside it
 *   - removeTempDir() in afterEach
 */

import { chmod, mkdir, mkdtemp, realpath, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

/**
 * Create a temporary directory and return its canonical path.
 * Caller must clean up with `removeTempDir`.
 */
export async function createTempDir(prefix: string = 'apc-'): Promise<string> {
  return realpath(await mkdtemp(path.join(tmpdir(), prefix)));
}

/**
 * Recursively delete a temporary directory.
 */
export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/**
 * Write files relative to `root`, creating parent directories as needed.
 *
 * @param files - Map of relative path to file content.
 */
export async function writeTree(
  root: string,
  files: Readonly<Record<string, string>>,
): Promise<void> {
  for (const [relative, content] of Object.entries(files)) {
    const target = path.join(root, relative);
    await mkdir(path.dirname(target), { recursive: true });
    await writeFile(target, content);
  }
}

/**
 * Write an executable shell script into `dir`.
 *
 * @returns Full path to the script.
 */
export async function createTempScript(
  dir: string,
  name: string,
  content: string,
): Promise<string> {
  const scriptPath = path.join(dir, name);
  await writeFile(scriptPath, content);
  await chmod(scriptPath, 0o755);
  return scriptPath;
}
