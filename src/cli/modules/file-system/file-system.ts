/**
 * File system predicates used by enablement conditions.
 */

import { stat } from 'node:fs/promises';

/**
 * Determine whether the provided path exists (file, directory or other).
 */
export async function pathExists(target: string): Promise<boolean> {
  try {
    await stat(target);
    return true;
  } catch {
    return false;
  }
}

/**
 * Determine whether the provided path exists and is a directory.
 *
 * Returns `true` when the path exists and is a directory, otherwise `false`.
 */
export async function directoryExists(target: string): Promise<boolean> {
  try {
    const stats = await stat(target);
    return stats.isDirectory();
  } catch {
    return false;
  }
}
