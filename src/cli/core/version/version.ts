/**
 * Version Management
 *
 * Role:
 *   Load and cache package version information.
 *
 * Responsibilities:
 *   - Locate package.json relative to this module
 *   - Read and cache version on first access
 *   - Fall back to a sentinel when the manifest is unreadable
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

import { z } from 'zod';

import { PKG_FILENAME, PKG_VERSION_FALLBACK } from '../../constants/paths.ts';

let cachedPkgVersion: string | undefined;

// src/cli/core/version -> package root
const pkgPath = fileURLToPath(new URL(`../../../../${PKG_FILENAME}`, import.meta.url));

const manifestSchema = z.object({ version: z.string().optional() });

/**
 * Read and cache the package version from package.json.
 *
 * Called once at module load; a read or parse failure is logged and
 * yields `PKG_VERSION_FALLBACK`.
 */
function getPkgVersion(): string {
  if (cachedPkgVersion !== undefined) {
    return cachedPkgVersion;
  }
  try {
    const manifest = manifestSchema.safeParse(JSON.parse(readFileSync(pkgPath, 'utf8')));
    cachedPkgVersion = manifest.success
      ? (manifest.data.version ?? PKG_VERSION_FALLBACK)
      : PKG_VERSION_FALLBACK;
  } catch (error) {
    console.error(`[version] Failed to read ${PKG_FILENAME}: ${String(error)}`);
    cachedPkgVersion = PKG_VERSION_FALLBACK;
  }
  return cachedPkgVersion;
}

const PKG_VERSION = getPkgVersion();

/**
 * Public accessor for the resolved package version.
 */
export function getPackageVersion(): string {
  return PKG_VERSION;
}

/**
 * Test-only access to the caching reader without reloading the module.
 */
export const __test__ = {
  getPkgVersion,
};
