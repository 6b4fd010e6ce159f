/**
 * Help & Version API
 *
 * Role:
 *   Single entry point for the `--help` and `--version` output.
 */

import { getPackageVersion } from '../version/version.ts';

export { showHelp } from './formatter.ts';

/**
 * Version line for `--version`, e.g. `agent-precommit v0.3.0`.
 */
export function showVersion(): string {
  return `agent-precommit v${getPackageVersion()}`;
}
