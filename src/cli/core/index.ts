/**
 * agent-precommit CLI
 *
 * Role:
 *   Run pre-commit checks quickly for humans and thoroughly for coding
 *   agents and CI, from one configuration file.
 *
 * Principles:
 *   - Mode decides which checks run and how they are scheduled
 *   - A failing check is a result, not an error
 *   - Deterministic exit codes
 */

export { type EntrypointDeps, main, runEntrypoint } from './entrypoint/entrypoint.ts';
export { showHelp } from './help/formatter.ts';
export { showVersion } from './help/help.ts';
export { getPackageVersion } from './version/version.ts';
export { executeWithArgs, type MainDeps, type MainResult } from '../execution/index.ts';
export { type CLIArgs, type CLICommand, parseCliArgs } from '../input/index.ts';
