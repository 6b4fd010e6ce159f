/**
 * @packageDocumentation
 * File path and package-related constants used across the CLI.
 *
 * These small constants centralize common literal values so callers do not
 * duplicate strings and tests can assert expected defaults.
 *
 * @remarks
 * Keep this file focused on literal values that are unlikely to change per
 * execution; avoid introducing logic here.
 */
/** Filename for the package manifest used when resolving project metadata. */
export const PKG_FILENAME = 'package.json';

/** Fallback value to use when a package version cannot be determined. */
export const PKG_VERSION_FALLBACK = 'unknown';

/** Configuration file searched for from the working directory upwards. */
export const CONFIG_FILE_NAME = 'agent-precommit.toml';

/** Git hook managed by `apc install` / `apc uninstall`. */
export const HOOK_NAME = 'pre-commit';

/** Suffix appended to a foreign hook when it is replaced with `--force`. */
export const HOOK_BACKUP_SUFFIX = '.bak';
