/**
 * @packageDocumentation
 * Time-related constants used across the codebase.
 *
 * These constants centralize commonly used time units to avoid magic
 * numbers and make intent clear in timeout calculations and tests.
 *
 * @remarks This module exports raw numeric values only; parsing lives in
 * `config/duration.ts`.
 */
/** Number of milliseconds in one second. */
export const MS_PER_SECOND = 1000;

/** Number of milliseconds in one minute. */
export const MINUTE_MS = 60 * MS_PER_SECOND;

/** Number of milliseconds in one hour. */
export const HOUR_MS = 60 * MINUTE_MS;

/** Timeout applied when none is configured or the configured one is unparseable. */
export const DEFAULT_TIMEOUT_MS = 300 * MS_PER_SECOND;

/** Exit code reported for a command that was killed for exceeding its timeout. */
export const TIMEOUT_EXIT_CODE = 124;
