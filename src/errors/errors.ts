/**
 * Shared error hierarchy for consistent error handling.
 *
 * A failing check is never an error: it surfaces as a failed `CheckResult`.
 * These classes cover the cases where the tool itself cannot proceed.
 */

export type ErrorCode =
  | 'CLI_INVALID_ARGUMENT'
  | 'CLI_UNKNOWN_OPTION'
  | 'CLI_PARSE_ERROR'
  | 'CONFIG_NOT_FOUND'
  | 'CONFIG_PARSE_FAILED'
  | 'CONFIG_INVALID'
  | 'CONFIG_INVALID_MODE'
  | 'PROCESS_SPAWN_FAILED'
  | 'PROCESS_OUTPUT_FAILED'
  | 'PROCESS_WAIT_FAILED'
  | 'PROCESS_INTERRUPTED'
  | 'CHECK_NOT_FOUND'
  | 'RUN_ABORTED'
  | 'GIT_NOT_A_REPOSITORY'
  | 'GIT_OPERATION_FAILED'
  | 'HOOK_EXISTS'
  | 'HOOK_INSTALL_FAILED'
  | 'UNEXPECTED_ERROR';

export interface ErrorDetails {
  readonly [key: string]: unknown;
}

/** Exit status used for configuration problems (sysexits EX_CONFIG). */
export const EXIT_CONFIG = 78;
/** Exit status used for repository problems (sysexits EX_DATAERR). */
export const EXIT_DATAERR = 65;

/**
 * Base class for every error the tool raises on purpose.
 */
export class AppError extends Error {
  readonly code: ErrorCode;
  readonly details?: ErrorDetails;
  public override cause?: unknown;

  constructor(
    code: ErrorCode,
    message: string,
    options?: { cause?: unknown; details?: ErrorDetails },
  ) {
    super(message);
    this.code = code;
    if (options?.details !== undefined) {
      this.details = options.details;
    }
    // Chain stack traces when cause is an Error for better debugging
    if (options?.cause instanceof Error) {
      this.cause = options.cause;
      const currentStack = this.stack;
      const causeStack = options.cause.stack;
      if (
        (currentStack === undefined || currentStack === '') &&
        causeStack !== undefined &&
        causeStack !== ''
      ) {
        this.stack = String(causeStack);
      }
    } else if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
    this.name = this.constructor.name;
  }
}

/** Argument parsing and command-line usage errors. */
export class CliError extends AppError {}

/** Configuration discovery, parsing and validation errors. */
export class ConfigError extends AppError {}

export class ProcessError extends AppError {}

export class CheckError extends AppError {}

/** Repository discovery errors. */
export class GitError extends AppError {}

export class HookError extends AppError {}

/**
 * Format an arbitrary error into a concise string for logging or display.
 *
 * @param error - The error value to format (may be an Error, AppError, or other).
 * @returns A short string representation of the error.
 */
export function formatErrorMessage(error: unknown): string {
  if (error instanceof AppError) {
    return `${error.code}: ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Narrow an unknown value to an AppError.
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Narrow an unknown value to a ProcessError.
 */
export function isProcessError(error: unknown): error is ProcessError {
  return error instanceof ProcessError;
}

/**
 * Map an error raised by the tool to the process exit status the CLI reports.
 */
export function exitCodeForError(error: unknown): number {
  if (error instanceof ConfigError) {
    return EXIT_CONFIG;
  }
  if (error instanceof GitError) {
    return EXIT_DATAERR;
  }
  return 1;
}
