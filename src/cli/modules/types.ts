/**
 * Shared types for executor modules.
 */

import type { Mode } from '../config/types.ts';

/** Status a check moves through while a run is displayed. */
export type CheckStatus = 'PENDING' | 'RUNNING' | 'PASS' | 'FAIL' | 'TIMEOUT' | 'SKIPPED';

/** Per-invocation settings for a single subprocess. */
export interface ExecutionOptions {
  /** Working directory; defaults to the current process directory. */
  readonly cwd?: string;
  /** Hard limit in milliseconds (default 300 000). */
  readonly timeoutMs?: number;
  /** Environment overrides applied in order; later entries shadow earlier. */
  readonly env?: readonly (readonly [string, string])[];
  /** Capture stdout/stderr into buffers (default) or inherit the caller's streams. */
  readonly captureOutput?: boolean;
}

/** Result of one subprocess run. */
export interface CommandOutcome {
  /** Exit status; 124 marks a timeout, 1 a death by signal. */
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;
  readonly timedOut: boolean;
  /** Wall-clock milliseconds from spawn to outcome. */
  readonly durationMs: number;
}

/** Outcome of one named check. */
export interface CheckResult {
  readonly name: string;
  /** Skipped checks always count as passed. */
  readonly passed: boolean;
  readonly outcome: CommandOutcome;
  readonly skipped: boolean;
  readonly skipReason?: string;
}

/** Aggregate of one scheduling pass. Frozen once built. */
export interface RunReport {
  readonly mode: Mode;
  /** Execution order (group order for parallel runs). */
  readonly results: readonly CheckResult[];
  readonly durationMs: number;
}

export interface ReportSummary {
  readonly total: number;
  readonly passed: number;
  readonly failed: number;
  readonly skipped: number;
  readonly durationMs: number;
}

/** Format of per-check log files. */
export type LogFormat = 'text' | 'json' | 'raw';

/**
 * Options consumed by the runner.
 *
 * @remarks
 * Callbacks are invoked synchronously from the scheduling loop; they must not
 * throw.
 */
export interface RunOptions {
  /** Repository root used to resolve enablement paths. */
  readonly repoRoot?: string;
  /** Concurrency limit for parallel groups (defaults to available cores). */
  readonly concurrency?: number;
  /** Capture output (default) or let checks write to the terminal. */
  readonly captureOutput?: boolean;
  /** Directory receiving one `<check>.log` per check. */
  readonly logDir?: string;
  readonly logFormat?: LogFormat;
  /** Cap on bytes written per log file. */
  readonly maxLogBytes?: number;
  /** Called each time a check changes status. */
  readonly onStatusChange?: (name: string, status: CheckStatus) => void;
  /** Diagnostic channel for non-fatal problems such as bad timeouts. */
  readonly onWarning?: (message: string) => void;
}

export type {
  CheckDefinition,
  CheckDefinitions,
  EnabledCondition,
  Mode,
  RunPolicy,
} from '../config/types.ts';
