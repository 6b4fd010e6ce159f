/**
 * Result building and report aggregation utilities used by the runner.
 *
 * Responsibilities:
 *   - Normalize command outcomes into `CheckResult` payloads
 *   - Derive display statuses
 *   - Build and summarize the immutable `RunReport`
 */

import type {
  CheckResult,
  CheckStatus,
  CommandOutcome,
  Mode,
  ReportSummary,
  RunReport,
} from '../types.ts';

/**
 * A command succeeded when it exited 0 within its time budget.
 */
export function isSuccessfulOutcome(outcome: CommandOutcome): boolean {
  return outcome.exitCode === 0 && !outcome.timedOut;
}

/**
 * Stdout and stderr for display: whichever is non-empty, or both joined by a
 * newline.
 */
export function combinedOutput(outcome: CommandOutcome): string {
  if (outcome.stdout.length === 0) {
    return outcome.stderr;
  }
  if (outcome.stderr.length === 0) {
    return outcome.stdout;
  }
  return `${outcome.stdout}\n${outcome.stderr}`;
}

/**
 * Create a `CheckResult` for an executed check.
 */
export function buildCheckResult(name: string, outcome: CommandOutcome): CheckResult {
  return { name, passed: isSuccessfulOutcome(outcome), outcome, skipped: false };
}

const SKIPPED_OUTCOME: CommandOutcome = Object.freeze({
  exitCode: 0,
  stdout: '',
  stderr: '',
  timedOut: false,
  durationMs: 0,
});

/**
 * Create a `CheckResult` for a check whose enablement condition did not hold.
 * Skips count as passed.
 */
export function buildSkippedResult(name: string, reason: string): CheckResult {
  return { name, passed: true, outcome: SKIPPED_OUTCOME, skipped: true, skipReason: reason };
}

/**
 * Final display status of a result.
 */
export function statusForResult(result: CheckResult): CheckStatus {
  if (result.skipped) {
    return 'SKIPPED';
  }
  if (result.passed) {
    return 'PASS';
  }
  return result.outcome.timedOut ? 'TIMEOUT' : 'FAIL';
}

/**
 * Freeze the results of a scheduling pass into a report.
 */
export function createRunReport(
  mode: Mode,
  results: readonly CheckResult[],
  durationMs: number,
): RunReport {
  return Object.freeze({ mode, results: Object.freeze([...results]), durationMs });
}

/**
 * True when every result passed; the empty report succeeds.
 */
export function isRunSuccessful(report: RunReport): boolean {
  return report.results.every((result) => result.passed);
}

/**
 * Iterate over failed results in report order.
 */
export function* failedResults(report: RunReport): Generator<CheckResult> {
  for (const result of report.results) {
    if (!result.passed) {
      yield result;
    }
  }
}

/**
 * Count passed, failed and skipped results. Skips are not counted as passed.
 */
export function summarizeReport(report: RunReport): ReportSummary {
  let passed = 0;
  let failed = 0;
  let skipped = 0;
  for (const result of report.results) {
    if (result.skipped) {
      skipped += 1;
    } else if (result.passed) {
      passed += 1;
    } else {
      failed += 1;
    }
  }
  return {
    total: report.results.length,
    passed,
    failed,
    skipped,
    durationMs: report.durationMs,
  };
}
