/**
 * Check Scheduling Engine
 *
 * Role:
 *   Run resolved checks for a mode and aggregate their results.
 *
 * Responsibilities:
 *   - Evaluate enablement immediately before each check runs
 *   - Sequential execution with fail-fast for human mode
 *   - Grouped, bounded-parallel execution for agent and CI modes
 *   - Per-check log files and status notifications
 *
 * Non-responsibilities:
 *   - No retries
 *   - No presentation
 */

import { availableParallelism } from 'node:os';
import pMap from 'p-map';

import { AppError, CheckError, formatErrorMessage, isAppError } from '../../errors/errors.ts';
import { parseDuration } from '../config/duration.ts';
import { isThoroughMode, modeConfigFor, policyFor } from '../config/mode.ts';
import type { Config } from '../config/types.ts';
import { DEFAULT_TIMEOUT_MS, MS_PER_SECOND } from '../constants/time.ts';
import {
  buildCheckResult,
  buildSkippedResult,
  type CheckDefinition,
  type CheckResult,
  createRunReport,
  executeCommand,
  type Mode,
  type ResolvedCheck,
  resolveChecks,
  type RunOptions,
  type RunPolicy,
  type RunReport,
  shouldSkipCheck,
  statusForResult,
} from '../modules/index.ts';
import { appendToLog, makeLogOptions, writeCheckLog } from '../observability/logger.ts';

const FALLBACK_CONCURRENCY = 4;

/**
 * Number of checks allowed in flight within one parallel group.
 */
export function defaultConcurrency(): number {
  try {
    const cores = availableParallelism();
    return cores > 0 ? cores : FALLBACK_CONCURRENCY;
  } catch {
    return FALLBACK_CONCURRENCY;
  }
}

/**
 * Parse a mode timeout, falling back to the default with a warning.
 */
export function resolveTimeout(timeout: string, onWarning?: (message: string) => void): number {
  const parsed = parseDuration(timeout);
  if (parsed !== null) {
    return parsed;
  }
  onWarning?.(
    `Invalid timeout '${timeout}', using default of ${DEFAULT_TIMEOUT_MS / MS_PER_SECOND} seconds`,
  );
  return DEFAULT_TIMEOUT_MS;
}

async function recordLog(options: RunOptions, result: CheckResult): Promise<void> {
  const logDir = options.logDir;
  if (logDir === undefined) {
    return;
  }

  if (result.skipped) {
    await appendToLog(logDir, result.name, `SKIPPED: ${result.skipReason ?? ''}`, {
      truncate: true,
    });
    return;
  }

  const { outcome } = result;
  await writeCheckLog(
    makeLogOptions({
      logDir,
      checkName: result.name,
      ...(options.logFormat === undefined ? {} : { format: options.logFormat }),
      ...(options.maxLogBytes === undefined ? {} : { maxBytes: options.maxLogBytes }),
    }),
    [outcome.stdout, outcome.stderr],
  );
  await appendToLog(
    logDir,
    result.name,
    `${statusForResult(result)}: exit ${outcome.exitCode} after ${Math.round(outcome.durationMs)}ms`,
  );
}

/**
 * Evaluate enablement and, when enabled, run one check.
 *
 * A failing command yields a failed result; only operational errors reject.
 */
export async function executeCheck(
  name: string,
  definition: CheckDefinition,
  timeout: string,
  options: RunOptions = {},
): Promise<CheckResult> {
  const decision = await shouldSkipCheck(definition, options.repoRoot);
  if (decision.skip) {
    const skipped = buildSkippedResult(name, decision.reason);
    await recordLog(options, skipped);
    options.onStatusChange?.(name, 'SKIPPED');
    return skipped;
  }

  options.onStatusChange?.(name, 'RUNNING');
  const outcome = await executeCommand(definition.run, {
    ...(options.repoRoot === undefined ? {} : { cwd: options.repoRoot }),
    timeoutMs: resolveTimeout(timeout, options.onWarning),
    env: Object.entries(definition.env),
    captureOutput: options.captureOutput ?? true,
  });

  const result = buildCheckResult(name, outcome);
  await recordLog(options, result);
  options.onStatusChange?.(name, statusForResult(result));
  return result;
}

/**
 * Run checks one at a time in declared order. With fail-fast, the first
 * failure ends the run and later checks are left out of the results.
 */
export async function runSequential(
  checks: readonly ResolvedCheck[],
  policy: RunPolicy,
  options: RunOptions = {},
): Promise<CheckResult[]> {
  const results: CheckResult[] = [];
  for (const [name, definition] of checks) {
    const result = await executeCheck(name, definition, policy.timeout, options);
    results.push(result);
    if (!result.passed && policy.failFast) {
      break;
    }
  }
  return results;
}

/**
 * Split checks into ordered stages. Explicit groups keep only names present
 * in `checks` and drop empty stages; without groups every check shares one
 * stage.
 */
export function planGroups(
  checks: readonly ResolvedCheck[],
  groups: readonly (readonly string[])[] = [],
): ResolvedCheck[][] {
  if (groups.length === 0) {
    return checks.length === 0 ? [] : [[...checks]];
  }

  const byName = new Map<string, ResolvedCheck>();
  for (const check of checks) {
    if (!byName.has(check[0])) {
      byName.set(check[0], check);
    }
  }

  return groups
    .map((group) =>
      group.flatMap((name) => {
        const check = byName.get(name);
        return check === undefined ? [] : [check];
      }),
    )
    .filter((stage) => stage.length > 0);
}

function toRunError(err: unknown): AppError {
  const errors: unknown[] = err instanceof AggregateError ? err.errors : [err];
  const first = errors[0];
  if (isAppError(first)) {
    return first;
  }
  return new AppError('RUN_ABORTED', `Check execution aborted: ${formatErrorMessage(first)}`, {
    cause: err,
  });
}

/**
 * Run stages one after another, each stage's checks concurrently.
 *
 * Every task in a stage is awaited before fail-fast is evaluated, and
 * fail-fast looks at every result so far, not only the current stage.
 * Operational errors abort the run once the stage has settled.
 */
export async function runParallelGroups(
  checks: readonly ResolvedCheck[],
  policy: RunPolicy,
  options: RunOptions = {},
): Promise<CheckResult[]> {
  const concurrency = options.concurrency ?? defaultConcurrency();
  const results: CheckResult[] = [];

  for (const stage of planGroups(checks, policy.parallelGroups)) {
    let stageResults: CheckResult[];
    try {
      stageResults = await pMap(
        stage,
        ([name, definition]) => executeCheck(name, definition, policy.timeout, options),
        { concurrency, stopOnError: false },
      );
    } catch (err: unknown) {
      throw toRunError(err);
    }

    results.push(...stageResults);
    if (policy.failFast && results.some((result) => !result.passed)) {
      break;
    }
  }

  return results;
}

/**
 * Schedule resolved checks for a mode and build the report.
 *
 * @param mode - Human runs sequentially; agent and CI run grouped in parallel.
 * @param checks - Resolved checks in declared order.
 * @param policy - Timeout, fail-fast and optional parallel groups.
 * @param options - Repository root, concurrency, logging and callbacks.
 */
export async function runChecks(
  mode: Mode,
  checks: readonly ResolvedCheck[],
  policy: RunPolicy,
  options: RunOptions = {},
): Promise<RunReport> {
  const start = performance.now();
  const results = isThoroughMode(mode)
    ? await runParallelGroups(checks, policy, options)
    : await runSequential(checks, policy, options);
  return createRunReport(mode, results, performance.now() - start);
}

/**
 * Run the checks configured for `mode`.
 */
export async function runConfiguredChecks(
  config: Config,
  mode: Mode,
  options: RunOptions = {},
): Promise<RunReport> {
  const checks = resolveChecks(modeConfigFor(config, mode).checks, config.checks);
  return runChecks(mode, checks, policyFor(config, mode), options);
}

/**
 * Run one configured check by name, bypassing mode scheduling.
 *
 * @throws CheckError with `CHECK_NOT_FOUND` when `name` is not configured.
 */
export async function runSingleCheck(
  config: Config,
  name: string,
  mode: Mode,
  options: RunOptions = {},
): Promise<RunReport> {
  const definition = Object.hasOwn(config.checks, name) ? config.checks[name] : undefined;
  if (definition === undefined) {
    throw new CheckError('CHECK_NOT_FOUND', `Check not found: ${name}`, { details: { name } });
  }

  const start = performance.now();
  const result = await executeCheck(name, definition, policyFor(config, mode).timeout, options);
  return createRunReport(mode, [result], performance.now() - start);
}
