/**
 * CLI Main Execution
 *
 * Role:
 *   Dispatch a parsed command and turn its outcome into an exit code.
 *
 * Responsibilities:
 *   - Resolve configuration, mode and repository root for `run`
 *   - Drive the dashboard from runner status callbacks
 *   - Print the run summary and failure excerpts
 *   - Report errors and map them to exit codes
 */

import { Console } from 'node:console';
import { readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { exitCodeForError, formatErrorMessage } from '../../errors/errors.ts';
import type { Mode } from '../config/index.ts';
import {
  findConfigFile,
  loadConfig,
  loadConfigOrDefault,
  modeConfigFor,
} from '../config/index.ts';
import { MS_PER_SECOND } from '../constants/time.ts';
import {
  discoverRepository,
  findRepositoryRoot,
  installHook,
  resolveHooksDir,
  uninstallHook,
} from '../infrastructure/index.ts';
import type { CLIArgs, CLICommand } from '../input/args.ts';
import type { EnvSnapshot, RunOptions, RunReport, TerminalState } from '../modules/index.ts';
import {
  combinedOutput,
  currentTerminalState,
  describeReason,
  detectMode,
  failedResults,
  isRunSuccessful,
  pathExists,
  summarizeReport,
} from '../modules/index.ts';
import type { OutputConsole, Reporter } from '../output/reporter.ts';
import { createReporter } from '../output/reporter.ts';
import { renderDashboard } from '../output/ui.tsx';
import type { CommandContext, CommandDeps } from './commands.ts';
import {
  configCommand,
  detectCommand,
  initCommand,
  installCommand,
  listCommand,
  uninstallCommand,
  validateCommand,
} from './commands.ts';
import { runConfiguredChecks, runSingleCheck } from './executor.ts';

/** Lines of captured output shown per failed check. */
const FAILURE_EXCERPT_LINES = 20;

/**
 * Dependency overrides supplied when invoking `executeWithArgs`.
 *
 * Allows callers (tests or alternative entrypoints) to replace the
 * environment, the console, the runner, git and the dashboard.
 */
export interface MainDeps extends Partial<CommandDeps> {
  readonly argv?: readonly string[];
  readonly cwd?: string;
  readonly env?: EnvSnapshot;
  readonly terminal?: TerminalState;
  readonly console?: OutputConsole;
  readonly stdout?: NodeJS.WriteStream;
  readonly stderr?: NodeJS.WriteStream;
  readonly findRepositoryRootFn?: (cwd: string) => Promise<string | undefined>;
  readonly runConfiguredChecksFn?: typeof runConfiguredChecks;
  readonly runSingleCheckFn?: typeof runSingleCheck;
  readonly renderDashboardFn?: typeof renderDashboard;
}

/**
 * Result returned from `executeWithArgs`.
 */
export interface MainResult {
  readonly exitCode: number;
  readonly report?: RunReport;
}

interface RunDeps {
  readonly stdout: NodeJS.WriteStream;
  readonly stderr: NodeJS.WriteStream;
  readonly findRepositoryRootFn: (cwd: string) => Promise<string | undefined>;
  readonly runConfiguredChecksFn: typeof runConfiguredChecks;
  readonly runSingleCheckFn: typeof runSingleCheck;
  readonly renderDashboardFn: typeof renderDashboard;
}

type RunCommand = Extract<CLICommand, { readonly name: 'run' }>;

function resolveCommandDeps(deps: MainDeps): CommandDeps {
  return {
    loadConfigFn: deps.loadConfigFn ?? loadConfig,
    loadConfigOrDefaultFn: deps.loadConfigOrDefaultFn ?? loadConfigOrDefault,
    findConfigFileFn: deps.findConfigFileFn ?? findConfigFile,
    readFileFn: deps.readFileFn ?? ((filePath) => readFile(filePath, 'utf8')),
    writeFileFn: deps.writeFileFn ?? ((filePath, content) => writeFile(filePath, content, 'utf8')),
    pathExistsFn: deps.pathExistsFn ?? pathExists,
    discoverRepositoryFn: deps.discoverRepositoryFn ?? ((cwd) => discoverRepository(cwd)),
    resolveHooksDirFn: deps.resolveHooksDirFn ?? ((repo) => resolveHooksDir(repo)),
    installHookFn: deps.installHookFn ?? installHook,
    uninstallHookFn: deps.uninstallHookFn ?? uninstallHook,
  };
}

/* -------------------------------------------------------------------------- */
/* Summary                                                                    */
/* -------------------------------------------------------------------------- */

function formatSeconds(ms: number): string {
  return `${(ms / MS_PER_SECOND).toFixed(2)}s`;
}

/**
 * First `limit` lines of `text`, without the empty line a trailing newline
 * would produce.
 */
export function excerptLines(text: string, limit: number = FAILURE_EXCERPT_LINES): string[] {
  if (text.length === 0) {
    return [];
  }
  const lines = text.split('\n').map((line) => (line.endsWith('\r') ? line.slice(0, -1) : line));
  if (lines.at(-1) === '') {
    lines.pop();
  }
  return lines.slice(0, limit);
}

/**
 * Print the outcome of a run: a one-line success message, or the failure
 * count followed by an excerpt of each failed check's output.
 */
export function printRunSummary(report: RunReport, reporter: Reporter): void {
  const summary = summarizeReport(report);

  for (const result of report.results) {
    if (result.skipped) {
      reporter.detail(`Skipped: ${result.name} (${result.skipReason ?? 'disabled'})`);
    }
  }

  reporter.print('');
  if (isRunSuccessful(report)) {
    reporter.print(
      `All checks passed (${summary.passed} passed, ${summary.skipped} skipped) in ${formatSeconds(summary.durationMs)}`,
    );
    return;
  }

  reporter.print(`${summary.failed} check(s) failed`);
  for (const result of failedResults(report)) {
    reporter.print('');
    reporter.print(`  Failed: ${result.name}${result.outcome.timedOut ? ' (timed out)' : ''}`);
    for (const line of excerptLines(combinedOutput(result.outcome))) {
      reporter.print(`    ${line}`);
    }
  }
}

/* -------------------------------------------------------------------------- */
/* run                                                                        */
/* -------------------------------------------------------------------------- */

async function runCommand(
  command: RunCommand,
  context: CommandContext,
  deps: RunDeps,
): Promise<MainResult> {
  const { cwd, env, terminal, reporter } = context;

  if (env['APC_SKIP'] === '1') {
    reporter.info('Skipping checks (APC_SKIP=1)');
    return { exitCode: 0 };
  }

  const loaded = await context.deps.loadConfigOrDefaultFn(cwd);
  const { config } = loaded;
  reporter.detail(
    loaded.path === undefined ? 'Configuration: built-in defaults' : `Configuration: ${loaded.path}`,
  );

  let mode: Mode;
  if (command.mode === undefined) {
    const detection = detectMode(config, env, terminal);
    reporter.info(`Mode: ${detection.mode} (${describeReason(detection.reason)})`);
    mode = detection.mode;
  } else {
    mode = command.mode;
    reporter.detail(`Mode: ${mode} (--mode)`);
  }

  const repoRoot = await deps.findRepositoryRootFn(cwd);
  reporter.detail(
    repoRoot === undefined ? 'Repository root: none' : `Repository root: ${repoRoot}`,
  );

  const logDir = command.logDir === undefined ? undefined : path.resolve(cwd, command.logDir);
  if (logDir !== undefined) {
    reporter.detail(`Log directory: ${logDir}`);
  }

  const names = command.check === undefined ? modeConfigFor(config, mode).checks : [command.check];
  const dashboard = deps.renderDashboardFn(names, {
    mode,
    stdout: deps.stdout,
    stderr: deps.stderr,
    ...(logDir === undefined ? {} : { logDir }),
  });

  const options: RunOptions = {
    logFormat: command.logFormat,
    onStatusChange: dashboard.updateStatus,
    onWarning: reporter.warn,
    ...(repoRoot === undefined ? {} : { repoRoot }),
    ...(logDir === undefined ? {} : { logDir }),
    ...(command.maxLogBytes === undefined ? {} : { maxLogBytes: command.maxLogBytes }),
  };

  let report: RunReport;
  try {
    report =
      command.check === undefined
        ? await deps.runConfiguredChecksFn(config, mode, options)
        : await deps.runSingleCheckFn(config, command.check, mode, options);
  } finally {
    await dashboard.complete();
  }

  printRunSummary(report, reporter);
  return { exitCode: isRunSuccessful(report) ? 0 : 1, report };
}

/* -------------------------------------------------------------------------- */
/* Dispatch                                                                   */
/* -------------------------------------------------------------------------- */

async function dispatch(
  command: CLICommand,
  context: CommandContext,
  runDeps: RunDeps,
): Promise<MainResult> {
  switch (command.name) {
    case 'run': {
      return runCommand(command, context, runDeps);
    }
    case 'init': {
      return { exitCode: await initCommand(command, context) };
    }
    case 'install': {
      return { exitCode: await installCommand(command, context) };
    }
    case 'uninstall': {
      return { exitCode: await uninstallCommand(context) };
    }
    case 'detect': {
      return { exitCode: await detectCommand(context) };
    }
    case 'list': {
      return { exitCode: await listCommand(command, context) };
    }
    case 'validate': {
      return { exitCode: await validateCommand(context) };
    }
    case 'config': {
      return { exitCode: await configCommand(command, context) };
    }
  }
}

/**
 * Execute a parsed command with optional dependency overrides.
 *
 * Errors are reported on stderr and mapped to an exit code; they never
 * escape.
 */
export async function executeWithArgs(args: CLIArgs, deps: MainDeps = {}): Promise<MainResult> {
  const stdout = deps.stdout ?? process.stdout;
  const stderr = deps.stderr ?? process.stderr;
  const scopedConsole = deps.console ?? new Console({ stdout, stderr });
  const reporter = createReporter(scopedConsole, { verbose: args.verbose, quiet: args.quiet });

  const context: CommandContext = {
    cwd: deps.cwd ?? process.cwd(),
    env: deps.env ?? process.env,
    terminal: deps.terminal ?? currentTerminalState(),
    reporter,
    deps: resolveCommandDeps(deps),
  };
  const runDeps: RunDeps = {
    stdout,
    stderr,
    findRepositoryRootFn: deps.findRepositoryRootFn ?? ((cwd) => findRepositoryRoot(cwd)),
    runConfiguredChecksFn: deps.runConfiguredChecksFn ?? runConfiguredChecks,
    runSingleCheckFn: deps.runSingleCheckFn ?? runSingleCheck,
    renderDashboardFn: deps.renderDashboardFn ?? renderDashboard,
  };

  try {
    return await dispatch(args.command, context, runDeps);
  } catch (err: unknown) {
    reporter.error(formatErrorMessage(err));
    return { exitCode: exitCodeForError(err) };
  }
}
