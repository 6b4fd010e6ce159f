/**
 * CLI Entrypoint
 *
 * Role:
 *   Handle process-level concerns (broken pipe, signals, uncaught errors).
 *
 * Responsibilities:
 *   - Set up EPIPE error handling
 *   - Parse argv and answer `--help` / `--version`
 *   - Turn the command result into the process exit code
 *   - Enable module self-execution detection
 */

import { pathToFileURL } from 'node:url';

import { AppError, exitCodeForError, formatErrorMessage, isAppError } from '../../../errors/errors.ts';
import type { MainDeps, MainResult } from '../../execution/execution.ts';
import { executeWithArgs } from '../../execution/execution.ts';
import type { CLIArgs } from '../../input/args.ts';
import { parseCliArgs } from '../../input/args.ts';
import { interruptActiveProcesses } from '../../modules/process-manager/process-manager.ts';
import { showHelp } from '../help/formatter.ts';
import { showVersion } from '../help/help.ts';

export interface EntrypointDeps {
  readonly mainFn?: () => Promise<{ exitCode: number }>;
  readonly console?: Pick<typeof console, 'error'>;
  /**
   * Shutdown handler invoked on the first SIGINT/SIGTERM. Defaults to
   * killing every running check.
   */
  readonly onSignal?: (signal: 'SIGINT' | 'SIGTERM') => Promise<void> | void;
}

/**
 * Ignore EPIPE raised when the reading end of a pipe goes away (`apc list |
 * head`); rethrow anything else.
 */
function handleBrokenPipe(err: NodeJS.ErrnoException): void {
  if (err.code === 'EPIPE') {
    return;
  }

  throw err;
}

function setupBrokenPipeHandlers(): void {
  process.stdout.on('error', handleBrokenPipe);
  process.stderr.on('error', handleBrokenPipe);
}

/**
 * Register SIGINT/SIGTERM handlers.
 *
 * @returns Cleanup function that unregisters the signal listeners.
 */
function setupSignalHandlers(
  onSignal: (signal: 'SIGINT' | 'SIGTERM') => Promise<void> | void,
  errorConsole: Pick<typeof console, 'error'>,
): () => void {
  let handling = false;

  const createHandler = (signal: 'SIGINT' | 'SIGTERM') => () => {
    if (handling) {
      return;
    }

    handling = true;

    // 128 + signal number
    process.exitCode = signal === 'SIGINT' ? 130 : 143;

    try {
      const maybe = onSignal(signal);
      if (maybe instanceof Promise) {
        maybe.catch((e: unknown) => errorConsole.error('\nWARN: signal handler failed:', e));
      }
    } catch (e: unknown) {
      errorConsole.error('\nWARN: signal handler failed:', e);
    }
  };

  const sigintHandler = createHandler('SIGINT');
  const sigtermHandler = createHandler('SIGTERM');

  process.on('SIGINT', sigintHandler);
  process.on('SIGTERM', sigtermHandler);

  return () => {
    process.off('SIGINT', sigintHandler);
    process.off('SIGTERM', sigtermHandler);
  };
}

function stopRunningChecks(signal: 'SIGINT' | 'SIGTERM'): void {
  interruptActiveProcesses(signal);
}

/**
 * Scrub argv values for logging: option values and positionals are
 * replaced by `<redacted>`, flag names are kept.
 */
function sanitizeArgs(argv: readonly (string | undefined)[]): string[] {
  return argv.map((arg) => {
    if (typeof arg !== 'string') {
      return '<redacted>';
    }

    if (arg.startsWith('--')) {
      const equals = arg.indexOf('=');
      return equals === -1 ? arg : `${arg.slice(0, equals)}=<redacted>`;
    }
    if (arg.startsWith('-')) {
      return arg;
    }
    return '<redacted>';
  });
}

/**
 * Parse argv, answer `--help` and `--version`, and run the selected command.
 *
 * @param deps - Optional argv, console and execution overrides.
 */
export async function main(deps: MainDeps = {}): Promise<MainResult> {
  const { argv = process.argv.slice(2) } = deps;
  const output = deps.console ?? console;

  let args: CLIArgs;
  try {
    args = parseCliArgs(argv);
  } catch (err: unknown) {
    output.error(`error: ${formatErrorMessage(err)}`);
    output.error("Run 'apc --help' for usage.");
    return { exitCode: exitCodeForError(err) };
  }

  if (args.help) {
    output.log(showHelp());
    return { exitCode: 0 };
  }

  if (args.version) {
    output.log(showVersion());
    return { exitCode: 0 };
  }

  return executeWithArgs(args, deps);
}

/**
 * Execute the CLI entrypoint logic, wiring up broken pipes, signal handling,
 * and top-level error reporting.
 *
 * A signal exit code set while the command runs takes precedence over the
 * command's own result.
 *
 * @param deps - Optional overrides for dependencies used during startup.
 */
export function runEntrypoint(deps: EntrypointDeps = {}): void {
  const { mainFn = main, console: injectedConsole, onSignal = stopRunningChecks } = deps;
  const errorConsole = injectedConsole ?? console;

  setupBrokenPipeHandlers();
  const removeSignalHandlers = setupSignalHandlers(onSignal, errorConsole);

  void mainFn()
    .then((result) => {
      if (process.exitCode === undefined) {
        process.exitCode = result.exitCode;
      }
    })
    .catch((error: unknown) => {
      const wrapped = isAppError(error)
        ? error
        : new AppError('UNEXPECTED_ERROR', error instanceof Error ? error.message : String(error), {
            cause: error,
            details: { context: { argv: sanitizeArgs(process.argv.slice(2)) } },
          });

      errorConsole.error('\nFatal error:', wrapped);
      process.exitCode = exitCodeForError(wrapped);
    })
    .finally(removeSignalHandlers);
}

/**
 * Test-only access to the process-level helpers.
 */
export const __test__ = {
  handleBrokenPipe,
  sanitizeArgs,
};

/* -------------------------------------------------------------------------- */
/* Module self-execution detection                                            */
/* -------------------------------------------------------------------------- */

const entryUrl = process.argv[1] === undefined ? null : pathToFileURL(process.argv[1]).href;

if (entryUrl !== null && import.meta.url === entryUrl) {
  runEntrypoint();
}
