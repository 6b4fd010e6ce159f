/**
 * Process execution and management utilities.
 *
 * `executeCommand` is the only place a check's command text reaches a shell.
 */

import { type ChildProcess, spawn } from 'node:child_process';
import type { Readable } from 'node:stream';
import { StringDecoder } from 'node:string_decoder';

import { ProcessError } from '../../../errors/errors.ts';
import { DEFAULT_TIMEOUT_MS, TIMEOUT_EXIT_CODE } from '../../constants/time.ts';
import type { CommandOutcome, ExecutionOptions } from '../types.ts';

const IS_WINDOWS = process.platform === 'win32';

/** Largest delay `setTimeout` honours; longer delays fire immediately. */
export const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

const activeChildren = new Set<ChildProcess>();
let interruptedBy: NodeJS.Signals | undefined;

interface OutputCollector {
  /** Settles once the stream has ended. */
  readonly drained: Promise<void>;
  /** Complete lines received so far, each terminated by `\n`. */
  text(): string;
}

const EMPTY_COLLECTOR: OutputCollector = { drained: Promise.resolve(), text: () => '' };

/**
 * Line-buffer a child stream. CRLF endings are normalized to `\n`; a final
 * unterminated line is kept and terminated when the stream ends.
 */
function collectLines(stream: Readable | null, label: string): OutputCollector {
  if (stream === null) {
    return EMPTY_COLLECTOR;
  }

  const decoder = new StringDecoder('utf8');
  let text = '';
  let pending = '';

  const pushLines = (): void => {
    let newline = pending.indexOf('\n');
    while (newline !== -1) {
      const line = pending.slice(0, newline);
      text += `${line.endsWith('\r') ? line.slice(0, -1) : line}\n`;
      pending = pending.slice(newline + 1);
      newline = pending.indexOf('\n');
    }
  };

  const drained = new Promise<void>((resolve, reject) => {
    stream.on('data', (chunk: Buffer) => {
      pending += decoder.write(chunk);
      pushLines();
    });
    stream.once('end', () => {
      pending += decoder.end();
      pushLines();
      if (pending.length > 0) {
        text += `${pending.endsWith('\r') ? pending.slice(0, -1) : pending}\n`;
        pending = '';
      }
      resolve();
    });
    stream.once('error', (err: Error) => {
      reject(
        new ProcessError('PROCESS_OUTPUT_FAILED', `Failed to read ${label}: ${err.message}`, {
          cause: err,
        }),
      );
    });
  });

  return { drained, text: () => text };
}

function shellInvocation(command: string): { readonly file: string; readonly args: string[] } {
  return IS_WINDOWS
    ? { file: 'cmd', args: ['/C', command] }
    : { file: 'sh', args: ['-c', command] };
}

/**
 * Run a shell command with a hard timeout.
 *
 * A non-zero exit is a normal outcome. Only operational problems (the shell
 * cannot be spawned, output cannot be read) reject.
 *
 * @param command - Complete shell program, passed verbatim to the shell.
 * @param options - Working directory, timeout, environment overrides and
 *   output capture.
 * @returns Exit status, captured text, timeout flag and wall-clock duration.
 */
export async function executeCommand(
  command: string,
  options: ExecutionOptions = {},
): Promise<CommandOutcome> {
  if (interruptedBy !== undefined) {
    throw new ProcessError('PROCESS_INTERRUPTED', `Interrupted by ${interruptedBy}`, {
      details: { command },
    });
  }

  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const capture = options.captureOutput ?? true;
  const { file, args } = shellInvocation(command);
  const start = performance.now();
  const elapsed = (): number => performance.now() - start;

  const child = spawn(file, args, {
    cwd: options.cwd,
    env: { ...process.env, ...Object.fromEntries(options.env ?? []) },
    stdio: ['ignore', capture ? 'pipe' : 'inherit', capture ? 'pipe' : 'inherit'],
    detached: !IS_WINDOWS,
    windowsVerbatimArguments: IS_WINDOWS,
  });

  activeChildren.add(child);
  child.once('exit', () => activeChildren.delete(child));

  const stdout = collectLines(child.stdout, 'stdout');
  const stderr = collectLines(child.stderr, 'stderr');

  const exited = new Promise<number>((resolve, reject) => {
    child.once('error', (err: Error) => {
      activeChildren.delete(child);
      reject(
        new ProcessError('PROCESS_SPAWN_FAILED', `Failed to spawn shell: ${err.message}`, {
          cause: err,
          details: { command },
        }),
      );
    });
    // A null code means the process died from a signal.
    child.once('exit', (code) => resolve(code ?? 1));
  });

  const completion = Promise.all([exited, stdout.drained, stderr.drained]);

  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<'timeout'>((resolve) => {
    const arm = (remaining: number): void => {
      timer = setTimeout(() => {
        const left = timeoutMs - elapsed();
        if (left <= 0) {
          resolve('timeout');
        } else {
          arm(left);
        }
      }, timerDelay(remaining));
    };
    arm(timeoutMs);
  });

  try {
    const settled = await Promise.race([completion, deadline]);

    if (settled === 'timeout') {
      const partial = { stdout: stdout.text(), stderr: stderr.text() };
      killProcessTree(child);
      child.stdout?.destroy();
      child.stderr?.destroy();
      await Promise.allSettled([exited]);
      return {
        exitCode: TIMEOUT_EXIT_CODE,
        ...partial,
        timedOut: true,
        durationMs: elapsed(),
      };
    }

    const [exitCode] = settled;
    return {
      exitCode,
      stdout: stdout.text(),
      stderr: stderr.text(),
      timedOut: false,
      durationMs: elapsed(),
    };
  } catch (err: unknown) {
    // Output failures leave the shell running; make sure it is reaped.
    if (child.exitCode === null && child.signalCode === null && child.pid !== undefined) {
      killProcessTree(child);
      await Promise.allSettled([exited]);
    }
    throw err;
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Delay for one timer tick towards a deadline `remainingMs` away. Deadlines
 * beyond `MAX_TIMER_DELAY_MS` are reached by re-arming.
 */
export function timerDelay(remainingMs: number): number {
  return Math.min(Math.max(remainingMs, 0), MAX_TIMER_DELAY_MS);
}

function signalGroup(pid: number): boolean {
  try {
    process.kill(-pid, 'SIGKILL');
    return true;
  } catch {
    return false;
  }
}

/**
 * Forcefully terminate a child and everything it started.
 *
 * POSIX children are spawned as process-group leaders, so the whole group is
 * signalled; Windows uses `taskkill /T`.
 */
export function killProcessTree(child: ChildProcess): void {
  const pid = child.pid;
  /* v8 ignore next 3 */
  if (pid === undefined || pid === 0) {
    return;
  }

  /* v8 ignore next 8 */
  if (IS_WINDOWS) {
    spawn(String.raw`C:\Windows\System32\taskkill.exe`, ['/pid', String(pid), '/T', '/F'], {
      stdio: 'ignore',
    }).once('error', () => {
      child.kill('SIGKILL');
    });
    return;
  }

  if (!signalGroup(pid)) {
    child.kill('SIGKILL');
  }
}

/**
 * Kill every running child and refuse to start new ones. Installed as the
 * SIGINT/SIGTERM handler so an interrupted run ends promptly.
 *
 * @returns Number of process trees signalled.
 */
export function interruptActiveProcesses(signal: NodeJS.Signals): number {
  interruptedBy = signal;
  let count = 0;
  for (const child of activeChildren) {
    killProcessTree(child);
    count += 1;
  }
  return count;
}

export const __test__ = {
  activeChildCount: (): number => activeChildren.size,
  resetInterruption: (): void => {
    interruptedBy = undefined;
  },
};
