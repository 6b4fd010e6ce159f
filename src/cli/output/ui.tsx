/**
 * Check Dashboard
 *
 * Role:
 *   Read-only rendering of check execution state.
 *
 * Guarantees:
 *   - No business logic
 *   - Stable rendering under rapid updates
 *   - Checks that never start stay PENDING
 *
 * Non-goals:
 *   - Progress estimation
 *   - Execution control
 */

import pathLib from 'node:path';
import { pathToFileURL } from 'node:url';

import { Box, render, Text } from 'ink';
import Spinner from 'ink-spinner';
import React, { useEffect, useMemo, useState } from 'react';

import type { CheckStatus, Mode } from '../modules/types.ts';
import { getLogPath } from '../observability/logger.ts';

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

interface CheckState {
  readonly key: string;
  readonly name: string;
  readonly status: CheckStatus;
  readonly logPath?: string;
}

type StatusEvent =
  | { readonly kind: 'status'; readonly name: string; readonly status: CheckStatus }
  | { readonly kind: 'complete' };

interface DashboardProps {
  readonly initialStates: readonly CheckState[];
  readonly mode: Mode;
  readonly onComplete: () => void;
  readonly subscribe: (listener: (event: StatusEvent) => void) => void;
}

/** Anything text can be written to. */
export interface TextSink {
  write(text: string): unknown;
}

export interface DashboardOptions {
  readonly mode: Mode;
  readonly logDir?: string;
  readonly stdout?: NodeJS.WriteStream;
  readonly stderr?: NodeJS.WriteStream;
}

export interface DashboardHandle {
  readonly updateStatus: (this: void, name: string, status: CheckStatus) => void;
  /** Freeze the display; resolves once the final frame is written. */
  readonly complete: (this: void) => Promise<void>;
}

/* -------------------------------------------------------------------------- */
/* Utilities                                                                  */
/* -------------------------------------------------------------------------- */

function supportsOsc8(): boolean {
  const term = process.env['TERM'];
  const termProgram = process.env['TERM_PROGRAM'];

  if (termProgram === 'iTerm.app' || termProgram === 'WezTerm') {
    return true;
  }

  // Linux console doesn't support OSC8
  if (typeof term === 'string' && term.includes('linux')) {
    return false;
  }

  return typeof term === 'string' && term !== '' && term !== 'dumb';
}

function createHyperlink(text: string, url: string): string {
  return `\u001b]8;;${url}\u0007${text}\u001b]8;;\u0007`;
}

/**
 * Color output follows https://no-color.org/ and `TERM=dumb`.
 */
function supportsColor(): boolean {
  if (process.env['NO_COLOR'] !== undefined) {
    return false;
  }
  return process.env['TERM'] !== 'dumb';
}

const ANSI = supportsColor()
  ? {
      reset: '\u001b[0m',
      bold: '\u001b[1m',
      dim: '\u001b[2m',
      underline: '\u001b[4m',
      red: '\u001b[31m',
      green: '\u001b[32m',
      yellow: '\u001b[33m',
      blue: '\u001b[34m',
      magenta: '\u001b[35m',
      cyan: '\u001b[36m',
    }
  : {
      reset: '',
      bold: '',
      dim: '',
      underline: '',
      red: '',
      green: '',
      yellow: '',
      blue: '',
      magenta: '',
      cyan: '',
    };

function colorize(text: string, ...codes: readonly string[]): string {
  return `${codes.join('')}${text}${ANSI.reset}`;
}

/* -------------------------------------------------------------------------- */
/* Status rendering (shared between TTY and non-TTY)                         */
/* -------------------------------------------------------------------------- */

/**
 * Each status carries a symbol as well as a color.
 */
const STATUS_CONFIG = {
  PENDING: { symbol: '○', label: 'PENDING', color: 'gray', ansiColor: ANSI.dim },
  RUNNING: { symbol: '◐', label: 'RUNNING', color: 'blue', ansiColor: ANSI.blue },
  PASS: { symbol: '✔', label: 'PASS', color: 'green', ansiColor: ANSI.green },
  FAIL: { symbol: '✘', label: 'FAIL', color: 'red', ansiColor: ANSI.red },
  TIMEOUT: { symbol: '⧗', label: 'TIMEOUT', color: 'magenta', ansiColor: ANSI.magenta },
  SKIPPED: { symbol: '⊝', label: 'SKIPPED', color: 'yellow', ansiColor: ANSI.yellow },
} as const satisfies Record<CheckStatus, { symbol: string; label: string; color: string; ansiColor: string }>;

const UI_CONSTANTS = {
  COLUMN_WIDTH: {
    CHECK: 28,
    STATUS: 16,
    LOG: 40,
  },
  TITLE: 'AGENT-PRECOMMIT',
  HEADERS: {
    CHECK: 'Check',
    STATUS: 'Status',
    LOG: 'Log',
  },
} as const;

interface StatusSummary {
  readonly total: number;
  readonly pass: number;
  readonly fail: number;
  readonly timeout: number;
  readonly skipped: number;
}

function summarizeStates(states: readonly CheckState[]): StatusSummary {
  return {
    total: states.length,
    pass: states.filter((s) => s.status === 'PASS').length,
    fail: states.filter((s) => s.status === 'FAIL').length,
    timeout: states.filter((s) => s.status === 'TIMEOUT').length,
    skipped: states.filter((s) => s.status === 'SKIPPED').length,
  };
}

function initialStates(names: readonly string[], logDir?: string): CheckState[] {
  return names.map((name, index) => ({
    key: `${index}:${name}`,
    name,
    status: 'PENDING',
    ...(logDir === undefined ? {} : { logPath: getLogPath(logDir, name) }),
  }));
}

function applyStatus(
  states: readonly CheckState[],
  name: string,
  status: CheckStatus,
): CheckState[] {
  return states.map((s) => (s.name === name && s.status !== status ? { ...s, status } : s));
}

function modeTitle(mode: Mode): string {
  return `${UI_CONSTANTS.TITLE} (${mode} mode)`;
}

/* -------------------------------------------------------------------------- */
/* Components                                                                 */
/* -------------------------------------------------------------------------- */

const Header: React.FC<{ readonly mode: Mode }> = ({ mode }) => (
  <Box borderStyle="round" borderColor="cyan" paddingX={2} justifyContent="center">
    <Text bold>{modeTitle(mode)}</Text>
  </Box>
);

const StatusIndicator: React.FC<{ readonly status: CheckStatus }> = ({ status }) => {
  const config = STATUS_CONFIG[status];

  if (status === 'RUNNING') {
    return (
      <Text color={config.color}>
        <Spinner type="dots" /> {config.label}
      </Text>
    );
  }

  return (
    <Text color={config.color}>
      {config.symbol} {config.label}
    </Text>
  );
};

const LogLink: React.FC<{ readonly path?: string; readonly status: CheckStatus }> = ({
  path,
  status,
}) => {
  if (path === undefined || status === 'PENDING' || status === 'RUNNING') {
    return <Text dimColor>-</Text>;
  }

  const display = supportsOsc8()
    ? createHyperlink('View Log', pathToFileURL(pathLib.resolve(path)).href)
    : path;

  return <Text>{display}</Text>;
};

const StatusTable: React.FC<{ readonly states: readonly CheckState[] }> = ({ states }) => (
  <Box flexDirection="column" marginY={1}>
    <Box>
      <Box width={UI_CONSTANTS.COLUMN_WIDTH.CHECK}>
        <Text bold underline>
          {UI_CONSTANTS.HEADERS.CHECK}
        </Text>
      </Box>
      <Box width={UI_CONSTANTS.COLUMN_WIDTH.STATUS}>
        <Text bold underline>
          {UI_CONSTANTS.HEADERS.STATUS}
        </Text>
      </Box>
      <Box width={UI_CONSTANTS.COLUMN_WIDTH.LOG}>
        <Text bold underline>
          {UI_CONSTANTS.HEADERS.LOG}
        </Text>
      </Box>
    </Box>

    {states.map((s) => (
      <Box key={s.key}>
        <Box width={UI_CONSTANTS.COLUMN_WIDTH.CHECK}>
          <Text wrap="truncate-end">{s.name}</Text>
        </Box>
        <Box width={UI_CONSTANTS.COLUMN_WIDTH.STATUS}>
          <StatusIndicator status={s.status} />
        </Box>
        <Box width={UI_CONSTANTS.COLUMN_WIDTH.LOG}>
          <LogLink status={s.status} {...(s.logPath === undefined ? {} : { path: s.logPath })} />
        </Box>
      </Box>
    ))}
  </Box>
);

const SummaryFooter: React.FC<{
  readonly states: readonly CheckState[];
  readonly duration: number;
}> = ({ states, duration }) => {
  const summary = useMemo(() => summarizeStates(states), [states]);

  return (
    <Box borderStyle="single" borderColor="gray" paddingX={1} flexDirection="column">
      <Text>
        Total: {summary.total} |{' '}
        <Text color="green" bold>
          ✔ Pass: {summary.pass}
        </Text>{' '}
        |{' '}
        <Text color="red" bold>
          ✘ Fail: {summary.fail}
        </Text>{' '}
        |{' '}
        <Text color="magenta" bold>
          ⧗ Timeout: {summary.timeout}
        </Text>{' '}
        |{' '}
        <Text color="yellow" dimColor>
          ⊝ Skipped: {summary.skipped}
        </Text>
      </Text>
      <Text>Duration: {(duration / 1000).toFixed(2)}s</Text>
    </Box>
  );
};

/* -------------------------------------------------------------------------- */
/* Non-TTY renderer                                                           */
/* -------------------------------------------------------------------------- */

function statusLabel(status: CheckStatus): string {
  const config = STATUS_CONFIG[status];
  return colorize(`${config.symbol} ${config.label}`, config.ansiColor);
}

function renderStaticDashboard(
  states: readonly CheckState[],
  mode: Mode,
  duration: number,
  sink: TextSink,
): void {
  const { CHECK: widthCheck, STATUS: widthStatus } = UI_CONSTANTS.COLUMN_WIDTH;

  const header = colorize(modeTitle(mode), ANSI.bold, ANSI.cyan);
  const headerRow =
    colorize(UI_CONSTANTS.HEADERS.CHECK.padEnd(widthCheck), ANSI.bold, ANSI.underline) +
    colorize(UI_CONSTANTS.HEADERS.STATUS.padEnd(widthStatus), ANSI.bold, ANSI.underline) +
    colorize(UI_CONSTANTS.HEADERS.LOG, ANSI.bold, ANSI.underline);

  const lines = [header, '', headerRow];

  for (const state of states) {
    const config = STATUS_CONFIG[state.status];
    const plainLabel = `${config.symbol} ${config.label}`;
    const padding = ' '.repeat(Math.max(1, widthStatus - plainLabel.length));
    const logDisplay =
      state.logPath === undefined || state.status === 'PENDING'
        ? colorize('-', ANSI.dim)
        : state.logPath;
    lines.push(`${state.name.padEnd(widthCheck)}${statusLabel(state.status)}${padding}${logDisplay}`);
  }

  const summary = summarizeStates(states);
  const passLabel = colorize(`Pass: ${summary.pass}`, ANSI.green);
  const failLabel = colorize(`Fail: ${summary.fail}`, ANSI.red);
  const timeoutLabel = colorize(`Timeout: ${summary.timeout}`, ANSI.magenta);
  const skippedLabel = colorize(`Skipped: ${summary.skipped}`, ANSI.yellow);

  lines.push(
    '',
    `Total: ${summary.total} | ${passLabel} | ${failLabel} | ${timeoutLabel} | ${skippedLabel}`,
    `Duration: ${(duration / 1000).toFixed(2)}s`,
    '',
  );

  sink.write(`${lines.join('\n')}\n`);
}

/* -------------------------------------------------------------------------- */
/* Dashboard                                                                  */
/* -------------------------------------------------------------------------- */

const Dashboard: React.FC<DashboardProps> = ({ initialStates: seed, mode, subscribe, onComplete }) => {
  const [states, setStates] = useState<readonly CheckState[]>(seed);
  const [startTime] = useState(() => Date.now());
  const [done, setDone] = useState(false);
  const [duration, setDuration] = useState(0);

  useEffect(() => {
    subscribe((event) => {
      if (event.kind === 'status') {
        setStates((prev) => applyStatus(prev, event.name, event.status));
        return;
      }
      setDuration(Date.now() - startTime);
      setDone(true);
    });
  }, [subscribe, startTime]);

  useEffect(() => {
    if (done) {
      onComplete();
    }
  }, [done, onComplete]);

  return (
    <Box flexDirection="column">
      <Header mode={mode} />
      <StatusTable states={states} />
      {done && <SummaryFooter states={states} duration={duration} />}
    </Box>
  );
};

function createStaticRenderer(
  names: readonly string[],
  options: { readonly mode: Mode; readonly logDir?: string },
  sink: TextSink,
): DashboardHandle {
  let states = initialStates(names, options.logDir);
  const startTime = Date.now();
  let rendered = false;

  return {
    updateStatus: (name, status) => {
      states = applyStatus(states, name, status);
    },
    complete: () => {
      if (!rendered) {
        rendered = true;
        renderStaticDashboard(states, options.mode, Date.now() - startTime, sink);
      }
      return Promise.resolve();
    },
  };
}

// Exposed for tests to exercise the non-TTY path and utility branches.
export const __test__ = {
  createStaticRenderer,
  renderStaticDashboard,
  supportsColor,
  supportsOsc8,
};

/* -------------------------------------------------------------------------- */
/* Public API                                                                 */
/* -------------------------------------------------------------------------- */

/**
 * Show a status row per check: a live Ink view on a terminal, a single
 * static table otherwise.
 *
 * @param names - Check names in run order.
 */
export function renderDashboard(
  names: readonly string[],
  options: DashboardOptions,
): DashboardHandle {
  const stdout = options.stdout ?? process.stdout;
  const stderr = options.stderr ?? process.stderr;

  if (!stdout.isTTY) {
    return createStaticRenderer(names, options, stdout);
  }

  let listener: ((event: StatusEvent) => void) | undefined;
  const pending: StatusEvent[] = [];
  const emit = (event: StatusEvent): void => {
    if (listener === undefined) {
      pending.push(event);
    } else {
      listener(event);
    }
  };

  let resolveExit: () => void = () => undefined;
  const exitPromise = new Promise<void>((resolve) => {
    resolveExit = resolve;
  });

  const { unmount } = render(
    <Dashboard
      initialStates={initialStates(names, options.logDir)}
      mode={options.mode}
      subscribe={(l) => {
        listener = l;
        for (const event of pending.splice(0)) {
          l(event);
        }
      }}
      onComplete={resolveExit}
    />,
    { stdout, stderr },
  );

  return {
    updateStatus: (name, status) => emit({ kind: 'status', name, status }),
    complete: async () => {
      emit({ kind: 'complete' });
      await exitPromise;
      unmount();
    },
  };
}
