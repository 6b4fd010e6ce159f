/**
 * CLI Argument Parsing
 *
 * Role:
 *   Turn raw argv into a typed command.
 *
 * Responsibilities:
 *   - Resolve the subcommand (default `run`) and its aliases
 *   - Reject options that do not belong to the chosen subcommand
 *   - Validate option values
 *   - Map parse errors to descriptive CliErrors
 */

import { parseArgs } from 'node:util';

import { CliError, isAppError } from '../../errors/errors.ts';
import { availablePresets, findPreset } from '../config/check-registry.ts';
import { parseMode } from '../config/mode.ts';
import type { LogFormat, Mode } from '../modules/types.ts';

/* -------------------------------------------------------------------------- */
/* CLI argument model                                                          */
/* -------------------------------------------------------------------------- */

export const COMMAND_NAMES = [
  'run',
  'init',
  'install',
  'uninstall',
  'detect',
  'list',
  'validate',
  'config',
] as const;

export type CommandName = (typeof COMMAND_NAMES)[number];

const COMMAND_ALIASES: ReadonlyMap<string, CommandName> = new Map<string, CommandName>([
  ['r', 'run'],
  ['i', 'init'],
  ['d', 'detect'],
  ['l', 'list'],
  ['v', 'validate'],
]);

export type CLICommand =
  | {
      readonly name: 'run';
      readonly mode?: Mode;
      readonly check?: string;
      readonly logDir?: string;
      readonly logFormat: LogFormat;
      readonly maxLogBytes?: number;
    }
  | { readonly name: 'init'; readonly preset?: string; readonly force: boolean }
  | { readonly name: 'install'; readonly force: boolean }
  | { readonly name: 'uninstall' }
  | { readonly name: 'detect' }
  | { readonly name: 'list'; readonly mode?: Mode }
  | { readonly name: 'validate' }
  | { readonly name: 'config'; readonly raw: boolean };

/**
 * Parsed CLI arguments normalized into strongly typed properties.
 */
export interface CLIArgs {
  readonly command: CLICommand;
  readonly help: boolean;
  readonly version: boolean;
  readonly verbose: boolean;
  readonly quiet: boolean;
}

/* -------------------------------------------------------------------------- */
/* Argument parsing                                                            */
/* -------------------------------------------------------------------------- */

const OPTIONS = {
  help: { type: 'boolean', short: 'h', default: false },
  version: { type: 'boolean', short: 'V', default: false },
  verbose: { type: 'boolean', short: 'v', default: false },
  quiet: { type: 'boolean', short: 'q', default: false },
  mode: { type: 'string', short: 'm' },
  check: { type: 'string', short: 'c' },
  'log-dir': { type: 'string' },
  'structured-logs': { type: 'boolean', default: false },
  'raw-logs': { type: 'boolean', default: false },
  'max-log-bytes': { type: 'string' },
  preset: { type: 'string', short: 'p' },
  force: { type: 'boolean', short: 'f', default: false },
  raw: { type: 'boolean', default: false },
} as const;

type OptionName = keyof typeof OPTIONS;

const GLOBAL_OPTIONS: readonly OptionName[] = ['help', 'version', 'verbose', 'quiet'];

const COMMAND_OPTIONS: Readonly<Record<CommandName, readonly OptionName[]>> = {
  run: ['mode', 'check', 'log-dir', 'structured-logs', 'raw-logs', 'max-log-bytes'],
  init: ['preset', 'force'],
  install: ['force'],
  uninstall: [],
  detect: [],
  list: ['mode'],
  validate: [],
  config: ['raw'],
};

/**
 * Parse the raw argv array into structured CLI arguments.
 *
 * @param argv - Raw arguments (defaults to `process.argv.slice(2)`).
 * @throws {CliError} when parsing fails or validation rejects the inputs.
 */
export function parseCliArgs(argv: readonly string[] = process.argv.slice(2)): CLIArgs {
  try {
    const { values, positionals, tokens } = parseArgs({
      args: [...argv],
      strict: true,
      allowPositionals: true,
      tokens: true,
      options: OPTIONS,
    });

    const given = new Set(
      tokens.flatMap((token) => (token.kind === 'option' ? [token.name] : [])),
    );
    return normalizeCliArgs(values, positionals, given);
  } catch (error) {
    throw mapParseArgsError(error);
  }
}

type RawCliValues = {
  readonly help?: boolean;
  readonly version?: boolean;
  readonly verbose?: boolean;
  readonly quiet?: boolean;
  readonly mode?: string;
  readonly check?: string;
  readonly 'log-dir'?: string;
  readonly 'structured-logs'?: boolean;
  readonly 'raw-logs'?: boolean;
  readonly 'max-log-bytes'?: string;
  readonly preset?: string;
  readonly force?: boolean;
  readonly raw?: boolean;
};

function resolveCommandName(positional: string | undefined): CommandName {
  if (positional === undefined) {
    return 'run';
  }
  const command =
    COMMAND_NAMES.find((name) => name === positional) ?? COMMAND_ALIASES.get(positional);
  if (command === undefined) {
    throw new CliError('CLI_INVALID_ARGUMENT', `Unknown command: ${positional}`);
  }
  return command;
}

function nonEmpty(value: string | undefined, message: string): string | undefined {
  if (value !== undefined && value.trim().length === 0) {
    throw new CliError('CLI_INVALID_ARGUMENT', message);
  }
  return value;
}

function parseMaxLogBytes(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const bytes = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(bytes) || bytes <= 0) {
    throw new CliError('CLI_INVALID_ARGUMENT', '--max-log-bytes requires a positive integer');
  }
  return bytes;
}

function logFormatFor(values: RawCliValues): LogFormat {
  if (values['structured-logs'] === true && values['raw-logs'] === true) {
    throw new CliError(
      'CLI_INVALID_ARGUMENT',
      '--structured-logs and --raw-logs cannot be used together',
    );
  }
  if (values['structured-logs'] === true) {
    return 'json';
  }
  return values['raw-logs'] === true ? 'raw' : 'text';
}

function buildCommand(name: CommandName, values: RawCliValues): CLICommand {
  switch (name) {
    case 'run': {
      const check = nonEmpty(values.check, '--check requires a check name');
      const logDir = nonEmpty(values['log-dir'], '--log-dir requires a path');
      const maxLogBytes = parseMaxLogBytes(values['max-log-bytes']);
      return {
        name,
        ...(values.mode === undefined ? {} : { mode: parseMode(values.mode) }),
        ...(check === undefined ? {} : { check }),
        ...(logDir === undefined ? {} : { logDir }),
        logFormat: logFormatFor(values),
        ...(maxLogBytes === undefined ? {} : { maxLogBytes }),
      };
    }
    case 'init': {
      const preset = values.preset;
      if (preset !== undefined && findPreset(preset) === undefined) {
        throw new CliError(
          'CLI_INVALID_ARGUMENT',
          `Unknown preset: ${preset}. Available presets: ${availablePresets().join(', ')}`,
        );
      }
      return {
        name,
        ...(preset === undefined ? {} : { preset }),
        force: values.force === true,
      };
    }
    case 'install':
      return { name, force: values.force === true };
    case 'list':
      return { name, ...(values.mode === undefined ? {} : { mode: parseMode(values.mode) }) };
    case 'config':
      return { name, raw: values.raw === true };
    case 'uninstall':
    case 'detect':
    case 'validate':
      return { name };
  }
}

/**
 * Normalize the `parseArgs` output into our CLI shape and enforce validation rules.
 */
function normalizeCliArgs(
  values: RawCliValues,
  positionals: readonly string[],
  given: ReadonlySet<string>,
): CLIArgs {
  const [first, extra] = positionals;
  if (extra !== undefined) {
    throw new CliError('CLI_INVALID_ARGUMENT', `Unexpected argument: ${extra}`);
  }

  const name = resolveCommandName(first);
  const allowed = new Set<string>([...GLOBAL_OPTIONS, ...COMMAND_OPTIONS[name]]);
  for (const option of given) {
    if (!allowed.has(option)) {
      throw new CliError(
        'CLI_INVALID_ARGUMENT',
        `Option --${option} is not valid for '${name}'`,
      );
    }
  }

  return {
    command: buildCommand(name, values),
    help: values.help === true,
    version: values.version === true,
    verbose: values.verbose === true,
    quiet: values.quiet === true,
  };
}

function errorCode(error: Error): string | undefined {
  return 'code' in error && typeof error.code === 'string' ? error.code : undefined;
}

/**
 * Translate `parseArgs` errors into `CliError` instances with user-friendly messages.
 */
function mapParseArgsError(error: unknown): Error {
  if (isAppError(error)) {
    return error;
  }

  if (error instanceof Error) {
    const code = errorCode(error);

    if (code === 'ERR_PARSE_ARGS_UNKNOWN_OPTION') {
      const option = /'(-{1,2}[\w-]+)'/.exec(error.message)?.[1];
      return new CliError('CLI_UNKNOWN_OPTION', `Unknown option: ${option ?? error.message}`, {
        cause: error,
      });
    }

    if (code === 'ERR_PARSE_ARGS_INVALID_OPTION_VALUE') {
      const option = /(--[\w-]+) <value>/.exec(error.message)?.[1];
      if (option !== undefined) {
        return new CliError('CLI_INVALID_ARGUMENT', `${option} requires a value`, {
          cause: error,
        });
      }
    }

    return new CliError('CLI_PARSE_ERROR', error.message, { cause: error });
  }
  return new CliError('CLI_PARSE_ERROR', String(error));
}
