/**
 * Tests for CLI argument parsing.
 */

import { describe, expect, it } from 'vitest';

import { parseCliArgs } from './args.ts';

function parseError(argv: readonly string[]): unknown {
  try {
    parseCliArgs(argv);
  } catch (err: unknown) {
    return err;
  }
  throw new Error('expected parseCliArgs to throw');
}

describe('input/args.ts', () => {
  it('defaults to run with text logs', () => {
    expect(parseCliArgs([])).toEqual({
      command: { name: 'run', logFormat: 'text' },
      help: false,
      version: false,
      verbose: false,
      quiet: false,
    });
  });

  it('parses run options', () => {
    const args = parseCliArgs([
      'run',
      '--mode',
      'Agent',
      '-c',
      'lint',
      '--log-dir',
      './logs',
      '--structured-logs',
      '--max-log-bytes',
      '4096',
    ]);

    expect(args.command).toEqual({
      name: 'run',
      mode: 'agent',
      check: 'lint',
      logDir: './logs',
      logFormat: 'json',
      maxLogBytes: 4096,
    });
  });

  it('selects raw logs', () => {
    expect(parseCliArgs(['--raw-logs']).command).toEqual({ name: 'run', logFormat: 'raw' });
  });

  it('parses global flags anywhere', () => {
    const args = parseCliArgs(['-v', 'detect', '--quiet']);

    expect(args).toMatchObject({ command: { name: 'detect' }, verbose: true, quiet: true });
  });

  it('parses help and version', () => {
    expect(parseCliArgs(['-h'])).toMatchObject({ help: true, version: false });
    expect(parseCliArgs(['--version'])).toMatchObject({ help: false, version: true });
  });

  it('parses init, install and config options', () => {
    expect(parseCliArgs(['init', '--preset', 'typescript', '-f']).command).toEqual({
      name: 'init',
      preset: 'typescript',
      force: true,
    });
    expect(parseCliArgs(['init']).command).toEqual({ name: 'init', force: false });
    expect(parseCliArgs(['install', '--force']).command).toEqual({ name: 'install', force: true });
    expect(parseCliArgs(['config', '--raw']).command).toEqual({ name: 'config', raw: true });
    expect(parseCliArgs(['list', '-m', 'ci']).command).toEqual({ name: 'list', mode: 'ci' });
    expect(parseCliArgs(['uninstall']).command).toEqual({ name: 'uninstall' });
  });

  it.each([
    ['r', 'run'],
    ['i', 'init'],
    ['d', 'detect'],
    ['l', 'list'],
    ['v', 'validate'],
  ])('resolves the %s alias to %s', (alias, name) => {
    expect(parseCliArgs([alias]).command.name).toBe(name);
  });

  it('rejects unknown commands', () => {
    expect(parseError(['deploy'])).toMatchObject({
      code: 'CLI_INVALID_ARGUMENT',
      message: 'Unknown command: deploy',
    });
  });

  it('rejects extra positionals', () => {
    expect(parseError(['run', 'lint'])).toMatchObject({
      code: 'CLI_INVALID_ARGUMENT',
      message: 'Unexpected argument: lint',
    });
  });

  it('rejects options that belong to another command', () => {
    expect(parseError(['install', '--preset', 'go'])).toMatchObject({
      code: 'CLI_INVALID_ARGUMENT',
      message: "Option --preset is not valid for 'install'",
    });
    expect(parseError(['-f'])).toMatchObject({
      message: "Option --force is not valid for 'run'",
    });
  });

  it('rejects unknown options', () => {
    expect(parseError(['--nope'])).toMatchObject({
      name: 'CliError',
      code: 'CLI_UNKNOWN_OPTION',
      message: 'Unknown option: --nope',
    });
  });

  it('rejects missing option values', () => {
    expect(parseError(['--log-dir'])).toMatchObject({
      code: 'CLI_INVALID_ARGUMENT',
      message: '--log-dir requires a value',
    });
    expect(parseError(['--mode'])).toMatchObject({ message: '--mode requires a value' });
  });

  it('rejects blank values', () => {
    expect(parseError(['--log-dir', '   '])).toMatchObject({
      message: '--log-dir requires a path',
    });
    expect(parseError(['--check', ''])).toMatchObject({
      message: '--check requires a check name',
    });
  });

  it('rejects invalid modes', () => {
    expect(parseError(['--mode', 'robot'])).toMatchObject({
      name: 'ConfigError',
      code: 'CONFIG_INVALID_MODE',
      message: 'Invalid mode: robot. Valid modes: human, agent, ci',
    });
  });

  it('rejects unknown presets', () => {
    expect(parseError(['init', '--preset', 'cobol'])).toMatchObject({
      message: 'Unknown preset: cobol. Available presets: python, node, rust, go',
    });
  });

  it('rejects conflicting log formats', () => {
    expect(parseError(['--structured-logs', '--raw-logs'])).toMatchObject({
      message: '--structured-logs and --raw-logs cannot be used together',
    });
  });

  it.each(['0', '-5', '1.5', 'lots'])('rejects --max-log-bytes %s', (value) => {
    expect(parseError([`--max-log-bytes=${value}`])).toMatchObject({
      message: '--max-log-bytes requires a positive integer',
    });
  });
});
