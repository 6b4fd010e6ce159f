/**
 * Repository setup and inspection commands: everything except `run`.
 *
 * Each command reports through the injected `Reporter` and returns its exit
 * code. Errors it cannot report itself propagate to `executeWithArgs`.
 */

import path from 'node:path';

import { isAppError } from '../../errors/errors.ts';
import type { Config, LoadedConfig } from '../config/index.ts';
import { configForPreset, defaultConfig, serializeConfig } from '../config/index.ts';
import { CONFIG_FILE_NAME } from '../constants/paths.ts';
import type { GitRepository, InstallResult, UninstallResult } from '../infrastructure/index.ts';
import type { CLICommand } from '../input/args.ts';
import type { EnvSnapshot, TerminalState } from '../modules/index.ts';
import { describeReason, detectMode } from '../modules/index.ts';
import type { Reporter } from '../output/reporter.ts';

/** Collaborators the commands reach the filesystem and git through. */
export interface CommandDeps {
  readonly loadConfigFn: (startDir: string) => Promise<LoadedConfig>;
  readonly loadConfigOrDefaultFn: (startDir: string) => Promise<LoadedConfig>;
  readonly findConfigFileFn: (startDir: string) => Promise<string>;
  readonly readFileFn: (filePath: string) => Promise<string>;
  readonly writeFileFn: (filePath: string, content: string) => Promise<void>;
  readonly pathExistsFn: (target: string) => Promise<boolean>;
  readonly discoverRepositoryFn: (cwd: string) => Promise<GitRepository>;
  readonly resolveHooksDirFn: (repo: GitRepository) => Promise<string>;
  readonly installHookFn: (
    hooksDir: string,
    options: { readonly force?: boolean },
  ) => Promise<InstallResult>;
  readonly uninstallHookFn: (hooksDir: string) => Promise<UninstallResult>;
}

export interface CommandContext {
  readonly cwd: string;
  readonly env: EnvSnapshot;
  readonly terminal: TerminalState;
  readonly reporter: Reporter;
  readonly deps: CommandDeps;
}

type CommandOf<N extends CLICommand['name']> = Extract<CLICommand, { readonly name: N }>;

const PRE_COMMIT_CONFIG = '.pre-commit-config.yaml';

/** Variables echoed by `apc detect`. */
const DETECT_ENV_VARS = ['APC_MODE', 'AGENT_MODE', 'CI', 'GITHUB_ACTIONS'] as const;

/* -------------------------------------------------------------------------- */
/* init                                                                        */
/* -------------------------------------------------------------------------- */

export async function initCommand(
  command: CommandOf<'init'>,
  { cwd, reporter, deps }: CommandContext,
): Promise<number> {
  const configPath = path.join(cwd, CONFIG_FILE_NAME);

  if (!command.force && (await deps.pathExistsFn(configPath))) {
    reporter.warn(`Configuration already exists: ${configPath}`);
    reporter.info('  Use --force to overwrite.');
    return 1;
  }

  let config: Config;
  if (command.preset === undefined) {
    const base = defaultConfig();
    if (await deps.pathExistsFn(path.join(cwd, PRE_COMMIT_CONFIG))) {
      reporter.info(`Detected ${PRE_COMMIT_CONFIG} - enabling integration`);
      config = { ...base, integration: { ...base.integration, preCommit: true } };
    } else {
      config = base;
    }
  } else {
    config = configForPreset(command.preset);
  }

  await deps.writeFileFn(configPath, serializeConfig(config));

  reporter.info(`Created ${configPath}`);
  if (command.preset !== undefined) {
    reporter.info(`  Using preset: ${command.preset}`);
  }
  reporter.info('');
  reporter.info('Next steps:');
  reporter.info(`  1. Review and customize ${CONFIG_FILE_NAME}`);
  reporter.info('  2. Run: apc install');
  return 0;
}

/* -------------------------------------------------------------------------- */
/* install / uninstall                                                        */
/* -------------------------------------------------------------------------- */

async function locateHooksDir({ cwd, deps }: CommandContext): Promise<string> {
  const repo = await deps.discoverRepositoryFn(cwd);
  return deps.resolveHooksDirFn(repo);
}

export async function installCommand(
  command: CommandOf<'install'>,
  context: CommandContext,
): Promise<number> {
  const { reporter, deps } = context;
  const result = await deps.installHookFn(await locateHooksDir(context), {
    force: command.force,
  });

  if (result.status === 'already-installed') {
    reporter.info(`Hook already installed at ${result.path}`);
    return 0;
  }
  if (result.backupPath !== undefined) {
    reporter.info(`Backed up existing hook to ${result.backupPath}`);
  }
  reporter.info(`Installed pre-commit hook at ${result.path}`);
  return 0;
}

export async function uninstallCommand(context: CommandContext): Promise<number> {
  const { reporter, deps } = context;
  const result = await deps.uninstallHookFn(await locateHooksDir(context));

  switch (result.status) {
    case 'not-installed': {
      reporter.info(`No hook installed at ${result.path}`);
      return 0;
    }
    case 'foreign': {
      reporter.warn(`Hook at ${result.path} was not installed by agent-precommit`);
      reporter.info('  Remove manually if desired.');
      return 1;
    }
    case 'removed': {
      reporter.info(`Removed pre-commit hook from ${result.path}`);
      if (result.backupPath !== undefined) {
        reporter.info(`  Backup exists at ${result.backupPath} - restore if needed`);
      }
      return 0;
    }
  }
}

/* -------------------------------------------------------------------------- */
/* detect / list                                                              */
/* -------------------------------------------------------------------------- */

export async function detectCommand({
  cwd,
  env,
  terminal,
  reporter,
  deps,
}: CommandContext): Promise<number> {
  const { config } = await deps.loadConfigOrDefaultFn(cwd);
  const detection = detectMode(config, env, terminal);

  reporter.print(`Detected mode: ${detection.mode}`);
  reporter.print(`Reason: ${describeReason(detection.reason)}`);
  reporter.print('');
  reporter.print('Environment:');
  for (const name of DETECT_ENV_VARS) {
    const value = env[name];
    if (value !== undefined) {
      reporter.print(`  ${name}=${value}`);
    }
  }
  reporter.print('');
  reporter.print(`TTY: stdin=${String(terminal.stdin)}, stdout=${String(terminal.stdout)}`);
  return 0;
}

function describeCheck(config: Config, name: string): string {
  const definition = Object.hasOwn(config.checks, name) ? config.checks[name] : undefined;
  const description = definition?.description ?? '';
  return `  ${name} - ${description === '' ? '(no description)' : description}`;
}

export async function listCommand(
  command: CommandOf<'list'>,
  { cwd, reporter, deps }: CommandContext,
): Promise<number> {
  const { config } = await deps.loadConfigOrDefaultFn(cwd);
  const { mode } = command;

  if (mode === undefined || mode === 'human') {
    reporter.print('Human mode checks:');
    for (const name of config.human.checks) {
      reporter.print(describeCheck(config, name));
    }
    if (mode === undefined) {
      reporter.print('');
    }
  }

  if (mode !== 'human') {
    reporter.print('Agent mode checks:');
    for (const name of config.agent.checks) {
      reporter.print(describeCheck(config, name));
    }
  }
  return 0;
}

/* -------------------------------------------------------------------------- */
/* validate / config                                                          */
/* -------------------------------------------------------------------------- */

export async function validateCommand({ cwd, reporter, deps }: CommandContext): Promise<number> {
  try {
    await deps.loadConfigFn(cwd);
  } catch (err: unknown) {
    if (!isAppError(err)) {
      throw err;
    }
    if (err.code === 'CONFIG_NOT_FOUND') {
      const expected = err.details?.['path'];
      reporter.warn(
        typeof expected === 'string' ? `Configuration not found: ${expected}` : err.message,
      );
      reporter.info('  Run: apc init');
    } else if (err.code === 'CONFIG_INVALID') {
      reporter.error(`Configuration validation failed: ${err.message}`);
    } else {
      reporter.error(`Failed to load configuration: ${err.message}`);
    }
    return 1;
  }

  reporter.print('Configuration is valid');
  return 0;
}

export async function configCommand(
  command: CommandOf<'config'>,
  { cwd, reporter, deps }: CommandContext,
): Promise<number> {
  let configPath: string;
  try {
    configPath = await deps.findConfigFileFn(cwd);
  } catch (err: unknown) {
    if (isAppError(err) && err.code === 'CONFIG_NOT_FOUND') {
      reporter.warn('No configuration file found');
      reporter.info('  Run: apc init');
      return 1;
    }
    throw err;
  }

  reporter.print(`Configuration file: ${configPath}`);
  if (command.raw) {
    const content = await deps.readFileFn(configPath);
    reporter.print('');
    reporter.print(content.endsWith('\n') ? content.slice(0, -1) : content);
  }
  return 0;
}
