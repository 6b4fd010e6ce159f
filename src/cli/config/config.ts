/**
 * Configuration loading, validation and serialization.
 *
 * The on-disk format is TOML with snake_case keys; in memory the configuration
 * is the camelCase `Config` value from `types.ts`.
 */

import { readFile, realpath, stat } from 'node:fs/promises';
import path from 'node:path';

import * as Toml from '@iarna/toml';
import { z } from 'zod';

import { ConfigError, isAppError } from '../../errors/errors.ts';
import { CONFIG_FILE_NAME } from '../constants/paths.ts';
import {
  DEFAULT_AGENT_CHECKS,
  DEFAULT_CHECKS,
  DEFAULT_HUMAN_CHECKS,
  findPreset,
} from './check-registry.ts';
import { parseDuration } from './duration.ts';
import { isMode, MODES } from './mode.ts';
import type {
  CheckDefinition,
  CheckDefinitions,
  Config,
  EnabledCondition,
} from './types.ts';

const DEFAULT_PRE_COMMIT_PATH = '.pre-commit-config.yaml';
const DEFAULT_HUMAN_TIMEOUT = '30s';
const DEFAULT_AGENT_TIMEOUT = '15m';

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const enabledConditionSchema = z.object({
  file_exists: z.string().optional(),
  dir_exists: z.string().optional(),
  command_exists: z.string().optional(),
});

const checkSchema = z.object({
  run: z.string().default(''),
  description: z.string().default(''),
  enabled_if: enabledConditionSchema.optional(),
  env: z.record(z.string()).default({}),
});

const configSchema = z.object({
  detection: z
    .object({
      mode: z.string().optional(),
      agent_env_vars: z.array(z.string()).default([]),
    })
    .default({}),
  integration: z
    .object({
      pre_commit: z.boolean().default(false),
      pre_commit_path: z.string().default(DEFAULT_PRE_COMMIT_PATH),
    })
    .default({}),
  human: z
    .object({
      checks: z.array(z.string()).default([...DEFAULT_HUMAN_CHECKS]),
      timeout: z.string().default(DEFAULT_HUMAN_TIMEOUT),
      fail_fast: z.boolean().default(true),
    })
    .default({}),
  agent: z
    .object({
      checks: z.array(z.string()).default([...DEFAULT_AGENT_CHECKS]),
      timeout: z.string().default(DEFAULT_AGENT_TIMEOUT),
      fail_fast: z.boolean().default(false),
      parallel_groups: z.array(z.array(z.string())).default([]),
    })
    .default({}),
  checks: z.record(checkSchema).optional(),
});

type RawConfig = z.infer<typeof configSchema>;
type RawCheck = z.infer<typeof checkSchema>;

function toEnabledCondition(
  raw: z.infer<typeof enabledConditionSchema>,
): EnabledCondition {
  return {
    ...(raw.file_exists === undefined ? {} : { fileExists: raw.file_exists }),
    ...(raw.dir_exists === undefined ? {} : { dirExists: raw.dir_exists }),
    ...(raw.command_exists === undefined ? {} : { commandExists: raw.command_exists }),
  };
}

function toCheckDefinition(raw: RawCheck): CheckDefinition {
  const base = { run: raw.run, description: raw.description, env: { ...raw.env } };
  return raw.enabled_if === undefined
    ? base
    : { ...base, enabledIf: toEnabledCondition(raw.enabled_if) };
}

function toConfig(raw: RawConfig): Config {
  const checks: Record<string, CheckDefinition> = {};
  if (raw.checks === undefined) {
    Object.assign(checks, DEFAULT_CHECKS);
  } else {
    for (const [name, check] of Object.entries(raw.checks)) {
      checks[name] = toCheckDefinition(check);
    }
  }

  return {
    detection: {
      ...(raw.detection.mode === undefined ? {} : { mode: raw.detection.mode }),
      agentEnvVars: raw.detection.agent_env_vars,
    },
    integration: {
      preCommit: raw.integration.pre_commit,
      preCommitPath: raw.integration.pre_commit_path,
    },
    human: {
      checks: raw.human.checks,
      timeout: raw.human.timeout,
      failFast: raw.human.fail_fast,
    },
    agent: {
      checks: raw.agent.checks,
      timeout: raw.agent.timeout,
      failFast: raw.agent.fail_fast,
      parallelGroups: raw.agent.parallel_groups,
    },
    checks,
  };
}

// ---------------------------------------------------------------------------
// Defaults and presets
// ---------------------------------------------------------------------------

/**
 * Built-in configuration used when no file is present.
 */
export function defaultConfig(): Config {
  return toConfig(configSchema.parse({}));
}

/**
 * Default configuration extended with a language preset. Unknown preset names
 * yield the plain defaults.
 */
export function configForPreset(name: string): Config {
  const base = defaultConfig();
  const preset = findPreset(name);
  if (preset === undefined) {
    return base;
  }
  return {
    ...base,
    agent: { ...base.agent, checks: [...preset.agentChecks] },
    checks: { ...base.checks, ...preset.checks },
  };
}

// ---------------------------------------------------------------------------
// Parsing and validation
// ---------------------------------------------------------------------------

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${where}: ${issue.message}`;
    })
    .join('; ');
}

/**
 * Parse TOML text into a `Config` without semantic validation.
 *
 * @param content - TOML document.
 * @param source - Optional file path used in error details.
 * @throws ConfigError with `CONFIG_PARSE_FAILED` on syntax or shape errors.
 */
export function parseConfig(content: string, source?: string): Config {
  let document: Toml.JsonMap;
  try {
    document = Toml.parse(content);
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError('CONFIG_PARSE_FAILED', `Failed to parse TOML: ${reason}`, {
      cause: err,
      ...(source === undefined ? {} : { details: { path: source } }),
    });
  }

  const parsed = configSchema.safeParse(document);
  if (!parsed.success) {
    throw new ConfigError(
      'CONFIG_PARSE_FAILED',
      `Failed to parse TOML: ${formatIssues(parsed.error)}`,
      {
        cause: parsed.error,
        details: { issues: parsed.error.issues, ...(source === undefined ? {} : { path: source }) },
      },
    );
  }

  return toConfig(parsed.data);
}

function invalid(field: string, message: string): ConfigError {
  return new ConfigError('CONFIG_INVALID', `Invalid configuration at ${field}: ${message}`, {
    details: { field },
  });
}

/**
 * Check cross-field rules the schema cannot express.
 *
 * @throws ConfigError with `CONFIG_INVALID`, naming the offending field in
 * `details.field`.
 */
export function validateConfig(config: Config): void {
  const forced = config.detection.mode;
  if (forced !== undefined && !isMode(forced)) {
    throw invalid('detection.mode', `Invalid mode: ${forced}. Valid modes: ${MODES.join(', ')}`);
  }
  if (parseDuration(config.human.timeout) === null) {
    throw invalid('human.timeout', `Invalid duration: ${config.human.timeout}`);
  }
  if (parseDuration(config.agent.timeout) === null) {
    throw invalid('agent.timeout', `Invalid duration: ${config.agent.timeout}`);
  }

  const defined = (name: string): boolean => Object.hasOwn(config.checks, name);

  for (const name of config.human.checks) {
    if (!defined(name)) {
      throw invalid('human.checks', `Check '${name}' is referenced but not defined in [checks]`);
    }
  }
  for (const name of config.agent.checks) {
    if (!defined(name)) {
      throw invalid('agent.checks', `Check '${name}' is referenced but not defined in [checks]`);
    }
  }

  config.agent.parallelGroups.forEach((group, index) => {
    for (const name of group) {
      if (!config.agent.checks.includes(name)) {
        throw invalid(
          `agent.parallel_groups[${index}]`,
          `Check '${name}' is in a parallel group but not in agent.checks`,
        );
      }
    }
  });

  for (const [name, check] of Object.entries(config.checks)) {
    if (check.run.trim().length === 0) {
      throw invalid(`checks.${name}.run`, 'Check command cannot be empty');
    }
  }
}

// ---------------------------------------------------------------------------
// File discovery and loading
// ---------------------------------------------------------------------------

async function isFile(candidate: string): Promise<boolean> {
  try {
    return (await stat(candidate)).isFile();
  } catch {
    return false;
  }
}

/**
 * Find `agent-precommit.toml` in `startDir` or any of its ancestors.
 *
 * @returns The canonical path of the nearest configuration file.
 * @throws ConfigError with `CONFIG_NOT_FOUND` when no ancestor has one.
 */
export async function findConfigFile(startDir: string = process.cwd()): Promise<string> {
  const start = await realpath(startDir);
  let current = start;

  for (;;) {
    const candidate = path.join(current, CONFIG_FILE_NAME);
    if (await isFile(candidate)) {
      return realpath(candidate);
    }
    const parent = path.dirname(current);
    if (parent === current) {
      break;
    }
    current = parent;
  }

  const expected = path.join(start, CONFIG_FILE_NAME);
  throw new ConfigError('CONFIG_NOT_FOUND', `Configuration file not found: ${expected}`, {
    details: { path: expected },
  });
}

/**
 * Read, parse and validate the configuration at `filePath`.
 */
export async function loadConfigFrom(filePath: string): Promise<Config> {
  const content = await readFile(filePath, 'utf8');
  const config = parseConfig(content, filePath);
  validateConfig(config);
  return config;
}

/** A loaded configuration and the file it came from, if any. */
export interface LoadedConfig {
  readonly config: Config;
  readonly path?: string;
}

/**
 * Load the nearest configuration file.
 *
 * @throws ConfigError with `CONFIG_NOT_FOUND` when none exists.
 */
export async function loadConfig(startDir?: string): Promise<LoadedConfig> {
  const filePath = await findConfigFile(startDir);
  return { config: await loadConfigFrom(filePath), path: filePath };
}

/**
 * Load the nearest configuration file, falling back to built-in defaults when
 * none exists. Parse and validation errors still propagate.
 */
export async function loadConfigOrDefault(startDir?: string): Promise<LoadedConfig> {
  try {
    return await loadConfig(startDir);
  } catch (err: unknown) {
    if (isAppError(err) && err.code === 'CONFIG_NOT_FOUND') {
      return { config: defaultConfig() };
    }
    throw err;
  }
}

// ---------------------------------------------------------------------------
// Serialization
// ---------------------------------------------------------------------------

function checkToToml(check: CheckDefinition): Toml.JsonMap {
  const table: Toml.JsonMap = { run: check.run, description: check.description };
  const condition = check.enabledIf;
  if (condition !== undefined) {
    const enabledIf: Toml.JsonMap = {};
    if (condition.fileExists !== undefined) enabledIf['file_exists'] = condition.fileExists;
    if (condition.dirExists !== undefined) enabledIf['dir_exists'] = condition.dirExists;
    if (condition.commandExists !== undefined) enabledIf['command_exists'] = condition.commandExists;
    table['enabled_if'] = enabledIf;
  }
  table['env'] = { ...check.env };
  return table;
}

function checksToToml(checks: CheckDefinitions): Toml.JsonMap {
  const names = Object.keys(checks).sort();
  const table: Toml.JsonMap = {};
  for (const name of names) {
    const check = checks[name];
    if (check !== undefined) {
      table[name] = checkToToml(check);
    }
  }
  return table;
}

/**
 * Render a configuration as a TOML document that `parseConfig` accepts.
 */
export function serializeConfig(config: Config): string {
  const detection: Toml.JsonMap = { agent_env_vars: [...config.detection.agentEnvVars] };
  if (config.detection.mode !== undefined) {
    detection['mode'] = config.detection.mode;
  }

  const document: Toml.JsonMap = {
    detection,
    integration: {
      pre_commit: config.integration.preCommit,
      pre_commit_path: config.integration.preCommitPath,
    },
    human: {
      checks: [...config.human.checks],
      timeout: config.human.timeout,
      fail_fast: config.human.failFast,
    },
    agent: {
      checks: [...config.agent.checks],
      timeout: config.agent.timeout,
      fail_fast: config.agent.failFast,
      parallel_groups: config.agent.parallelGroups.map((group) => [...group]),
    },
    checks: checksToToml(config.checks),
  };

  return Toml.stringify(document);
}
