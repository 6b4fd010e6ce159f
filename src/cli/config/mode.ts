/**
 * Mode parsing and per-mode policy selection.
 */

import { ConfigError } from '../../errors/errors.ts';
import type { Config, Mode, ModeConfig, RunPolicy } from './types.ts';

export const MODES = ['human', 'agent', 'ci'] as const satisfies readonly Mode[];

/**
 * Narrow an arbitrary string to a `Mode`.
 */
export function isMode(value: string): value is Mode {
  return MODES.some((mode) => mode === value);
}

/**
 * Parse a user-supplied mode string.
 *
 * @throws ConfigError with `CONFIG_INVALID_MODE` for unknown values.
 */
export function parseMode(value: string): Mode {
  const normalized = value.trim().toLowerCase();
  if (isMode(normalized)) {
    return normalized;
  }
  throw new ConfigError(
    'CONFIG_INVALID_MODE',
    `Invalid mode: ${value}. Valid modes: ${MODES.join(', ')}`,
    { details: { value } },
  );
}

/**
 * Agent and CI runs use the grouped parallel strategy; human runs are
 * sequential.
 */
export function isThoroughMode(mode: Mode): boolean {
  return mode !== 'human';
}

/**
 * Mode configuration block backing the given mode.
 */
export function modeConfigFor(config: Config, mode: Mode): ModeConfig {
  return isThoroughMode(mode) ? config.agent : config.human;
}

/**
 * Build the runner policy for a mode from the loaded configuration.
 */
export function policyFor(config: Config, mode: Mode): RunPolicy {
  if (!isThoroughMode(mode)) {
    return { timeout: config.human.timeout, failFast: config.human.failFast };
  }
  return {
    timeout: config.agent.timeout,
    failFast: config.agent.failFast,
    parallelGroups: config.agent.parallelGroups,
  };
}
