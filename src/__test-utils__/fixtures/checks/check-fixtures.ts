/**
 * Check and configuration fixtures.
 */

import { defaultConfig } from '../../../cli/config/config.ts';
import type { CheckDefinition, CheckDefinitions, Config } from '../../../cli/config/types.ts';
import type { ResolvedCheck } from '../../../cli/modules/check-resolver/check-resolver.ts';

/**
 * Build a check definition running `run`.
 */
export function createCheck(
  run: string,
  overrides: Partial<CheckDefinition> = {},
): CheckDefinition {
  return { run, description: '', env: {}, ...overrides };
}

/**
 * Pair names with inline commands, e.g. `resolved({ a: 'true' })`.
 */
export function resolved(commands: Readonly<Record<string, string>>): ResolvedCheck[] {
  return Object.entries(commands).map(([name, run]) => [name, createCheck(run)] as const);
}

/**
 * Default configuration with both modes pointed at `checks`.
 */
export function createTestConfig(
  checks: CheckDefinitions,
  overrides: Partial<Config> = {},
): Config {
  const base = defaultConfig();
  const names = Object.keys(checks);
  return {
    ...base,
    human: { ...base.human, checks: names },
    agent: { ...base.agent, checks: names },
    checks,
    ...overrides,
  };
}
