/**
 * Mode Detection
 *
 * Role:
 *   Decide whether a commit is made by a human, an AI agent or CI.
 *
 * Priority (first match wins):
 *   1. `APC_MODE` (unrecognized values mean human)
 *   2. `[detection] mode` from configuration
 *   3. `AGENT_MODE=1` or `AGENT_MODE=true`
 *   4. Known agent environment variables
 *   5. `[detection] agent_env_vars` from configuration
 *   6. Known CI environment variables
 *   7. Neither stdin nor stdout is a terminal (agent)
 *   8. Human
 *
 * Detection is a pure function of the configuration, an environment snapshot
 * and the terminal flags passed in.
 */

import { isMode } from '../../config/mode.ts';
import type { Config } from '../../config/types.ts';
import type { Mode } from '../types.ts';
import knownEnvVars from './known-env-vars.json';

/** Environment snapshot; `process.env` satisfies it. */
export type EnvSnapshot = Readonly<Record<string, string | undefined>>;

export interface TerminalState {
  readonly stdin: boolean;
  readonly stdout: boolean;
}

export type DetectionReason =
  | { readonly kind: 'apc-mode'; readonly value: string }
  | { readonly kind: 'configured'; readonly value: string }
  | { readonly kind: 'agent-mode' }
  | { readonly kind: 'known-agent-var'; readonly variable: string }
  | { readonly kind: 'custom-agent-var'; readonly variable: string }
  | { readonly kind: 'ci-var'; readonly variable: string }
  | { readonly kind: 'no-tty' }
  | { readonly kind: 'default' };

export interface Detection {
  readonly mode: Mode;
  readonly reason: DetectionReason;
}

export const KNOWN_AGENT_ENV_VARS: readonly string[] = knownEnvVars.agent;
export const KNOWN_CI_ENV_VARS: readonly string[] = knownEnvVars.ci;

function isSet(env: EnvSnapshot, name: string): boolean {
  return env[name] !== undefined;
}

function modeOrHuman(value: string): Mode {
  const normalized = value.trim().toLowerCase();
  return isMode(normalized) ? normalized : 'human';
}

function firstSet(env: EnvSnapshot, names: readonly string[]): string | undefined {
  return names.find((name) => isSet(env, name));
}

/**
 * Detect the commit mode.
 *
 * @param config - Supplies the configured mode and custom agent variables.
 * @param env - Environment snapshot to inspect.
 * @param terminal - Whether stdin and stdout are attached to a terminal.
 */
export function detectMode(
  config: Pick<Config, 'detection'>,
  env: EnvSnapshot,
  terminal: TerminalState,
): Detection {
  const apcMode = env['APC_MODE'];
  if (apcMode !== undefined) {
    return { mode: modeOrHuman(apcMode), reason: { kind: 'apc-mode', value: apcMode } };
  }

  const configured = config.detection.mode;
  if (configured !== undefined) {
    return { mode: modeOrHuman(configured), reason: { kind: 'configured', value: configured } };
  }

  const agentMode = env['AGENT_MODE'];
  if (agentMode === '1' || agentMode?.toLowerCase() === 'true') {
    return { mode: 'agent', reason: { kind: 'agent-mode' } };
  }

  const knownAgent = firstSet(env, KNOWN_AGENT_ENV_VARS);
  if (knownAgent !== undefined) {
    return { mode: 'agent', reason: { kind: 'known-agent-var', variable: knownAgent } };
  }

  const customAgent = firstSet(env, config.detection.agentEnvVars);
  if (customAgent !== undefined) {
    return { mode: 'agent', reason: { kind: 'custom-agent-var', variable: customAgent } };
  }

  const ci = firstSet(env, KNOWN_CI_ENV_VARS);
  if (ci !== undefined) {
    return { mode: 'ci', reason: { kind: 'ci-var', variable: ci } };
  }

  // Only when both are redirected; a single pipe is common in interactive use.
  if (!terminal.stdin && !terminal.stdout) {
    return { mode: 'agent', reason: { kind: 'no-tty' } };
  }

  return { mode: 'human', reason: { kind: 'default' } };
}

/**
 * Printable explanation of a detection result.
 */
export function describeReason(reason: DetectionReason): string {
  switch (reason.kind) {
    case 'apc-mode':
      return `APC_MODE=${reason.value}`;
    case 'configured':
      return `Configured mode: ${reason.value}`;
    case 'agent-mode':
      return 'AGENT_MODE=1';
    case 'known-agent-var':
      return `Known agent env var: ${reason.variable}`;
    case 'custom-agent-var':
      return `Custom agent env var: ${reason.variable}`;
    case 'ci-var':
      return `CI environment: ${reason.variable}`;
    case 'no-tty':
      return 'No TTY detected (non-interactive)';
    case 'default':
      return 'Default (no agent indicators)';
  }
}

/**
 * Terminal flags of the current process.
 */
export function currentTerminalState(): TerminalState {
  return { stdin: process.stdin.isTTY === true, stdout: process.stdout.isTTY === true };
}
