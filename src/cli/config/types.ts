/**
 * Configuration value types shared by the loader, the runner and the CLI.
 *
 * All values are created once at load time and treated as read-only for the
 * rest of the process.
 */

/** Execution mode selected by detection or by `--mode`. */
export type Mode = 'human' | 'agent' | 'ci';

/**
 * Predicates gating whether a check is attempted. Every predicate present
 * must hold.
 */
export interface EnabledCondition {
  /** Path (relative to the repository root) that must exist. */
  readonly fileExists?: string;
  /** Path (relative to the repository root) that must be a directory. */
  readonly dirExists?: string;
  /** Executable name that must be discoverable on PATH. */
  readonly commandExists?: string;
}

/** A named check backed by a shell command. */
export interface CheckDefinition {
  /** Shell program passed verbatim to `sh -c` / `cmd /C`. */
  readonly run: string;
  readonly description: string;
  readonly enabledIf?: EnabledCondition;
  /** Extra environment variables applied on top of the parent environment. */
  readonly env: Readonly<Record<string, string>>;
}

export type CheckDefinitions = Readonly<Record<string, CheckDefinition>>;

export interface ModeConfig {
  readonly checks: readonly string[];
  /** Duration literal such as "30s" or "15m". */
  readonly timeout: string;
  readonly failFast: boolean;
}

export interface AgentModeConfig extends ModeConfig {
  /** Ordered stages; members of one stage run concurrently. */
  readonly parallelGroups: readonly (readonly string[])[];
}

export interface DetectionConfig {
  /** Forced mode, bypassing environment heuristics. */
  readonly mode?: string;
  /** Additional variables whose presence marks an agent session. */
  readonly agentEnvVars: readonly string[];
}

export interface IntegrationConfig {
  readonly preCommit: boolean;
  readonly preCommitPath: string;
}

export interface Config {
  readonly detection: DetectionConfig;
  readonly integration: IntegrationConfig;
  readonly human: ModeConfig;
  readonly agent: AgentModeConfig;
  readonly checks: CheckDefinitions;
}

/**
 * Scheduling policy the runner applies for one mode. `parallelGroups` is only
 * consulted in thorough modes; an empty or absent list means one group.
 */
export interface RunPolicy {
  readonly timeout: string;
  readonly failFast: boolean;
  readonly parallelGroups?: readonly (readonly string[])[];
}
