/**
 * agent-precommit - Main Entry Point
 *
 * Library surface of the `apc` CLI: configuration loading, mode detection,
 * the check runner and git hook management.
 */

export type {
  AgentModeConfig,
  CheckDefinition,
  CheckDefinitions,
  Config,
  DetectionConfig,
  EnabledCondition,
  IntegrationConfig,
  LoadedConfig,
  Mode,
  ModeConfig,
  Preset,
  PresetName,
  RunPolicy,
} from './cli/config/index.ts';
export {
  availablePresets,
  configForPreset,
  defaultConfig,
  findConfigFile,
  findPreset,
  isBuiltinCheck,
  isValidDuration,
  loadConfig,
  loadConfigFrom,
  loadConfigOrDefault,
  MODES,
  parseConfig,
  parseDuration,
  parseMode,
  presetDescription,
  serializeConfig,
  validateConfig,
} from './cli/config/index.ts';
export { getPackageVersion } from './cli/core/index.ts';
export {
  executeCheck,
  executeWithArgs,
  type MainDeps,
  type MainResult,
  runChecks,
  runConfiguredChecks,
  runSingleCheck,
} from './cli/execution/index.ts';
export {
  discoverRepository,
  findRepositoryRoot,
  type GitRepository,
  HOOK_MARKER,
  type InstallResult,
  installHook,
  resolveHooksDir,
  type UninstallResult,
  uninstallHook,
} from './cli/infrastructure/index.ts';
export type {
  CheckResult,
  CheckStatus,
  CommandOutcome,
  Detection,
  DetectionReason,
  EnvSnapshot,
  ExecutionOptions,
  LogFormat,
  ReportSummary,
  ResolvedCheck,
  RunOptions,
  RunReport,
  SkipDecision,
  TerminalState,
} from './cli/modules/index.ts';
export {
  combinedOutput,
  commandExists,
  describeReason,
  detectMode,
  executeCommand,
  isRunSuccessful,
  isSuccessfulOutcome,
  resolveChecks,
  shouldSkipCheck,
  summarizeReport,
} from './cli/modules/index.ts';
export {
  AppError,
  CheckError,
  CliError,
  ConfigError,
  type ErrorCode,
  exitCodeForError,
  formatErrorMessage,
  GitError,
  HookError,
  isAppError,
  ProcessError,
} from './errors/errors.ts';
