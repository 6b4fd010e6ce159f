/**
 * Execution orchestration and coordination
 */

export {
  type CommandContext,
  type CommandDeps,
  configCommand,
  detectCommand,
  initCommand,
  installCommand,
  listCommand,
  uninstallCommand,
  validateCommand,
} from './commands.ts';
export {
  excerptLines,
  executeWithArgs,
  type MainDeps,
  type MainResult,
  printRunSummary,
} from './execution.ts';
export {
  defaultConcurrency,
  executeCheck,
  planGroups,
  resolveTimeout,
  runChecks,
  runConfiguredChecks,
  runParallelGroups,
  runSequential,
  runSingleCheck,
} from './executor.ts';
