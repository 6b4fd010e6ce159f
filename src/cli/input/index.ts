/**
 * Input handling: argument parsing.
 *
 * This barrel re-exports the CLI argument parser so other layers import from
 * a single stable path.
 */

export {
  type CLIArgs,
  type CLICommand,
  COMMAND_NAMES,
  type CommandName,
  parseCliArgs,
} from './args.ts';
