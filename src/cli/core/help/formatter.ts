/**
 * Help Text Formatter
 *
 * Role:
 *   Format the `--help` output, including the available presets.
 */

import { availablePresets, presetDescription } from '../../config/index.ts';

/**
 * Static help message template. The placeholder `[PRESETS]` is replaced
 * with one line per preset at runtime by `showHelp()`.
 */
const HELP_MESSAGE = `
agent-precommit - pre-commit checks for humans and coding agents

USAGE:
  apc [COMMAND] [OPTIONS]

COMMANDS:
  run (r)               Run the checks for the detected mode (default)
  init (i)              Create agent-precommit.toml in the current directory
  install               Install the git pre-commit hook
  uninstall             Remove the git pre-commit hook
  detect (d)            Show the detected mode and why
  list (l)              List the configured checks per mode
  validate (v)          Validate the configuration file
  config                Show the configuration file location

RUN OPTIONS:
  -m, --mode <mode>     Force a mode: human, agent or ci
  -c, --check <name>    Run a single configured check
  --log-dir <path>      Write one log file per check into <path>
  --structured-logs     Write logs as JSON lines
  --raw-logs            Write logs without line prefixes
  --max-log-bytes <n>   Truncate each log file after <n> bytes

OTHER OPTIONS:
  -p, --preset <name>   init: start from a language preset
  -f, --force           init, install: overwrite existing files
  --raw                 config: print the file content
  -m, --mode <mode>     list: show one mode only
  -v, --verbose         Print additional detail
  -q, --quiet           Print results and errors only
  -h, --help            Show this help message
  -V, --version         Show version number

PRESETS:
[PRESETS]

ENVIRONMENT:
  APC_MODE=<mode>       Force a mode (overrides detection)
  APC_SKIP=1            Skip all checks
  AGENT_MODE=1          Treat the session as an agent session

EXAMPLES:
  apc init --preset node
  apc install
  apc run --mode agent --log-dir ./logs
  apc run --check test-unit
`;

const PRESET_COLUMN_WIDTH = 22;

/**
 * Build the help message with the preset list filled in.
 */
export function showHelp(): string {
  const presets = availablePresets()
    .map((name) => `  ${name.padEnd(PRESET_COLUMN_WIDTH)}${presetDescription(name)}`)
    .join('\n');
  return HELP_MESSAGE.replace('[PRESETS]', presets);
}
