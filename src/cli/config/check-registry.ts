/**
 * Check Registry
 *
 * Role: Built-in check definitions and language presets.
 *
 * This file is:
 *   - The source of default configuration content
 *   - Immutable and side-effect free
 *
 * Loading, validation and serialization live in `config.ts`.
 */

import type { AgentModeConfig, CheckDefinition, CheckDefinitions } from './types.ts';

/** Names of the checks shipped with the tool. */
export const BUILTIN_CHECK_NAMES = [
  'pre-commit',
  'pre-commit-all',
  'no-merge-conflicts',
  'test-unit',
  'test-integration',
  'security-scan',
  'build-verify',
] as const;

export type BuiltinCheckName = (typeof BUILTIN_CHECK_NAMES)[number];

/**
 * Whether `name` is one of the built-in check names.
 */
export function isBuiltinCheck(name: string): name is BuiltinCheckName {
  return BUILTIN_CHECK_NAMES.some((builtin) => builtin === name);
}

const PRE_COMMIT_CONFIG = '.pre-commit-config.yaml';

// Fetches the main branch and asks git whether merging it would conflict.
const NO_MERGE_CONFLICTS_CMD = [
  'git fetch origin main --quiet 2>/dev/null || git fetch origin master --quiet 2>/dev/null || true',
  'MAIN_BRANCH=$(git rev-parse --verify origin/main >/dev/null 2>&1 && echo "main" || echo "master")',
  'BASE=$(git merge-base HEAD origin/$MAIN_BRANCH 2>/dev/null || echo "")',
  'if [ -n "$BASE" ]; then',
  '    if git merge-tree $BASE HEAD origin/$MAIN_BRANCH 2>/dev/null | grep -q "^<<<<<<<"; then',
  '        echo "Would conflict with $MAIN_BRANCH"',
  '        exit 1',
  '    fi',
  'fi',
  'echo "No conflicts with $MAIN_BRANCH"',
].join('\n');

const UNCONFIGURED_TEST_CMD =
  "echo 'No test command configured. Use apc init --preset <lang> or define checks.test-unit.run in your config.'";

function check(
  run: string,
  description: string,
  enabledIf?: CheckDefinition['enabledIf'],
): CheckDefinition {
  return enabledIf === undefined
    ? { run, description, env: {} }
    : { run, description, enabledIf, env: {} };
}

/**
 * Checks present in every default configuration.
 */
export const DEFAULT_CHECKS: CheckDefinitions = {
  'pre-commit': check('pre-commit run', 'Run pre-commit on staged files', {
    fileExists: PRE_COMMIT_CONFIG,
  }),
  'pre-commit-all': check('pre-commit run --all-files', 'Run pre-commit on all files', {
    fileExists: PRE_COMMIT_CONFIG,
  }),
  'test-unit': check(
    UNCONFIGURED_TEST_CMD,
    'Run unit tests (configure with a preset or custom command)',
  ),
  'no-merge-conflicts': check(NO_MERGE_CONFLICTS_CMD, 'Ensure no merge conflicts with main/master'),
};

export const DEFAULT_HUMAN_CHECKS: readonly string[] = ['pre-commit'];
export const DEFAULT_AGENT_CHECKS: readonly string[] = [
  'pre-commit-all',
  'no-merge-conflicts',
  'test-unit',
];

export const PRESET_NAMES = ['python', 'node', 'rust', 'go'] as const;

export type PresetName = (typeof PRESET_NAMES)[number];

/**
 * A preset replaces the agent check list and adds (or overrides) checks.
 */
export interface Preset {
  readonly name: PresetName;
  readonly description: string;
  readonly agentChecks: AgentModeConfig['checks'];
  readonly checks: CheckDefinitions;
}

const PRESETS: Readonly<Record<PresetName, Preset>> = {
  python: {
    name: 'python',
    description: 'Python projects (pytest, ruff, mypy, pre-commit integration)',
    agentChecks: [
      'pre-commit-all',
      'no-merge-conflicts',
      'test-unit',
      'test-integration',
      'security-scan',
      'build-verify',
    ],
    checks: {
      'test-unit': check('pytest -x -q', 'Run unit tests', { fileExists: 'pyproject.toml' }),
      'test-integration': check('pytest tests/integration/ -v', 'Run integration tests', {
        dirExists: 'tests/integration',
      }),
      'security-scan': check('gitleaks detect --source . --no-git', 'Scan for secrets', {
        commandExists: 'gitleaks',
      }),
      'build-verify': check('python -m build --no-isolation', 'Verify package builds', {
        fileExists: 'pyproject.toml',
      }),
    },
  },
  node: {
    name: 'node',
    description: 'Node.js/TypeScript projects (npm, eslint, jest, tsc)',
    agentChecks: [
      'pre-commit-all',
      'no-merge-conflicts',
      'lint',
      'typecheck',
      'test-unit',
      'build-verify',
    ],
    checks: {
      lint: check('npm run lint', 'Run ESLint', { fileExists: 'package.json' }),
      typecheck: check('npm run typecheck || npx tsc --noEmit', 'Run TypeScript type checking', {
        fileExists: 'tsconfig.json',
      }),
      'test-unit': check('npm test', 'Run unit tests', { fileExists: 'package.json' }),
      'build-verify': check('npm run build', 'Verify build works', { fileExists: 'package.json' }),
    },
  },
  rust: {
    name: 'rust',
    description: 'Rust projects (cargo fmt, clippy, cargo test)',
    agentChecks: ['no-merge-conflicts', 'fmt-check', 'clippy', 'test-unit', 'build-verify'],
    checks: {
      'fmt-check': check('cargo fmt --all -- --check', 'Check code formatting', {
        fileExists: 'Cargo.toml',
      }),
      clippy: check(
        'cargo clippy --all-targets --all-features -- -D warnings',
        'Run Clippy lints',
        { fileExists: 'Cargo.toml' },
      ),
      'test-unit': check('cargo test', 'Run unit tests', { fileExists: 'Cargo.toml' }),
      'build-verify': check('cargo build --release', 'Verify release build', {
        fileExists: 'Cargo.toml',
      }),
    },
  },
  go: {
    name: 'go',
    description: 'Go projects (gofmt, golangci-lint, go test)',
    agentChecks: ['no-merge-conflicts', 'fmt-check', 'lint', 'test-unit', 'build-verify'],
    checks: {
      'fmt-check': check('test -z "$(gofmt -l .)"', 'Check code formatting', {
        fileExists: 'go.mod',
      }),
      lint: check('golangci-lint run', 'Run golangci-lint', { commandExists: 'golangci-lint' }),
      'test-unit': check('go test ./...', 'Run unit tests', { fileExists: 'go.mod' }),
      'build-verify': check('go build ./...', 'Verify build works', { fileExists: 'go.mod' }),
    },
  },
};

const PRESET_ALIASES: ReadonlyMap<string, PresetName> = new Map<string, PresetName>([
  ['python', 'python'],
  ['node', 'node'],
  ['nodejs', 'node'],
  ['typescript', 'node'],
  ['rust', 'rust'],
  ['go', 'go'],
]);

/**
 * Canonical preset names, in display order.
 */
export function availablePresets(): readonly PresetName[] {
  return PRESET_NAMES;
}

/**
 * Look up a preset by name or alias.
 *
 * @returns The preset, or `undefined` for unknown names.
 */
export function findPreset(name: string): Preset | undefined {
  const canonical = PRESET_ALIASES.get(name);
  return canonical === undefined ? undefined : PRESETS[canonical];
}

export function presetDescription(name: string): string {
  return findPreset(name)?.description ?? 'Unknown preset';
}
