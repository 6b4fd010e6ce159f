/**
 * CLI integration: argv through configuration, the runner and real shell
 * subprocesses, with only the dashboard and repository discovery stubbed.
 */

import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { fakeConsole } from '../../__test-utils__/mocks/console/fake-console.ts';
import { createTempDir, removeTempDir, writeTree } from '../../__test-utils__/utils/temp-utils.ts';
import type { MainDeps } from './index.ts';
import { main } from './index.ts';

const CONFIG = `
[human]
checks = ["greet"]
timeout = "30s"

[agent]
checks = ["greet", "broken"]
timeout = "1m"

[checks.greet]
run = "echo hello"
description = "Say hello"

[checks.broken]
run = "echo nope >&2; exit 3"
description = "Always fails"
`;

describe('apc CLI', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  function run(argv: readonly string[], env: MainDeps['env'] = {}) {
    const output = fakeConsole();
    const dashboard = { updateStatus: vi.fn(), complete: vi.fn().mockResolvedValue(undefined) };
    const result = main({
      argv,
      cwd: dir,
      env,
      terminal: { stdin: true, stdout: true },
      console: output,
      renderDashboardFn: () => dashboard,
      findRepositoryRootFn: () => Promise.resolve(dir),
    });
    return {
      result,
      dashboard,
      stdout: () => output.log.mock.calls.map(([line]) => line),
      stderr: () => output.error.mock.calls.map(([line]) => line),
    };
  }

  it('runs agent checks, reports failures and writes logs', async () => {
    await writeTree(dir, { 'agent-precommit.toml': CONFIG });

    const cli = run(['run', '--mode', 'agent', '--log-dir', 'logs']);

    expect((await cli.result).exitCode).toBe(1);
    expect(cli.stdout()).toEqual(['', '1 check(s) failed', '', '  Failed: broken', '    nope']);
    expect(cli.dashboard.updateStatus).toHaveBeenCalledWith('greet', 'PASS');
    expect(cli.dashboard.updateStatus).toHaveBeenCalledWith('broken', 'FAIL');
    const log = await readFile(path.join(dir, 'logs', 'greet.log'), 'utf8');
    expect(log).toMatch(/^\[[^\]]+\] \[greet\] hello\nPASS: exit 0 after \d+ms\n$/);
  });

  it('detects the mode from the environment', async () => {
    await writeTree(dir, { 'agent-precommit.toml': CONFIG });

    const cli = run(['run'], { APC_MODE: 'human' });

    expect((await cli.result).exitCode).toBe(0);
    expect(cli.stderr()).toEqual(['Mode: human (APC_MODE=human)']);
    expect(cli.stdout()[1]).toMatch(/^All checks passed \(1 passed, 0 skipped\) in \d+\.\d{2}s$/);
  });

  it('initializes, validates and lists a preset configuration', async () => {
    const init = run(['init', '--preset', 'go']);
    expect((await init.result).exitCode).toBe(0);

    const validate = run(['validate']);
    expect((await validate.result).exitCode).toBe(0);
    expect(validate.stdout()).toEqual(['Configuration is valid']);

    const list = run(['list', '--mode', 'agent']);
    expect((await list.result).exitCode).toBe(0);
    expect(list.stdout().slice(0, 2)).toEqual([
      'Agent mode checks:',
      '  no-merge-conflicts - Ensure no merge conflicts with main/master',
    ]);
  });

  it('rejects a second init without --force', async () => {
    await writeTree(dir, { 'agent-precommit.toml': CONFIG });

    const cli = run(['init']);

    expect((await cli.result).exitCode).toBe(1);
    expect(await readFile(path.join(dir, 'agent-precommit.toml'), 'utf8')).toBe(CONFIG);
  });
});
