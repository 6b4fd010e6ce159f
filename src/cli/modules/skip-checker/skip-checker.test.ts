import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { createTempDir, removeTempDir, writeTree } from '../../../__test-utils__/utils/temp-utils.ts';
import type { CheckDefinition } from '../types.ts';
import { isCheckEnabled, shouldSkipCheck } from './skip-checker.ts';

function check(enabledIf?: CheckDefinition['enabledIf']): CheckDefinition {
  return enabledIf === undefined
    ? { run: 'true', description: '', env: {} }
    : { run: 'true', description: '', enabledIf, env: {} };
}

describe('shouldSkipCheck', () => {
  let root: string;

  beforeEach(async () => {
    root = await createTempDir('apc-skip-');
    await writeTree(root, { 'Cargo.toml': '', 'tests/integration/a.txt': '' });
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  it('runs checks without a condition', async () => {
    await expect(shouldSkipCheck(check(), root)).resolves.toEqual({ skip: false });
  });

  it('runs when the required file exists', async () => {
    await expect(shouldSkipCheck(check({ fileExists: 'Cargo.toml' }), root)).resolves.toEqual({
      skip: false,
    });
  });

  it('treats a directory as an existing path', async () => {
    await expect(shouldSkipCheck(check({ fileExists: 'tests' }), root)).resolves.toEqual({
      skip: false,
    });
  });

  it('skips when the required file is missing', async () => {
    await expect(shouldSkipCheck(check({ fileExists: 'go.mod' }), root)).resolves.toEqual({
      skip: true,
      reason: 'File not found: go.mod',
    });
  });

  it('requires a directory for dirExists', async () => {
    await expect(
      shouldSkipCheck(check({ dirExists: 'tests/integration' }), root),
    ).resolves.toEqual({ skip: false });
    await expect(shouldSkipCheck(check({ dirExists: 'Cargo.toml' }), root)).resolves.toEqual({
      skip: true,
      reason: 'Directory not found: Cargo.toml',
    });
  });

  it('skips when the command is not on PATH', async () => {
    await expect(
      shouldSkipCheck(check({ commandExists: 'apc-definitely-missing-binary' }), root),
    ).resolves.toEqual({
      skip: true,
      reason: 'Command not found on PATH: apc-definitely-missing-binary',
    });
  });

  it('treats path predicates as unsatisfied without a repository root', async () => {
    await expect(shouldSkipCheck(check({ fileExists: 'Cargo.toml' }), undefined)).resolves.toEqual(
      { skip: true, reason: 'No repository root to resolve Cargo.toml' },
    );
    await expect(shouldSkipCheck(check({ dirExists: 'tests' }), undefined)).resolves.toEqual({
      skip: true,
      reason: 'No repository root to resolve tests',
    });
  });

  it('still evaluates the command predicate without a repository root', async () => {
    await expect(shouldSkipCheck(check({ commandExists: 'sh' }), undefined)).resolves.toEqual({
      skip: false,
    });
  });

  it('stops at the first unsatisfied predicate', async () => {
    const probes = {
      pathExists: vi.fn(async () => false),
      directoryExists: vi.fn(async () => true),
      commandExists: vi.fn(async () => true),
    };

    const decision = await shouldSkipCheck(
      check({ fileExists: 'a', dirExists: 'b', commandExists: 'c' }),
      '/repo',
      probes,
    );

    expect(decision).toEqual({ skip: true, reason: 'File not found: a' });
    expect(probes.pathExists).toHaveBeenCalledWith(path.resolve('/repo', 'a'));
    expect(probes.directoryExists).not.toHaveBeenCalled();
    expect(probes.commandExists).not.toHaveBeenCalled();
  });

  it('requires every predicate to hold', async () => {
    const probes = {
      pathExists: vi.fn(async () => true),
      directoryExists: vi.fn(async () => true),
      commandExists: vi.fn(async () => false),
    };

    const decision = await shouldSkipCheck(
      check({ fileExists: 'a', dirExists: 'b', commandExists: 'tool' }),
      '/repo',
      probes,
    );

    expect(decision).toEqual({ skip: true, reason: 'Command not found on PATH: tool' });
    expect(probes.directoryExists).toHaveBeenCalledWith(path.resolve('/repo', 'b'));
    expect(probes.commandExists).toHaveBeenCalledWith('tool');
  });
});

describe('isCheckEnabled', () => {
  it('mirrors the skip decision', async () => {
    await expect(isCheckEnabled(check())).resolves.toBe(true);
    await expect(isCheckEnabled(check({ fileExists: 'x' }))).resolves.toBe(false);
    await expect(
      isCheckEnabled(check({ commandExists: 'apc-definitely-missing-binary' })),
    ).resolves.toBe(false);
  });
});
