import { writeFile } from 'node:fs/promises';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import {
  createTempDir,
  createTempScript,
  removeTempDir,
} from '../../../__test-utils__/utils/temp-utils.ts';
import { commandExists, resolveBinary } from './binary-checker.ts';

describe('binary-checker', () => {
  let binDir: string;

  beforeEach(async () => {
    binDir = await createTempDir('apc-bin-');
  });

  afterEach(async () => {
    await removeTempDir(binDir);
  });

  it('finds common shell binaries on the process PATH', async () => {
    await expect(commandExists('sh')).resolves.toBe(true);
  });

  it('reports missing binaries', async () => {
    await expect(commandExists('apc-definitely-missing-binary')).resolves.toBe(false);
  });

  it('resolves executables from a custom PATH', async () => {
    await createTempScript(binDir, 'mytool', '#!/bin/sh\nexit 0\n');

    await expect(resolveBinary('mytool', { PATH: binDir })).resolves.toBe(
      path.join(binDir, 'mytool'),
    );
  });

  it('ignores files without execute permission', async () => {
    await writeFile(path.join(binDir, 'plain'), 'data', { mode: 0o644 });

    await expect(commandExists('plain', { PATH: binDir })).resolves.toBe(false);
  });

  it('ignores relative PATH entries and empty PATH', async () => {
    await createTempScript(binDir, 'mytool', '#!/bin/sh\nexit 0\n');

    await expect(commandExists('mytool', { PATH: 'relative/bin' })).resolves.toBe(false);
    await expect(commandExists('mytool', { PATH: '' })).resolves.toBe(false);
    await expect(commandExists('mytool', {})).resolves.toBe(false);
  });

  it('checks names containing a separator directly', async () => {
    const script = await createTempScript(binDir, 'direct', '#!/bin/sh\nexit 0\n');

    await expect(commandExists(script, { PATH: '' })).resolves.toBe(true);
    await expect(commandExists(path.join(binDir, 'absent'), { PATH: '' })).resolves.toBe(false);
  });

  it('rejects empty names', async () => {
    await expect(resolveBinary('', { PATH: binDir })).resolves.toBeNull();
  });
});
