/**
 * Tests for the CLI `version` helper.
 *
 * The package version is read from `package.json` once and cached; an
 * unreadable or malformed manifest yields `PKG_VERSION_FALLBACK`.
 */
import { afterEach, describe, expect, it, vi } from 'vitest';

import { PKG_VERSION_FALLBACK } from '../../constants/paths.ts';

describe('version module', () => {
  afterEach(() => {
    vi.doUnmock('node:fs');
    vi.resetModules();
  });

  it('returns cached package version on subsequent reads', async () => {
    vi.doMock('node:fs', () => ({
      readFileSync: vi.fn(() => JSON.stringify({ version: '1.2.3' })),
    }));

    const mod = await import('./version.ts');
    const fs = await import('node:fs');
    const readSpy = vi.mocked(fs.readFileSync);

    expect(mod.getPackageVersion()).toBe('1.2.3');
    expect(mod.__test__.getPkgVersion()).toBe('1.2.3');
    expect(readSpy).toHaveBeenCalledTimes(1);
  });

  it('falls back and logs when package.json cannot be read', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.doMock('node:fs', () => ({
      readFileSync: vi.fn(() => {
        throw new Error('boom');
      }),
    }));

    const mod = await import('./version.ts');

    expect(mod.getPackageVersion()).toBe(PKG_VERSION_FALLBACK);
    expect(errorSpy).toHaveBeenCalledWith('[version] Failed to read package.json: Error: boom');
  });

  it('uses the fallback without logging when version is missing', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.doMock('node:fs', () => ({
      readFileSync: vi.fn(() => JSON.stringify({})),
    }));

    const mod = await import('./version.ts');

    expect(mod.getPackageVersion()).toBe(PKG_VERSION_FALLBACK);
    expect(errorSpy).not.toHaveBeenCalled();
  });

  it('uses the fallback when version is not a string', async () => {
    vi.doMock('node:fs', () => ({
      readFileSync: vi.fn(() => JSON.stringify({ version: 52 })),
    }));

    const mod = await import('./version.ts');

    expect(mod.getPackageVersion()).toBe(PKG_VERSION_FALLBACK);
  });

  it('reads the real manifest', async () => {
    const mod = await import('./version.ts');

    expect(mod.getPackageVersion()).toBe('0.3.0');
  });
});
