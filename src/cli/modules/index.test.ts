/**
 * Tests for module barrel exports.
 */

import { describe, expect, it } from 'vitest';

import * as modules from './index.ts';

describe('modules index', () => {
  it('exports key module functions', () => {
    expect(typeof modules.commandExists).toBe('function');
    expect(typeof modules.executeCommand).toBe('function');
    expect(typeof modules.buildCheckResult).toBe('function');
    expect(typeof modules.statusForResult).toBe('function');
    expect(typeof modules.shouldSkipCheck).toBe('function');
    expect(typeof modules.resolveChecks).toBe('function');
  });
});
