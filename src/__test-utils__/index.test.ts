/**
 * Test Utilities Index Tests
 */

import { describe, expect, it } from 'vitest';
import * as testUtils from './index.ts';

describe('Test utilities index', () => {
  it('exports the shared helpers', () => {
    expect(Object.keys(testUtils).sort()).toEqual([
      'createCheck',
      'createDeferred',
      'createTempDir',
      'createTempScript',
      'createTestConfig',
      'fakeConsole',
      'removeTempDir',
      'resolved',
      'writeTree',
    ]);
  });

  it('builds a configuration whose modes run the given checks', () => {
    const config = testUtils.createTestConfig({ lint: testUtils.createCheck('true') });

    expect(config.human.checks).toEqual(['lint']);
    expect(config.agent.checks).toEqual(['lint']);
    expect(config.checks['lint']).toEqual({ run: 'true', description: '', env: {} });
  });

  it('pairs names with inline commands', () => {
    expect(testUtils.resolved({ a: 'echo a' })).toEqual([
      ['a', { run: 'echo a', description: '', env: {} }],
    ]);
  });
});
