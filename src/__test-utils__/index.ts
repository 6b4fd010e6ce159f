/**
 * Test Utilities Index
 *
 * Role:
 *   Centralized export point for all test utilities.
 *
 * This file is:
 *   - Test-only infrastructure
 *   - Pure re-exports with no logic
 */

export { createCheck, createTestConfig, resolved } from './fixtures/checks/check-fixtures.ts';
export { fakeConsole } from './mocks/console/fake-console.ts';
export { createDeferred, type Deferred } from './utils/deferred.ts';
export { createTempDir, createTempScript, removeTempDir, writeTree } from './utils/temp-utils.ts';
