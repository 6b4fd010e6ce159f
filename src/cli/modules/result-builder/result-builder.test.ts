import { describe, expect, it } from 'vitest';

import type { CommandOutcome } from '../types.ts';
import {
  buildCheckResult,
  buildSkippedResult,
  combinedOutput,
  createRunReport,
  failedResults,
  isRunSuccessful,
  isSuccessfulOutcome,
  statusForResult,
  summarizeReport,
} from './result-builder.ts';

function outcome(overrides: Partial<CommandOutcome> = {}): CommandOutcome {
  return { exitCode: 0, stdout: '', stderr: '', timedOut: false, durationMs: 5, ...overrides };
}

describe('outcomes', () => {
  it('requires exit 0 without a timeout', () => {
    expect(isSuccessfulOutcome(outcome())).toBe(true);
    expect(isSuccessfulOutcome(outcome({ exitCode: 1 }))).toBe(false);
    expect(isSuccessfulOutcome(outcome({ exitCode: 0, timedOut: true }))).toBe(false);
  });

  it('combines output streams', () => {
    expect(combinedOutput(outcome({ stdout: 'out\n' }))).toBe('out\n');
    expect(combinedOutput(outcome({ stderr: 'err\n' }))).toBe('err\n');
    expect(combinedOutput(outcome({ stdout: 'out\n', stderr: 'err\n' }))).toBe('out\n\nerr\n');
    expect(combinedOutput(outcome())).toBe('');
  });
});

describe('results', () => {
  it('builds executed results', () => {
    expect(buildCheckResult('a', outcome({ exitCode: 2 }))).toEqual({
      name: 'a',
      passed: false,
      outcome: outcome({ exitCode: 2 }),
      skipped: false,
    });
  });

  it('builds skipped results that count as passed', () => {
    const result = buildSkippedResult('b', 'File not found: x');

    expect(result).toEqual({
      name: 'b',
      passed: true,
      outcome: outcome({ durationMs: 0 }),
      skipped: true,
      skipReason: 'File not found: x',
    });
  });

  it('derives display statuses', () => {
    expect(statusForResult(buildSkippedResult('s', 'r'))).toBe('SKIPPED');
    expect(statusForResult(buildCheckResult('p', outcome()))).toBe('PASS');
    expect(statusForResult(buildCheckResult('f', outcome({ exitCode: 1 })))).toBe('FAIL');
    expect(
      statusForResult(buildCheckResult('t', outcome({ exitCode: 124, timedOut: true }))),
    ).toBe('TIMEOUT');
  });
});

describe('reports', () => {
  const results = [
    buildCheckResult('ok', outcome()),
    buildCheckResult('bad', outcome({ exitCode: 1 })),
    buildSkippedResult('skip', 'reason'),
    buildCheckResult('slow', outcome({ exitCode: 124, timedOut: true })),
  ];

  it('succeeds when empty', () => {
    expect(isRunSuccessful(createRunReport('agent', [], 0))).toBe(true);
  });

  it('succeeds when only passes and skips are present', () => {
    const report = createRunReport(
      'human',
      [buildCheckResult('ok', outcome()), buildSkippedResult('skip', 'reason')],
      1,
    );

    expect(isRunSuccessful(report)).toBe(true);
  });

  it('lists failures in order', () => {
    const report = createRunReport('agent', results, 10);

    expect(isRunSuccessful(report)).toBe(false);
    expect([...failedResults(report)].map((r) => r.name)).toEqual(['bad', 'slow']);
  });

  it('summarizes counts', () => {
    expect(summarizeReport(createRunReport('ci', results, 42))).toEqual({
      total: 4,
      passed: 1,
      failed: 2,
      skipped: 1,
      durationMs: 42,
    });
  });

  it('freezes the report', () => {
    const report = createRunReport('agent', results, 1);

    expect(Object.isFrozen(report)).toBe(true);
    expect(Object.isFrozen(report.results)).toBe(true);
  });
});
