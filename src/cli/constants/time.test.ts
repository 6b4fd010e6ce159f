import { describe, expect, it } from 'vitest';

import {
  DEFAULT_TIMEOUT_MS,
  HOUR_MS,
  MINUTE_MS,
  MS_PER_SECOND,
  TIMEOUT_EXIT_CODE,
} from './time.ts';

describe('CLI time constants', () => {
  it('defines milliseconds per second as 1000', () => {
    expect(MS_PER_SECOND).toBe(1000);
  });

  it('defines minute and hour durations', () => {
    expect(MINUTE_MS).toBe(60 * MS_PER_SECOND);
    expect(HOUR_MS).toBe(60 * MINUTE_MS);
  });

  it('defaults timeouts to five minutes', () => {
    expect(DEFAULT_TIMEOUT_MS).toBe(300_000);
  });

  it('reserves exit code 124 for timeouts', () => {
    expect(TIMEOUT_EXIT_CODE).toBe(124);
  });
});
