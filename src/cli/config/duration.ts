/**
 * Duration literal parsing ("30s", "15m", "1h30m", "500ms").
 *
 * A literal is one or more `<integer><unit>` pairs, optionally separated by
 * whitespace. Bare numbers, signs, fractions and unknown units are rejected.
 */

import { HOUR_MS, MINUTE_MS, MS_PER_SECOND } from '../constants/time.ts';

const DAY_MS = 24 * HOUR_MS;

const UNIT_MS: ReadonlyMap<string, number> = new Map<string, number>([
  ...withAliases(['nsec', 'ns'], 1e-6),
  ...withAliases(['usec', 'us', 'µs'], 1e-3),
  ...withAliases(['msec', 'ms', 'millis'], 1),
  ...withAliases(['seconds', 'second', 'secs', 'sec', 's'], MS_PER_SECOND),
  ...withAliases(['minutes', 'minute', 'mins', 'min', 'm'], MINUTE_MS),
  ...withAliases(['hours', 'hour', 'hrs', 'hr', 'h'], HOUR_MS),
  ...withAliases(['days', 'day', 'd'], DAY_MS),
  ...withAliases(['weeks', 'week', 'w'], 7 * DAY_MS),
  ...withAliases(['months', 'month', 'M'], 30.44 * DAY_MS),
  ...withAliases(['years', 'year', 'y'], 365.25 * DAY_MS),
]);

function withAliases(names: readonly string[], ms: number): Array<[string, number]> {
  return names.map((name) => [name, ms]);
}

/**
 * Parse a duration literal into milliseconds.
 *
 * @returns The total in milliseconds, or `null` when the literal is invalid.
 */
export function parseDuration(input: string): number | null {
  const text = input.trim();
  if (text.length === 0) {
    return null;
  }

  const token = /(\d+)\s*([a-zA-Zµ]+)\s*/y;
  let total = 0;
  let index = 0;

  while (index < text.length) {
    token.lastIndex = index;
    const match = token.exec(text);
    if (match === null) {
      return null;
    }

    const [, amount = '', unit = ''] = match;
    const factor = UNIT_MS.get(unit);
    if (factor === undefined) {
      return null;
    }

    total += Number.parseInt(amount, 10) * factor;
    index = token.lastIndex;
  }

  return total;
}

/**
 * Whether the literal parses as a duration.
 */
export function isValidDuration(input: string): boolean {
  return parseDuration(input) !== null;
}
