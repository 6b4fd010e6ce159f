import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { createTempDir, removeTempDir } from '../../__test-utils__/utils/temp-utils.ts';
import {
  appendToLog,
  getLogPath,
  logFileStem,
  makeLogOptions,
  writeCheckLog,
} from './logger.ts';

const TIMESTAMP = String.raw`\[\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z\]`;

describe('logFileStem', () => {
  it('keeps safe names', () => {
    expect(logFileStem('test-unit')).toBe('test-unit');
    expect(logFileStem('build.v2')).toBe('build.v2');
    expect(logFileStem('npm_test')).toBe('npm_test');
  });

  it('replaces unsafe characters and appends a name hash', () => {
    expect(logFileStem('npm run lint')).toBe('npm_run_lint-326d9800');
    expect(logFileStem('a/b\\c')).toBe('a_b_c-7e65aa1c');
  });

  it('keeps names that sanitize alike apart', () => {
    expect(logFileStem('npm test')).toBe('npm_test-328e123c');
    expect(logFileStem('npm test')).not.toBe(logFileStem('npm_test'));
  });

  it('never yields an empty or relative stem', () => {
    expect(logFileStem('')).toBe('_-e3b0c442');
    expect(logFileStem('..')).toBe('_-5ec1f7e7');
    expect(logFileStem('/')).toBe('_-8a5edab2');
  });

  it('limits the stem length', () => {
    const stem = logFileStem('x'.repeat(300));

    expect(stem).toHaveLength(100);
    expect(stem.endsWith('-0d4e2ca9')).toBe(true);
  });
});

describe('makeLogOptions', () => {
  it('defaults to text format and omits unset fields', () => {
    expect(makeLogOptions({ logDir: '/logs', checkName: 'lint' })).toEqual({
      logDir: '/logs',
      checkName: 'lint',
      format: 'text',
    });
    expect(makeLogOptions({ logDir: '/logs', checkName: 'lint', maxBytes: 10 })).toEqual({
      logDir: '/logs',
      checkName: 'lint',
      format: 'text',
      maxBytes: 10,
    });
  });
});

describe('check log files', () => {
  let logDir: string;

  beforeEach(async () => {
    logDir = path.join(await createTempDir('apc-logs-'), 'nested');
  });

  afterEach(async () => {
    await removeTempDir(path.dirname(logDir));
  });

  async function readLines(checkName: string): Promise<string[]> {
    const content = await readFile(getLogPath(logDir, checkName), 'utf8');
    return content.split('\n').slice(0, -1);
  }

  it('prefixes each line with a timestamp and the check name', async () => {
    const logPath = await writeCheckLog(makeLogOptions({ logDir, checkName: 'lint' }), [
      'hello\nworld\n',
      'oops\n',
    ]);

    expect(logPath).toBe(path.join(logDir, 'lint.log'));
    const lines = await readLines('lint');
    expect(lines).toHaveLength(3);
    expect(lines[0]).toMatch(new RegExp(`^${TIMESTAMP} \\[lint\\] hello$`));
    expect(lines[1]).toMatch(new RegExp(`^${TIMESTAMP} \\[lint\\] world$`));
    expect(lines[2]).toMatch(new RegExp(`^${TIMESTAMP} \\[lint\\] oops$`));
  });

  it('terminates a final partial line', async () => {
    await writeCheckLog(makeLogOptions({ logDir, checkName: 'lint' }), ['partial']);

    const lines = await readLines('lint');
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(new RegExp(`^${TIMESTAMP} \\[lint\\] partial$`));
  });

  it('writes JSON lines in structured format', async () => {
    await writeCheckLog(makeLogOptions({ logDir, checkName: 'test', format: 'json' }), [
      'one\ntwo\n',
    ]);

    const payloads = (await readLines('test')).map((line): unknown => JSON.parse(line));
    expect(payloads).toEqual([
      { timestamp: expect.any(String), check: 'test', message: 'one' },
      { timestamp: expect.any(String), check: 'test', message: 'two' },
    ]);
  });

  it('writes captured text without prefixes in raw format', async () => {
    await writeCheckLog(makeLogOptions({ logDir, checkName: 'build', format: 'raw' }), [
      'out\n',
      'err without newline',
    ]);

    await expect(readFile(getLogPath(logDir, 'build'), 'utf8')).resolves.toBe(
      'out\nerr without newline',
    );
  });

  it('truncates at the byte budget with a marker', async () => {
    await writeCheckLog(
      makeLogOptions({ logDir, checkName: 'build', format: 'raw', maxBytes: 5 }),
      ['hello world\n'],
    );

    const lines = await readLines('build');
    expect(lines[0]).toBe('hello');
    expect(lines[1]).toMatch(new RegExp(`^${TIMESTAMP} \\[build\\] \\[TRUNCATED at 5 bytes\\]$`));
    expect(lines).toHaveLength(2);
  });

  it('replaces the previous log', async () => {
    const options = makeLogOptions({ logDir, checkName: 'x', format: 'raw' });
    await writeCheckLog(options, ['first\n']);
    await writeCheckLog(options, ['second\n']);

    await expect(readFile(getLogPath(logDir, 'x'), 'utf8')).resolves.toBe('second\n');
  });

  it('creates an empty log when there is no output', async () => {
    await writeCheckLog(makeLogOptions({ logDir, checkName: 'quiet' }), ['', '']);

    await expect(readFile(getLogPath(logDir, 'quiet'), 'utf8')).resolves.toBe('');
  });

  it('appends messages and can start a fresh file', async () => {
    await appendToLog(logDir, 'fmt', 'first');
    await appendToLog(logDir, 'fmt', 'second');
    expect(await readLines('fmt')).toEqual(['first', 'second']);

    await appendToLog(logDir, 'fmt', 'SKIPPED: reason', { truncate: true });
    expect(await readLines('fmt')).toEqual(['SKIPPED: reason']);
  });
});
