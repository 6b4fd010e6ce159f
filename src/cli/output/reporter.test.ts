import { describe, expect, it } from 'vitest';

import { fakeConsole } from '../../__test-utils__/mocks/console/fake-console.ts';
import { createReporter } from './reporter.ts';

describe('createReporter', () => {
  it('prints results to stdout and info to stderr by default', () => {
    const output = fakeConsole();
    const reporter = createReporter(output);

    reporter.print('result');
    reporter.info('note');
    reporter.detail('hidden');

    expect(output.log.mock.calls).toEqual([['result']]);
    expect(output.error.mock.calls).toEqual([['note']]);
  });

  it('shows detail lines when verbose', () => {
    const output = fakeConsole();
    createReporter(output, { verbose: true }).detail('extra');

    expect(output.error).toHaveBeenCalledWith('extra');
  });

  it('suppresses info and detail when quiet, even if verbose', () => {
    const output = fakeConsole();
    const reporter = createReporter(output, { verbose: true, quiet: true });

    reporter.info('note');
    reporter.detail('extra');
    reporter.print('result');

    expect(output.error).not.toHaveBeenCalled();
    expect(output.log).toHaveBeenCalledWith('result');
  });

  it('prefixes warnings and errors regardless of quiet', () => {
    const output = fakeConsole();
    const reporter = createReporter(output, { quiet: true });

    reporter.warn('careful');
    reporter.error('broken');

    expect(output.error.mock.calls).toEqual([['warning: careful'], ['error: broken']]);
  });
});
