import { afterEach, describe, expect, it, vi } from 'vitest';

import { ConsoleReporter } from '../console-reporter.js';

describe('ConsoleReporter', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should print outputs as name=value', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    new ConsoleReporter(false).setOutput('valid', 'true');

    expect(logSpy).toHaveBeenCalledWith('valid=true');
  });

  it('should route warnings and errors to stderr channels', () => {
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const reporter = new ConsoleReporter(false);

    reporter.warning('No commits found to validate');
    reporter.error('Commit abc1234 failed validation: "wip"');
    reporter.setFailed('1 out of 1 commit(s) failed validation.');

    expect(warnSpy).toHaveBeenCalledWith('warning: No commits found to validate');
    expect(errorSpy).toHaveBeenNthCalledWith(1, 'error: Commit abc1234 failed validation: "wip"');
    expect(errorSpy).toHaveBeenNthCalledWith(2, 'failed: 1 out of 1 commit(s) failed validation.');
  });

  it('should print info lines unchanged', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    new ConsoleReporter(false).info('Checking 2 commit(s) (all commits)');

    expect(logSpy).toHaveBeenCalledWith('Checking 2 commit(s) (all commits)');
  });
});
