import * as core from '@actions/core';
import { beforeEach, describe, expect, it, vi } from 'vitest';

import { GitHubActionReporter } from '../github-action-reporter.js';

vi.mock('@actions/core');

describe('GitHubActionReporter', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should forward each capability to the matching workflow command', () => {
    const reporter = new GitHubActionReporter();

    reporter.setOutput('valid', 'true');
    reporter.info('checking');
    reporter.warning('careful');
    reporter.error('broken');
    reporter.setFailed('failed');

    expect(core.setOutput).toHaveBeenCalledWith('valid', 'true');
    expect(core.info).toHaveBeenCalledWith('checking');
    expect(core.warning).toHaveBeenCalledWith('careful');
    expect(core.error).toHaveBeenCalledWith('broken');
    expect(core.setFailed).toHaveBeenCalledWith('failed');
  });
});
