import * as core from '@actions/core';
import type { Reporter } from '@commitguard/core';

/**
 * Reporter backed by workflow commands. `setFailed` also sets the process
 * exit code, which is what marks the step as failed.
 */
export class GitHubActionReporter implements Reporter {
  setOutput(name: string, value: string): void {
    core.setOutput(name, value);
  }

  setFailed(message: string): void {
    core.setFailed(message);
  }

  info(message: string): void {
    core.info(message);
  }

  warning(message: string): void {
    core.warning(message);
  }

  error(message: string): void {
    core.error(message);
  }
}
