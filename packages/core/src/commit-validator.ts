import { getLogger } from '@commitguard/logger';
import { ok, type Result } from 'neverthrow';

import type { Commit, ValidationResult } from './commit.js';
import type { EventContext, ValidatorConfig } from './config.js';
import type { ConfigError, LoadError } from './errors.js';
import { loadEventCommits } from './event-loader.js';
import { type CompiledPattern, compilePattern } from './pattern.js';
import { formatFailureReport, serializeFailedCommits, shortId, subjectLine, truncateSubject } from './report.js';
import type { Reporter } from './reporter.js';

const logger = getLogger('CommitValidator');

export type LoadCommits = (eventName: string | undefined, eventPath: string) => Result<Commit[], LoadError>;

export interface CommitValidatorOptions {
  eventContext?: EventContext | undefined;
  /** Replaces the file-based EventLoader */
  loadCommits?: LoadCommits | undefined;
}

export type RunOutcome =
  | {
      status: 'passed' | 'failed-validation';
      /** Whether the host step was marked failed */
      stepFailed: boolean;
      totalCommits: number;
      failedCommits: readonly Commit[];
    }
  | {
      status: 'errored';
      stepFailed: true;
      error: LoadError;
    };

/**
 * Checks commit subjects against the configured pattern and reports the
 * verdict through a Reporter. One instance per run.
 */
export class CommitValidator {
  private constructor(
    private readonly config: ValidatorConfig,
    private readonly pattern: CompiledPattern,
    private readonly reporter: Reporter,
    private readonly eventContext: EventContext,
    private readonly loadCommits: LoadCommits
  ) {}

  /**
   * Compiles the pattern up front; an invalid pattern never reaches validation.
   */
  static create(
    config: ValidatorConfig,
    reporter: Reporter,
    options: CommitValidatorOptions = {}
  ): Result<CommitValidator, ConfigError> {
    const eventContext = options.eventContext ?? {};
    const loadCommits = options.loadCommits ?? loadEventCommits;

    return compilePattern(config.pattern, config.caseSensitive).map(
      (pattern) => new CommitValidator(config, pattern, reporter, eventContext, loadCommits)
    );
  }

  getCommits(): Result<Commit[], LoadError> {
    const { eventName, eventPath } = this.eventContext;
    if (eventPath === undefined) {
      this.reporter.warning('No event payload found');
      return ok([]);
    }

    return this.loadCommits(eventName, eventPath);
  }

  validateCommits(commits: readonly Commit[]): ValidationResult {
    if (commits.length === 0) {
      this.reporter.warning('No commits found to validate');
      return { isValid: true, failedCommits: [], checkedCount: 0 };
    }

    const policy = this.config.checkAllCommits ? 'all commits' : 'stop at first failure';
    this.reporter.info(`Checking ${commits.length} commit(s) (${policy})`);

    const failedCommits: Commit[] = [];
    let checkedCount = 0;

    for (const commit of commits) {
      checkedCount++;
      const subject = subjectLine(commit.message);

      if (this.pattern.matches(subject)) {
        this.reporter.info(`Commit ${shortId(commit.id)} passed validation`);
        continue;
      }

      failedCommits.push(commit);
      this.reporter.error(`Commit ${shortId(commit.id)} failed validation: "${truncateSubject(subject)}"`);

      if (!this.config.checkAllCommits) break;
    }

    logger.debug({ checkedCount, failed: failedCommits.length, total: commits.length }, 'Validated commits');

    return { isValid: failedCommits.length === 0, failedCommits, checkedCount };
  }

  /**
   * load -> validate -> report. A load error fails the step before any
   * output is written.
   */
  run(): RunOutcome {
    this.reporter.info(`Validating commit messages with pattern: ${this.config.pattern}`);
    this.reporter.info(`Expected format: ${this.config.patternDescription}`);

    const commitsResult = this.getCommits();
    if (commitsResult.isErr()) {
      const error = commitsResult.error;
      logger.error({ error, eventPath: error.eventPath }, 'Failed to load commits');
      this.reporter.setFailed(`Action failed with error: ${error.message}`);
      return { status: 'errored', stepFailed: true, error };
    }

    const commits = commitsResult.value;
    const result = this.validateCommits(commits);

    this.reporter.setOutput('valid', String(result.isValid));
    this.reporter.setOutput('failed-commits', serializeFailedCommits(result.failedCommits));
    this.reporter.setOutput('total-commits', String(commits.length));

    if (result.isValid) {
      this.reporter.info(`All ${result.checkedCount} commit(s) passed validation`);
      return { status: 'passed', stepFailed: false, totalCommits: commits.length, failedCommits: [] };
    }

    const report =
      this.config.customErrorMessage ??
      formatFailureReport({
        failedCommits: result.failedCommits,
        checkedCount: result.checkedCount,
        pattern: this.config.pattern,
        patternDescription: this.config.patternDescription,
      });

    if (this.config.failOnError) {
      this.reporter.setFailed(report);
    } else {
      this.reporter.error(report);
    }

    return {
      status: 'failed-validation',
      stepFailed: this.config.failOnError,
      totalCommits: commits.length,
      failedCommits: result.failedCommits,
    };
  }
}
