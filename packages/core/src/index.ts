export {
  CommitSchema,
  PushEventPayloadSchema,
  type Commit,
  type ValidationResult,
} from './commit.js';
export {
  DEFAULT_PATTERN,
  DEFAULT_PATTERN_DESCRIPTION,
  INPUT_NAMES,
  parseEventContext,
  parseValidatorConfig,
  ValidatorInputsSchema,
  type EventContext,
  type InputName,
  type RawInputs,
  type ValidatorConfig,
} from './config.js';
export {
  CommitValidator,
  type CommitValidatorOptions,
  type LoadCommits,
  type RunOutcome,
} from './commit-validator.js';
export { ConfigError, getErrorMessage, isErrorWithMessage, LoadError } from './errors.js';
export { COMMIT_LIST_EVENTS, extractCommits, loadEventCommits } from './event-loader.js';
export { compilePattern, type CompiledPattern } from './pattern.js';
export {
  formatFailureReport,
  serializeFailedCommits,
  SHORT_ID_LENGTH,
  shortId,
  SUBJECT_MAX_LENGTH,
  subjectLine,
  truncateSubject,
  type FailureReportParams,
} from './report.js';
export { RecordingReporter, type Reporter, type ReporterLevel, type ReporterMessage } from './reporter.js';
