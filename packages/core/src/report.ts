import type { Commit } from './commit.js';

export const SHORT_ID_LENGTH = 7;
export const SUBJECT_MAX_LENGTH = 72;

/**
 * First line of a commit message, trimmed. Bodies and trailers are never
 * matched against the pattern.
 */
export function subjectLine(message: string): string {
  return (message.split('\n')[0] ?? '').trim();
}

export function shortId(id: string): string {
  return id.slice(0, SHORT_ID_LENGTH);
}

/** Lengths count code points, so a surrogate pair is never split. */
export function truncateSubject(subject: string, maxLength = SUBJECT_MAX_LENGTH): string {
  const codePoints = Array.from(subject);
  return codePoints.length <= maxLength ? subject : `${codePoints.slice(0, maxLength - 1).join('')}…`;
}

export interface FailureReportParams {
  failedCommits: readonly Commit[];
  checkedCount: number;
  pattern: string;
  patternDescription: string;
}

/**
 * Human-readable failure report:
 *
 * ```
 * 1 out of 3 commit(s) failed validation.
 * Expected format: Conventional Commits format: type(scope): description
 * Pattern: ^(feat|fix)...
 *
 * Failed commits:
 * - 1a2b3c4: "wip"
 * ```
 */
export function formatFailureReport(params: FailureReportParams): string {
  const { failedCommits, checkedCount, pattern, patternDescription } = params;

  return [
    `${failedCommits.length} out of ${checkedCount} commit(s) failed validation.`,
    `Expected format: ${patternDescription}`,
    `Pattern: ${pattern}`,
    '',
    'Failed commits:',
    ...failedCommits.map((commit) => `- ${shortId(commit.id)}: "${truncateSubject(subjectLine(commit.message))}"`),
  ].join('\n');
}

/** Value of the `failed-commits` output */
export function serializeFailedCommits(failedCommits: readonly Commit[]): string {
  return JSON.stringify(failedCommits.map((commit) => ({ id: commit.id, message: subjectLine(commit.message) })));
}
