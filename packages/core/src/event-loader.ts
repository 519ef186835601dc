import { readFileSync } from 'node:fs';

import { getLogger } from '@commitguard/logger';
import { err, ok, type Result } from 'neverthrow';
import type { ZodIssue } from 'zod';

import { type Commit, PushEventPayloadSchema } from './commit.js';
import { getErrorMessage, LoadError } from './errors.js';

const logger = getLogger('EventLoader');

/** Event types whose payload carries a `commits` array */
export const COMMIT_LIST_EVENTS: ReadonlySet<string> = new Set(['push']);

function formatIssues(issues: ZodIssue[]): string {
  return issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Extract the ordered commit list from an already parsed event payload.
 *
 * Events without a commit list, an absent or null `commits` field, and an
 * empty array all yield an empty list.
 */
export function extractCommits(
  eventName: string | undefined,
  payload: unknown,
  eventPath: string
): Result<Commit[], LoadError> {
  if (!isPlainObject(payload)) {
    return err(new LoadError(`Event payload at ${eventPath} is not a JSON object`, eventPath));
  }

  if (eventName === undefined || !COMMIT_LIST_EVENTS.has(eventName)) {
    logger.debug({ eventName }, 'Event type carries no commit list');
    return ok([]);
  }

  const parsed = PushEventPayloadSchema.safeParse(payload);
  if (!parsed.success) {
    const details = formatIssues(parsed.error.issues);
    return err(new LoadError(`Invalid commit list in event payload at ${eventPath}: ${details}`, eventPath));
  }

  const commits = (parsed.data.commits ?? []).map((commit): Commit => ({ id: commit.id, message: commit.message }));
  logger.debug({ eventName, count: commits.length }, 'Extracted commits from event payload');
  return ok(commits);
}

/**
 * Read a JSON event payload from disk and extract its commits.
 * A missing file or invalid JSON is fatal; there is no partial result.
 */
export function loadEventCommits(eventName: string | undefined, eventPath: string): Result<Commit[], LoadError> {
  let content: string;
  try {
    content = readFileSync(eventPath, 'utf-8');
  } catch (error) {
    return err(new LoadError(`Could not read event payload at ${eventPath}: ${getErrorMessage(error)}`, eventPath));
  }

  let payload: unknown;
  try {
    payload = JSON.parse(content);
  } catch (error) {
    return err(new LoadError(`Event payload at ${eventPath} is not valid JSON: ${getErrorMessage(error)}`, eventPath));
  }

  return extractCommits(eventName, payload, eventPath);
}
