import { z } from 'zod';

/**
 * A commit record as it appears in a push event. Extra fields (author,
 * timestamp, url, ...) are dropped.
 */
export const CommitSchema = z.object({
  id: z.string(),
  message: z.string(),
});

export type Commit = Readonly<z.infer<typeof CommitSchema>>;

export const PushEventPayloadSchema = z.object({
  commits: z.array(CommitSchema).nullish(),
});

export interface ValidationResult {
  isValid: boolean;
  /** Subset of the input commits, same references, original order */
  failedCommits: readonly Commit[];
  /** Commits evaluated before the policy stopped (all of them unless stopped at a failure) */
  checkedCount: number;
}
