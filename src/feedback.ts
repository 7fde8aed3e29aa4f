/**
 * Feedback scores for traces and spans
 *
 * A feedback score is a named numeric value, optionally with a reason, attached
 * after the fact to a trace or span by its id.
 *
 * @example
 * ```typescript
 * const client = new Tracelet();
 * const trace = client.trace({ name: 'chat-turn' });
 *
 * client.logTracesFeedbackScores([
 *   { id: trace.id, name: 'helpfulness', value: 0.8, reason: 'Answered the question' },
 * ]);
 *
 * await client.flush();
 * ```
 */

import { z } from 'zod';
import { ValidationError } from './errors';

export type FeedbackSource = 'sdk' | 'ui' | 'online_scoring';

export interface FeedbackScore {
  /** Trace id or span id the score belongs to */
  id: string;
  name: string;
  value: number;
  reason?: string;
  categoryName?: string;
  source?: FeedbackSource;
  /** Project of the scored trace. Defaults to the client's project. */
  projectName?: string;
}

export type FeedbackScoreRecord = Required<Pick<FeedbackScore, 'id' | 'name' | 'value' | 'source' | 'projectName'>> &
  Pick<FeedbackScore, 'reason' | 'categoryName'>;

export const FeedbackScoreSchema = z.object({
  id: z.string().min(1, 'id is required'),
  name: z.string().min(1, 'name is required'),
  value: z.number().finite(),
  reason: z.string().optional(),
  categoryName: z.string().optional(),
  source: z.enum(['sdk', 'ui', 'online_scoring']).default('sdk'),
  projectName: z.string().min(1).optional(),
});

/**
 * Validate scores and fill in defaults. Throws ValidationError on the first invalid score.
 */
export function normalizeFeedbackScores(scores: FeedbackScore[], defaultProjectName: string): FeedbackScoreRecord[] {
  return scores.map((score, index) => {
    const parsed = FeedbackScoreSchema.safeParse(score);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
      throw new ValidationError(`Invalid feedback score at index ${index}: ${issues.join('; ')}`, issues);
    }

    const { reason, categoryName, ...rest } = parsed.data;
    const record: FeedbackScoreRecord = {
      ...rest,
      projectName: rest.projectName ?? defaultProjectName,
    };
    if (reason !== undefined) record.reason = reason;
    if (categoryName !== undefined) record.categoryName = categoryName;
    return record;
  });
}
