import { z } from 'zod';
import { MAX_QUESTION_LENGTH } from '../utils/sanitize';

/**
 * Body of POST /api/v1/query/stream
 */
export const QueryBodySchema = z.object({
  query: z.string().trim().min(1, 'Query cannot be empty').max(MAX_QUESTION_LENGTH, `Query too long (max ${MAX_QUESTION_LENGTH} characters)`),
  session_id: z.string().trim().min(1, 'session_id is required').max(200),
  sources: z.array(z.string().trim().min(1)).optional(),
});

export type QueryBody = z.infer<typeof QueryBodySchema>;

export const SessionIdSchema = z.string().trim().min(1).max(200);
