/**
 * Request Validation Schemas
 *
 * Zod schemas for request bodies and path parameters, kept here so the
 * controllers stay thin.
 */

import { z } from 'zod';

// ─────────────────────────────────────────────────────────────────────────────
// Body schemas
// ─────────────────────────────────────────────────────────────────────────────

/**
 * `content` may be empty or absent: the report store declines those with
 * EMPTY_CONTENT rather than a generic validation error.
 */
export const submitReportBody = z.object({
  content: z.string({ error: 'content must be a string' }).nullish(),
});

export type SubmitReportBody = z.infer<typeof submitReportBody>;

// ─────────────────────────────────────────────────────────────────────────────
// Path parameter schemas
// ─────────────────────────────────────────────────────────────────────────────

export const toolNameParams = z.object({
  name: z.string().regex(/^[a-z][a-z0-9_]*$/, 'Tool names are lowercase snake_case'),
});
