import { z } from 'zod';
import type { QueryIssue } from '../domain/index.js';
import { MAX_SCAN_LIMIT } from '../infrastructure/db/index.js';

const BOOLEAN_STRINGS: Record<string, boolean> = {
  true: true,
  '1': true,
  yes: true,
  false: false,
  '0': false,
  no: false,
};

/** Exact-match text filter. Compared as given, so surrounding whitespace is refused. */
const textFilter = z
  .string({ invalid_type_error: 'must be a string' })
  .superRefine((v, ctx) => {
    if (v.trim().length === 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must not be empty' });
    } else if (v.trim() !== v) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'must not have leading or trailing whitespace',
      });
    }
  });

/**
 * Any `Date.parse`-able string, normalized to ISO-8601 UTC.
 * Stored timestamps compare as text: the year must have four digits.
 */
const timestamp = z
  .string({ invalid_type_error: 'must be a valid ISO-8601 timestamp' })
  .superRefine((v, ctx) => {
    const ms = Date.parse(v);
    if (!Number.isFinite(ms)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be a valid ISO-8601 timestamp' });
      return;
    }
    const year = new Date(ms).getUTCFullYear();
    if (year < 0 || year > 9999) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must have a year between 0000 and 9999' });
    }
  })
  .transform((v) => new Date(v).toISOString());

const flag = z.preprocess(
  (v) => (typeof v === 'string' ? BOOLEAN_STRINGS[v.trim().toLowerCase()] ?? v : v),
  z.boolean({ invalid_type_error: 'must be one of true, false, 1, 0, yes, no' }),
);

/** Positive integer, clamped to the store's scan cap. */
const limit = z
  .preprocess(
    (v) => (typeof v === 'string' && v.trim() !== '' ? Number(v) : v),
    z
      .number({ invalid_type_error: 'must be an integer' })
      .int('must be an integer')
      .positive('must be a positive integer'),
  )
  .transform((v) => Math.min(v, MAX_SCAN_LIMIT));

export const recentQuerySchema = z.object({
  limit: limit.optional(),
});

export const searchQuerySchema = z
  .object({
    operation_name: textFilter.optional(),
    session_id: textFilter.optional(),
    client_name: textFilter.optional(),
    since: timestamp.optional(),
    until: timestamp.optional(),
    errors_only: flag.optional(),
    limit: limit.optional(),
  })
  .superRefine((q, ctx) => {
    if (
      q.since !== undefined &&
      q.until !== undefined &&
      Date.parse(q.since) > Date.parse(q.until)
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['since'],
        message: 'must not be after until',
      });
    }
  });

export type RecentQuery = z.infer<typeof recentQuerySchema>;
export type SearchQuery = z.infer<typeof searchQuerySchema>;

/** Maps zod issues to one entry per offending parameter. */
export function toQueryIssues(error: z.ZodError): QueryIssue[] {
  return error.issues.map((issue) => ({
    parameter: issue.path.length > 0 ? issue.path.join('.') : 'query',
    message: issue.message,
  }));
}
