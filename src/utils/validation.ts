/**
 * Verbatim Sync - Validation Utilities
 *
 * Zod schemas for outgoing comments and incoming API responses.
 *
 * @version 1.0.0
 */

import { z } from 'zod';
import { ValidationError } from './errors';

// =============================================================================
// COMMENT SCHEMAS
// =============================================================================

/**
 * ISO-8601 date-time with an explicit offset (or `Z`) and optional fraction.
 * Accepted when reading timestamps back from the service.
 */
export const TIMESTAMP_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(?:\.(\d+))?(Z|[+-]\d{2}:\d{2})$/;

/**
 * The only layout sent in a comment: six fraction digits and a numeric offset.
 */
export const COMMENT_TIMESTAMP_PATTERN =
  /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{6}[+-]\d{2}:\d{2}$/;

export const TimestampStringSchema = z.string().regex(TIMESTAMP_PATTERN, {
  message: 'Timestamp must be ISO-8601 with a UTC offset',
});

export const CommentTimestampSchema = z.string().regex(COMMENT_TIMESTAMP_PATTERN, {
  message: 'Timestamp must look like 2011-12-11T01:02:03.000000+00:00',
});

const PROPERTY_KEY_PATTERN = /^(string|number):(.+)$/;

/**
 * User properties: `string:*` keys hold strings, `number:*` keys hold finite numbers.
 */
export const UserPropertiesSchema = z
  .record(z.string(), z.union([z.string(), z.number()]))
  .superRefine((properties, ctx) => {
    for (const [key, value] of Object.entries(properties)) {
      const match = PROPERTY_KEY_PATTERN.exec(key);
      if (!match) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: `User property \`${key}\` must be prefixed with \`string:\` or \`number:\``,
        });
        continue;
      }

      const expected = match[1];
      const valid =
        expected === 'string'
          ? typeof value === 'string'
          : typeof value === 'number' && Number.isFinite(value);
      if (!valid) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: `User property \`${key}\` must hold a ${expected === 'string' ? 'string' : 'finite number'}`,
        });
      }
    }
  });

export const CommentSchema = z.object({
  original_text: z.string(),
  timestamp: CommentTimestampSchema,
  id: z.string().min(1),
  user_properties: UserPropertiesSchema.optional(),
});

// =============================================================================
// RESPONSE SCHEMAS
// =============================================================================

/**
 * Error bodies carry an optional human readable `message`.
 */
export const ErrorBodySchema = z.object({
  message: z.string().optional(),
});

export const RecentResponseSchema = z.object({
  comments: z.array(
    z.object({
      id: z.string(),
      timestamp: TimestampStringSchema,
    })
  ),
});

export type RecentResponse = z.infer<typeof RecentResponseSchema>;

// =============================================================================
// VALIDATION HELPERS
// =============================================================================

/**
 * Validate data against a Zod schema
 *
 * @example
 * ```typescript
 * validate(CommentSchema, comment, 'comments.0');
 * ```
 */
export function validate<T>(
  schema: z.ZodSchema<T>,
  data: unknown,
  fieldName?: string
): T {
  const result = schema.safeParse(data);

  if (!result.success) {
    const [firstIssue] = result.error.issues;
    const issuePath = firstIssue ? firstIssue.path.join('.') : '';
    const field = [fieldName, issuePath].filter(Boolean).join('.');
    const message = firstIssue ? firstIssue.message : 'Invalid value';
    throw new ValidationError(field ? `${field}: ${message}` : message, { field });
  }

  return result.data;
}

/**
 * Parse a JSON string, returning `undefined` instead of throwing.
 */
export function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
