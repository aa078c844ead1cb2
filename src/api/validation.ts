import { z } from 'zod';
import type { Context } from 'hono';
import { ACTIVITY_ACTIONS, CONTENT_ACCESS_LEVELS } from '../types/index.js';

const ContentAccessEnum = z.enum(CONTENT_ACCESS_LEVELS);

// POST /api/content/quality/batch-calculate
export const BatchCalculateRequestSchema = z.object({
  articleIds: z.array(z.string().min(1)).max(1000).optional(),
  limit: z.number().int().min(1).max(1000).optional(),
});

// POST /api/content/subscription/flag/:articleId
export const FlagRequestSchema = z.object({
  contentAccess: ContentAccessEnum,
  premiumFeatures: z.record(z.unknown()).optional(),
});

// POST /api/content/subscription/batch-flag
export const BatchFlagRequestSchema = z.object({
  contentAccess: ContentAccessEnum,
  criteria: z.object({
    qualityScoreMin: z.number().min(0).max(100).optional(),
    categoryIds: z.array(z.string().min(1)).optional(),
    authorIds: z.array(z.string().min(1)).optional(),
    createdAfter: z.string().datetime().transform((value) => new Date(value)).optional(),
  }).default({}),
});

// POST /api/content/activity
export const ActivityRequestSchema = z.object({
  action: z.enum(ACTIVITY_ACTIONS),
  articleId: z.string().min(1).optional(),
  sessionId: z.string().min(1).max(200).optional(),
  readingTime: z.number().min(0).optional(),
  metadata: z.record(z.unknown()).optional(),
});

// ?days= on the insight and analytics endpoints
export const DaysQuerySchema = z.coerce.number().int().min(1).max(365);

// ?limit= on premium suggestions
export const LimitQuerySchema = z.coerce.number().int().min(1).max(100);

export type BodyResult<T> =
  | { ok: true; data: T }
  | { ok: false; response: Response };

/**
 * Validate a JSON request body against a Zod schema. On failure the result
 * carries the 400 response to return.
 */
export async function validateBody<S extends z.ZodTypeAny>(
  c: Context,
  schema: S,
): Promise<BodyResult<z.output<S>>> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    return { ok: false, response: c.json({ error: 'Invalid JSON body' }, 400) };
  }

  const result = schema.safeParse(body);
  if (!result.success) {
    return {
      ok: false,
      response: c.json({
        error: 'Validation failed',
        details: result.error.issues.map((i) => ({
          path: i.path.join('.'),
          message: i.message,
        })),
      }, 400),
    };
  }
  return { ok: true, data: result.data };
}

/**
 * Parse an optional query parameter, falling back to `defaultValue` when it is absent.
 * Returns null when it is present but invalid.
 */
export function parseQuery<T>(
  raw: string | undefined,
  schema: z.ZodType<T>,
  defaultValue: T,
): T | null {
  if (raw === undefined || raw === '') return defaultValue;
  const result = schema.safeParse(raw);
  return result.success ? result.data : null;
}
