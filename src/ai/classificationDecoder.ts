import { z } from 'zod';
import type { Classification } from './types';

export const DEFAULT_CLASSIFICATION: Readonly<Classification> = Object.freeze({
  responseType: 'default',
  extractedValue: undefined,
  needsFollowup: false,
});

export type ClassificationParseError =
  | { reason: 'no_json_object' }
  | { reason: 'invalid_json'; detail: string }
  | { reason: 'invalid_shape'; detail: string };

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

const ClassificationSchema = z.object({
  response_type: z.string().trim().min(1),
  extracted_value: z
    .union([z.string(), z.number(), z.boolean(), z.null()])
    .optional()
    .transform((value) => {
      if (value === null || value === undefined) {
        return undefined;
      }
      const text = String(value).trim();
      return text === '' ? undefined : text;
    }),
  needs_followup: z
    .union([z.boolean(), z.enum(['true', 'false'])])
    .optional()
    .transform((value) => value === true || value === 'true'),
});

/** The span from the first `{` to the last `}`, or null. */
export function extractJsonSpan(text: string): string | null {
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start === -1 || end <= start) {
    return null;
  }
  return text.slice(start, end + 1);
}

export function decodeClassification(text: string): Result<Classification, ClassificationParseError> {
  const span = extractJsonSpan(text);
  if (span === null) {
    return { ok: false, error: { reason: 'no_json_object' } };
  }

  let payload: unknown;
  try {
    payload = JSON.parse(span);
  } catch (error) {
    return {
      ok: false,
      error: { reason: 'invalid_json', detail: error instanceof Error ? error.message : String(error) },
    };
  }

  const parsed = ClassificationSchema.safeParse(payload);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join(', ');
    return { ok: false, error: { reason: 'invalid_shape', detail } };
  }

  return {
    ok: true,
    value: {
      responseType: parsed.data.response_type.toLowerCase(),
      extractedValue: parsed.data.extracted_value,
      needsFollowup: parsed.data.needs_followup,
    },
  };
}
