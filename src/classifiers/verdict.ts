/**
 * Verdict parsing: coerces raw classifier text into a Verdict or fails.
 */
import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';

import { ClassifierParseError } from '@/core/errors.js';
import type { ResponseFormat } from '@/providers/types.js';
import type { ClassifierKind, Verdict } from './types.js';

export const verdictSchema = z.object({
  reasoning: z.string(),
  verdict: z.string(),
});

/** Structured-output request sent with every classifier call. */
export const VERDICT_RESPONSE_FORMAT: ResponseFormat = {
  name: 'verdict',
  schema: toResponseSchema(),
};

function toResponseSchema(): Record<string, unknown> {
  const raw = zodToJsonSchema(verdictSchema, { target: 'jsonSchema7' }) as Record<string, unknown>;
  delete raw['$schema'];
  return raw;
}

const CODE_FENCE = /^```(?:json)?\s*\n?([\s\S]*?)\n?```$/;

/**
 * Parse a classifier reply. The reply must be a JSON object with string
 * `verdict` and `reasoning` fields; one surrounding Markdown code fence is
 * tolerated. Extra fields are dropped.
 *
 * @throws ClassifierParseError for anything else.
 */
export function parseVerdict(raw: string, classifier: ClassifierKind): Verdict {
  const trimmed = raw.trim();
  const body = CODE_FENCE.exec(trimmed)?.[1] ?? trimmed;

  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (error) {
    throw new ClassifierParseError(
      classifier,
      raw,
      error instanceof Error ? error : undefined,
    );
  }

  const parsed = verdictSchema.safeParse(json);
  if (!parsed.success) {
    throw new ClassifierParseError(classifier, raw, parsed.error);
  }
  return { verdict: parsed.data.verdict, reasoning: parsed.data.reasoning };
}
