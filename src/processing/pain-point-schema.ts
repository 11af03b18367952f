/**
 * Pain Point Reply Parsing
 *
 * The model is asked for a snake_case JSON object. Replies are accepted as
 * bare JSON or with JSON embedded in prose; anything that does not match the
 * closed category/severity sets is a ParseError.
 */

import { z } from 'zod';
import { ParseError } from '../errors';
import { PAIN_POINT_CATEGORIES, SEVERITIES } from '../types';
import type { PainPointFields } from '../types';

export type ExtractionOutcome = { ok: true; fields: PainPointFields } | { ok: false; error: ParseError };

const optionalText = z
  .string()
  .nullish()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : null;
  });

export const painPointReplySchema = z
  .object({
    problem_statement: z.string().trim().min(1),
    category: z.string().trim().toLowerCase().pipe(z.enum(PAIN_POINT_CATEGORIES)),
    severity: z.string().trim().toLowerCase().pipe(z.enum(SEVERITIES)),
    context: optionalText,
    suggested_solution: optionalText,
    tags: z.array(z.string().trim().min(1)).default([]),
    target_audience: optionalText,
    related_industry: optionalText,
  })
  .transform(
    (reply): PainPointFields => ({
      problemStatement: reply.problem_statement,
      category: reply.category,
      severity: reply.severity,
      context: reply.context,
      suggestedSolution: reply.suggested_solution,
      tags: reply.tags,
      targetAudience: reply.target_audience,
      relatedIndustry: reply.related_industry,
    })
  );

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    // Fall through to the embedded-object search
  }

  const jsonMatch = text.match(/\{[\s\S]*\}/);
  if (!jsonMatch) {
    throw new ParseError('Could not find JSON in extraction reply', text);
  }

  try {
    return JSON.parse(jsonMatch[0]);
  } catch {
    throw new ParseError('Could not parse JSON from extraction reply', text);
  }
}

export function parsePainPointReply(text: string): ExtractionOutcome {
  let json: unknown;
  try {
    json = parseJson(text);
  } catch (error) {
    if (error instanceof ParseError) {
      return { ok: false, error };
    }
    throw error;
  }

  const parsed = painPointReplySchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'reply'}: ${issue.message}`);
    return { ok: false, error: new ParseError(`Invalid extraction reply (${issues.join('; ')})`, text) };
  }

  return { ok: true, fields: parsed.data };
}
