// Phase response parsing
//
// Models wrap JSON in prose or markdown fences often enough that extraction is
// lenient; validation is not. Every failure is returned as a list of issues the
// retry prompt can quote back.

import type { z } from 'zod';

export type ParseOutcome<T> =
  | { ok: true; data: T }
  | { ok: false; issues: string[] };

/** The outermost JSON object in a model response, fences and prose stripped. */
export function extractJsonObject(raw: string): string | null {
  const fenced = raw.match(/```(?:json)?\s*([\s\S]*?)```/i);
  const body = fenced ? fenced[1] : raw;
  const match = body.match(/\{[\s\S]*\}/);
  return match ? match[0] : null;
}

export function parsePhaseOutput<T>(raw: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): ParseOutcome<T> {
  const json = extractJsonObject(raw);
  if (json === null) {
    return { ok: false, issues: ['response contains no JSON object'] };
  }

  let value: unknown;
  try {
    value = JSON.parse(json);
  } catch (err) {
    return { ok: false, issues: [`invalid JSON: ${err instanceof Error ? err.message : String(err)}`] };
  }

  const result = schema.safeParse(value);
  if (!result.success) {
    return {
      ok: false,
      issues: result.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`),
    };
  }
  return { ok: true, data: result.data };
}
