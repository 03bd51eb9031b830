/**
 * Parsing of the grounded claim decision returned by the model.
 * Only the verdict is mandatory; every other field falls back to an empty
 * or neutral value when absent or malformed.
 */

import { z } from 'zod';

const upper = (value: unknown): unknown =>
  typeof value === 'string' ? value.trim().toUpperCase() : value;

const stringList = z
  .array(z.unknown())
  .transform((items) => items.filter((i): i is string => typeof i === 'string' && i.trim() !== ''))
  .catch([]);

const text = z.string().catch('');

const guidanceEntry = z.object({
  document: z.string().min(1),
  status: z.preprocess(upper, z.enum(['MISSING', 'DECLARED_BUT_UNVERIFIED'])).catch('MISSING'),
  how_to_obtain: text.default(''),
  issuing_entity: text.default(''),
  typical_turnaround: text.default(''),
  typical_cost: text.default(''),
  contact: text.default(''),
});

export const claimDecisionSchema = z.object({
  verdict: z.preprocess(
    upper,
    z.enum(['APPROVED', 'PENDING_DOCUMENTS', 'UNDER_INVESTIGATION', 'REJECTED'])
  ),
  coverage_applicable: z.boolean().catch(false).default(false),
  fraud_risk: z.preprocess(upper, z.enum(['LOW', 'MEDIUM', 'HIGH'])).catch('MEDIUM').default('MEDIUM'),
  fraud_score: z.number().min(0).max(1).catch(0).default(0),
  document_verification: z
    .object({
      declared_and_verified: stringList.default([]),
      declared_but_unverified: stringList.default([]),
      missing: stringList.default([]),
    })
    .catch({ declared_and_verified: [], declared_but_unverified: [], missing: [] })
    .default({}),
  document_guidance: z
    .array(z.unknown())
    .transform((items) =>
      items.flatMap((item) => {
        const entry = guidanceEntry.safeParse(item);
        return entry.success ? [entry.data] : [];
      })
    )
    .catch([])
    .default([]),
  missing_documents: stringList.default([]),
  fraud_signals_found: stringList.default([]),
  reason: text.default(''),
  claimant_message: text.default(''),
  required_documents_checklist: stringList.default([]),
  estimated_coverage_amount: z.number().min(0).catch(0).default(0),
  policy_references: stringList.default([]),
  next_steps: stringList.default([]),
  internal_notes: text.default(''),
});

export type ClaimDecision = z.infer<typeof claimDecisionSchema>;

export type DecisionParse =
  | { ok: true; decision: ClaimDecision }
  | { ok: false; error: string };

/** Remove a surrounding markdown code fence, if any. */
export function stripFences(raw: string): string {
  let body = raw.trim();
  for (const fence of ['```json', '```JSON', '```']) {
    if (body.startsWith(fence)) {
      body = body.slice(fence.length);
      break;
    }
  }
  if (body.endsWith('```')) body = body.slice(0, -3);
  return body.trim();
}

export function parseClaimDecision(raw: string): DecisionParse {
  let json: unknown;
  try {
    json = JSON.parse(stripFences(raw));
  } catch (err) {
    return { ok: false, error: err instanceof Error ? err.message : String(err) };
  }

  const parsed = claimDecisionSchema.safeParse(json);
  if (!parsed.success) {
    return { ok: false, error: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ') };
  }
  return { ok: true, decision: parsed.data };
}
