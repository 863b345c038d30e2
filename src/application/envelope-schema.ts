import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import type { EnvelopeDraft, EventEnvelope } from '../domain/index.js';

/**
 * Zod schema for the wire envelope.
 *
 * Accepted identically from the broadcast channel and the direct
 * delivery endpoint. `targetModule`, `correlationId` and `payload` may
 * be omitted by lenient producers and are normalized here.
 */
export const envelopeSchema = z.object({
  id: z.string().min(1).max(255),
  type: z.string().min(1).max(255),
  sourceModule: z.string().min(1).max(64),
  targetModule: z.string().min(1).max(64).nullable().default(null),
  payload: z.record(z.string(), z.unknown()).default({}),
  correlationId: z.string().min(1).max(255).nullable().default(null),
  timestamp: z.string().datetime({ offset: true, message: 'Must be a valid ISO-8601 datetime' }),
});

export type EnvelopeInput = z.input<typeof envelopeSchema>;

export type EnvelopeParseResult =
  | { readonly ok: true; readonly envelope: EventEnvelope }
  | { readonly ok: false; readonly issues: readonly string[] };

/**
 * Parses a raw message (JSON text or an already-decoded body).
 * Returns a discriminated result so the caller decides how to surface errors.
 */
export function parseEnvelope(raw: unknown): EnvelopeParseResult {
  let candidate: unknown = raw;
  if (typeof raw === 'string') {
    try {
      candidate = JSON.parse(raw);
    } catch (err: unknown) {
      return { ok: false, issues: [`invalid JSON: ${err instanceof Error ? err.message : String(err)}`] };
    }
  }

  const parsed = envelopeSchema.safeParse(candidate);
  if (!parsed.success) {
    return {
      ok: false,
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    };
  }

  return { ok: true, envelope: Object.freeze({ ...parsed.data, payload: Object.freeze(parsed.data.payload) }) };
}

/** Stamps id, timestamp and source onto a draft and freezes the result. */
export function createEnvelope(draft: EnvelopeDraft, sourceModule: string): EventEnvelope {
  return Object.freeze({
    id: randomUUID(),
    type: draft.type,
    sourceModule,
    targetModule: draft.targetModule ?? null,
    payload: Object.freeze({ ...(draft.payload ?? {}) }),
    correlationId: draft.correlationId ?? null,
    timestamp: new Date().toISOString(),
  });
}

/**
 * Verdict carried by a validation response payload.
 *
 * Finance and operations answer with `approved: boolean`; newer
 * producers send `verdict`; executive approval decisions use `status`.
 */
const verdictPayloadSchema = z
  .object({
    verdict: z.enum(['approved', 'rejected']).optional(),
    approved: z.boolean().optional(),
    status: z.enum(['approved', 'rejected']).optional(),
    summary: z.string().max(2000).optional(),
  })
  .refine(
    (data) => data.verdict !== undefined || data.approved !== undefined || data.status !== undefined,
    { message: 'One of verdict, approved or status is required' },
  );

export interface Verdict {
  readonly state: 'approved' | 'rejected';
  readonly summary: string | null;
}

/** Extracts the verdict from a response payload, or null when malformed. */
export function readVerdict(payload: Record<string, unknown>): Verdict | null {
  const parsed = verdictPayloadSchema.safeParse(payload);
  if (!parsed.success) return null;

  const { verdict, approved, status, summary } = parsed.data;
  const decision = verdict ?? status ?? (approved === true ? 'approved' : 'rejected');

  return { state: decision, summary: summary ?? null };
}
