import type { Logger } from 'pino';
import type { EventEnvelope } from '../../domain/index.js';

export interface BackoffPolicy {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
  readonly requestTimeoutMs: number;
}

export type DirectDeliveryResult =
  | { readonly ok: true; readonly attempts: number }
  | { readonly ok: false; readonly attempts: number; readonly error: string };

/** Delay before retry number `attempt + 1`: base * 2^(attempt-1), capped. */
export function backoffDelay(attempt: number, policy: BackoffPolicy): number {
  return Math.min(policy.baseDelayMs * 2 ** (attempt - 1), policy.maxDelayMs);
}

/**
 * POSTs the envelope to a single direct endpoint.
 *
 * A 2xx response is the acknowledgment. Anything else (non-2xx,
 * network error, request timeout) is retried with bounded exponential
 * backoff up to `maxAttempts`.
 */
export async function deliverDirect(
  endpoint: string,
  envelope: EventEnvelope,
  policy: BackoffPolicy,
  log: Logger,
): Promise<DirectDeliveryResult> {
  let lastError = 'not attempted';

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    try {
      const response = await fetch(endpoint, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(envelope),
        signal: AbortSignal.timeout(policy.requestTimeoutMs),
      });

      if (response.ok) {
        return { ok: true, attempts: attempt };
      }

      lastError = `HTTP ${response.status}`;
      log.warn(
        { endpoint, status: response.status, attempt, envelope_id: envelope.id },
        'Direct endpoint returned non-OK status',
      );
    } catch (err: unknown) {
      lastError = err instanceof Error ? err.message : String(err);
      log.warn({ err, endpoint, attempt, envelope_id: envelope.id }, 'Direct delivery attempt failed');
    }

    if (attempt < policy.maxAttempts) {
      await sleep(backoffDelay(attempt, policy));
    }
  }

  return { ok: false, attempts: policy.maxAttempts, error: lastError };
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
