import {
  RejectedDeliveryError,
  TransientDeliveryError,
  getErrorMessage,
} from '../../domain/index.js';
import type { TransportResponse } from '../transport/index.js';

/** Outcome of one attempt, before the retry loop decides what to do next. */
export type AttemptOutcome =
  | { readonly ok: true; readonly status_code: number }
  | { readonly ok: false; readonly error: TransientDeliveryError | RejectedDeliveryError };

const MAX_DETAIL_LENGTH = 200;

function truncate(text: string): string {
  const trimmed = text.trim();
  return trimmed.length > MAX_DETAIL_LENGTH ? `${trimmed.slice(0, MAX_DETAIL_LENGTH)}…` : trimmed;
}

/**
 * Maps a collector response to an attempt outcome.
 *
 * - 2xx: delivered.
 * - 5xx: transient, retried.
 * - anything else (4xx, unexpected 1xx/3xx): rejected, not retried.
 */
export function classifyResponse(response: TransportResponse): AttemptOutcome {
  const { status } = response;
  if (status >= 200 && status < 300) {
    return { ok: true, status_code: status };
  }

  const detail = truncate(response.detail);
  const suffix = detail ? `: ${detail}` : '';

  if (status >= 500 && status < 600) {
    return {
      ok: false,
      error: new TransientDeliveryError('server_error', `Collector returned ${status}${suffix}`, {
        status_code: status,
      }),
    };
  }

  return {
    ok: false,
    error: new RejectedDeliveryError('client_error', `Collector rejected event with ${status}${suffix}`, {
      status_code: status,
    }),
  };
}

/** Maps a thrown transport error to a transient failure. */
export function classifyFailure(err: unknown, timedOut: boolean, timeoutMs: number): TransientDeliveryError {
  if (timedOut) {
    return new TransientDeliveryError('timeout', `Request timed out after ${timeoutMs}ms`, { cause: err });
  }
  return new TransientDeliveryError('network', `Network error: ${getErrorMessage(err)}`, { cause: err });
}

/**
 * Delay before retry number `retry` (1-based): exponential from
 * `baseMs`, capped at `maxMs`.
 */
export function backoffDelay(retry: number, baseMs: number, maxMs: number): number {
  if (retry < 1 || baseMs <= 0) return 0;
  return Math.min(maxMs, baseMs * 2 ** (retry - 1));
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
