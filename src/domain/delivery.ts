import type { DeliveryError } from './errors.js';

/**
 * Outcome of one `send` call.
 *
 * `attempts` counts requests actually issued: 0 when the event never
 * reached the transport (invalid or unserializable), otherwise 1..retries+1.
 */
export type DeliveryResult =
  | { readonly ok: true; readonly attempts: number; readonly status_code: number }
  | { readonly ok: false; readonly attempts: number; readonly error: DeliveryError };

/** Per-call lifecycle of the delivery client, surfaced in diagnostics. */
export type DeliveryState =
  | 'idle'
  | 'attempting'
  | 'retrying'
  | 'success'
  | 'rejected'
  | 'exhausted';
