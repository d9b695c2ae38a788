/**
 * Error taxonomy for the delivery pipeline.
 *
 * - ConfigurationError: integration misuse, always thrown.
 * - TransientDeliveryError: worth another attempt.
 * - RejectedDeliveryError: the collector (or the serializer) said no; retrying cannot help.
 * - ExhaustedRetriesError: every attempt ended in a transient failure.
 */

export type HuntGlitchErrorCode =
  | 'configuration'
  | 'transient_delivery'
  | 'rejected_delivery'
  | 'exhausted_retries';

export abstract class HuntGlitchError extends Error {
  abstract readonly code: HuntGlitchErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends HuntGlitchError {
  readonly code = 'configuration' as const;
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = [], options?: { cause?: unknown }) {
    super(message, options);
    this.issues = issues;
  }
}

export type TransientReason = 'network' | 'timeout' | 'server_error';

export class TransientDeliveryError extends HuntGlitchError {
  readonly code = 'transient_delivery' as const;
  readonly reason: TransientReason;
  readonly status_code: number | null;

  constructor(
    reason: TransientReason,
    message: string,
    options?: { status_code?: number; cause?: unknown },
  ) {
    super(message, { cause: options?.cause });
    this.reason = reason;
    this.status_code = options?.status_code ?? null;
  }
}

export type RejectionReason = 'client_error' | 'serialization' | 'invalid_event';

export class RejectedDeliveryError extends HuntGlitchError {
  readonly code = 'rejected_delivery' as const;
  readonly reason: RejectionReason;
  readonly status_code: number | null;

  constructor(
    reason: RejectionReason,
    message: string,
    options?: { status_code?: number; cause?: unknown },
  ) {
    super(message, { cause: options?.cause });
    this.reason = reason;
    this.status_code = options?.status_code ?? null;
  }
}

export class ExhaustedRetriesError extends HuntGlitchError {
  readonly code = 'exhausted_retries' as const;
  readonly attempts: number;
  readonly lastError: TransientDeliveryError;

  constructor(attempts: number, lastError: TransientDeliveryError) {
    super(
      `Delivery failed after ${attempts} attempt${attempts === 1 ? '' : 's'}: ${lastError.message}`,
      { cause: lastError },
    );
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

/** Failures a send can end with once the attempt loop is over. */
export type DeliveryError = RejectedDeliveryError | ExhaustedRetriesError;

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
