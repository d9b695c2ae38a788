import type { Logger } from 'pino';
import { clientConfigSchema, formatIssues, type ClientConfig } from '../../application/index.js';
import {
  ConfigurationError,
  ExhaustedRetriesError,
  RejectedDeliveryError,
  TransientDeliveryError,
  type DeliveryError,
  type DeliveryResult,
  type DeliveryState,
  type Event,
} from '../../domain/index.js';
import { createDiagnosticLogger } from '../logging.js';
import {
  CLIENT_NAME,
  CLIENT_VERSION,
  createFetchTransport,
  encodeEvent,
  type Transport,
} from '../transport/index.js';
import {
  backoffDelay,
  classifyFailure,
  classifyResponse,
  sleep as defaultSleep,
  type AttemptOutcome,
} from './retry-policy.js';

export interface DeliveryClientDeps {
  transport?: Transport;
  log?: Logger;
  /** Backoff sleep; tests replace it to keep retries instant. */
  sleep?: (ms: number) => Promise<void>;
}

const REQUEST_HEADERS: Readonly<Record<string, string>> = {
  'content-type': 'application/json',
  accept: 'application/json',
  'user-agent': `${CLIENT_NAME}/${CLIENT_VERSION}`,
};

function assertKeys(config: Pick<ClientConfig, 'project_key' | 'deliverable_key'>): void {
  const missing: string[] = [];
  if (typeof config.project_key !== 'string' || config.project_key.trim() === '') {
    missing.push('project_key');
  }
  if (typeof config.deliverable_key !== 'string' || config.deliverable_key.trim() === '') {
    missing.push('deliverable_key');
  }
  if (missing.length > 0) {
    throw new ConfigurationError(
      `Missing HuntGlitch credentials: ${missing.join(', ')}`,
      missing.map((key) => `${key}: Must not be empty`),
    );
  }
}

/** Re-checks a config built in code, which may never have gone through the loader. */
function validateConfig(config: ClientConfig): ClientConfig {
  const parsed = clientConfigSchema.safeParse(config);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new ConfigurationError(
      `Invalid HuntGlitch configuration: ${issues.join('; ')}`,
      issues,
      { cause: parsed.error },
    );
  }
  return Object.freeze(parsed.data);
}

function isEvent(value: unknown): value is Event {
  if (typeof value !== 'object' || value === null) return false;
  if (!('kind' in value) || !('payload' in value)) return false;
  return (
    (value.kind === 'exception' || value.kind === 'log') &&
    typeof value.payload === 'object' &&
    value.payload !== null
  );
}

/**
 * Delivers events to the HuntGlitch collector.
 *
 * Per call: Idle → Attempting → Success | Rejected | (Retrying → Attempting)
 * | Exhausted. At most `retries + 1` requests are issued; only network
 * errors, timeouts and 5xx answers are retried.
 *
 * The timeout applies to each attempt separately, and the wait between
 * attempts doubles from `retry_delay_ms` up to `max_retry_delay_ms`.
 *
 * The instance holds no per-call state, so concurrent `send` calls are safe.
 */
export class DeliveryClient {
  private readonly config: ClientConfig;
  private readonly transport: Transport;
  private readonly log: Logger;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(config: ClientConfig, deps: DeliveryClientDeps = {}) {
    assertKeys(config);
    this.config = validateConfig(config);
    this.transport = deps.transport ?? createFetchTransport();
    this.log = deps.log ?? createDiagnosticLogger();
    this.sleep = deps.sleep ?? defaultSleep;
  }

  /**
   * Sends one event.
   *
   * Resolves with the result when delivery succeeds or when failures are
   * silenced; otherwise rejects with the `DeliveryError`.
   *
   * @throws ConfigurationError regardless of `silent_failures`.
   */
  async send(event: Event): Promise<DeliveryResult> {
    assertKeys(this.config);

    if (!isEvent(event)) {
      return this.fail(
        new RejectedDeliveryError('invalid_event', 'Event must be an exception or log record'),
        0,
        null,
      );
    }

    let body: string;
    try {
      body = encodeEvent(this.config, event);
    } catch (err: unknown) {
      if (err instanceof RejectedDeliveryError) return this.fail(err, 0, event);
      throw err;
    }

    const maxAttempts = this.config.retries + 1;

    for (let attempt = 1; ; attempt++) {
      this.trace('attempting', event, { attempt, max_attempts: maxAttempts });
      const outcome = await this.attempt(body);

      if (outcome.ok) {
        this.log.info(
          { event_id: event.event_id, kind: event.kind, attempts: attempt, status_code: outcome.status_code },
          'HuntGlitch event delivered',
        );
        return { ok: true, attempts: attempt, status_code: outcome.status_code };
      }

      if (outcome.error instanceof RejectedDeliveryError) {
        return this.fail(outcome.error, attempt, event);
      }

      if (attempt >= maxAttempts) {
        return this.fail(new ExhaustedRetriesError(attempt, outcome.error), attempt, event);
      }

      const delay = backoffDelay(attempt, this.config.retry_delay_ms, this.config.max_retry_delay_ms);
      this.log.warn(
        {
          err: outcome.error,
          event_id: event.event_id,
          attempt,
          reason: outcome.error.reason,
          retry_in_ms: delay,
        },
        'HuntGlitch delivery attempt failed, retrying',
      );
      this.trace('retrying', event, { attempt, delay_ms: delay });
      await this.sleep(delay);
    }
  }

  /**
   * Applies the silent-failure policy to an event that failed before it
   * could be sent (for example, malformed tags).
   */
  settleEarlyFailure(error: RejectedDeliveryError): DeliveryResult {
    return this.fail(error, 0, null);
  }

  /**
   * One bounded request. The transport gets an abort signal, and the
   * call is also raced against the timer so a transport that ignores the
   * signal still cannot hold the attempt open.
   */
  private async attempt(body: string): Promise<AttemptOutcome> {
    const timeoutMs = this.config.timeout_ms;
    const controller = new AbortController();
    let timedOut = false;
    let timer: ReturnType<typeof setTimeout> | undefined;

    const expired = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        timedOut = true;
        reject(classifyFailure(null, true, timeoutMs));
        controller.abort();
      }, timeoutMs);
    });

    try {
      // A transport that throws synchronously lands in the catch below
      // like a rejected request, and the timer is still cleared.
      const request = this.transport.send({
        url: this.config.endpoint,
        body,
        headers: REQUEST_HEADERS,
        signal: controller.signal,
      });
      // The losing side of the race still settles; observe it so an abort
      // after a timeout is not reported as an unhandled rejection.
      request.catch((err: unknown) => {
        if (timedOut) this.log.debug({ err }, 'HuntGlitch request settled after timeout');
      });

      const response = await Promise.race([request, expired]);
      return classifyResponse(response);
    } catch (err: unknown) {
      if (err instanceof TransientDeliveryError) return { ok: false, error: err };
      return { ok: false, error: classifyFailure(err, timedOut, timeoutMs) };
    } finally {
      clearTimeout(timer);
    }
  }

  private fail(error: DeliveryError, attempts: number, event: Event | null): DeliveryResult {
    const state: DeliveryState = error instanceof ExhaustedRetriesError ? 'exhausted' : 'rejected';

    if (!this.config.silent_failures) {
      throw error;
    }

    this.log.warn(
      {
        err: error,
        state,
        attempts,
        event_id: event?.event_id,
        kind: event?.kind,
      },
      'HuntGlitch delivery failed (silenced)',
    );
    return { ok: false, attempts, error };
  }

  private trace(state: DeliveryState, event: Event, details: Record<string, unknown>): void {
    this.log.debug({ state, event_id: event.event_id, ...details }, 'HuntGlitch delivery state');
  }
}
