import { vi } from 'vitest';
import type { ClientConfig } from '../src/application/index.js';
import type { Transport, TransportRequest, TransportResponse } from '../src/infrastructure/index.js';

export function fakeLogger() {
  return {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } as unknown as import('pino').Logger;
}

export const TEST_ENDPOINT = 'https://collector.test/api/v1/logs';

/**
 * Factory for client configs with test-friendly defaults.
 * Backoff is zero so retries never wait on the clock.
 */
export function makeConfig(overrides: Partial<ClientConfig> = {}): ClientConfig {
  return {
    project_key: 'p1',
    deliverable_key: 'd1',
    endpoint: TEST_ENDPOINT,
    silent_failures: true,
    retries: 2,
    timeout_ms: 5000,
    retry_delay_ms: 0,
    max_retry_delay_ms: 0,
    ...overrides,
  };
}

/**
 * One scripted answer per request:
 * a status code, a thrown error, or 'hang' (settles only when aborted).
 */
export type TransportStep = number | Error | 'hang';

export interface ScriptedTransport extends Transport {
  readonly requests: TransportRequest[];
}

/** In-process transport; the last step repeats once the script runs out. */
export function scriptedTransport(...steps: TransportStep[]): ScriptedTransport {
  const requests: TransportRequest[] = [];

  return {
    requests,
    send(request: TransportRequest): Promise<TransportResponse> {
      requests.push(request);
      const step = steps[Math.min(requests.length - 1, steps.length - 1)];

      if (step === undefined) {
        return Promise.reject(new Error('No scripted response'));
      }
      if (step === 'hang') {
        return new Promise<TransportResponse>((_, reject) => {
          request.signal.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
        });
      }
      if (step instanceof Error) {
        return Promise.reject(step);
      }
      return Promise.resolve({ status: step, detail: step >= 400 ? `status ${step}` : '' });
    },
  };
}

export const noSleep = (): Promise<void> => Promise.resolve();
