import { describe, it, expect, vi, beforeEach } from 'vitest';
import { DeliveryClient } from '../../src/infrastructure/delivery/index.js';
import { createExceptionEvent, createLogEvent } from '../../src/application/index.js';
import {
  ConfigurationError,
  ExhaustedRetriesError,
  RejectedDeliveryError,
  type DeliveryResult,
  type Event,
} from '../../src/domain/index.js';
import type { TransportResponse } from '../../src/infrastructure/transport/index.js';
import {
  TEST_ENDPOINT,
  fakeLogger,
  makeConfig,
  noSleep,
  scriptedTransport,
  type ScriptedTransport,
} from '../helpers.js';

function valueError(message: string): Error {
  const err = new Error(message);
  err.name = 'ValueError';
  return err;
}

function failureOf(result: DeliveryResult) {
  if (result.ok) throw new Error('Expected a failed delivery');
  return result.error;
}

describe('DeliveryClient', () => {
  let log: ReturnType<typeof fakeLogger>;

  beforeEach(() => {
    log = fakeLogger();
  });

  function makeClient(transport: ScriptedTransport, overrides: Parameters<typeof makeConfig>[0] = {}) {
    return new DeliveryClient(makeConfig(overrides), { transport, log, sleep: noSleep });
  }

  describe('construction', () => {
    it('fails on an empty project_key', () => {
      expect(() => new DeliveryClient(makeConfig({ project_key: '' }))).toThrow(ConfigurationError);
    });

    it('fails on a blank deliverable_key', () => {
      expect(() => new DeliveryClient(makeConfig({ deliverable_key: '   ' }))).toThrow(
        'Missing HuntGlitch credentials: deliverable_key',
      );
    });

    it('lists both keys when both are missing', () => {
      expect(() => new DeliveryClient(makeConfig({ project_key: '', deliverable_key: '' }))).toThrow(
        'Missing HuntGlitch credentials: project_key, deliverable_key',
      );
    });

    it.each<[string, Parameters<typeof makeConfig>[0], string]>([
      ['a negative retry count', { retries: -1 }, 'retries: Number must be greater than or equal to 0'],
      ['a fractional retry count', { retries: 2.5 }, 'retries: Expected integer, received float'],
      ['a zero timeout', { timeout_ms: 0 }, 'timeout_ms: Number must be greater than 0'],
      [
        'a timeout past the timer limit',
        { timeout_ms: 3_000_000_000 },
        'timeout_ms: Number must be less than or equal to 2147483647',
      ],
    ])('rejects %s', (_label, overrides, issue) => {
      let caught: unknown;
      try {
        new DeliveryClient(makeConfig(overrides), { transport: scriptedTransport(200), log });
      } catch (err: unknown) {
        caught = err;
      }

      expect(caught).toBeInstanceOf(ConfigurationError);
      expect(caught instanceof ConfigurationError && caught.issues).toEqual([issue]);
    });
  });

  describe('send', () => {
    it('delivers on the first attempt with exactly one request', async () => {
      const transport = scriptedTransport(200);
      const event = createExceptionEvent(valueError('bad input'));

      const result = await makeClient(transport).send(event);

      expect(result).toEqual({ ok: true, attempts: 1, status_code: 200 });
      expect(transport.requests).toHaveLength(1);
    });

    it('POSTs the serialized event to the configured endpoint', async () => {
      const transport = scriptedTransport(202);
      const event = createLogEvent('Cache warmed', 'info', { tags: { region: 'eu' } });

      await makeClient(transport).send(event);

      const [request] = transport.requests;
      expect(request?.url).toBe(TEST_ENDPOINT);
      expect(request?.headers['content-type']).toBe('application/json');
      expect(request?.headers['user-agent']).toBe('huntglitch-node/1.0.0');
      const body = JSON.parse(request?.body ?? '{}') as Record<string, unknown>;
      expect(body).toMatchObject({
        project_key: 'p1',
        deliverable_key: 'd1',
        kind: 'log',
        event_id: event.event_id,
        payload: { message: 'Cache warmed', log_type: 4 },
        tags: { region: 'eu' },
      });
    });

    it.each([0, 1, 2, 4])('makes retries + 1 attempts when every attempt is transient (retries=%i)', async (retries) => {
      const transport = scriptedTransport(503);

      const result = await makeClient(transport, { retries }).send(createExceptionEvent(new Error('x')));

      expect(result.attempts).toBe(retries + 1);
      expect(transport.requests).toHaveLength(retries + 1);
      const error = failureOf(result);
      expect(error).toBeInstanceOf(ExhaustedRetriesError);
      expect(error instanceof ExhaustedRetriesError && error.attempts).toBe(retries + 1);
    });

    it('recovers after network errors and 5xx answers', async () => {
      const transport = scriptedTransport(new Error('ECONNRESET'), 502, 201);

      const result = await makeClient(transport, { retries: 2 }).send(createExceptionEvent(new Error('x')));

      expect(result).toEqual({ ok: true, attempts: 3, status_code: 201 });
    });

    it('does not retry a 4xx rejection', async () => {
      const transport = scriptedTransport(400);

      const result = await makeClient(transport, { retries: 5 }).send(createExceptionEvent(new Error('x')));

      expect(result.attempts).toBe(1);
      expect(transport.requests).toHaveLength(1);
      const error = failureOf(result);
      expect(error).toBeInstanceOf(RejectedDeliveryError);
      expect(error instanceof RejectedDeliveryError && error.reason).toBe('client_error');
      expect(error instanceof RejectedDeliveryError && error.status_code).toBe(400);
    });

    it('stops at a rejection that follows a transient failure', async () => {
      const transport = scriptedTransport(500, 403);

      const result = await makeClient(transport, { retries: 3 }).send(createExceptionEvent(new Error('x')));

      expect(result.attempts).toBe(2);
      expect(failureOf(result)).toBeInstanceOf(RejectedDeliveryError);
    });

    it('throws ExhaustedRetriesError when failures are not silenced', async () => {
      const transport = scriptedTransport(503);
      const client = makeClient(transport, { retries: 1, silent_failures: false });

      await expect(client.send(createExceptionEvent(new Error('x')))).rejects.toBeInstanceOf(
        ExhaustedRetriesError,
      );
      expect(transport.requests).toHaveLength(2);
    });

    it('throws RejectedDeliveryError when failures are not silenced', async () => {
      const client = makeClient(scriptedTransport(422), { silent_failures: false });

      await expect(client.send(createExceptionEvent(new Error('x')))).rejects.toThrow(
        'Collector rejected event with 422: status 422',
      );
    });

    it('logs silenced failures', async () => {
      await makeClient(scriptedTransport(503), { retries: 0 }).send(createExceptionEvent(new Error('x')));

      expect(log.warn).toHaveBeenCalledWith(
        expect.objectContaining({ state: 'exhausted', attempts: 1, kind: 'exception' }),
        'HuntGlitch delivery failed (silenced)',
      );
    });

    it('counts a timeout as one transient attempt and aborts the request', async () => {
      const transport = scriptedTransport('hang');

      const result = await makeClient(transport, { retries: 1, timeout_ms: 20 }).send(
        createExceptionEvent(new Error('x')),
      );

      expect(result.attempts).toBe(2);
      const error = failureOf(result);
      expect(error).toBeInstanceOf(ExhaustedRetriesError);
      expect(error instanceof ExhaustedRetriesError && error.lastError.reason).toBe('timeout');
      expect(transport.requests.every((request) => request.signal.aborted)).toBe(true);
    });

    it('bounds an attempt even when the transport ignores the abort signal', async () => {
      const transport = { send: () => new Promise<never>(() => {}) };
      const client = new DeliveryClient(makeConfig({ retries: 0, timeout_ms: 20 }), {
        transport,
        log,
        sleep: noSleep,
      });

      const result = await client.send(createExceptionEvent(new Error('x')));

      const error = failureOf(result);
      expect(error instanceof ExhaustedRetriesError && error.lastError.message).toBe(
        'Request timed out after 20ms',
      );
    });

    it('retries a transport that throws synchronously as a network failure', async () => {
      const send = vi.fn((): Promise<TransportResponse> => {
        throw new Error('ECONNREFUSED sync');
      });
      const client = new DeliveryClient(makeConfig({ retries: 1, timeout_ms: 30 }), {
        transport: { send },
        log,
        sleep: noSleep,
      });

      const result = await client.send(createExceptionEvent(new Error('x')));
      // Outlive the attempt timeout so a stray timer would surface here.
      await new Promise((resolve) => setTimeout(resolve, 60));

      expect(send).toHaveBeenCalledTimes(2);
      expect(result.attempts).toBe(2);
      const error = failureOf(result);
      expect(error instanceof ExhaustedRetriesError && error.lastError.reason).toBe('network');
      expect(error instanceof ExhaustedRetriesError && error.lastError.message).toBe(
        'Network error: ECONNREFUSED sync',
      );
    });

    it('throws a synchronous transport failure only as a delivery error', async () => {
      const transport = {
        send: (): Promise<TransportResponse> => {
          throw new Error('ECONNREFUSED sync');
        },
      };
      const client = new DeliveryClient(makeConfig({ retries: 0, silent_failures: false }), {
        transport,
        log,
        sleep: noSleep,
      });

      await expect(client.send(createExceptionEvent(new Error('x')))).rejects.toBeInstanceOf(
        ExhaustedRetriesError,
      );
    });

    it('waits with exponential backoff between attempts', async () => {
      const sleep = vi.fn().mockResolvedValue(undefined);
      const client = new DeliveryClient(
        makeConfig({ retries: 3, retry_delay_ms: 100, max_retry_delay_ms: 250 }),
        { transport: scriptedTransport(503), log, sleep },
      );

      await client.send(createExceptionEvent(new Error('x')));

      expect(sleep.mock.calls).toEqual([[100], [200], [250]]);
    });

    it('rejects unserializable events without a request', async () => {
      const transport = scriptedTransport(200);
      const event = createExceptionEvent(new Error('x'), { additional_data: { big: 10n } });

      const result = await makeClient(transport).send(event);

      expect(result.attempts).toBe(0);
      expect(transport.requests).toHaveLength(0);
      const error = failureOf(result);
      expect(error instanceof RejectedDeliveryError && error.reason).toBe('serialization');
    });

    it('rejects a missing event', async () => {
      const transport = scriptedTransport(200);

      const result = await makeClient(transport).send(null as unknown as Event);

      expect(result.attempts).toBe(0);
      const error = failureOf(result);
      expect(error instanceof RejectedDeliveryError && error.reason).toBe('invalid_event');
    });

    it('handles concurrent sends independently', async () => {
      const transport = scriptedTransport(200);
      const client = makeClient(transport);

      const results = await Promise.all([
        client.send(createLogEvent('one', 'info')),
        client.send(createLogEvent('two', 'info')),
        client.send(createLogEvent('three', 'info')),
      ]);

      expect(results.every((result) => result.ok)).toBe(true);
      expect(transport.requests).toHaveLength(3);
    });
  });

  describe('silent-failure scenario with two retries', () => {
    const scenario = { retries: 2, timeout_ms: 5000, silent_failures: true };

    it('succeeds if any of the three attempts returns 2xx', async () => {
      const transport = scriptedTransport(503, 503, 200);

      const result = await makeClient(transport, scenario).send(createExceptionEvent(valueError('bad input')));

      expect(result).toEqual({ ok: true, attempts: 3, status_code: 200 });
    });

    it('swallows exhaustion as a non-raising failure result', async () => {
      const transport = scriptedTransport(503);

      const result = await makeClient(transport, scenario).send(createExceptionEvent(valueError('bad input')));

      expect(result.ok).toBe(false);
      expect(result.attempts).toBe(3);
      expect(failureOf(result)).toBeInstanceOf(ExhaustedRetriesError);
    });
  });
});
