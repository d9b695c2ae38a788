/**
 * Single-request HTTP collaborator used by the delivery client.
 *
 * One call = one POST. Retries, timeouts and status interpretation live in
 * the delivery client; the transport only moves bytes and reports the
 * status code. Tests swap it for an in-process fake.
 */

export interface TransportRequest {
  readonly url: string;
  readonly body: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly signal: AbortSignal;
}

export interface TransportResponse {
  readonly status: number;
  /** Response text, read only for non-2xx answers. */
  readonly detail: string;
}

export interface Transport {
  send(request: TransportRequest): Promise<TransportResponse>;
}

/**
 * Transport backed by the global `fetch`.
 *
 * `fetch` is looked up per call so a stubbed global is picked up.
 * Successful response bodies are cancelled unread to free the socket.
 */
export function createFetchTransport(): Transport {
  return {
    async send(request: TransportRequest): Promise<TransportResponse> {
      const response = await fetch(request.url, {
        method: 'POST',
        headers: request.headers,
        body: request.body,
        signal: request.signal,
      });

      if (response.ok) {
        await response.body?.cancel();
        return { status: response.status, detail: '' };
      }

      return { status: response.status, detail: await response.text() };
    },
  };
}
