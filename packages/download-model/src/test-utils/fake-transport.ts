import type { Transport, TransportRequest, TransportResponse } from "../lib/ports/transport.js";

export interface FakeResponseInit {
  status?: number;
  statusText?: string;
  url?: string;
  headers?: Record<string, string>;
  /** Chunks yielded in order; an Error instance is thrown when reached */
  chunks?: Array<string | Uint8Array | Error>;
  body?: null;
}

export interface FakeTransport extends Transport {
  requests: TransportRequest[];
  cancelled: number;
  /** Number of body chunks consumers pulled */
  chunksRead: number;
}

/**
 * In-process transport returning canned responses in order.
 */
export function createFakeTransport(...responses: Array<FakeResponseInit | Error>): FakeTransport {
  const queue = [...responses];
  const fake: FakeTransport = {
    requests: [],
    cancelled: 0,
    chunksRead: 0,
    async get(request) {
      fake.requests.push(request);
      const next = queue.shift();
      if (next === undefined) {
        throw new Error(`Unexpected request to ${request.url}`);
      }
      if (next instanceof Error) {
        throw next;
      }
      return toResponse(next, request);
    },
  };

  function toResponse(init: FakeResponseInit, request: TransportRequest): TransportResponse {
    const status = init.status ?? 200;
    const headers = new Map(
      Object.entries(init.headers ?? {}).map(([name, value]) => [name.toLowerCase(), value])
    );
    const chunks = init.chunks ?? [];

    async function* body(): AsyncGenerator<Uint8Array | string> {
      for (const chunk of chunks) {
        fake.chunksRead++;
        if (chunk instanceof Error) throw chunk;
        yield chunk;
      }
    }

    return {
      status,
      statusText: init.statusText ?? (status === 200 ? "OK" : ""),
      ok: status >= 200 && status < 300,
      url: init.url ?? request.url,
      headers: { get: (name) => headers.get(name.toLowerCase()) ?? null },
      body: init.body === null ? null : body(),
      async cancel() {
        fake.cancelled++;
      },
    };
  }

  return fake;
}
