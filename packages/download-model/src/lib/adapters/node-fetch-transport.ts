import fetch from "node-fetch";
import { Readable } from "stream";
import type { Transport } from "../ports/transport.js";

/**
 * Create a transport using node-fetch. Redirects are followed, and node-fetch
 * drops the Authorization header when a redirect leaves the original host.
 */
export function createNodeFetchTransport(fetchImpl: typeof fetch = fetch): Transport {
  return {
    async get({ url, headers }) {
      const response = await fetchImpl(url, {
        method: "GET",
        headers,
        redirect: "follow",
      });
      const body = response.body;

      return {
        status: response.status,
        statusText: response.statusText,
        ok: response.ok,
        url: response.url || url,
        headers: response.headers,
        body,
        async cancel() {
          if (body instanceof Readable) {
            body.destroy();
          }
        },
      };
    },
  };
}

/**
 * Default transport instance.
 */
export const nodeFetchTransport = createNodeFetchTransport();
