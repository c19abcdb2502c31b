/**
 * Abstraction for the single HTTP GET a download makes.
 * Allows testing without actual network requests.
 */
export interface TransportRequest {
  url: string;
  headers: Record<string, string>;
}

export interface TransportResponse {
  status: number;
  statusText: string;
  ok: boolean;
  /** URL after redirects were followed */
  url: string;
  headers: { get(name: string): string | null };
  body: AsyncIterable<Uint8Array | string> | null;
  /** Discard the body without reading it */
  cancel(): Promise<void>;
}

export interface Transport {
  get(request: TransportRequest): Promise<TransportResponse>;
}
