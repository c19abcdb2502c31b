import type { TransportRequest, TransportResponse } from "./ports/transport.js";
import { REDACTED } from "./logger.js";

/** Fixed browser user agent; some origins reject non-browser clients. */
export const BROWSER_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/91.0.4472.124 Safari/537.36";

/** Query parameter carrying the token in `query` auth mode. */
export const TOKEN_QUERY_PARAM = "token";

export type AuthMode = "header" | "query";

/**
 * Build the GET request for a URL, attaching the token either as a bearer
 * header or as a query parameter.
 */
export function buildRequest(
  url: string,
  authToken: string | undefined,
  authMode: AuthMode = "header",
  accept = "*/*"
): TransportRequest {
  const headers: Record<string, string> = {
    "User-Agent": BROWSER_USER_AGENT,
    Accept: accept,
  };

  if (!authToken) {
    return { url, headers };
  }

  if (authMode === "query") {
    const withToken = new URL(url);
    withToken.searchParams.set(TOKEN_QUERY_PARAM, authToken);
    return { url: withToken.toString(), headers };
  }

  headers.Authorization = `Bearer ${authToken}`;
  return { url, headers };
}

/**
 * URL safe to print: the token query parameter is masked.
 */
export function redactUrl(url: string): string {
  try {
    const parsed = new URL(url);
    if (!parsed.searchParams.has(TOKEN_QUERY_PARAM)) return url;
    parsed.searchParams.set(TOKEN_QUERY_PARAM, REDACTED);
    return parsed.toString();
  } catch {
    return url;
  }
}

/**
 * Content length advertised by a response, if any.
 */
export function contentLength(response: TransportResponse): number | undefined {
  const raw = response.headers.get("content-length");
  if (!raw) return undefined;
  const value = Number(raw);
  return Number.isFinite(value) && value >= 0 ? value : undefined;
}

/**
 * Whether the response is an HTML page rather than a file.
 */
export function isHtmlResponse(response: TransportResponse): boolean {
  return (response.headers.get("content-type") ?? "").toLowerCase().includes("text/html");
}

/**
 * Read a whole response body as UTF-8 text.
 */
export async function readText(response: TransportResponse): Promise<string> {
  if (!response.body) return "";
  const chunks: Buffer[] = [];
  for await (const chunk of response.body) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf-8") : Buffer.from(chunk));
  }
  return Buffer.concat(chunks).toString("utf-8");
}
