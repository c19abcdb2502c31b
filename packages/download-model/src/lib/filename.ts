/**
 * Filename selection for downloaded artifacts.
 */

export const FALLBACK_FILENAME_PREFIX = "civitai-download";

const UNSAFE_CHARACTERS = /[<>:"/\\|?*\u0000-\u001f]/g;

export interface FilenameSources {
  contentDisposition?: string | null;
  /** URL after redirects */
  finalUrl?: string;
  /** URL that was requested */
  requestUrl: string;
}

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

/**
 * Filename from a content-disposition header. The RFC 5987 `filename*` form
 * wins over the plain `filename` parameter.
 */
export function parseContentDispositionFilename(value: string | null | undefined): string | null {
  if (!value) return null;

  const extended = value.match(/filename\*\s*=\s*(?:UTF-8|ISO-8859-1)?'[^']*'([^;]+)/i);
  if (extended?.[1]) {
    const decoded = safeDecode(extended[1].trim());
    if (decoded) return decoded;
  }

  const quoted = value.match(/filename\s*=\s*"([^"]*)"/i);
  if (quoted) {
    return quoted[1].trim() || null;
  }

  const bare = value.match(/filename\s*=\s*([^;]+)/i);
  return bare?.[1].trim() || null;
}

/**
 * Last non-empty path segment of a URL.
 */
export function filenameFromUrl(url: string): string | null {
  try {
    const segments = new URL(url).pathname.split("/").filter(Boolean);
    const last = segments.at(-1);
    return last ? safeDecode(last) : null;
  } catch {
    return null;
  }
}

/**
 * Reduce a server-supplied name to a safe base name inside the destination.
 * Path components are dropped and reserved characters become underscores.
 */
export function sanitizeFilename(name: string, now: () => number = Date.now): string {
  const base = name.split(/[\\/]/).pop() ?? "";
  const cleaned = base.replace(UNSAFE_CHARACTERS, "_").trim();

  if (!cleaned || cleaned === "." || cleaned === "..") {
    return `${FALLBACK_FILENAME_PREFIX}-${Math.floor(now() / 1000)}`;
  }
  return cleaned;
}

/**
 * Pick the filename for a response: header hint, then the final URL, then
 * the requested URL.
 */
export function chooseFilename(sources: FilenameSources, now?: () => number): string {
  const candidate =
    parseContentDispositionFilename(sources.contentDisposition) ??
    (sources.finalUrl ? filenameFromUrl(sources.finalUrl) : null) ??
    filenameFromUrl(sources.requestUrl) ??
    "";
  return sanitizeFilename(candidate, now);
}
