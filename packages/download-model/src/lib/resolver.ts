import { invalidInput, unsupportedAirSource } from "./errors/catalog.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const CIVITAI_ORIGIN = "https://civitai.com";

/** Canonical download endpoint; the model-version id is appended. */
export const DOWNLOAD_ENDPOINT = `${CIVITAI_ORIGIN}/api/download/models/`;

const POSITIVE_INTEGER = /^0*[1-9]\d*$/;
const CANONICAL_PATH = /(?:^|\/)api\/download\/models\/(\d+)\/?$/;
const VERSION_QUERY_PARAM = "modelVersionId";

/**
 * urn:air:{ecosystem}:{type}:{source}:{id}@{version}.{format}
 * The "air:" prefix is required so that arbitrary colon-separated text is not
 * mistaken for a resource name.
 */
const AIR_PATTERN =
  /^(?:urn:)?air:(?<ecosystem>[^:]+):(?<type>[^:]+):(?<source>[^:]+):(?<id>[^@.]+)(?:@(?<version>[^.]+))?(?:\.(?<format>\w+))?$/i;

/** AIR format suffixes mapped to the download endpoint's `format` values. */
const AIR_FORMATS: Record<string, string> = {
  safetensor: "SafeTensor",
  safetensors: "SafeTensor",
  ckpt: "PickleTensor",
  pickletensor: "PickleTensor",
  gguf: "GGUF",
  diffusers: "Diffusers",
  other: "Other",
};

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Optional query selectors understood by the download endpoint. */
export interface DownloadSelectors {
  type?: string;
  format?: string;
  size?: string;
  fp?: string;
}

export interface AirReference {
  ecosystem: string;
  type: string;
  source: string;
  id: string;
  version?: string;
  format?: string;
}

export type ResolvedInput =
  | { kind: "version-id"; versionId: string; selectors: DownloadSelectors }
  | { kind: "download-url"; versionId: string; url: string }
  | { kind: "page-url"; versionId: string; selectors: DownloadSelectors }
  | { kind: "air"; versionId: string; air: AirReference; selectors: DownloadSelectors };

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function normalizeId(value: string): string {
  return value.replace(/^0+/, "");
}

function parseHttpUrl(value: string): URL | undefined {
  try {
    const url = new URL(value);
    return url.protocol === "http:" || url.protocol === "https:" ? url : undefined;
  } catch {
    return undefined;
  }
}

/**
 * Build the canonical download URL for a model-version id.
 * Selectors are appended in a fixed order: type, format, size, fp.
 */
export function canonicalDownloadUrl(versionId: string, selectors: DownloadSelectors = {}): string {
  const url = new URL(`${DOWNLOAD_ENDPOINT}${normalizeId(versionId)}`);
  for (const key of ["type", "format", "size", "fp"] as const) {
    const value = selectors[key];
    if (value) url.searchParams.set(key, value);
  }
  return url.toString();
}

/**
 * Version id of a URL on the canonical download endpoint, if it is one.
 */
export function canonicalVersionId(input: string): string | undefined {
  const url = parseHttpUrl(input);
  if (!url) return undefined;
  const match = url.pathname.match(CANONICAL_PATH);
  return match ? normalizeId(match[1]) : undefined;
}

/**
 * Parse an AIR string. Returns undefined when the input is not shaped like one.
 */
export function parseAir(input: string): AirReference | undefined {
  const groups = input.match(AIR_PATTERN)?.groups;
  if (!groups) return undefined;
  return {
    ecosystem: groups.ecosystem,
    type: groups.type,
    source: groups.source.toLowerCase(),
    id: groups.id,
    version: groups.version || undefined,
    format: groups.format || undefined,
  };
}

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

/**
 * Classify raw input into one of the accepted shapes, in order:
 * bare id, canonical download URL, URL with ?modelVersionId=, AIR.
 *
 * @throws InvalidInputError when no shape matches
 */
export function classifyInput(rawInput: string, selectors: DownloadSelectors = {}): ResolvedInput {
  const input = rawInput.trim();

  if (POSITIVE_INTEGER.test(input)) {
    return { kind: "version-id", versionId: normalizeId(input), selectors };
  }

  const downloadId = canonicalVersionId(input);
  if (downloadId) {
    return { kind: "download-url", versionId: downloadId, url: input };
  }

  const pageUrl = parseHttpUrl(input);
  if (pageUrl) {
    const versionId = pageUrl.searchParams.get(VERSION_QUERY_PARAM);
    if (versionId && POSITIVE_INTEGER.test(versionId)) {
      return { kind: "page-url", versionId: normalizeId(versionId), selectors };
    }
    throw invalidInput(rawInput);
  }

  const air = parseAir(input);
  if (air) {
    if (air.source !== "civitai") {
      throw unsupportedAirSource(rawInput, air.source);
    }
    const resourceId = air.version ?? air.id;
    if (!POSITIVE_INTEGER.test(resourceId)) {
      throw invalidInput(rawInput);
    }
    const format = air.format
      ? AIR_FORMATS[air.format.toLowerCase()] ?? air.format
      : undefined;
    return {
      kind: "air",
      versionId: normalizeId(resourceId),
      air,
      selectors: { ...selectors, format: selectors.format ?? format },
    };
  }

  throw invalidInput(rawInput);
}

/**
 * Resolve raw input to the URL the artifact is downloaded from.
 * A URL already on the canonical endpoint is returned exactly as given.
 *
 * @throws InvalidInputError when the input matches no accepted shape
 */
export function resolve(rawInput: string, selectors: DownloadSelectors = {}): string {
  const resolved = classifyInput(rawInput, selectors);
  if (resolved.kind === "download-url") {
    return resolved.url;
  }
  return canonicalDownloadUrl(resolved.versionId, resolved.selectors);
}

/**
 * Resolve raw input to its numeric model-version id.
 */
export function resolveVersionId(rawInput: string): string {
  return classifyInput(rawInput).versionId;
}
