import { z } from "zod";
import type { Transport, TransportResponse } from "./ports/transport.js";
import { buildRequest, readText, type AuthMode } from "./http.js";
import { CIVITAI_ORIGIN } from "./resolver.js";
import { fromHttpStatus, invalidMetadata, transferFailed } from "./errors/catalog.js";

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

const FileMetadataSchema = z.object({
  format: z.string().nullish(),
  size: z.string().nullish(),
  fp: z.string().nullish(),
});

export const ModelFileSchema = z.object({
  id: z.number().optional(),
  name: z.string(),
  type: z.string().optional(),
  sizeKB: z.number().optional(),
  primary: z.boolean().optional(),
  downloadUrl: z.string().optional(),
  metadata: FileMetadataSchema.optional(),
});

export const ModelVersionSchema = z.object({
  id: z.number(),
  name: z.string(),
  modelId: z.number().optional(),
  baseModel: z.string().optional(),
  model: z
    .object({
      name: z.string(),
      type: z.string().optional(),
    })
    .optional(),
  files: z.array(ModelFileSchema).default([]),
});

export type ModelFile = z.infer<typeof ModelFileSchema>;
export type ModelVersion = z.infer<typeof ModelVersionSchema>;

export const MODEL_VERSION_ENDPOINT = `${CIVITAI_ORIGIN}/api/v1/model-versions/`;

/** File types shipped alongside the model weights */
const COMPANION_TYPES = new Set(["VAE", "Config", "Other"]);

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export interface ModelApiOptions {
  transport: Transport;
  token?: string;
  authMode?: AuthMode;
}

/**
 * Fetch and validate metadata for a model version.
 *
 * @throws TransferError on transport, status or payload problems
 */
export async function getModelVersion(versionId: string, options: ModelApiOptions): Promise<ModelVersion> {
  const request = buildRequest(
    `${MODEL_VERSION_ENDPOINT}${versionId}`,
    options.token,
    options.authMode,
    "application/json"
  );

  let response: TransportResponse;
  try {
    response = await options.transport.get(request);
  } catch (error) {
    throw transferFailed(error instanceof Error ? error.message : String(error), error);
  }

  if (!response.ok) {
    await response.cancel();
    throw fromHttpStatus(response.status, response.statusText);
  }

  const text = await readText(response);
  let payload: unknown;
  try {
    payload = JSON.parse(text);
  } catch {
    throw invalidMetadata("Response was not valid JSON");
  }

  const result = ModelVersionSchema.safeParse(payload);
  if (!result.success) {
    throw invalidMetadata(
      result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ")
    );
  }
  return result.data;
}

// ---------------------------------------------------------------------------
// File selection
// ---------------------------------------------------------------------------

export interface FileSelection {
  size?: string;
  fp?: string;
  includeCompanions?: boolean;
}

/**
 * Model files matching the size and precision filters, followed by
 * companion files (VAE, configs) when requested.
 */
export function selectModelFiles(files: ModelFile[], selection: FileSelection = {}): ModelFile[] {
  const models = files.filter((f) => f.type === "Model" || f.type === undefined).filter((f) => {
    if (selection.size && f.metadata?.size !== selection.size) return false;
    if (selection.fp && f.metadata?.fp !== selection.fp) return false;
    return true;
  });

  if (!selection.includeCompanions) {
    return models;
  }
  return [...models, ...files.filter((f) => f.type !== undefined && COMPANION_TYPES.has(f.type))];
}
