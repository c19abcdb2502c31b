import { constants, existsSync } from "fs";
import { access, open, rm, stat } from "fs/promises";
import { join } from "path";
import { pipeline } from "stream/promises";
import type { DownloadRequest } from "./download-request.js";
import type { Transport, TransportResponse } from "./ports/transport.js";
import type { Logger } from "./logger.js";
import { createNoopLogger } from "./logger.js";
import { chooseFilename, sanitizeFilename } from "./filename.js";
import { buildRequest, contentLength, isHtmlResponse, redactUrl, type AuthMode } from "./http.js";
import {
  destinationMissing,
  destinationNotDirectory,
  destinationNotWritable,
  fileExists,
  fromHttpStatus,
  htmlInsteadOfFile,
  missingBody,
  transferFailed,
  transferInterrupted,
} from "./errors/catalog.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface TransferResult {
  success: boolean;
  bytesWritten: number;
  finalPath: string;
}

export type ProgressListener = (bytesWritten: number, totalBytes?: number) => void;

export interface FetchDependencies {
  transport: Transport;
  logger?: Logger;
  onProgress?: ProgressListener;
  /** Clock for the fallback filename */
  now?: () => number;
}

export interface FetchOptions {
  authMode?: AuthMode;
  /** Use this filename instead of the server hint */
  outputName?: string;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function errorCode(error: unknown): string | undefined {
  return error instanceof Error && "code" in error && typeof error.code === "string" ? error.code : undefined;
}

// ---------------------------------------------------------------------------
// Destination checks
// ---------------------------------------------------------------------------

/**
 * Fail unless the directory exists, is a directory and is writable.
 *
 * @throws DestinationError
 */
export async function assertDestination(directory: string): Promise<void> {
  let stats;
  try {
    stats = await stat(directory);
  } catch (error) {
    if (errorCode(error) === "ENOENT") {
      throw destinationMissing(directory);
    }
    throw destinationNotWritable(directory, errorMessage(error));
  }

  if (!stats.isDirectory()) {
    throw destinationNotDirectory(directory);
  }

  try {
    await access(directory, constants.W_OK);
  } catch (error) {
    throw destinationNotWritable(directory, errorMessage(error));
  }
}

async function discard(response: TransportResponse, logger: Logger): Promise<void> {
  try {
    await response.cancel();
  } catch (error) {
    logger.debug("Failed to cancel response body", { error: errorMessage(error) });
  }
}

// ---------------------------------------------------------------------------
// Transfer
// ---------------------------------------------------------------------------

/**
 * Stream a body into a new file, creating it exclusively.
 * The partial file is removed if anything fails after it was created.
 */
async function writeBody(
  body: AsyncIterable<Uint8Array | string>,
  finalPath: string,
  totalBytes: number | undefined,
  onProgress: ProgressListener | undefined
): Promise<number> {
  let handle;
  try {
    handle = await open(finalPath, "wx");
  } catch (error) {
    if (errorCode(error) === "EEXIST") {
      throw fileExists(finalPath);
    }
    throw transferFailed(`Cannot create ${finalPath}: ${errorMessage(error)}`, error);
  }

  let bytesWritten = 0;
  async function* count(source: AsyncIterable<Uint8Array | string>): AsyncGenerator<Buffer> {
    for await (const chunk of source) {
      const buffer = typeof chunk === "string" ? Buffer.from(chunk, "utf-8") : Buffer.from(chunk);
      bytesWritten += buffer.byteLength;
      onProgress?.(bytesWritten, totalBytes);
      yield buffer;
    }
  }

  try {
    await pipeline(body, count, handle.createWriteStream());
  } catch (error) {
    // The write stream closes the handle itself when it is destroyed
    await rm(finalPath, { force: true });
    throw transferInterrupted(errorMessage(error), error);
  }

  return bytesWritten;
}

/**
 * Fetch the artifact for a resolved request into its destination directory.
 *
 * Nothing is sent when the destination is unusable, or when an explicit
 * output name already exists. When the name comes from the response, the
 * body is cancelled unread if that file already exists. Existing files are
 * never overwritten.
 *
 * @throws DestinationError, AlreadyExistsError or TransferError
 */
export async function fetchArtifact(
  request: DownloadRequest,
  deps: FetchDependencies,
  options: FetchOptions = {}
): Promise<TransferResult> {
  const logger = deps.logger ?? createNoopLogger();
  const directory = request.destinationDirectory;

  await assertDestination(directory);

  const explicitName = options.outputName ? sanitizeFilename(options.outputName, deps.now) : undefined;
  if (explicitName && existsSync(join(directory, explicitName))) {
    throw fileExists(join(directory, explicitName));
  }

  const httpRequest = buildRequest(request.resolvedURL, request.authToken, options.authMode);
  logger.debug("Requesting artifact", {
    url: redactUrl(httpRequest.url),
    authenticated: Boolean(request.authToken),
  });

  let response: TransportResponse;
  try {
    response = await deps.transport.get(httpRequest);
  } catch (error) {
    throw transferFailed(errorMessage(error), error);
  }

  logger.debug("Received response", {
    status: response.status,
    finalUrl: redactUrl(response.url),
    contentType: response.headers.get("content-type"),
  });

  if (!response.ok) {
    await discard(response, logger);
    throw fromHttpStatus(response.status, response.statusText);
  }

  if (isHtmlResponse(response)) {
    await discard(response, logger);
    throw htmlInsteadOfFile(response.status);
  }

  if (!response.body) {
    throw missingBody(response.status);
  }

  const filename =
    explicitName ??
    chooseFilename(
      {
        contentDisposition: response.headers.get("content-disposition"),
        finalUrl: response.url,
        requestUrl: request.resolvedURL,
      },
      deps.now
    );
  const finalPath = join(directory, filename);

  if (existsSync(finalPath)) {
    await discard(response, logger);
    throw fileExists(finalPath);
  }

  let bytesWritten: number;
  try {
    bytesWritten = await writeBody(response.body, finalPath, contentLength(response), deps.onProgress);
  } catch (error) {
    await discard(response, logger);
    throw error;
  }
  logger.debug("Artifact saved", { path: finalPath, bytes: bytesWritten });

  return { success: true, bytesWritten, finalPath };
}
