import { Command, Option } from "commander";
import { loadConfig } from "../lib/config.js";
import { getContext, isQuietMode } from "../lib/cli-context.js";
import { resolveAuthToken, TOKEN_ENV_VAR, type TokenStore } from "../lib/credentials.js";
import { selectDestination } from "../lib/destinations.js";
import { createDownloadRequest } from "../lib/download-request.js";
import { handleCommandError } from "../lib/errors/renderer.js";
import { fetchArtifact, type TransferResult } from "../lib/fetcher.js";
import { redactUrl, type AuthMode } from "../lib/http.js";
import { createLogger } from "../lib/logger.js";
import type { Transport } from "../lib/ports/transport.js";
import { classifyInput, type DownloadSelectors } from "../lib/resolver.js";
import { createSpinner, formatBytes, progressText } from "../lib/spinner.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface DownloadOptions {
  type?: string;
  outputName?: string;
  fileType?: string;
  format?: string;
  size?: string;
  fp?: string;
  token?: string;
  authMode?: AuthMode;
  config?: string;
}

export interface DownloadDependencies {
  transport: Transport;
  createTokenStore: () => TokenStore;
  env?: NodeJS.ProcessEnv;
}

// ---------------------------------------------------------------------------
// Core Logic
// ---------------------------------------------------------------------------

function selectorsFrom(options: DownloadOptions): DownloadSelectors {
  return {
    type: options.fileType,
    format: options.format,
    size: options.size,
    fp: options.fp,
  };
}

/**
 * Resolve the input, pick the destination and fetch the artifact.
 *
 * @throws InvalidInputError, DestinationError, AlreadyExistsError or TransferError
 */
export async function runDownload(
  input: string,
  destination: string | undefined,
  options: DownloadOptions,
  deps: DownloadDependencies
): Promise<TransferResult> {
  const selectors = selectorsFrom(options);
  // Input problems are reported before destination problems
  classifyInput(input, selectors);

  const { config, sources } = loadConfig(options.config, {
    authMode: options.authMode,
    logLevel: getContext().debug ? "debug" : undefined,
  });
  const { token, source } = resolveAuthToken({
    flag: options.token,
    env: deps.env,
    store: deps.createTokenStore,
  });

  const logger = createLogger({
    level: config.logLevel,
    json: config.logJson,
    redact: token ? [token] : [],
  }).child({ command: "download" });
  logger.debug("Configuration loaded", { sources, authMode: config.authMode });
  logger.debug(token ? "Using API token" : "No API token, sending unauthenticated request", {
    source,
  });

  const request = createDownloadRequest({
    rawInput: input,
    destinationDirectory: selectDestination({ destination, typeCode: options.type }, config, input),
    authToken: token,
    selectors,
  });
  const displayUrl = redactUrl(request.resolvedURL);
  logger.debug("Resolved input", {
    input: redactUrl(input),
    url: displayUrl,
    destination: request.destinationDirectory,
  });

  const spinner = createSpinner(`Downloading ${displayUrl}`).start();
  try {
    const result = await fetchArtifact(
      request,
      {
        transport: deps.transport,
        logger,
        onProgress: (bytesWritten, totalBytes) => {
          spinner.text = progressText("Downloading", bytesWritten, totalBytes);
        },
      },
      { authMode: config.authMode, outputName: options.outputName }
    );

    spinner.succeed(`Saved ${result.finalPath} (${formatBytes(result.bytesWritten)})`);
    if (isQuietMode()) {
      console.log(result.finalPath);
    }
    return result;
  } catch (error) {
    spinner.fail("Download failed");
    throw error;
  }
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerDownloadCommand(program: Command, deps: DownloadDependencies): void {
  program
    .command("get", { isDefault: true })
    .description("Download a model into a directory (default command)")
    .argument("<model>", "Model-version id, download URL, model page URL or AIR")
    .argument("[destination]", "Directory to save the model into")
    .option("-t, --type <code>", "Save into the directory configured for a model type code")
    .option("-n, --output-name <name>", "Save under this filename instead of the server's")
    .option("--file-type <type>", "File type selector, e.g. Model, VAE, Config")
    .option("--format <format>", "Format selector, e.g. SafeTensor, PickleTensor")
    .addOption(new Option("--size <size>", "Size selector").choices(["full", "pruned"]))
    .addOption(new Option("--fp <fp>", "Precision selector").choices(["fp8", "fp16", "bf16", "fp32"]))
    .option("--token <token>", `API token (default: $${TOKEN_ENV_VAR} or the stored token)`)
    .addOption(new Option("--auth-mode <mode>", "How the token is sent").choices(["header", "query"]))
    .option("-c, --config <path>", "Config file to use")
    .action(async (model: string, destination: string | undefined, options: DownloadOptions) => {
      try {
        await runDownload(model, destination, options, deps);
      } catch (error) {
        handleCommandError(error);
      }
    });
}
