import {
  AlreadyExistsError,
  CLIError,
  DestinationError,
  InvalidInputError,
  TransferError,
} from "./types.js";

/**
 * Error catalog - factory functions for creating CLIErrors with helpful context.
 */

// ============================================================================
// Input Errors
// ============================================================================

export function invalidInput(input: string): InvalidInputError {
  return new InvalidInputError(
    input,
    `"${input}" is not a recognized model identifier or download URL`,
    {
      suggestion: "Pass a model-version id, a download URL, a model page URL with ?modelVersionId=, or an AIR",
      examples: [
        "download-model 46846 ./models",
        "download-model https://civitai.com/api/download/models/46846 ./models",
        'download-model "https://civitai.com/models/43331?modelVersionId=46846" ./models',
      ],
    }
  );
}

export function unsupportedAirSource(input: string, source: string): InvalidInputError {
  return new InvalidInputError(input, `AIR source "${source}" can't be downloaded`, {
    suggestion: 'Only AIRs with the "civitai" source are supported',
    example: "download-model urn:air:sdxl:lora:civitai:328553@368189 ./models",
  });
}

export function unknownTypeCode(code: string, knownCodes: string[]): InvalidInputError {
  return new InvalidInputError(code, `Unknown model type code "${code}"`, {
    suggestion: knownCodes.length
      ? `Choose from: ${knownCodes.join(", ")}`
      : "Add a destinations map to your config file",
    example: "download-model config show",
  });
}

export function missingDestination(input: string): InvalidInputError {
  return new InvalidInputError(input, "Missing destination directory", {
    suggestion: "Pass a directory or a model type code with --type",
    examples: ["download-model 46846 ./models", "download-model 46846 --type lora"],
  });
}

// ============================================================================
// Destination Errors
// ============================================================================

export function destinationMissing(directory: string): DestinationError {
  return new DestinationError(directory, `Destination "${directory}" doesn't exist`, {
    suggestion: "Create the directory first, or check the path",
    example: `mkdir -p "${directory}"`,
  });
}

export function destinationNotDirectory(directory: string): DestinationError {
  return new DestinationError(directory, `Destination "${directory}" is not a directory`, {
    suggestion: "Provide the directory the model should be saved into",
  });
}

export function destinationNotWritable(directory: string, reason?: string): DestinationError {
  return new DestinationError(directory, `Can't write to "${directory}"`, {
    suggestion: "Check the directory permissions",
    details: reason,
  });
}

export function fileExists(path: string): AlreadyExistsError {
  return new AlreadyExistsError(path, `"${path}" already exists`, {
    suggestion: "Remove or rename the existing file, or pick another destination",
  });
}

// ============================================================================
// Transfer Errors
// ============================================================================

export function transferFailed(details: string, cause?: unknown): TransferError {
  return new TransferError("Download failed", {
    suggestion: "Check your connection and try again",
    details,
    cause,
  });
}

export function transferInterrupted(details: string, cause?: unknown): TransferError {
  return new TransferError("Download was interrupted", {
    suggestion: "The partial file was removed. Run the command again to restart",
    details,
    cause,
  });
}

export function htmlInsteadOfFile(status: number): TransferError {
  return new TransferError("Received HTML instead of a file", {
    suggestion: "The token may be invalid or the model may require a login",
    example: "download-model auth login",
    status,
  });
}

export function missingBody(status: number): TransferError {
  return new TransferError("The server sent no file content", { status });
}

export function invalidMetadata(details: string): TransferError {
  return new TransferError("Model metadata has an unexpected shape", { details });
}

/**
 * Convert an HTTP error response to a TransferError.
 */
export function fromHttpStatus(status: number, statusText: string): TransferError {
  const label = `${status} ${statusText}`.trim();

  switch (status) {
    case 401:
      return new TransferError(`Access denied (${label})`, {
        suggestion: "This model requires an API token",
        example: "download-model auth login",
        status,
      });
    case 403:
      return new TransferError(`Access denied (${label})`, {
        suggestion: "Your token may be invalid, or the model may need early access",
        status,
      });
    case 404:
    case 410:
      return new TransferError(`Model version not found (${label})`, {
        suggestion: "Check the model-version id is correct",
        status,
      });
    case 429:
      return new TransferError(`Too many requests (${label})`, {
        suggestion: "Wait a moment and try again",
        status,
      });
    default:
      if (status >= 500) {
        return new TransferError(`Server error (${label})`, {
          suggestion: "This is usually temporary. Try again in a few minutes",
          status,
        });
      }
      return new TransferError(`Request failed (${label})`, { status });
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

export function invalidConfig(path: string, issues: string[]): CLIError {
  const details = issues.length > 1
    ? issues.map((i) => `• ${i}`).join("\n")
    : issues[0];
  return new CLIError("CONFIG_INVALID", `Config file ${path} has errors`, {
    suggestion: "Fix the issues below and try again",
    details,
  });
}

// ============================================================================
// Authentication Errors
// ============================================================================

export function tokenRequired(): CLIError {
  return new CLIError("AUTH_TOKEN_REQUIRED", "No token supplied and interactive prompts disabled", {
    suggestion: "Pass the token with --token or set CIVITAI_TOKEN",
    example: "download-model auth login --token <token>",
  });
}

// ============================================================================
// Generic Error
// ============================================================================

export function unknownError(error: unknown): CLIError {
  const message = error instanceof Error ? error.message : String(error);
  return new CLIError("UNKNOWN_ERROR", message, { cause: error });
}
