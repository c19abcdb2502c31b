/**
 * Error codes for all CLI error types.
 * Each code maps to a specific failure scenario and a process exit code.
 */
export type ErrorCode =
  // Input errors
  | "INPUT_INVALID"
  // Destination errors
  | "DEST_UNAVAILABLE"
  | "DEST_FILE_EXISTS"
  // Transfer errors
  | "TRANSFER_FAILED"
  // Configuration errors
  | "CONFIG_INVALID"
  // Authentication errors
  | "AUTH_TOKEN_REQUIRED"
  // Generic
  | "UNKNOWN_ERROR";

/** Exit code reported for each error code. */
export const EXIT_CODES: Record<ErrorCode, number> = {
  INPUT_INVALID: 2,
  DEST_UNAVAILABLE: 3,
  DEST_FILE_EXISTS: 4,
  TRANSFER_FAILED: 5,
  CONFIG_INVALID: 1,
  AUTH_TOKEN_REQUIRED: 1,
  UNKNOWN_ERROR: 1,
};

export interface CLIErrorOptions {
  suggestion?: string;
  example?: string;
  examples?: string[];
  details?: string;
  cause?: unknown;
}

/**
 * Extended Error class for CLI-specific errors with helpful context.
 */
export class CLIError extends Error {
  readonly code: ErrorCode;
  readonly suggestion?: string;
  readonly example?: string;
  readonly examples?: string[];
  readonly details?: string;

  constructor(code: ErrorCode, message: string, options: CLIErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = "CLIError";
    this.code = code;
    this.suggestion = options.suggestion;
    this.example = options.example;
    this.examples = options.examples;
    this.details = options.details;
  }

  get exitCode(): number {
    return EXIT_CODES[this.code];
  }
}

/** The input is not a model-version id, download URL, model page URL or AIR. */
export class InvalidInputError extends CLIError {
  readonly input: string;

  constructor(input: string, message: string, options?: CLIErrorOptions) {
    super("INPUT_INVALID", message, options);
    this.name = "InvalidInputError";
    this.input = input;
  }
}

/** The destination directory is missing, not a directory, or not writable. */
export class DestinationError extends CLIError {
  readonly directory: string;

  constructor(directory: string, message: string, options?: CLIErrorOptions) {
    super("DEST_UNAVAILABLE", message, options);
    this.name = "DestinationError";
    this.directory = directory;
  }
}

/** A file with the target name is already present in the destination. */
export class AlreadyExistsError extends CLIError {
  readonly path: string;

  constructor(path: string, message: string, options?: CLIErrorOptions) {
    super("DEST_FILE_EXISTS", message, options);
    this.name = "AlreadyExistsError";
    this.path = path;
  }
}

/** The HTTP exchange failed: bad status, connection error or broken stream. */
export class TransferError extends CLIError {
  readonly status?: number;

  constructor(message: string, options: CLIErrorOptions & { status?: number } = {}) {
    super("TRANSFER_FAILED", message, options);
    this.name = "TransferError";
    this.status = options.status;
  }
}

/**
 * Type guard to check if an error is a CLIError.
 */
export function isCLIError(error: unknown): error is CLIError {
  return error instanceof CLIError;
}
