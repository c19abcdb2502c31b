/**
 * Global CLI context for shared options and state.
 * Provides consistent behavior across all commands.
 */

export interface CLIContext {
  /** Suppress spinners and progress indicators */
  quiet: boolean;
  /** Fail instead of prompting for input (CI mode) */
  noInput: boolean;
  /** Force debug-level logging */
  debug: boolean;
}

const DEFAULT_CONTEXT: CLIContext = {
  quiet: false,
  noInput: false,
  debug: false,
};

let currentContext: CLIContext = { ...DEFAULT_CONTEXT };

function isTruthyFlag(value: string | undefined): boolean {
  return value === "1" || value === "true";
}

/**
 * Initialize CLI context from command line arguments and environment.
 */
export function initContext(
  argv: string[] = process.argv,
  env: NodeJS.ProcessEnv = process.env
): CLIContext {
  currentContext = { ...DEFAULT_CONTEXT };

  if (argv.includes("--quiet") || argv.includes("-q")) {
    currentContext.quiet = true;
  }

  if (argv.includes("--no-input")) {
    currentContext.noInput = true;
  }

  if (argv.includes("--debug")) {
    currentContext.debug = true;
  }

  if (isTruthyFlag(env.DOWNLOAD_MODEL_QUIET)) {
    currentContext.quiet = true;
  }

  if (env.CI || isTruthyFlag(env.DOWNLOAD_MODEL_NO_INPUT)) {
    currentContext.noInput = true;
  }

  if (isTruthyFlag(env.DOWNLOAD_MODEL_DEBUG)) {
    currentContext.debug = true;
  }

  return currentContext;
}

/**
 * Get the current CLI context.
 */
export function getContext(): CLIContext {
  return currentContext;
}

/**
 * Check if we're in quiet mode (no spinners/progress).
 */
export function isQuietMode(): boolean {
  return currentContext.quiet;
}

/**
 * Check if we're in non-interactive mode.
 */
export function isNonInteractive(): boolean {
  return currentContext.noInput || !process.stdin.isTTY;
}

/**
 * Reset context to defaults (for testing).
 */
export function resetContext(): void {
  currentContext = { ...DEFAULT_CONTEXT };
}
