import { z } from "zod";
import { readFileSync, existsSync } from "fs";
import { parse as parseYaml } from "yaml";
import { homedir } from "os";
import { isAbsolute, join, resolve } from "path";
import type { AuthMode } from "./http.js";
import type { LogLevel } from "./logger.js";
import { invalidConfig } from "./errors/catalog.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** System-wide configuration path (Linux standard) */
export const SYSTEM_CONFIG_PATH = "/etc/download-model/config.yaml";

/** User-level configuration path (XDG Base Directory Specification) */
export const USER_CONFIG_PATH = join(
  homedir(),
  ".config",
  "download-model",
  "config.yaml"
);

/** Built-in type codes, relative to the UI installation root */
export const DEFAULT_DESTINATIONS: Readonly<Record<string, string>> = {
  ckpt: "models/Stable-diffusion",
  lora: "models/Lora",
  emb: "embeddings",
  vae: "models/VAE",
  hyper: "models/hypernetworks",
  cnet: "models/ControlNet",
};

/** Default values for all configuration options */
export const CONFIG_DEFAULTS = {
  root: "~/stable-diffusion-webui",
  authMode: "header",
  logLevel: "warn",
  logJson: false,
} as const;

// ---------------------------------------------------------------------------
// Zod Schemas
// ---------------------------------------------------------------------------

const TypeCodeSchema = z
  .string()
  .regex(/^[A-Za-z0-9_-]+$/, "type codes may only contain letters, digits, '-' and '_'");

/** Complete configuration file schema */
export const ConfigFileSchema = z
  .object({
    root: z.string().min(1).optional(),
    destinations: z.record(TypeCodeSchema, z.string().min(1)).optional(),
    auth: z
      .object({
        mode: z.enum(["header", "query"]).optional(),
      })
      .optional(),
    logging: z
      .object({
        level: z.enum(["debug", "info", "warn", "error"]).optional(),
        json: z.boolean().optional(),
      })
      .optional(),
  })
  .strict();

/** Type derived from the Zod schema */
export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/** Resolved configuration with all defaults applied */
export interface ResolvedConfig {
  /** Absolute installation root that relative destinations resolve against */
  root: string;
  /** Lower-cased type code mapped to an absolute directory */
  destinations: Record<string, string>;
  authMode: AuthMode;
  logLevel: LogLevel;
  logJson: boolean;
}

/** Options the command line can override */
export interface ConfigOverrides {
  root?: string;
  authMode?: AuthMode;
  logLevel?: LogLevel;
  logJson?: boolean;
}

// ---------------------------------------------------------------------------
// Paths
// ---------------------------------------------------------------------------

/**
 * Expand a leading `~` to the home directory.
 */
export function expandHome(path: string, home: string = homedir()): string {
  if (path === "~") return home;
  if (path.startsWith("~/")) return join(home, path.slice(2));
  return path;
}

/**
 * Absolute path for a destination entry; relative entries hang off the root.
 */
export function resolveDestinationPath(entry: string, root: string): string {
  const expanded = expandHome(entry);
  return isAbsolute(expanded) ? expanded : resolve(root, expanded);
}

// ---------------------------------------------------------------------------
// Loader Functions
// ---------------------------------------------------------------------------

/**
 * Load a YAML config file from disk.
 * Returns undefined if file doesn't exist.
 *
 * @throws CLIError (CONFIG_INVALID) if the file exists but is invalid
 */
export function loadConfigFile(path: string): ConfigFile | undefined {
  if (!existsSync(path)) {
    return undefined;
  }

  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (err) {
    throw invalidConfig(path, [`cannot read file: ${(err as Error).message}`]);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw invalidConfig(path, [`invalid YAML: ${(err as Error).message}`]);
  }

  // Handle empty files
  if (parsed === null || parsed === undefined) {
    return {};
  }

  const result = ConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.map((i) =>
      i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message
    );
    throw invalidConfig(path, issues);
  }

  return result.data;
}

interface PendingConfig {
  root: string;
  destinations: Record<string, string>;
  authMode: AuthMode;
  logLevel: LogLevel;
  logJson: boolean;
}

/**
 * Apply values from a config file. Only overrides values that are explicitly
 * set in the source; destination maps are merged code by code.
 */
function applyConfigFile(target: PendingConfig, source: ConfigFile): void {
  if (source.root !== undefined) {
    target.root = source.root;
  }
  if (source.destinations !== undefined) {
    for (const [code, path] of Object.entries(source.destinations)) {
      target.destinations[code.toLowerCase()] = path;
    }
  }
  if (source.auth?.mode !== undefined) {
    target.authMode = source.auth.mode;
  }
  if (source.logging?.level !== undefined) {
    target.logLevel = source.logging.level;
  }
  if (source.logging?.json !== undefined) {
    target.logJson = source.logging.json;
  }
}

/**
 * Merge configuration sources with proper precedence:
 * CLI args > User config > System config > Defaults
 *
 * Destination entries are resolved against the final root, so a root set
 * in any layer also moves the built-in relative destinations.
 */
export function resolveConfig(
  cliOptions: ConfigOverrides = {},
  userConfig: ConfigFile | undefined = undefined,
  systemConfig: ConfigFile | undefined = undefined
): ResolvedConfig {
  const pending: PendingConfig = {
    root: CONFIG_DEFAULTS.root,
    destinations: { ...DEFAULT_DESTINATIONS },
    authMode: CONFIG_DEFAULTS.authMode,
    logLevel: CONFIG_DEFAULTS.logLevel,
    logJson: CONFIG_DEFAULTS.logJson,
  };

  if (systemConfig) {
    applyConfigFile(pending, systemConfig);
  }

  if (userConfig) {
    applyConfigFile(pending, userConfig);
  }

  if (cliOptions.root !== undefined) pending.root = cliOptions.root;
  if (cliOptions.authMode !== undefined) pending.authMode = cliOptions.authMode;
  if (cliOptions.logLevel !== undefined) pending.logLevel = cliOptions.logLevel;
  if (cliOptions.logJson !== undefined) pending.logJson = cliOptions.logJson;

  const root = resolve(expandHome(pending.root));
  const destinations = Object.fromEntries(
    Object.entries(pending.destinations).map(([code, path]) => [
      code,
      resolveDestinationPath(path, root),
    ])
  );

  return {
    root,
    destinations,
    authMode: pending.authMode,
    logLevel: pending.logLevel,
    logJson: pending.logJson,
  };
}

/**
 * Load configuration from all sources.
 * Optionally accepts explicit config path from CLI.
 *
 * @param explicitPath - Optional path to a specific config file
 * @returns The resolved config and list of source files that were loaded
 */
export function loadConfig(
  explicitPath?: string,
  cliOptions: ConfigOverrides = {}
): {
  config: ResolvedConfig;
  sources: string[];
} {
  const sources: string[] = [];

  let systemConfig: ConfigFile | undefined;
  let userConfig: ConfigFile | undefined;

  if (explicitPath) {
    // Explicit path takes precedence, used as "user config"
    userConfig = loadConfigFile(explicitPath);
    if (userConfig) sources.push(explicitPath);
  } else {
    systemConfig = loadConfigFile(SYSTEM_CONFIG_PATH);
    if (systemConfig) sources.push(SYSTEM_CONFIG_PATH);

    userConfig = loadConfigFile(USER_CONFIG_PATH);
    if (userConfig) sources.push(USER_CONFIG_PATH);
  }

  const config = resolveConfig(cliOptions, userConfig, systemConfig);

  return { config, sources };
}
