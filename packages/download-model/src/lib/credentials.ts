import Conf from "conf";
import prompts from "prompts";
import { tokenRequired } from "./errors/catalog.js";

/** Environment variable holding the API token. */
export const TOKEN_ENV_VAR = "CIVITAI_TOKEN";

export interface StoredCredentials {
  apiToken?: string;
  savedAt?: number;
}

export interface TokenStore {
  getToken(): string | undefined;
  setToken(token: string): void;
  clearToken(): void;
  /** Where the token is kept, when it lives in a file */
  readonly path?: string;
}

export class ConfTokenStore implements TokenStore {
  private readonly conf = new Conf<StoredCredentials>({ projectName: "download-model" });

  getToken(): string | undefined {
    return this.conf.get("apiToken");
  }

  setToken(token: string): void {
    this.conf.set({ apiToken: token, savedAt: Date.now() });
  }

  clearToken(): void {
    this.conf.clear();
  }

  get path(): string {
    return this.conf.path;
  }
}

export type TokenSource = "flag" | "env" | "store";

export interface ResolvedToken {
  token?: string;
  source?: TokenSource;
}

export interface TokenLookup {
  flag?: string;
  env?: NodeJS.ProcessEnv;
  /** Created lazily so the store is only touched when no other source applies */
  store?: () => TokenStore;
}

/**
 * Find the API token: --token, then CIVITAI_TOKEN, then the stored token.
 */
export function resolveAuthToken({ flag, env = process.env, store }: TokenLookup): ResolvedToken {
  const fromFlag = flag?.trim();
  if (fromFlag) return { token: fromFlag, source: "flag" };

  const fromEnv = env[TOKEN_ENV_VAR]?.trim();
  if (fromEnv) return { token: fromEnv, source: "env" };

  const fromStore = store?.().getToken()?.trim();
  if (fromStore) return { token: fromStore, source: "store" };

  return {};
}

/**
 * Token shown in status output: first four characters only.
 */
export function maskToken(token: string): string {
  return token.length <= 4 ? "****" : `${token.slice(0, 4)}${"*".repeat(8)}`;
}

export interface PromptTokenOptions {
  token?: string;
  nonInteractive?: boolean;
}

/**
 * Token from the option, or from an interactive password prompt.
 *
 * @throws CLIError (AUTH_TOKEN_REQUIRED) when prompting is not allowed
 */
export async function promptForToken(options: PromptTokenOptions): Promise<string> {
  if (options.token) return options.token;
  if (options.nonInteractive) {
    throw tokenRequired();
  }

  const { token } = await prompts({
    type: "password",
    name: "token",
    message: "Paste your CivitAI API token",
  });

  if (typeof token !== "string" || !token.trim()) {
    throw new Error("Token is required.");
  }

  return token.trim();
}
