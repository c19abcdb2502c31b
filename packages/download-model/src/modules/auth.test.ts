import { afterEach, beforeAll, beforeEach, describe, expect, it, vi, type MockInstance } from "vitest";
import chalk from "chalk";
import { Command } from "commander";
import { registerAuthCommands } from "./auth.js";
import type { TokenStore } from "../lib/credentials.js";

class MemoryStore implements TokenStore {
  token?: string;
  path?: string;

  getToken(): string | undefined {
    return this.token;
  }

  setToken(token: string): void {
    this.token = token;
  }

  clearToken(): void {
    this.token = undefined;
  }
}

describe("auth commands", () => {
  let store: MemoryStore;
  let env: NodeJS.ProcessEnv;
  let consoleLogSpy: MockInstance;
  let consoleErrorSpy: MockInstance;

  function createProgram(): Command {
    const program = new Command();
    program.exitOverride();
    registerAuthCommands(program, { createTokenStore: () => store, env });
    return program;
  }

  beforeAll(() => {
    chalk.level = 0;
  });

  beforeEach(() => {
    store = new MemoryStore();
    env = {};
    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    process.exitCode = undefined;
  });

  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
  });

  describe("auth login", () => {
    it("stores the token passed with --token", async () => {
      await createProgram().parseAsync(["node", "test", "auth", "login", "--token", "test-secret"]);

      expect(store.token).toBe("test-secret");
      expect(consoleLogSpy).toHaveBeenCalledWith("Token saved locally.");
    });

    it("fails without a token in non-interactive mode", async () => {
      await createProgram().parseAsync(["node", "test", "auth", "login", "--non-interactive"]);

      expect(store.token).toBeUndefined();
      expect(consoleErrorSpy).toHaveBeenCalledWith("✗ No token supplied and interactive prompts disabled");
      expect(process.exitCode).toBe(1);
    });
  });

  describe("auth logout", () => {
    it("removes the stored token", async () => {
      store.token = "test-secret";

      await createProgram().parseAsync(["node", "test", "auth", "logout"]);

      expect(store.token).toBeUndefined();
      expect(consoleLogSpy).toHaveBeenCalledWith("Stored token removed.");
    });
  });

  describe("auth status", () => {
    it("reports the stored token masked", async () => {
      store.token = "test-secret";

      await createProgram().parseAsync(["node", "test", "auth", "status"]);

      expect(consoleLogSpy).toHaveBeenCalledWith("Token: test******** (from stored token)");
    });

    it("shows where the stored token is kept", async () => {
      store.token = "test-secret";
      store.path = "/home/user/.config/download-model/config.json";

      await createProgram().parseAsync(["node", "test", "auth", "status"]);

      expect(consoleLogSpy).toHaveBeenCalledWith("Stored token file: /home/user/.config/download-model/config.json");
    });

    it("reports that the environment wins over the store", async () => {
      store.token = "stored-secret";
      env.CIVITAI_TOKEN = "env-secret";

      await createProgram().parseAsync(["node", "test", "auth", "status"]);

      expect(consoleLogSpy).toHaveBeenCalledWith("Token: env-******** (from $CIVITAI_TOKEN)");
      expect(consoleLogSpy).toHaveBeenCalledTimes(1);
    });

    it("reports unauthenticated downloads without a token", async () => {
      await createProgram().parseAsync(["node", "test", "auth", "status"]);

      expect(consoleLogSpy).toHaveBeenCalledWith("No API token configured; downloads are unauthenticated.");
    });
  });
});
