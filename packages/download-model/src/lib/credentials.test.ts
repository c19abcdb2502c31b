import { describe, it, expect, vi, beforeEach } from "vitest";
import {
  maskToken,
  promptForToken,
  resolveAuthToken,
  type TokenStore,
} from "./credentials.js";

vi.mock("prompts", () => ({
  default: vi.fn(),
}));

import prompts from "prompts";

class MemoryStore implements TokenStore {
  constructor(private token?: string) {}

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

describe("credentials", () => {
  beforeEach(() => {
    vi.resetAllMocks();
  });

  describe("resolveAuthToken", () => {
    it("prefers the flag over the environment and the store", () => {
      const store = vi.fn(() => new MemoryStore("stored-token"));

      const result = resolveAuthToken({
        flag: "flag-token",
        env: { CIVITAI_TOKEN: "env-token" },
        store,
      });

      expect(result).toEqual({ token: "flag-token", source: "flag" });
      expect(store).not.toHaveBeenCalled();
    });

    it("falls back to CIVITAI_TOKEN", () => {
      const result = resolveAuthToken({
        env: { CIVITAI_TOKEN: " env-token\n" },
        store: () => new MemoryStore("stored-token"),
      });

      expect(result).toEqual({ token: "env-token", source: "env" });
    });

    it("falls back to the stored token", () => {
      const result = resolveAuthToken({
        flag: "   ",
        env: {},
        store: () => new MemoryStore("stored-token"),
      });

      expect(result).toEqual({ token: "stored-token", source: "store" });
    });

    it("returns nothing when no source has a token", () => {
      expect(resolveAuthToken({ env: {}, store: () => new MemoryStore() })).toEqual({});
      expect(resolveAuthToken({ env: {} })).toEqual({});
    });
  });

  describe("maskToken", () => {
    it("shows only the first four characters", () => {
      expect(maskToken("test-secret")).toBe("test********");
    });

    it("hides short tokens entirely", () => {
      expect(maskToken("abcd")).toBe("****");
    });
  });

  describe("promptForToken", () => {
    it("returns a supplied token without prompting", async () => {
      await expect(promptForToken({ token: "test-secret" })).resolves.toBe("test-secret");
      expect(prompts).not.toHaveBeenCalled();
    });

    it("refuses to prompt in non-interactive mode", async () => {
      await expect(promptForToken({ nonInteractive: true })).rejects.toMatchObject({
        code: "AUTH_TOKEN_REQUIRED",
      });
      expect(prompts).not.toHaveBeenCalled();
    });

    it("trims the prompted token", async () => {
      vi.mocked(prompts).mockResolvedValue({ token: "  test-secret " });

      await expect(promptForToken({})).resolves.toBe("test-secret");
    });

    it("fails when the prompt is cancelled", async () => {
      vi.mocked(prompts).mockResolvedValue({});

      await expect(promptForToken({})).rejects.toThrow("Token is required.");
    });
  });
});
