import { describe, it, expect, vi, beforeEach } from "vitest";
import { homedir } from "os";
import { join } from "path";
import {
  resolveConfig,
  loadConfigFile,
  expandHome,
  ConfigFileSchema,
  CONFIG_DEFAULTS,
} from "./config.js";

// Mock fs module
vi.mock("fs", () => ({
  existsSync: vi.fn(),
  readFileSync: vi.fn(),
}));

import { existsSync, readFileSync } from "fs";

const DEFAULT_ROOT = join(homedir(), "stable-diffusion-webui");

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("expected an error to be thrown");
}

describe("config", () => {
  beforeEach(() => {
    vi.resetAllMocks();
  });

  describe("resolveConfig", () => {
    it("returns defaults when no config provided", () => {
      const config = resolveConfig();

      expect(config.root).toBe(DEFAULT_ROOT);
      expect(config.authMode).toBe(CONFIG_DEFAULTS.authMode);
      expect(config.logLevel).toBe("warn");
      expect(config.logJson).toBe(false);
      expect(config.destinations).toEqual({
        ckpt: join(DEFAULT_ROOT, "models/Stable-diffusion"),
        lora: join(DEFAULT_ROOT, "models/Lora"),
        emb: join(DEFAULT_ROOT, "embeddings"),
        vae: join(DEFAULT_ROOT, "models/VAE"),
        hyper: join(DEFAULT_ROOT, "models/hypernetworks"),
        cnet: join(DEFAULT_ROOT, "models/ControlNet"),
      });
    });

    it("resolves built-in destinations against a configured root", () => {
      const config = resolveConfig({}, { root: "/srv/webui" });

      expect(config.destinations.ckpt).toBe("/srv/webui/models/Stable-diffusion");
      expect(config.destinations.emb).toBe("/srv/webui/embeddings");
    });

    it("merges configured destinations with the built-in codes", () => {
      const userConfig = {
        root: "/srv/webui",
        destinations: { LoRA: "/mnt/loras", upscaler: "models/ESRGAN" },
      };

      const config = resolveConfig({}, userConfig);

      expect(config.destinations.lora).toBe("/mnt/loras");
      expect(config.destinations.upscaler).toBe("/srv/webui/models/ESRGAN");
      expect(config.destinations.vae).toBe("/srv/webui/models/VAE");
      expect(config.destinations).not.toHaveProperty("LoRA");
    });

    it("user config overrides system config", () => {
      const systemConfig = { root: "/opt/sd", auth: { mode: "query" as const } };
      const userConfig = { root: "/srv/webui" };

      const config = resolveConfig({}, userConfig, systemConfig);

      expect(config.root).toBe("/srv/webui");
      expect(config.authMode).toBe("query");
    });

    it("CLI options override all configs", () => {
      const userConfig = { root: "/srv/webui", logging: { level: "info" as const } };

      const config = resolveConfig({ root: "/data/sd", logLevel: "debug" }, userConfig);

      expect(config.root).toBe("/data/sd");
      expect(config.logLevel).toBe("debug");
      expect(config.destinations.lora).toBe("/data/sd/models/Lora");
    });

    it("applies logging settings from config", () => {
      const userConfig = { logging: { level: "debug" as const, json: true } };

      const config = resolveConfig({}, userConfig);

      expect(config.logLevel).toBe("debug");
      expect(config.logJson).toBe(true);
    });
  });

  describe("expandHome", () => {
    it("expands a leading tilde", () => {
      expect(expandHome("~", "/home/alex")).toBe("/home/alex");
      expect(expandHome("~/models", "/home/alex")).toBe("/home/alex/models");
    });

    it("leaves other paths alone", () => {
      expect(expandHome("/abs/~/dir", "/home/alex")).toBe("/abs/~/dir");
      expect(expandHome("~other/dir", "/home/alex")).toBe("~other/dir");
    });
  });

  describe("ConfigFileSchema", () => {
    it("validates correct config", () => {
      const input = {
        root: "~/sd",
        destinations: { lora: "models/Lora", "ti-embed": "embeddings" },
        auth: { mode: "query" },
        logging: { level: "info", json: true },
      };

      const result = ConfigFileSchema.safeParse(input);

      expect(result.success).toBe(true);
    });

    it("validates empty config", () => {
      const result = ConfigFileSchema.safeParse({});

      expect(result.success).toBe(true);
    });

    it("rejects unknown keys", () => {
      const result = ConfigFileSchema.safeParse({ concurrency: 3 });

      expect(result.success).toBe(false);
    });

    it("rejects type codes with spaces", () => {
      const result = ConfigFileSchema.safeParse({ destinations: { "my lora": "models/Lora" } });

      expect(result.success).toBe(false);
    });

    it("rejects an unknown auth mode", () => {
      const result = ConfigFileSchema.safeParse({ auth: { mode: "cookie" } });

      expect(result.success).toBe(false);
    });

    it("rejects invalid logging level", () => {
      const result = ConfigFileSchema.safeParse({ logging: { level: "verbose" } });

      expect(result.success).toBe(false);
    });
  });

  describe("loadConfigFile", () => {
    it("returns undefined for non-existent file", () => {
      vi.mocked(existsSync).mockReturnValue(false);

      const result = loadConfigFile("/path/to/config.yaml");

      expect(result).toBeUndefined();
    });

    it("loads and parses valid YAML file", () => {
      vi.mocked(existsSync).mockReturnValue(true);
      vi.mocked(readFileSync).mockReturnValue(`
root: /srv/webui
destinations:
  lora: /mnt/loras
logging:
  level: debug
`);

      const result = loadConfigFile("/path/to/config.yaml");

      expect(result).toEqual({
        root: "/srv/webui",
        destinations: { lora: "/mnt/loras" },
        logging: { level: "debug" },
      });
    });

    it("handles empty YAML file", () => {
      vi.mocked(existsSync).mockReturnValue(true);
      vi.mocked(readFileSync).mockReturnValue("");

      const result = loadConfigFile("/path/to/config.yaml");

      expect(result).toEqual({});
    });

    it("throws on invalid YAML syntax", () => {
      vi.mocked(existsSync).mockReturnValue(true);
      vi.mocked(readFileSync).mockReturnValue(`
destinations:
  lora: [invalid
`);

      const error = captureError(() => loadConfigFile("/path/to/config.yaml"));

      expect(error).toMatchObject({
        code: "CONFIG_INVALID",
        message: "Config file /path/to/config.yaml has errors",
      });
      expect(error).toHaveProperty("details", expect.stringMatching(/^invalid YAML: /));
    });

    it("throws on schema validation failure", () => {
      vi.mocked(existsSync).mockReturnValue(true);
      vi.mocked(readFileSync).mockReturnValue(`
root: 5
`);

      const error = captureError(() => loadConfigFile("/path/to/config.yaml"));

      expect(error).toMatchObject({
        message: "Config file /path/to/config.yaml has errors",
        details: "root: Expected string, received number",
      });
    });

    it("lists every issue when several fields are wrong", () => {
      vi.mocked(existsSync).mockReturnValue(true);
      vi.mocked(readFileSync).mockReturnValue(`
root: 5
auth:
  mode: cookie
`);

      const error = captureError(() => loadConfigFile("/path/to/config.yaml"));

      expect(error).toHaveProperty(
        "details",
        expect.stringMatching(/^• root: Expected string, received number\n• auth\.mode: /)
      );
    });
  });
});
