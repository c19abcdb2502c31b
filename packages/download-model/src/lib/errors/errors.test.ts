import { afterEach, beforeAll, describe, expect, it, vi } from "vitest";
import chalk from "chalk";
import { fileExists, fromHttpStatus, invalidConfig, destinationMissing } from "./catalog.js";
import { exitCodeFor, formatError, handleCommandError, wrapText } from "./renderer.js";
import { InvalidInputError, TransferError } from "./types.js";

describe("error catalog", () => {
  it.each([
    [401, "Unauthorized", "Access denied (401 Unauthorized)"],
    [403, "Forbidden", "Access denied (403 Forbidden)"],
    [410, "Gone", "Model version not found (410 Gone)"],
    [429, "Too Many Requests", "Too many requests (429 Too Many Requests)"],
    [503, "Service Unavailable", "Server error (503 Service Unavailable)"],
    [418, "", "Request failed (418)"],
  ])("maps HTTP %i", (status, statusText, message) => {
    const error = fromHttpStatus(status, statusText);
    expect(error).toBeInstanceOf(TransferError);
    expect(error.message).toBe(message);
    expect(error.status).toBe(status);
  });

  it("bullets config issues when there are several", () => {
    expect(invalidConfig("/cfg.yaml", ["root: bad"]).details).toBe("root: bad");
    expect(invalidConfig("/cfg.yaml", ["root: bad", "auth.mode: bad"]).details).toBe("• root: bad\n• auth.mode: bad");
  });

  it("assigns a distinct exit code per failure kind", () => {
    expect(exitCodeFor(new InvalidInputError("x", "bad"))).toBe(2);
    expect(exitCodeFor(destinationMissing("/nope"))).toBe(3);
    expect(exitCodeFor(fileExists("/tmp/a"))).toBe(4);
    expect(exitCodeFor(fromHttpStatus(500, ""))).toBe(5);
    expect(exitCodeFor(invalidConfig("/cfg.yaml", ["x"]))).toBe(1);
    expect(exitCodeFor(new Error("boom"))).toBe(1);
  });
});

describe("error renderer", () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  afterEach(() => {
    process.exitCode = undefined;
  });

  it("wraps long text with a hanging indent", () => {
    expect(wrapText("aaa bbb ccc", 7, "  ")).toEqual(["aaa bbb", "  ccc"]);
  });

  it("formats message, details, suggestion and a single example", () => {
    const error = new TransferError("Download failed", {
      details: "socket hang up",
      suggestion: "Try again",
      example: "download-model 46846 ./models",
    });

    expect(formatError(error)).toEqual([
      "",
      "✗ Download failed",
      "",
      "  socket hang up",
      "",
      "  → Try again",
      "",
      "  Try: download-model 46846 ./models",
      "",
    ]);
  });

  it("lists several examples as commands", () => {
    const error = new InvalidInputError("x", "Bad input", {
      examples: ["download-model 1 ./a", "download-model 2 ./b"],
    });

    expect(formatError(error)).toEqual([
      "",
      "✗ Bad input",
      "",
      "  Examples:",
      "    $ download-model 1 ./a",
      "    $ download-model 2 ./b",
      "",
    ]);
  });

  it("keeps line breaks in multi-line details", () => {
    const lines = formatError(invalidConfig("/cfg.yaml", ["root: bad", "auth.mode: bad"]));

    expect(lines.slice(0, 5)).toEqual(["", "✗ Config file /cfg.yaml has errors", "", "  • root: bad", "  • auth.mode: bad"]);
  });

  it("renders unknown errors and records exit code 1", () => {
    const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});

    handleCommandError(new Error("boom"));

    expect(errorSpy).toHaveBeenCalledWith("✗ boom");
    expect(process.exitCode).toBe(1);
  });

  it("records the exit code of a CLI error", () => {
    vi.spyOn(console, "error").mockImplementation(() => {});

    handleCommandError(fileExists("/tmp/model.safetensors"));

    expect(process.exitCode).toBe(4);
  });
});
