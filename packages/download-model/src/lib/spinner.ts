/**
 * Spinner wrapper that respects quiet mode.
 * Provides a consistent interface for download progress.
 */

import ora, { type Ora } from "ora";
import { isQuietMode } from "./cli-context.js";

export interface Spinner {
  start(text?: string): Spinner;
  stop(): Spinner;
  succeed(text?: string): Spinner;
  fail(text?: string): Spinner;
  text: string;
  isSpinning: boolean;
}

/**
 * No-op spinner for quiet mode.
 */
class SilentSpinner implements Spinner {
  text = "";
  isSpinning = false;

  start(_text?: string): Spinner {
    return this;
  }

  stop(): Spinner {
    return this;
  }

  succeed(_text?: string): Spinner {
    return this;
  }

  fail(_text?: string): Spinner {
    return this;
  }
}

/**
 * Wrapper around ora. Writes to stderr so stdout stays clean for scripts.
 */
class OraSpinner implements Spinner {
  private ora: Ora;

  constructor(text?: string) {
    this.ora = ora({ text, stream: process.stderr });
  }

  get text(): string {
    return this.ora.text;
  }

  set text(value: string) {
    this.ora.text = value;
  }

  get isSpinning(): boolean {
    return this.ora.isSpinning;
  }

  start(text?: string): Spinner {
    this.ora.start(text);
    return this;
  }

  stop(): Spinner {
    this.ora.stop();
    return this;
  }

  succeed(text?: string): Spinner {
    this.ora.succeed(text);
    return this;
  }

  fail(text?: string): Spinner {
    this.ora.fail(text);
    return this;
  }
}

/**
 * Create a spinner that respects quiet mode.
 */
export function createSpinner(text?: string): Spinner {
  if (isQuietMode()) {
    return new SilentSpinner();
  }
  return new OraSpinner(text);
}

const UNITS = ["B", "KB", "MB", "GB", "TB"];

/**
 * Human-readable byte count using binary multiples.
 */
export function formatBytes(bytes: number): string {
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < UNITS.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0 ? `${value} ${UNITS[0]}` : `${value.toFixed(1)} ${UNITS[unit]}`;
}

/**
 * Spinner text for an in-flight download.
 */
export function progressText(label: string, bytesWritten: number, totalBytes?: number): string {
  if (totalBytes && totalBytes > 0) {
    const percent = ((bytesWritten / totalBytes) * 100).toFixed(1);
    return `${label}: ${percent}% (${formatBytes(bytesWritten)} of ${formatBytes(totalBytes)})`;
  }
  return `${label}: ${formatBytes(bytesWritten)}`;
}
