import chalk from "chalk";
import { CLIError, EXIT_CODES, isCLIError } from "./types.js";
import { unknownError } from "./catalog.js";

/**
 * Symbols for error display.
 */
const SYM = {
  error: "✗",
  arrow: "→",
  prompt: "$",
};

/**
 * Get terminal width, with fallback for non-TTY.
 */
function getTerminalWidth(): number {
  return process.stderr.columns || 80;
}

/**
 * Wrap text to fit within a given width, preserving indentation.
 */
export function wrapText(text: string, maxWidth: number, indent: string = ""): string[] {
  const words = text.split(" ");
  const lines: string[] = [];
  let currentLine = "";

  for (const word of words) {
    const testLine = currentLine ? `${currentLine} ${word}` : word;
    if (testLine.length <= maxWidth) {
      currentLine = testLine;
    } else {
      if (currentLine) lines.push(currentLine);
      currentLine = word;
    }
  }
  if (currentLine) lines.push(currentLine);

  return lines.map((line, i) => (i === 0 ? line : indent + line));
}

/**
 * Format an error as the block of lines printed to stderr.
 */
export function formatError(error: CLIError): string[] {
  const termWidth = Math.min(getTerminalWidth(), 80);
  const output: string[] = [""];

  const errorLines = wrapText(error.message, termWidth - 4, "  ");
  output.push(`${chalk.red(SYM.error)} ${chalk.red.bold(errorLines[0])}`);
  for (let i = 1; i < errorLines.length; i++) {
    output.push(`  ${chalk.red(errorLines[i])}`);
  }

  // Details may span several lines (config issues), keep their breaks
  if (error.details) {
    output.push("");
    for (const paragraph of error.details.split("\n")) {
      for (const line of wrapText(paragraph, termWidth - 4, "  ")) {
        output.push(`  ${chalk.dim(line)}`);
      }
    }
  }

  if (error.suggestion || error.example || error.examples?.length) {
    output.push("");

    if (error.suggestion) {
      const suggestionLines = wrapText(error.suggestion, termWidth - 4, "  ");
      output.push(`  ${chalk.yellow(SYM.arrow)} ${suggestionLines[0]}`);
      for (let i = 1; i < suggestionLines.length; i++) {
        output.push(`    ${suggestionLines[i]}`);
      }
    }

    const examples = error.examples?.length ? error.examples : error.example ? [error.example] : [];
    if (examples.length > 0) {
      if (error.suggestion) output.push("");
      if (examples.length === 1) {
        output.push(`  ${chalk.dim("Try:")} ${chalk.cyan(examples[0])}`);
      } else {
        output.push(`  ${chalk.dim("Examples:")}`);
        for (const ex of examples.slice(0, 3)) {
          output.push(`    ${chalk.cyan(`${SYM.prompt} ${ex}`)}`);
        }
      }
    }
  }

  output.push("");
  return output;
}

/**
 * Render an error to stderr.
 */
export function renderError(error: CLIError): void {
  for (const line of formatError(error)) {
    console.error(line);
  }
}

/**
 * Exit code for any thrown value.
 */
export function exitCodeFor(error: unknown): number {
  return isCLIError(error) ? error.exitCode : EXIT_CODES.UNKNOWN_ERROR;
}

/**
 * Render an error of any kind and record the matching process exit code.
 */
export function handleCommandError(error: unknown): void {
  renderError(isCLIError(error) ? error : unknownError(error));
  process.exitCode = exitCodeFor(error);
}

export { CLIError, isCLIError };
