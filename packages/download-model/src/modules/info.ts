import { Command, Option } from "commander";
import chalk from "chalk";
import CliTable3 from "cli-table3";
import { loadConfig } from "../lib/config.js";
import { resolveAuthToken, type TokenStore } from "../lib/credentials.js";
import { handleCommandError } from "../lib/errors/renderer.js";
import {
  getModelVersion,
  selectModelFiles,
  type FileSelection,
  type ModelFile,
  type ModelVersion,
} from "../lib/model-api.js";
import type { Transport } from "../lib/ports/transport.js";
import { canonicalDownloadUrl, resolveVersionId } from "../lib/resolver.js";
import { createSpinner, formatBytes } from "../lib/spinner.js";

export interface InfoOptions extends FileSelection {
  token?: string;
  config?: string;
}

export interface InfoDependencies {
  transport: Transport;
  createTokenStore: () => TokenStore;
  env?: NodeJS.ProcessEnv;
}

// ---------------------------------------------------------------------------
// Output Formatting
// ---------------------------------------------------------------------------

function formatFileSize(file: ModelFile): string {
  return file.sizeKB !== undefined ? formatBytes(Math.round(file.sizeKB * 1024)) : "-";
}

export function formatModelVersion(version: ModelVersion, files: ModelFile[]): string {
  const lines: string[] = [];
  const title = version.model ? `${version.model.name} - ${version.name}` : version.name;
  lines.push(chalk.bold(title));
  lines.push(`  Version ID: ${version.id}`);
  if (version.model?.type) lines.push(`  Type:       ${version.model.type}`);
  if (version.baseModel) lines.push(`  Base model: ${version.baseModel}`);
  lines.push(`  Download:   ${canonicalDownloadUrl(String(version.id))}`);

  if (files.length === 0) {
    lines.push(chalk.gray("\nNo files match the given filters"));
    return lines.join("\n");
  }

  const table = new CliTable3({
    head: ["File", "Type", "Format", "Size", "Precision", "Bytes"].map((h) => chalk.cyan(h)),
  });
  for (const file of files) {
    table.push([
      file.primary ? `${file.name} ${chalk.green("(primary)")}` : file.name,
      file.type ?? "-",
      file.metadata?.format ?? "-",
      file.metadata?.size ?? "-",
      file.metadata?.fp ?? "-",
      formatFileSize(file),
    ]);
  }
  lines.push("");
  lines.push(table.toString());
  return lines.join("\n");
}

// ---------------------------------------------------------------------------
// Core Logic
// ---------------------------------------------------------------------------

export async function showModelInfo(
  input: string,
  options: InfoOptions,
  deps: InfoDependencies
): Promise<ModelVersion> {
  const versionId = resolveVersionId(input);
  const { config } = loadConfig(options.config);
  const { token } = resolveAuthToken({ flag: options.token, env: deps.env, store: deps.createTokenStore });

  const spinner = createSpinner(`Fetching model version ${versionId}`).start();
  let version: ModelVersion;
  try {
    version = await getModelVersion(versionId, {
      transport: deps.transport,
      token,
      authMode: config.authMode,
    });
    spinner.stop();
  } catch (error) {
    spinner.fail("Could not fetch model metadata");
    throw error;
  }

  console.log(formatModelVersion(version, selectModelFiles(version.files, options)));
  return version;
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerInfoCommand(program: Command, deps: InfoDependencies): void {
  program
    .command("info")
    .description("Show a model version and its files without downloading")
    .argument("<model>", "Model-version id, download URL, model page URL or AIR")
    .addOption(new Option("--size <size>", "Only list model files of this size").choices(["full", "pruned"]))
    .addOption(new Option("--fp <fp>", "Only list model files of this precision").choices(["fp8", "fp16", "bf16", "fp32"]))
    .option("--include-companions", "Also list companion files such as VAEs and configs")
    .option("--token <token>", "API token")
    .option("-c, --config <path>", "Config file to use")
    .action(async (model: string, options: InfoOptions) => {
      try {
        await showModelInfo(model, options, deps);
      } catch (error) {
        handleCommandError(error);
      }
    });
}
