#!/usr/bin/env node
import { Command } from "commander";
import pkg from "../package.json" with { type: "json" };
import { nodeFetchTransport } from "./lib/adapters/index.js";
import { initContext } from "./lib/cli-context.js";
import { ConfTokenStore } from "./lib/credentials.js";
import { handleCommandError } from "./lib/errors/renderer.js";
import { registerAuthCommands } from "./modules/auth.js";
import { registerConfigCommands } from "./modules/config-cmd.js";
import { registerDownloadCommand } from "./modules/download.js";
import { registerInfoCommand } from "./modules/info.js";

export async function main(argv = process.argv): Promise<void> {
  initContext(argv);

  const program = new Command()
    .name("download-model")
    .description("Download CivitAI models into your model directories")
    .version(pkg.version)
    .option("-q, --quiet", "Suppress spinners and progress output")
    .option("--debug", "Enable debug logging")
    .option("--no-input", "Fail instead of prompting for input");

  const deps = {
    transport: nodeFetchTransport,
    createTokenStore: () => new ConfTokenStore(),
  };

  registerDownloadCommand(program, deps);
  registerInfoCommand(program, deps);
  registerAuthCommands(program, deps);
  registerConfigCommands(program);

  try {
    await program.parseAsync(argv);
  } catch (error) {
    handleCommandError(error);
  }
}

void main();
