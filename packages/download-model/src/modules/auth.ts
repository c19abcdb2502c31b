import { Command } from "commander";
import chalk from "chalk";
import { isNonInteractive } from "../lib/cli-context.js";
import {
  maskToken,
  promptForToken,
  resolveAuthToken,
  TOKEN_ENV_VAR,
  type TokenStore,
} from "../lib/credentials.js";
import { handleCommandError } from "../lib/errors/renderer.js";

export interface LoginOptions {
  token?: string;
  nonInteractive?: boolean;
}

export interface AuthDependencies {
  createTokenStore: () => TokenStore;
  env?: NodeJS.ProcessEnv;
}

const SOURCE_LABELS = {
  flag: "--token",
  env: `$${TOKEN_ENV_VAR}`,
  store: "stored token",
} as const;

export function registerAuthCommands(program: Command, deps: AuthDependencies): void {
  const auth = program.command("auth").description("Manage the CivitAI API token");

  auth
    .command("login")
    .description("Store an API token for future downloads")
    .option("-t, --token <token>", "CivitAI API token")
    .option("--non-interactive", "Fail instead of prompting for input", false)
    .action(async (options: LoginOptions) => {
      try {
        const token = await promptForToken({
          token: options.token,
          nonInteractive: options.nonInteractive || isNonInteractive(),
        });
        deps.createTokenStore().setToken(token);
        console.log(chalk.green("Token saved locally."));
      } catch (error) {
        handleCommandError(error);
      }
    });

  auth
    .command("logout")
    .description("Remove the stored API token")
    .action(() => {
      deps.createTokenStore().clearToken();
      console.log(chalk.green("Stored token removed."));
    });

  auth
    .command("status")
    .description("Show which API token downloads will use")
    .action(() => {
      const store = deps.createTokenStore();
      const { token, source } = resolveAuthToken({
        env: deps.env,
        store: () => store,
      });
      if (!token || !source) {
        console.log(chalk.yellow("No API token configured; downloads are unauthenticated."));
        console.log(chalk.gray(`Run 'download-model auth login' or set ${TOKEN_ENV_VAR}.`));
        return;
      }
      console.log(chalk.cyan(`Token: ${maskToken(token)} (from ${SOURCE_LABELS[source]})`));
      if (source === "store" && store.path) {
        console.log(chalk.gray(`Stored token file: ${store.path}`));
      }
    });
}
