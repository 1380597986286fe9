import { Command } from "commander";
import chalk from "chalk";
import type { PromptServiceFactory } from "../lib/ports/prompt.js";
import { maybeOutputJson, type InteractiveResultJson } from "../lib/json-output.js";

export const INTERACTIVE_MESSAGE = "Terminal is interactive! You're good to use prompts!";
export const NON_INTERACTIVE_MESSAGE =
  "Terminal is not interactive! Consider using flags or environment variables!";

export function registerInteractiveCommand(program: Command, getPrompts: PromptServiceFactory): void {
  program
    .command("interactive")
    .description("Report whether stdin is an interactive terminal")
    .action(() => {
      const interactive = getPrompts().isInteractive();

      if (maybeOutputJson<InteractiveResultJson>({ interactive })) return;

      console.log(
        interactive ? chalk.green(INTERACTIVE_MESSAGE) : chalk.yellow(NON_INTERACTIVE_MESSAGE)
      );
    });
}
