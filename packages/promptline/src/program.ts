import { Command } from "commander";
import type { PromptServiceFactory } from "./lib/ports/prompt.js";
import { registerInteractiveCommand } from "./modules/interactive.js";
import { registerAskCommands } from "./modules/ask.js";
import { registerPasswordCommand } from "./modules/password.js";
import { registerCheckboxesCommand } from "./modules/checkboxes.js";
import { registerConfigCommands } from "./modules/config-cmd.js";

export function buildProgram(getPrompts: PromptServiceFactory, version: string): Command {
  const program = new Command()
    .name("promptline")
    .description("Interactive command-line prompts that behave on pipes")
    .version(version)
    .option("--json", "Print results and errors as JSON")
    .option("--no-input", "Never treat stdin as a terminal")
    .option("--max-attempts <n>", "Rejected answers allowed per prompt (0 = no limit)")
    .option("--log-level <level>", "debug, info, warn or error")
    .option("-c, --config <path>", "Config file to use instead of the default locations");

  registerInteractiveCommand(program, getPrompts);
  registerAskCommands(program, getPrompts);
  registerPasswordCommand(program, getPrompts);
  registerCheckboxesCommand(program, getPrompts);
  registerConfigCommands(program);

  return program;
}
