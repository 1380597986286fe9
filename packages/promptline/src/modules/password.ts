import { Command } from "commander";
import type { PromptServiceFactory } from "../lib/ports/prompt.js";
import { maybeOutputJson, type AnswerResultJson } from "../lib/json-output.js";

export const DEFAULT_PASSWORD_LABEL = "What is your password?";

export function registerPasswordCommand(program: Command, getPrompts: PromptServiceFactory): void {
  program
    .command("password")
    .description("Ask for a secret without echoing it")
    .argument("[label]", "Question to show", DEFAULT_PASSWORD_LABEL)
    .action(async (label: string) => {
      const password = await getPrompts().password(label);

      if (maybeOutputJson<AnswerResultJson>({ label, answer: password })) return;

      console.log(`Oh, I see! Your password is ${JSON.stringify(password)}`);
    });
}
