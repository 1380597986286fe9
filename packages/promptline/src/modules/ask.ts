import { Command } from "commander";
import type { PromptServiceFactory } from "../lib/ports/prompt.js";
import {
  maybeOutputJson,
  type AnswerResultJson,
  type ConfirmResultJson,
} from "../lib/json-output.js";

export const DEFAULT_TEXT_LABEL = "What is your name?";
export const DEFAULT_CONFIRM_LABEL = "Do you want to continue?";

export function registerAskCommands(program: Command, getPrompts: PromptServiceFactory): void {
  program
    .command("ask")
    .description("Ask for a line of text")
    .argument("[label]", "Question to show", DEFAULT_TEXT_LABEL)
    .action(async (label: string) => {
      const answer = await getPrompts().text(label);

      if (maybeOutputJson<AnswerResultJson>({ label, answer })) return;

      console.log(`Oh, I see! You said ${JSON.stringify(answer)}`);
    });

  program
    .command("confirm")
    .description("Ask a yes/no question")
    .argument("[label]", "Question to show", DEFAULT_CONFIRM_LABEL)
    .option("--default-no", "Treat an empty answer as no", false)
    .action(async (label: string, options: { defaultNo: boolean }) => {
      const confirmed = await getPrompts().confirm(label, !options.defaultNo);

      if (maybeOutputJson<ConfirmResultJson>({ label, confirmed })) return;

      console.log(confirmed ? "yes" : "no");
    });
}
