import { Command } from "commander";
import type { PromptServiceFactory } from "../lib/ports/prompt.js";
import { maybeOutputJson, type SelectionResultJson } from "../lib/json-output.js";

export const DEFAULT_CHECKBOX_LABEL = "Which are your favourite programming languages?";

export const DEFAULT_LANGUAGES = [
  "C",
  "Python",
  "Java",
  "C++",
  "C#",
  "Visual Basic",
  "JavaScript",
  "PHP",
  "Assembly Language",
  "SQL",
  "Groovy",
  "Classic Visual Basic",
  "Fortran",
  "R",
  "Ruby",
  "Swift",
  "MATLAB",
  "Go",
  "Prolog",
  "Perl",
];

export function describeSelection(selected: string[]): string {
  return selected.length > 0
    ? `Oh, I see! You like ${selected.join(", ")}`
    : "Oh, I see! You like none of them";
}

export function registerCheckboxesCommand(
  program: Command,
  getPrompts: PromptServiceFactory
): void {
  program
    .command("checkboxes")
    .description("Pick any number of entries from a list")
    .argument("[label]", "Question to show", DEFAULT_CHECKBOX_LABEL)
    .option("-o, --option <entry...>", "Entries to choose from (defaults to a list of languages)")
    .action(async (label: string, options: { option?: string[] }) => {
      const entries = options.option ?? DEFAULT_LANGUAGES;
      const selected = await getPrompts().multiSelect(label, entries);

      if (maybeOutputJson<SelectionResultJson>({ label, options: entries, selected })) return;

      console.log(describeSelection(selected));
    });
}
