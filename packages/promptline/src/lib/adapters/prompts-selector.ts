import prompts from "prompts";
import type { Readable, Writable } from "stream";
import type { ListSelector } from "../ports/selector.js";
import { inputInterrupted } from "../errors/catalog.js";

export interface PromptsSelectorStreams {
  stdin?: Readable;
  stdout?: Writable;
}

/**
 * Checkbox list backed by the 'prompts' package.
 * Renders on stderr by default so stdout keeps only command output.
 */
export function createPromptsSelector(streams: PromptsSelectorStreams = {}): ListSelector {
  return {
    async select({ label, options }): Promise<string[]> {
      let cancelled = false;
      const answers = await prompts(
        {
          type: "multiselect",
          name: "value",
          message: label,
          choices: options.map((option) => ({ title: option, value: option })),
          instructions: false,
          hint: "- Space to toggle. Return to submit",
          stdin: streams.stdin ?? process.stdin,
          stdout: streams.stdout ?? process.stderr,
        },
        {
          onCancel: () => {
            cancelled = true;
          },
        }
      );

      if (cancelled) {
        throw inputInterrupted();
      }

      const picked: unknown = answers.value;
      return Array.isArray(picked)
        ? picked.filter((item): item is string => typeof item === "string")
        : [];
    },
  };
}
