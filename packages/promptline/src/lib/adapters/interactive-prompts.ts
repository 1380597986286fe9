import type { PromptService } from "../ports/prompt.js";
import { InputChannel } from "../input/channel.js";
import { createInputSource, type InputMode } from "../input/source.js";
import { Prompter } from "../prompter.js";
import type { Logger } from "../logger.js";
import { createProcessTerminal } from "./process-terminal.js";
import { createPromptsSelector } from "./prompts-selector.js";

export interface InteractivePromptsOptions {
  mode?: InputMode;
  maxAttempts?: number;
  logger?: Logger;
}

/**
 * Real prompt service over the process's stdin and stderr.
 */
export function createInteractivePrompts(
  options: InteractivePromptsOptions = {}
): PromptService {
  const terminal = createProcessTerminal();

  return new Prompter({
    channel: new InputChannel(process.stdin),
    status: process.stderr,
    terminal,
    source: createInputSource(terminal, options.mode),
    selector: createPromptsSelector(),
    logger: options.logger,
    maxAttempts: options.maxAttempts,
  });
}
