export { createProcessTerminal } from "./process-terminal.js";
export { createPromptsSelector } from "./prompts-selector.js";
export { createInteractivePrompts } from "./interactive-prompts.js";
