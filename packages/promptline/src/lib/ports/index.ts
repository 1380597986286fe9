export type { TerminalControl } from "./terminal.js";
export type { ListSelector, SelectionRequest } from "./selector.js";
export type { PromptService, PromptServiceFactory } from "./prompt.js";
