/**
 * Library entry point for embedding promptline prompts in other programs.
 */

export type { PromptService, PromptServiceFactory, TerminalControl, ListSelector, SelectionRequest } from "./ports/index.js";
export { createInteractivePrompts, createProcessTerminal, createPromptsSelector } from "./adapters/index.js";
export { Prompter, confirmHint, parseConfirm, findDuplicates, type PrompterDeps } from "./prompter.js";
export { InputChannel } from "./input/channel.js";
export { readLine, normalizeLine, type LineResult } from "./input/line-reader.js";
export { readSecret } from "./input/masked-reader.js";
export { createInputSource, type InputMode, type InputSource } from "./input/source.js";
export { CLIError, isCLIError, exitCodeFor, INTERRUPTED_EXIT_CODE, type ErrorCode } from "./errors/types.js";
export {
  inputExhausted,
  notATerminal,
  inputInterrupted,
  attemptsExceeded,
  invalidOptions,
} from "./errors/catalog.js";
export { createLogger, createNoopLogger, type Logger, type LogLevel } from "./logger.js";
