/**
 * Abstraction for user prompts.
 * Allows testing interactive flows without actual user input.
 */
export interface PromptService {
  /** Whether standard input is an interactive terminal */
  isInteractive(): boolean;
  /** Ask for a non-empty line of text */
  text(label: string): Promise<string>;
  /** Ask for a non-empty secret, typed without echo */
  password(label: string): Promise<string>;
  /** Ask a yes/no question; an empty answer picks the default */
  confirm(label: string, defaultValue: boolean): Promise<boolean>;
  /** Let the user pick any subset of the options */
  multiSelect(label: string, options: readonly string[]): Promise<string[]>;
}

/** Builds the prompt service once configuration is known */
export type PromptServiceFactory = () => PromptService;
