/**
 * Abstraction over the terminal device behind standard input.
 * Allows testing interactive and piped flows without a real TTY.
 */
export interface TerminalControl {
  /** True when standard input is a character-mode terminal device */
  isTerminal(): boolean;
  /** Turn local echo of typed characters on or off */
  setEcho(enabled: boolean): void;
}
