import type { TerminalControl } from "../ports/terminal.js";

/**
 * `auto` asks the terminal; `non-interactive` answers false regardless, for
 * CI runs and `--no-input`.
 */
export type InputMode = "auto" | "non-interactive";

export interface InputSource {
  isInteractive(): boolean;
}

/**
 * Resolve once whether stdin is an interactive terminal.
 * The first answer is kept for the life of the resolver; the device is not
 * re-queried per prompt.
 */
export function createInputSource(
  terminal: TerminalControl,
  mode: InputMode = "auto"
): InputSource {
  let resolved: boolean | undefined;

  return {
    isInteractive(): boolean {
      if (resolved === undefined) {
        resolved = mode === "auto" && terminal.isTerminal();
      }
      return resolved;
    },
  };
}
