import { isatty } from "tty";
import type { TerminalControl } from "../ports/terminal.js";

/**
 * The parts of a TTY read stream that echo control needs.
 */
export interface RawModeStream {
  readonly fd: number;
  readonly isTTY?: boolean;
  readonly isRaw?: boolean;
  setRawMode(mode: boolean): unknown;
}

/**
 * Terminal control for the process's own stdin.
 * Echo is switched off through raw mode, the only echo control Node exposes;
 * the mode that was active before is put back when echo returns.
 */
export function createProcessTerminal(
  stdin: RawModeStream = process.stdin
): TerminalControl {
  let restoreRaw = false;

  return {
    isTerminal: () => isatty(stdin.fd),

    setEcho(enabled: boolean): void {
      if (!stdin.isTTY) return;
      if (enabled) {
        stdin.setRawMode(restoreRaw);
      } else {
        restoreRaw = stdin.isRaw === true;
        stdin.setRawMode(true);
      }
    },
  };
}
