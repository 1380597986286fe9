import type { Writable } from "stream";
import type { TerminalControl } from "../ports/terminal.js";
import { inputExhausted, inputInterrupted, notATerminal } from "../errors/catalog.js";
import type { InputChannel } from "./channel.js";

const ENTER = "\r";
const LINE_FEED = "\n";
const CTRL_C = "\u0003";
const CTRL_D = "\u0004";
const BACKSPACE = "\b";
const DELETE = "\u007f";
const ESCAPE = "\u001b";

/**
 * Read one line from the terminal with echo turned off.
 *
 * Echo is restored and a newline written to `status` on every exit path,
 * including Ctrl-C and a closed stream, so the terminal is never left mute.
 */
export async function readSecret(
  channel: InputChannel,
  terminal: TerminalControl,
  status: Writable,
  label = "Secret entry"
): Promise<string> {
  if (!terminal.isTerminal()) {
    throw notATerminal(label);
  }

  terminal.setEcho(false);
  try {
    return await collectKeys(channel, label);
  } finally {
    terminal.setEcho(true);
    status.write("\n");
  }
}

/**
 * Index of the last key of the escape sequence starting at `start`.
 *
 * Covers CSI (`ESC [`) and SS3 (`ESC O`) sequences, which end at the first
 * key in `@`..`~`, and two-key `ESC x` sequences. A lone ESC at the end of
 * the chunk is dropped by itself.
 */
export function escapeSequenceEnd(keys: readonly string[], start: number): number {
  const introducer = keys[start + 1];
  if (introducer === undefined) return start;
  if (introducer !== "[" && introducer !== "O") return start + 1;

  for (let j = start + 2; j < keys.length; j++) {
    const code = keys[j]?.codePointAt(0) ?? 0;
    if (code >= 0x40 && code <= 0x7e) return j;
  }
  return keys.length - 1;
}

async function collectKeys(channel: InputChannel, label: string): Promise<string> {
  // Code points, so backspace removes a whole character
  const typed: string[] = [];

  for (;;) {
    const chunk = await channel.next();
    if (chunk === undefined) {
      if (typed.length === 0) throw inputExhausted(label);
      return typed.join("");
    }

    const keys = Array.from(chunk);
    for (let i = 0; i < keys.length; i++) {
      const key = keys[i];
      switch (key) {
        case ENTER:
        case LINE_FEED: {
          // CRLF from a pasted line counts as one terminator
          const next = key === ENTER && keys[i + 1] === LINE_FEED ? i + 2 : i + 1;
          channel.unread(keys.slice(next).join(""));
          return typed.join("");
        }
        case CTRL_C:
          throw inputInterrupted();
        case CTRL_D:
          if (typed.length === 0) throw inputExhausted(label);
          return typed.join("");
        case BACKSPACE:
        case DELETE:
          typed.pop();
          break;
        case ESCAPE:
          i = escapeSequenceEnd(keys, i);
          break;
        default:
          typed.push(key);
      }
    }
  }
}
