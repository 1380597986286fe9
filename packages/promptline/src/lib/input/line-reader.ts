import type { InputChannel } from "./channel.js";

/**
 * Outcome of reading one line. `end` means the stream closed before a single
 * character arrived, which is different from an empty line the user submitted.
 */
export type LineResult = { kind: "line"; text: string } | { kind: "end" };

/**
 * Strip the line terminator (including a CR from CRLF input) and surrounding
 * whitespace.
 */
export function normalizeLine(raw: string): string {
  return raw.replace(/\r$/, "").trim();
}

/**
 * Read up to the next line feed. Anything after it stays in the channel.
 * A final line without a terminator is still returned as a line.
 */
export async function readLine(channel: InputChannel): Promise<LineResult> {
  let line = "";
  let sawInput = false;

  for (;;) {
    const chunk = await channel.next();
    if (chunk === undefined) {
      return sawInput ? { kind: "line", text: normalizeLine(line) } : { kind: "end" };
    }
    sawInput = true;

    const newline = chunk.indexOf("\n");
    if (newline === -1) {
      line += chunk;
      continue;
    }

    line += chunk.slice(0, newline);
    channel.unread(chunk.slice(newline + 1));
    return { kind: "line", text: normalizeLine(line) };
  }
}
