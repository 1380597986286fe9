import { PassThrough, Writable } from "stream";
import { vi } from "vitest";
import { InputChannel } from "./lib/input/channel.js";
import type { InputSource } from "./lib/input/source.js";
import type { ListSelector } from "./lib/ports/selector.js";
import type { TerminalControl } from "./lib/ports/terminal.js";
import type { PromptService } from "./lib/ports/prompt.js";

/**
 * A finished input stream holding `text`, like a pipe that was closed.
 */
export function createInput(text: string): PassThrough {
  const input = new PassThrough();
  input.end(text);
  return input;
}

export function createChannel(text: string): { input: PassThrough; channel: InputChannel } {
  const input = createInput(text);
  return { input, channel: new InputChannel(input) };
}

/**
 * Writable that keeps everything written to it.
 */
export function captureOutput(): { stream: Writable; text: () => string } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk.toString("utf8"));
      callback();
    },
  });
  return { stream, text: () => chunks.join("") };
}

export interface FakeTerminal extends TerminalControl {
  echoChanges: boolean[];
}

export function createFakeTerminal(interactive: boolean): FakeTerminal {
  const echoChanges: boolean[] = [];
  return {
    echoChanges,
    isTerminal: () => interactive,
    setEcho: (enabled: boolean) => {
      echoChanges.push(enabled);
    },
  };
}

export function fixedSource(interactive: boolean): InputSource {
  return { isInteractive: () => interactive };
}

/**
 * Selector that answers with a fixed list, as if those entries were toggled
 * in that order.
 */
export function createFakeSelector(chosen: string[]) {
  const select = vi.fn<ListSelector["select"]>(async () => chosen);
  const selector: ListSelector = { select };
  return { selector, select };
}

export function createFakePrompts(overrides: Partial<PromptService> = {}): PromptService {
  return {
    isInteractive: vi.fn(() => true),
    text: vi.fn(async () => "answer"),
    password: vi.fn(async () => "test-secret"),
    confirm: vi.fn(async (_label: string, defaultValue: boolean) => defaultValue),
    multiSelect: vi.fn(async () => []),
    ...overrides,
  };
}
