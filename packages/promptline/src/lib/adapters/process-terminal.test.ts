import { describe, it, expect, vi } from "vitest";

vi.mock("tty", () => ({
  isatty: vi.fn(() => true),
}));

import { isatty } from "tty";
import { createProcessTerminal } from "./process-terminal.js";

function fakeStdin(options: { isTTY: boolean; isRaw?: boolean }) {
  return { fd: 0, isTTY: options.isTTY, isRaw: options.isRaw ?? false, setRawMode: vi.fn() };
}

describe("createProcessTerminal", () => {
  it("checks the stream's descriptor", () => {
    const terminal = createProcessTerminal(fakeStdin({ isTTY: true }));

    expect(terminal.isTerminal()).toBe(true);
    expect(isatty).toHaveBeenCalledWith(0);
  });

  it("disables echo through raw mode and restores cooked mode", () => {
    const stdin = fakeStdin({ isTTY: true });
    const terminal = createProcessTerminal(stdin);

    terminal.setEcho(false);
    terminal.setEcho(true);

    expect(stdin.setRawMode.mock.calls).toEqual([[true], [false]]);
  });

  it("puts back raw mode when it was already on", () => {
    const stdin = fakeStdin({ isTTY: true, isRaw: true });
    const terminal = createProcessTerminal(stdin);

    terminal.setEcho(false);
    terminal.setEcho(true);

    expect(stdin.setRawMode.mock.calls).toEqual([[true], [true]]);
  });

  it("leaves a non-TTY stream alone", () => {
    const stdin = fakeStdin({ isTTY: false });
    const terminal = createProcessTerminal(stdin);

    terminal.setEcho(false);
    terminal.setEcho(true);

    expect(stdin.setRawMode).not.toHaveBeenCalled();
  });
});
