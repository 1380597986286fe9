import { describe, it, expect, vi } from "vitest";
import { createInputSource } from "./source.js";

describe("createInputSource", () => {
  it("asks the terminal once and keeps the answer", () => {
    const isTerminal = vi.fn().mockReturnValueOnce(true).mockReturnValue(false);
    const source = createInputSource({ isTerminal, setEcho: vi.fn() });

    expect(source.isInteractive()).toBe(true);
    expect(source.isInteractive()).toBe(true);
    expect(isTerminal).toHaveBeenCalledTimes(1);
  });

  it("reports a pipe as non-interactive", () => {
    const source = createInputSource({ isTerminal: () => false, setEcho: vi.fn() });

    expect(source.isInteractive()).toBe(false);
  });

  it("never reports interactive in non-interactive mode", () => {
    const isTerminal = vi.fn(() => true);
    const source = createInputSource({ isTerminal, setEcho: vi.fn() }, "non-interactive");

    expect(source.isInteractive()).toBe(false);
    expect(isTerminal).not.toHaveBeenCalled();
  });
});
