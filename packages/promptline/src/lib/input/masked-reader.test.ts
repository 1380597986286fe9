import { describe, it, expect } from "vitest";
import { escapeSequenceEnd, readSecret } from "./masked-reader.js";
import { captureOutput, createChannel, createFakeTerminal } from "../../test-utils.js";

function setup(text: string, interactive = true) {
  const { input, channel } = createChannel(text);
  const terminal = createFakeTerminal(interactive);
  const status = captureOutput();
  return {
    input,
    terminal,
    status,
    read: () => readSecret(channel, terminal, status.stream, "Password?"),
    channel,
  };
}

describe("readSecret", () => {
  it("refuses to run without a terminal", async () => {
    const { read, input, terminal, status } = setup("test-secret\n", false);

    await expect(read()).rejects.toMatchObject({ code: "INPUT_NOT_A_TERMINAL" });
    expect(terminal.echoChanges).toEqual([]);
    expect(input.readableLength).toBe(12);
    expect(status.text()).toBe("");
  });

  it("reads up to Enter with echo disabled", async () => {
    const { read, terminal, status } = setup("test-secret\r");

    await expect(read()).resolves.toBe("test-secret");
    expect(terminal.echoChanges).toEqual([false, true]);
    expect(status.text()).toBe("\n");
  });

  it("does not trim the secret", async () => {
    const { read } = setup(" pass word \n");

    await expect(read()).resolves.toBe(" pass word ");
  });

  it("applies backspace and delete", async () => {
    const { read } = setup("abx\u007fc\bd\r");

    await expect(read()).resolves.toBe("abd");
  });

  it("ignores escape sequences", async () => {
    const { read } = setup("\u001b[A");

    await expect(read()).rejects.toMatchObject({ code: "INPUT_EXHAUSTED" });
  });

  it("keeps the keys that follow an arrow key in the same chunk", async () => {
    const { read, terminal } = setup("ab\u001b[D\r");

    await expect(read()).resolves.toBe("ab");
    expect(terminal.echoChanges).toEqual([false, true]);
  });

  it("keeps typing after function keys and Alt combinations", async () => {
    await expect(setup("a\u001bOPb\u001b[15~c\u001bxd\r").read()).resolves.toBe("abcd");
  });

  it("treats CRLF as a single terminator", async () => {
    const { read, channel } = setup("one\r\ntwo\r");

    await expect(read()).resolves.toBe("one");
    await expect(channel.next()).resolves.toBe("two\r");
  });

  it("fails with INPUT_INTERRUPTED on Ctrl-C and restores echo", async () => {
    const { read, terminal, status } = setup("abc\u0003");

    await expect(read()).rejects.toMatchObject({ code: "INPUT_INTERRUPTED" });
    expect(terminal.echoChanges).toEqual([false, true]);
    expect(status.text()).toBe("\n");
  });

  it("fails with INPUT_EXHAUSTED when input ends before anything is typed", async () => {
    const { read, terminal } = setup("");

    await expect(read()).rejects.toMatchObject({ code: "INPUT_EXHAUSTED" });
    expect(terminal.echoChanges).toEqual([false, true]);
  });

  it("submits what was typed on Ctrl-D", async () => {
    await expect(setup("abc\u0004").read()).resolves.toBe("abc");
    await expect(setup("\u0004").read()).rejects.toMatchObject({ code: "INPUT_EXHAUSTED" });
  });

  it("submits what was typed when input ends without Enter", async () => {
    await expect(setup("abc").read()).resolves.toBe("abc");
  });
});

describe("escapeSequenceEnd", () => {
  const keys = (text: string) => Array.from(text);

  it("ends a CSI sequence at its final byte", () => {
    expect(escapeSequenceEnd(keys("\u001b[1;5Cx"), 0)).toBe(5);
  });

  it("ends an SS3 sequence after its final byte", () => {
    expect(escapeSequenceEnd(keys("\u001bOAx"), 0)).toBe(2);
  });

  it("consumes one key after a plain ESC", () => {
    expect(escapeSequenceEnd(keys("\u001bxy"), 0)).toBe(1);
  });

  it("drops only the ESC when it ends the chunk", () => {
    expect(escapeSequenceEnd(keys("ab\u001b"), 2)).toBe(2);
  });

  it("stops at the end of the chunk when the sequence is cut short", () => {
    expect(escapeSequenceEnd(keys("\u001b[12"), 0)).toBe(3);
  });
});
