import { describe, it, expect } from "vitest";
import { normalizeLine, readLine } from "./line-reader.js";
import { createChannel } from "../../test-utils.js";

describe("normalizeLine", () => {
  it("strips a trailing carriage return and surrounding whitespace", () => {
    expect(normalizeLine("  hello world \r")).toBe("hello world");
  });

  it("keeps inner whitespace", () => {
    expect(normalizeLine("a \t b")).toBe("a \t b");
  });
});

describe("readLine", () => {
  it("reads one line and leaves the rest", async () => {
    const { channel } = createChannel("one\ntwo\n");

    await expect(readLine(channel)).resolves.toEqual({ kind: "line", text: "one" });
    await expect(readLine(channel)).resolves.toEqual({ kind: "line", text: "two" });
    await expect(readLine(channel)).resolves.toEqual({ kind: "end" });
  });

  it("tells an empty line apart from the end of input", async () => {
    const { channel } = createChannel("\n");

    await expect(readLine(channel)).resolves.toEqual({ kind: "line", text: "" });
    await expect(readLine(channel)).resolves.toEqual({ kind: "end" });
  });

  it("returns an unterminated final line", async () => {
    const { channel } = createChannel("  last  ");

    await expect(readLine(channel)).resolves.toEqual({ kind: "line", text: "last" });
    await expect(readLine(channel)).resolves.toEqual({ kind: "end" });
  });

  it("handles CRLF line endings", async () => {
    const { channel } = createChannel("yes\r\nno\r\n");

    await expect(readLine(channel)).resolves.toEqual({ kind: "line", text: "yes" });
    await expect(readLine(channel)).resolves.toEqual({ kind: "line", text: "no" });
  });
});
