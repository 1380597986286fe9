import { describe, it, expect } from "vitest";
import { PassThrough } from "stream";
import { InputChannel } from "./channel.js";
import { createChannel } from "../../test-utils.js";

describe("InputChannel", () => {
  it("yields the stream's text, then undefined once it ends", async () => {
    const { channel } = createChannel("abc");

    await expect(channel.next()).resolves.toBe("abc");
    await expect(channel.next()).resolves.toBeUndefined();
    await expect(channel.next()).resolves.toBeUndefined();
  });

  it("serves unread text before reading the stream again", async () => {
    const { channel } = createChannel("abc");

    await channel.next();
    channel.unread("bc");

    await expect(channel.next()).resolves.toBe("bc");
    await expect(channel.next()).resolves.toBeUndefined();
  });

  it("ignores empty unread text", async () => {
    const { channel } = createChannel("");

    channel.unread("");

    await expect(channel.next()).resolves.toBeUndefined();
  });

  it("joins a multi-byte character split across chunks", async () => {
    const input = new PassThrough();
    const channel = new InputChannel(input);
    input.write(Buffer.from([0xc3]));
    input.write(Buffer.from([0xa9]));
    input.end();

    await expect(channel.next()).resolves.toBe("é");
  });

  it("pauses the stream between reads", async () => {
    const input = new PassThrough();
    const channel = new InputChannel(input);
    input.write("one");

    await expect(channel.next()).resolves.toBe("one");

    expect(input.isPaused()).toBe(true);
    expect(input.listenerCount("data")).toBe(0);
  });

  it("waits for text written after the read started", async () => {
    const input = new PassThrough();
    const channel = new InputChannel(input);

    const pending = channel.next();
    input.write("late");

    await expect(pending).resolves.toBe("late");
  });

  it("rejects when the stream fails", async () => {
    const input = new PassThrough();
    const channel = new InputChannel(input);

    const pending = channel.next();
    input.destroy(new Error("boom"));

    await expect(pending).rejects.toThrow("boom");
  });

  it("keeps rejecting reads after the stream failed", async () => {
    const input = new PassThrough();
    const channel = new InputChannel(input);

    const pending = channel.next();
    input.destroy(new Error("boom"));
    await expect(pending).rejects.toThrow("boom");

    await expect(channel.next()).rejects.toThrow("boom");
    await expect(channel.next()).rejects.toThrow("boom");
  });

  it("ends reads on a stream destroyed without an error", async () => {
    const input = new PassThrough();
    const channel = new InputChannel(input);
    input.destroy();

    await expect(channel.next()).resolves.toBeUndefined();
  });

  it("ends a pending read when the stream is destroyed", async () => {
    const input = new PassThrough();
    const channel = new InputChannel(input);

    const pending = channel.next();
    input.destroy();

    await expect(pending).resolves.toBeUndefined();
  });
});
