import { StringDecoder } from "string_decoder";
import type { Readable } from "stream";

/**
 * Text source over a readable stream, shared by the line and masked readers.
 *
 * Listeners are attached only while a read is pending and the stream is
 * paused again afterwards, so stdin is left alone between prompts (and the
 * multi-select list can own it). Text a reader does not consume is handed
 * back with `unread` and served first on the next read.
 */
export class InputChannel {
  private readonly decoder = new StringDecoder("utf8");
  private readonly pending: string[] = [];
  private ended = false;
  private failure: Error | undefined;

  constructor(private readonly input: Readable) {}

  /**
   * Next chunk of decoded text, or undefined once the stream has ended and
   * nothing is left over. A stream error rejects this read and every later
   * one.
   */
  async next(): Promise<string | undefined> {
    const buffered = this.pending.shift();
    if (buffered !== undefined) return buffered;

    const failure = this.failure ?? this.input.errored;
    if (failure) {
      this.failure = failure;
      throw failure;
    }

    if (this.ended || this.input.readableEnded || this.input.destroyed) {
      return this.finish();
    }

    return new Promise<string | undefined>((resolve, reject) => {
      const cleanup = (): void => {
        this.input.off("data", onData);
        this.input.off("end", onEnd);
        this.input.off("close", onEnd);
        this.input.off("error", onError);
        this.input.pause();
      };

      const onData = (chunk: Buffer | string): void => {
        const text = typeof chunk === "string" ? chunk : this.decoder.write(chunk);
        // A split multi-byte character decodes to nothing until completed
        if (text === "") return;
        cleanup();
        resolve(text);
      };

      const onEnd = (): void => {
        cleanup();
        resolve(this.finish());
      };

      const onError = (error: Error): void => {
        cleanup();
        this.failure = error;
        reject(error);
      };

      this.input.on("data", onData);
      this.input.once("end", onEnd);
      this.input.once("close", onEnd);
      this.input.once("error", onError);
      this.input.resume();
    });
  }

  /** Return text to the front of the channel. */
  unread(text: string): void {
    if (text !== "") this.pending.unshift(text);
  }

  private finish(): string | undefined {
    if (this.ended) return undefined;
    this.ended = true;
    const tail = this.decoder.end();
    return tail === "" ? undefined : tail;
  }
}
