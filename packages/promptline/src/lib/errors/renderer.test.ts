import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from "vitest";

// Mock chalk to avoid color codes in tests
vi.mock("chalk", () => {
  const plain = (s: string) => s;
  return {
    default: {
      red: Object.assign(plain, { bold: plain }),
      yellow: plain,
      cyan: plain,
      dim: plain,
    },
  };
});

import { renderError, renderUnknownError, wrapText } from "./renderer.js";
import { inputExhausted, inputInterrupted } from "./catalog.js";

describe("renderer", () => {
  let consoleErrorSpy: MockInstance;

  beforeEach(() => {
    consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  function printed(): string[] {
    return consoleErrorSpy.mock.calls.map((call) => String(call[0]));
  }

  describe("wrapText", () => {
    it("wraps at word boundaries and indents continuation lines", () => {
      expect(wrapText("one two three four", 9, "  ")).toEqual(["one two", "  three", "  four"]);
    });
  });

  describe("text mode", () => {
    it("prints message, details, suggestion and example", () => {
      renderError(inputExhausted("Name?"), "text");

      expect(printed()).toEqual([
        "",
        "✗ Input ended before an answer was given",
        "",
        "  Name?",
        "",
        "  → Pipe an answer for every prompt, or run the command in a terminal",
        "",
        '  Try: echo "my answer" | promptline ask',
        "",
      ]);
    });

    it("prints only the message when there is nothing else", () => {
      renderError(inputInterrupted(), "text");

      expect(printed()).toEqual(["", "✗ Prompt cancelled", ""]);
    });
  });

  describe("json mode", () => {
    it("prints the error as JSON without empty fields", () => {
      renderError(inputInterrupted(), "json");

      expect(JSON.parse(printed()[0] ?? "")).toEqual({
        success: false,
        error: { code: "INPUT_INTERRUPTED", message: "Prompt cancelled" },
      });
    });
  });

  describe("renderUnknownError", () => {
    it("wraps plain errors as UNKNOWN_ERROR", () => {
      renderUnknownError(new Error("boom"), "json");

      expect(JSON.parse(printed()[0] ?? "")).toEqual({
        success: false,
        error: { code: "UNKNOWN_ERROR", message: "boom" },
      });
    });

    it("stringifies non-Error values", () => {
      renderUnknownError("odd failure", "json");

      expect(JSON.parse(printed()[0] ?? "").error.message).toBe("odd failure");
    });
  });
});
