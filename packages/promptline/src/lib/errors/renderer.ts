import chalk from "chalk";
import { CLIError, isCLIError } from "./types.js";

/**
 * `text` for people, `json` for scripts (`--json` / PROMPTLINE_JSON).
 */
export type OutputMode = "text" | "json";

/**
 * Symbols for error display.
 */
const SYM = {
  error: "✗",
  arrow: "→",
};

/**
 * Get terminal width, with fallback for non-TTY.
 */
function getTerminalWidth(): number {
  return process.stderr.columns || 80;
}

/**
 * Wrap text to fit within a given width, preserving indentation.
 */
export function wrapText(text: string, maxWidth: number, indent: string = ""): string[] {
  const words = text.split(" ");
  const lines: string[] = [];
  let currentLine = "";

  for (const word of words) {
    const testLine = currentLine ? `${currentLine} ${word}` : word;
    if (testLine.length <= maxWidth) {
      currentLine = testLine;
    } else {
      if (currentLine) lines.push(currentLine);
      currentLine = word;
    }
  }
  if (currentLine) lines.push(currentLine);

  return lines.map((line, i) => (i === 0 ? line : indent + line));
}

/**
 * Render an error as human-readable lines.
 */
function renderTextError(error: CLIError): void {
  const termWidth = Math.min(getTerminalWidth(), 80);
  const output: string[] = [""];

  const [first = "", ...rest] = wrapText(error.message, termWidth - 4, "  ");
  output.push(`${chalk.red(SYM.error)} ${chalk.red.bold(first)}`);
  for (const line of rest) {
    output.push(`  ${chalk.red(line)}`);
  }

  if (error.details) {
    output.push("");
    for (const line of wrapText(error.details, termWidth - 4, "  ")) {
      output.push(`  ${chalk.dim(line)}`);
    }
  }

  if (error.suggestion || error.example) {
    output.push("");

    if (error.suggestion) {
      const [head = "", ...tail] = wrapText(error.suggestion, termWidth - 4, "  ");
      output.push(`  ${chalk.yellow(SYM.arrow)} ${head}`);
      for (const line of tail) {
        output.push(`    ${line}`);
      }
    }

    if (error.example) {
      output.push("");
      output.push(`  ${chalk.dim("Try:")} ${chalk.cyan(error.example)}`);
    }
  }

  output.push("");

  for (const line of output) {
    console.error(line);
  }
}

/**
 * Render an error in JSON mode.
 */
function renderJSONError(error: CLIError): void {
  const output = {
    success: false,
    error: {
      code: error.code,
      message: error.message,
      suggestion: error.suggestion,
      example: error.example,
      details: error.details,
    },
  };

  // undefined fields are dropped by JSON.stringify
  console.error(JSON.stringify(output, null, 2));
}

/**
 * Render an error in the given output mode.
 */
export function renderError(error: CLIError, mode: OutputMode): void {
  switch (mode) {
    case "json":
      renderJSONError(error);
      break;
    case "text":
      renderTextError(error);
      break;
  }
}

/**
 * Convert an unknown error to a CLIError and render it.
 */
export function renderUnknownError(error: unknown, mode: OutputMode): void {
  if (isCLIError(error)) {
    renderError(error, mode);
  } else {
    const message = error instanceof Error ? error.message : String(error);
    const cliError = new CLIError("UNKNOWN_ERROR", message, {
      cause: error instanceof Error ? error : undefined,
    });
    renderError(cliError, mode);
  }
}
