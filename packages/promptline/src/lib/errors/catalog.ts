import { CLIError } from "./types.js";

/**
 * Error catalog - factory functions for creating CLIErrors with helpful context.
 * Each function produces a consistent, user-friendly error message.
 */

// ============================================================================
// Input Errors
// ============================================================================

export function inputExhausted(label: string): CLIError {
  return new CLIError("INPUT_EXHAUSTED", "Input ended before an answer was given", {
    suggestion: "Pipe an answer for every prompt, or run the command in a terminal",
    example: `echo "my answer" | promptline ask`,
    details: label,
  });
}

export function notATerminal(operation: string): CLIError {
  return new CLIError("INPUT_NOT_A_TERMINAL", `${operation} needs an interactive terminal`, {
    suggestion: "Run the command in a terminal, or pass the value through an environment variable",
  });
}

export function inputInterrupted(): CLIError {
  return new CLIError("INPUT_INTERRUPTED", "Prompt cancelled");
}

export function attemptsExceeded(label: string, attempts: number): CLIError {
  return new CLIError(
    "INPUT_ATTEMPTS_EXCEEDED",
    `No valid answer after ${attempts} ${attempts === 1 ? "attempt" : "attempts"}`,
    {
      suggestion: "Raise prompts.maxAttempts in your config, or set it to 0 for no limit",
      details: label,
    }
  );
}

// ============================================================================
// Validation Errors
// ============================================================================

export function invalidOptions(duplicates: string[]): CLIError {
  const quoted = duplicates.map((d) => `"${d}"`).join(", ");
  return new CLIError("VALIDATION_INVALID_OPTIONS", "Selection options must be unique", {
    suggestion: "Remove the repeated entries from the option list",
    details: `Repeated: ${quoted}`,
  });
}

export function configInvalid(path: string, details: string): CLIError {
  return new CLIError("VALIDATION_CONFIG_INVALID", `Config file "${path}" is invalid`, {
    suggestion: "Fix the file, or check it with the command below",
    example: `promptline config validate -c ${path}`,
    details,
  });
}
