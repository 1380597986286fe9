/**
 * Error codes for all prompt and CLI failures.
 * Each code maps to a specific error scenario with predefined messaging.
 */
export type ErrorCode =
  // Input errors
  | "INPUT_EXHAUSTED"
  | "INPUT_NOT_A_TERMINAL"
  | "INPUT_INTERRUPTED"
  | "INPUT_ATTEMPTS_EXCEEDED"
  // Validation errors
  | "VALIDATION_INVALID_OPTIONS"
  | "VALIDATION_CONFIG_INVALID"
  // Generic
  | "UNKNOWN_ERROR";

/** Exit status used for interrupts, matching a shell's SIGINT convention. */
export const INTERRUPTED_EXIT_CODE = 130;

/**
 * Extended Error class for prompt failures with helpful context.
 */
export class CLIError extends Error {
  readonly code: ErrorCode;
  readonly suggestion?: string;
  readonly example?: string;
  readonly details?: string;

  constructor(
    code: ErrorCode,
    message: string,
    options?: {
      suggestion?: string;
      example?: string;
      details?: string;
      cause?: Error;
    }
  ) {
    super(message, { cause: options?.cause });
    this.name = "CLIError";
    this.code = code;
    this.suggestion = options?.suggestion;
    this.example = options?.example;
    this.details = options?.details;
  }
}

/**
 * Type guard to check if an error is a CLIError.
 */
export function isCLIError(error: unknown): error is CLIError {
  return error instanceof CLIError;
}

/**
 * Process exit code for an error raised anywhere below the CLI entry point.
 */
export function exitCodeFor(error: unknown): number {
  if (isCLIError(error) && error.code === "INPUT_INTERRUPTED") {
    return INTERRUPTED_EXIT_CODE;
  }
  return 1;
}
