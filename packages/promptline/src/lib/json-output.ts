/**
 * JSON output utilities for machine-readable CLI output.
 * Provides consistent schemas and output helpers.
 */

import { isJsonMode } from "./cli-context.js";

// ============================================================================
// Base Types
// ============================================================================

export interface JsonSuccess<T> {
  success: true;
  data: T;
}

// ============================================================================
// Command-Specific Schemas
// ============================================================================

export interface InteractiveResultJson {
  interactive: boolean;
}

export interface AnswerResultJson {
  label: string;
  answer: string;
}

export interface ConfirmResultJson {
  label: string;
  confirmed: boolean;
}

export interface SelectionResultJson {
  label: string;
  options: string[];
  selected: string[];
}

// ============================================================================
// Output Functions
// ============================================================================

/**
 * Output a successful JSON result to stdout.
 */
export function outputSuccess<T>(data: T): void {
  const result: JsonSuccess<T> = {
    success: true,
    data,
  };
  console.log(JSON.stringify(result, null, 2));
}

/**
 * Conditionally output JSON or return false for human output.
 * Use this to check if JSON mode is enabled before outputting.
 */
export function maybeOutputJson<T>(data: T): boolean {
  if (isJsonMode()) {
    outputSuccess(data);
    return true;
  }
  return false;
}
