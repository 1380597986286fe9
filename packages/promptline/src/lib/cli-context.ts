/**
 * Global CLI context for shared options and state.
 * Provides consistent behavior across all commands.
 */

import { isLogLevel, type LogLevel } from "./logger.js";
import { MAX_ATTEMPTS_LIMIT, type ResolvedConfig } from "./config.js";
import type { OutputMode } from "./errors/renderer.js";

export interface CLIContext {
  /** Output JSON instead of human-readable text */
  json: boolean;
  /** Treat stdin as non-interactive even on a terminal (CI mode) */
  noInput: boolean;
  /** Rejected answers allowed per prompt, when given */
  maxAttempts?: number;
  /** Log level override, when given */
  logLevel?: LogLevel;
  /** Explicit config file path */
  configPath?: string;
}

const DEFAULT_CONTEXT: CLIContext = {
  json: false,
  noInput: false,
};

let currentContext: CLIContext = { ...DEFAULT_CONTEXT };

/**
 * Value of an option given as `--name value` or `--name=value`.
 */
function flagValue(argv: string[], ...names: string[]): string | undefined {
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;
    if (names.includes(arg)) return argv[i + 1];

    const eq = arg.indexOf("=");
    if (eq !== -1 && names.includes(arg.slice(0, eq))) {
      return arg.slice(eq + 1);
    }
  }
  return undefined;
}

function isTruthyEnv(value: string | undefined): boolean {
  return value === "1" || value === "true";
}

/**
 * Initialize CLI context from command line arguments and environment.
 */
export function initContext(
  argv: string[] = process.argv,
  env: NodeJS.ProcessEnv = process.env
): CLIContext {
  currentContext = { ...DEFAULT_CONTEXT };

  if (argv.includes("--json")) {
    currentContext.json = true;
  }

  if (argv.includes("--no-input")) {
    currentContext.noInput = true;
  }

  const attempts = flagValue(argv, "--max-attempts");
  if (attempts !== undefined) {
    const value = Number(attempts);
    if (Number.isInteger(value) && value >= 0 && value <= MAX_ATTEMPTS_LIMIT) {
      currentContext.maxAttempts = value;
    }
  }

  const level = flagValue(argv, "--log-level");
  if (level !== undefined && isLogLevel(level)) {
    currentContext.logLevel = level;
  }

  const configPath = flagValue(argv, "--config", "-c");
  if (configPath !== undefined) {
    currentContext.configPath = configPath;
  }

  // Environment variable overrides
  if (isTruthyEnv(env.PROMPTLINE_JSON)) {
    currentContext.json = true;
  }

  if (env.CI || isTruthyEnv(env.PROMPTLINE_NO_INPUT)) {
    currentContext.noInput = true;
  }

  const envLevel = env.PROMPTLINE_LOG_LEVEL;
  if (currentContext.logLevel === undefined && envLevel !== undefined && isLogLevel(envLevel)) {
    currentContext.logLevel = envLevel;
  }

  return currentContext;
}

/**
 * Get the current CLI context.
 */
export function getContext(): CLIContext {
  return currentContext;
}

/**
 * Check if we're in JSON output mode.
 */
export function isJsonMode(): boolean {
  return currentContext.json;
}

/**
 * Output mode for results and error reports.
 */
export function outputMode(context: CLIContext = currentContext): OutputMode {
  return context.json ? "json" : "text";
}

/**
 * Flag and environment values as config overrides (highest precedence).
 */
export function contextOverrides(context: CLIContext = currentContext): Partial<ResolvedConfig> {
  const overrides: Partial<ResolvedConfig> = {};
  if (context.noInput) overrides.inputMode = "non-interactive";
  if (context.maxAttempts !== undefined) overrides.maxAttempts = context.maxAttempts;
  if (context.logLevel !== undefined) overrides.logLevel = context.logLevel;
  return overrides;
}

/**
 * Reset context to defaults (for testing).
 */
export function resetContext(): void {
  currentContext = { ...DEFAULT_CONTEXT };
}
