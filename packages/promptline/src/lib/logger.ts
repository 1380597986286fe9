/**
 * Diagnostic logging for prompts and commands.
 *
 * Log lines never go to stdout: that stream carries command results, and a
 * prompt's answer piped into another program must arrive without noise.
 */

export const LOG_LEVEL_NAMES = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVEL_NAMES)[number];

export type LogMeta = Record<string, unknown>;

export interface LoggerOptions {
  level: LogLevel;
  /** One JSON object per line instead of the human format */
  json: boolean;
  /** Line sink; console.error (stderr) when omitted */
  write?: (line: string) => void;
  /** Clock for timestamps */
  now?: () => Date;
}

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  child(defaultMeta: LogMeta): Logger;
}

function severity(level: LogLevel): number {
  return LOG_LEVEL_NAMES.indexOf(level);
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVEL_NAMES.some((level) => level === value);
}

/**
 * `[timestamp] LEVEL message {meta}`, or the same fields as one JSON object.
 */
export function formatLogLine(
  level: LogLevel,
  message: string,
  meta: LogMeta,
  timestamp: string,
  json: boolean
): string {
  if (json) {
    return JSON.stringify({ timestamp, level, message, ...meta });
  }

  const suffix = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
  return `[${timestamp}] ${level.toUpperCase().padEnd(5)} ${message}${suffix}`;
}

export function createLogger(options: LoggerOptions): Logger {
  const threshold = severity(options.level);
  const write = options.write ?? ((line: string) => console.error(line));
  const now = options.now ?? (() => new Date());

  const withMeta = (defaultMeta: LogMeta): Logger => {
    const emit = (level: LogLevel) => (message: string, meta: LogMeta = {}) => {
      if (severity(level) < threshold) return;
      const timestamp = now().toISOString();
      write(formatLogLine(level, message, { ...defaultMeta, ...meta }, timestamp, options.json));
    };

    return {
      debug: emit("debug"),
      info: emit("info"),
      warn: emit("warn"),
      error: emit("error"),
      child: (childMeta) => withMeta({ ...defaultMeta, ...childMeta }),
    };
  };

  return withMeta({});
}

/**
 * Logger that drops everything; the default when none is injected.
 */
export function createNoopLogger(): Logger {
  const noop = (): void => {};
  const logger: Logger = {
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
    child: () => logger,
  };
  return logger;
}
