import type { Writable } from "stream";
import type { PromptService } from "./ports/prompt.js";
import type { ListSelector } from "./ports/selector.js";
import type { TerminalControl } from "./ports/terminal.js";
import type { InputChannel } from "./input/channel.js";
import type { InputSource } from "./input/source.js";
import { readLine } from "./input/line-reader.js";
import { readSecret } from "./input/masked-reader.js";
import {
  attemptsExceeded,
  inputExhausted,
  invalidOptions,
  notATerminal,
} from "./errors/catalog.js";
import type { CLIError } from "./errors/types.js";
import { createNoopLogger, type Logger } from "./logger.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface PrompterDeps {
  channel: InputChannel;
  /** Where labels and hints go; stderr in the CLI */
  status: Writable;
  terminal: TerminalControl;
  source: InputSource;
  selector: ListSelector;
  logger?: Logger;
  /** Rejected answers allowed per prompt; 0 means no limit */
  maxAttempts?: number;
}

/**
 * One answer checked by a prompt: either the value to return, or a retry.
 */
type Verdict<T> = { ok: true; value: T } | { ok: false };

const YES = new Set(["y", "yes"]);
const NO = new Set(["n", "no"]);

// ---------------------------------------------------------------------------
// Answer parsing
// ---------------------------------------------------------------------------

export function confirmHint(defaultValue: boolean): string {
  return defaultValue ? "[Y/n]" : "[y/N]";
}

/**
 * Map a confirm answer to a boolean; undefined for anything unrecognised.
 */
export function parseConfirm(answer: string, defaultValue: boolean): boolean | undefined {
  const normalized = answer.trim().toLowerCase();
  if (normalized === "") return defaultValue;
  if (YES.has(normalized)) return true;
  if (NO.has(normalized)) return false;
  return undefined;
}

/**
 * Entries that appear more than once, each reported once.
 */
export function findDuplicates(options: readonly string[]): string[] {
  const seen = new Set<string>();
  const repeated = new Set<string>();
  for (const option of options) {
    if (seen.has(option)) repeated.add(option);
    seen.add(option);
  }
  return [...repeated];
}

// ---------------------------------------------------------------------------
// Prompter
// ---------------------------------------------------------------------------

/**
 * Line-oriented prompts over an input channel.
 *
 * Text and confirm prompts keep asking until the answer is valid. The loop
 * stops with INPUT_EXHAUSTED as soon as the stream ends, so an empty or
 * closed pipe can never spin.
 */
export class Prompter implements PromptService {
  private readonly logger: Logger;
  private readonly maxAttempts: number;

  constructor(private readonly deps: PrompterDeps) {
    this.logger = deps.logger ?? createNoopLogger();
    this.maxAttempts = deps.maxAttempts ?? 0;
  }

  isInteractive(): boolean {
    return this.deps.source.isInteractive();
  }

  async text(label: string): Promise<string> {
    return this.ask<string>(label, `${label} `, async () => {
      const line = await readLine(this.deps.channel);
      if (line.kind === "end") throw this.exhausted(label);
      return line.text === "" ? { ok: false } : { ok: true, value: line.text };
    });
  }

  async password(label: string): Promise<string> {
    if (!this.isInteractive()) {
      throw notATerminal("Password entry");
    }

    return this.ask<string>(label, `${label} `, async () => {
      const secret = await readSecret(
        this.deps.channel,
        this.deps.terminal,
        this.deps.status,
        label
      );
      return secret === "" ? { ok: false } : { ok: true, value: secret };
    });
  }

  async confirm(label: string, defaultValue: boolean): Promise<boolean> {
    return this.ask<boolean>(label, `${label} ${confirmHint(defaultValue)} `, async () => {
      const line = await readLine(this.deps.channel);
      if (line.kind === "end") throw this.exhausted(label);
      const answer = parseConfirm(line.text, defaultValue);
      return answer === undefined ? { ok: false } : { ok: true, value: answer };
    });
  }

  async multiSelect(label: string, options: readonly string[]): Promise<string[]> {
    const duplicates = findDuplicates(options);
    if (duplicates.length > 0) {
      throw invalidOptions(duplicates);
    }
    if (!this.isInteractive()) {
      throw notATerminal("Multi-select");
    }

    const reported = await this.deps.selector.select({ label, options });
    this.logger.debug("Selection received", { label, count: reported.length });
    const chosen = new Set(reported);
    const ordered = options.filter((option) => chosen.has(option));

    if (ordered.length !== chosen.size) {
      this.logger.debug("Dropped selections not in the option list", {
        label,
        reported: chosen.size,
        kept: ordered.length,
      });
    }
    return ordered;
  }

  private exhausted(label: string): CLIError {
    this.logger.debug("Input ended while waiting for an answer", { label });
    return inputExhausted(label);
  }

  /**
   * Write the prompt, read one answer, repeat until it validates.
   */
  private async ask<T>(
    label: string,
    prompt: string,
    readAnswer: () => Promise<Verdict<T>>
  ): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      this.deps.status.write(prompt);
      const verdict = await readAnswer();
      if (verdict.ok) return verdict.value;

      this.logger.debug("Answer rejected, asking again", { label, attempt });
      if (this.maxAttempts > 0 && attempt >= this.maxAttempts) {
        throw attemptsExceeded(label, attempt);
      }
    }
  }
}
