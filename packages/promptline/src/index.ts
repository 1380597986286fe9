#!/usr/bin/env node
import { readFileSync } from "fs";
import { z } from "zod";
import { buildProgram } from "./program.js";
import { contextOverrides, initContext, outputMode } from "./lib/cli-context.js";
import { loadConfig } from "./lib/config.js";
import { createLogger } from "./lib/logger.js";
import { createInteractivePrompts } from "./lib/adapters/interactive-prompts.js";
import { renderUnknownError } from "./lib/errors/renderer.js";
import { exitCodeFor } from "./lib/errors/types.js";
import type { PromptService } from "./lib/ports/prompt.js";

const PackageJsonSchema = z.object({ version: z.string() });

function readVersion(): string {
  const raw = readFileSync(new URL("../package.json", import.meta.url), "utf-8");
  return PackageJsonSchema.parse(JSON.parse(raw)).version;
}

export async function main(argv = process.argv): Promise<void> {
  const context = initContext(argv);

  let prompts: PromptService | undefined;
  const getPrompts = (): PromptService => {
    if (!prompts) {
      const { config, sources } = loadConfig(context.configPath, contextOverrides(context));
      const logger = createLogger({ level: config.logLevel, json: config.logJson });
      logger.debug("Configuration loaded", { sources, inputMode: config.inputMode });
      prompts = createInteractivePrompts({
        mode: config.inputMode,
        maxAttempts: config.maxAttempts,
        logger: logger.child({ component: "prompts" }),
      });
    }
    return prompts;
  };

  try {
    const program = buildProgram(getPrompts, readVersion());
    await program.parseAsync(argv);
  } catch (error) {
    renderUnknownError(error, outputMode(context));
    process.exitCode = exitCodeFor(error);
  }
}

void main();
