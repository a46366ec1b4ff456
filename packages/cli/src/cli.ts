#!/usr/bin/env tsx
/**
 * Pixel Banner CLI
 */

import { program, InvalidArgumentError } from "commander";
import { loadEnvFile, parseMaxLength, resolveConfig } from "./config";
import { PROMPT, prompt, renderToShell, listCharacters } from "./shell";

interface CliOptions {
  text?: string;
  lossy?: boolean;
  maxLength?: number;
  preview?: boolean;
}

function maxLengthOption(value: string): number {
  const parsed = parseMaxLength(value);
  if (parsed === null) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return parsed;
}

loadEnvFile();

program
  .name("pixel-banner")
  .description("Render text as 0/1 pixel art using a built-in bitmap font")
  .version("0.1.0")
  .option("--text <text>", "Text to render (prompts when omitted)")
  .option("--lossy", "Draw unsupported characters as blank space")
  .option("--max-length <n>", "Maximum number of characters", maxLengthOption)
  .option("--preview", "Draw pixels as blocks instead of 0/1")
  .action(async (options: CliOptions) => {
    const config = resolveConfig({ maxLength: options.maxLength, lossy: options.lossy });
    const input = options.text ?? (await prompt(PROMPT));

    // Render failures are reported, not fatal
    renderToShell({ text: input.trim(), config, preview: options.preview });
  });

program
  .command("chars")
  .description("List the characters the font supports")
  .action(() => {
    listCharacters();
  });

program.parseAsync().catch((error: unknown) => {
  console.error("pixel-banner error:", error);
  process.exitCode = 1;
});
