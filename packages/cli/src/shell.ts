/**
 * Interactive shell: read a line, render it, print rows or a message
 */

import { createInterface } from "readline";
import {
  render,
  renderLossy,
  formatRows,
  BLOCK_PREVIEW,
  glyphTable,
} from "@pixel-banner/core";
import type { PixelArtError } from "@pixel-banner/core";
import type { ShellConfig } from "./config";

export const PROMPT = "Enter your text input: ";

/** Where the shell writes its output */
export interface ShellIO {
  log: (line?: string) => void;
  error: (line: string) => void;
}

export const consoleIO: ShellIO = {
  log: (line = "") => console.log(line),
  error: (line) => console.error(line),
};

/**
 * Prompt for one line of input
 */
export function prompt(
  question: string,
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): Promise<string> {
  const rl = createInterface({ input, output });

  return new Promise((resolve) => {
    let answered = false;
    rl.question(question, (answer) => {
      answered = true;
      rl.close();
      resolve(answer);
    });
    // stdin closed before a full line arrived
    rl.on("close", () => {
      if (!answered) resolve("");
    });
  });
}

/**
 * User-facing message for each error kind
 */
export function describeFailure(error: PixelArtError): string[] {
  switch (error.kind) {
    case "character-not-found":
      return [
        `Error: Character '${error.character}' is not supported by the font.`,
        "Supported characters: A-Z, a-z, and space",
      ];
    case "text-too-long":
      return [
        `Error: Text is too long (${error.length} characters). Maximum length is ${error.maxLength} characters.`,
      ];
    case "empty-text":
      return ["Error: No text entered."];
  }
}

export interface RenderRequest {
  text: string;
  config: ShellConfig;
  preview?: boolean;
}

/**
 * Render text and print the outcome. Returns whether rendering succeeded.
 */
export function renderToShell(
  { text, config, preview = false }: RenderRequest,
  io: ShellIO = consoleIO
): boolean {
  const renderFn = config.lossy ? renderLossy : render;
  const result = renderFn(text, { maxLength: config.maxLength });

  if (!result.success) {
    describeFailure(result.error).forEach((line) => io.error(line));
    return false;
  }

  const rows = preview ? formatRows(result.value, BLOCK_PREVIEW) : result.value;
  io.log();
  io.log("output:");
  rows.forEach((row) => io.log(row));
  return true;
}

/**
 * Print the font's character set
 */
export function listCharacters(io: ShellIO = consoleIO): void {
  const chars = glyphTable.supportedCharacters();
  io.log(`${chars.length} supported characters:`);
  io.log(chars.filter((char) => char !== " ").join(""));
  io.log("(plus space)");
}
