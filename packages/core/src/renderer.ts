/**
 * Text to pixel art rendering
 *
 * Glyphs are laid out left to right with one blank spacing column between
 * neighbours, then the whole block is wrapped in a one-pixel border of
 * zeros. Output is always GLYPH_HEIGHT + 2 rows tall.
 */

import { glyphTable } from "./glyph-table";
import { characterNotFound, emptyText, textTooLong } from "./errors";
import type { RenderResult } from "./errors";
import { GLYPH_HEIGHT } from "./types";
import type { Bit, FallbackPolicy, GlyphPattern, PixelArt, RenderOptions } from "./types";

export const DEFAULT_MAX_LENGTH = 100;

/** Blank columns/rows around the composed glyphs */
export const BORDER = 1;

/** Blank columns between consecutive glyphs */
export const SPACING = 1;

const DEFAULT_OPTIONS: Required<RenderOptions> = {
  maxLength: DEFAULT_MAX_LENGTH,
};

function resolveOptions(options: RenderOptions): Required<RenderOptions> {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  if (!Number.isInteger(opts.maxLength) || opts.maxLength < 1) {
    throw new RangeError(`maxLength must be a positive integer, got ${opts.maxLength}`);
  }
  return opts;
}

/**
 * Split text into characters by code point
 */
function toChars(text: string): string[] {
  return Array.from(text);
}

function check(
  chars: string[],
  policy: FallbackPolicy,
  maxLength: number
): RenderResult<void> {
  if (chars.length > maxLength) {
    return { success: false, error: textTooLong(chars.length, maxLength) };
  }
  if (chars.length === 0) {
    return { success: false, error: emptyText() };
  }
  if (policy === "strict") {
    const missing = chars.find((char) => !glyphTable.supports(char));
    if (missing !== undefined) {
      return { success: false, error: characterNotFound(missing) };
    }
  }
  return { success: true, value: undefined };
}

/**
 * Find the glyph for a character under a fallback policy.
 * Returns undefined only in strict mode for unsupported characters.
 */
export function lookupGlyph(char: string, policy: FallbackPolicy): GlyphPattern | undefined {
  const glyph = glyphTable.lookup(char);
  if (glyph || policy === "strict") return glyph;
  return glyphTable.spaceGlyph();
}

function resolveGlyphs(chars: string[], policy: FallbackPolicy): GlyphPattern[] {
  return chars.map((char) => {
    const glyph = lookupGlyph(char, policy);
    if (!glyph) {
      throw new Error(`Invariant violated: no glyph for validated character '${char}'`);
    }
    return glyph;
  });
}

function contentWidth(glyphs: GlyphPattern[]): number {
  if (glyphs.length === 0) return 0;
  const glyphWidth = glyphs.reduce((sum, glyph) => sum + glyph.width, 0);
  return glyphWidth + (glyphs.length - 1) * SPACING;
}

function compose(glyphs: GlyphPattern[]): PixelArt {
  const width = contentWidth(glyphs) + 2 * BORDER;
  const height = GLYPH_HEIGHT + 2 * BORDER;
  const bitmap: Bit[][] = Array.from({ length: height }, () => new Array<Bit>(width).fill(0));

  let cursorX = BORDER;
  for (const glyph of glyphs) {
    for (let row = 0; row < GLYPH_HEIGHT; row++) {
      for (let col = 0; col < glyph.width; col++) {
        bitmap[BORDER + row][cursorX + col] = glyph.rows[row][col];
      }
    }
    // The spacing after the last glyph lands in the right border
    cursorX += glyph.width + SPACING;
  }

  return bitmap.map((row) => row.join(""));
}

/**
 * Pixel width of the glyphs and spacing, without the border
 */
export function measureText(text: string, policy: FallbackPolicy = "strict"): number {
  const glyphs = toChars(text).map((char) => lookupGlyph(char, policy));
  const known = glyphs.filter((glyph): glyph is GlyphPattern => glyph !== undefined);
  if (known.length !== glyphs.length) {
    throw new Error("measureText: text contains characters the font does not support");
  }
  return contentWidth(known);
}

/**
 * Check that text can be rendered strictly
 */
export function validate(text: string, options: RenderOptions = {}): RenderResult<void> {
  const { maxLength } = resolveOptions(options);
  return check(toChars(text), "strict", maxLength);
}

function renderWith(
  text: string,
  policy: FallbackPolicy,
  options: RenderOptions
): RenderResult<PixelArt> {
  const { maxLength } = resolveOptions(options);
  const chars = toChars(text);
  const checked = check(chars, policy, maxLength);
  if (!checked.success) return checked;
  return { success: true, value: compose(resolveGlyphs(chars, policy)) };
}

/**
 * Render text, failing on the first unsupported character
 */
export function render(text: string, options: RenderOptions = {}): RenderResult<PixelArt> {
  return renderWith(text, "strict", options);
}

/**
 * Render text, drawing unsupported characters as spaces
 */
export function renderLossy(text: string, options: RenderOptions = {}): RenderResult<PixelArt> {
  return renderWith(text, "space", options);
}
