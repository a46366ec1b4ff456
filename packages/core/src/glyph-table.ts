/**
 * Variable-width 5-row bitmap font
 *
 * Glyph data lives in glyphs.json: each entry is 5 strings of '0'/'1',
 * and a glyph's width is the length of its rows. Narrow letters (i, l, j,
 * f, r, t, I) use 1-3 columns, most lowercase 4, most uppercase and m/w 5.
 */

import glyphData from "./glyphs.json";
import { GLYPH_HEIGHT, MAX_GLYPH_WIDTH } from "./types";
import type { Bit, GlyphPattern } from "./types";

const SPACE = " ";

function toBit(char: string): Bit {
  if (char === "0") return 0;
  if (char === "1") return 1;
  throw new Error(`Invalid glyph bit: '${char}'`);
}

/**
 * Build a frozen glyph from bit rows
 */
export function createGlyph(rows: ReadonlyArray<ReadonlyArray<Bit>>): GlyphPattern {
  if (rows.length !== GLYPH_HEIGHT) {
    throw new Error(`Glyph must have exactly ${GLYPH_HEIGHT} rows, got ${rows.length}`);
  }

  const width = rows[0].length;
  if (width < 1 || width > MAX_GLYPH_WIDTH) {
    throw new Error(`Glyph width must be 1-${MAX_GLYPH_WIDTH}, got ${width}`);
  }

  const frozen = rows.map((row, i) => {
    if (row.length !== width) {
      throw new Error(`Glyph row ${i} has width ${row.length}, expected ${width}`);
    }
    for (const bit of row) {
      if (bit !== 0 && bit !== 1) {
        throw new Error(`Glyph row ${i} contains non-bit value ${String(bit)}`);
      }
    }
    return Object.freeze([...row]);
  });

  return Object.freeze({ width, rows: Object.freeze(frozen) });
}

/**
 * Parse a glyph from its '0'/'1' string rows
 */
export function parseGlyph(rows: readonly string[]): GlyphPattern {
  return createGlyph(rows.map((row) => Array.from(row, toBit)));
}

function buildGlyphMap(data: Record<string, readonly string[]>): Map<string, GlyphPattern> {
  const glyphs = new Map<string, GlyphPattern>();
  for (const [char, rows] of Object.entries(data)) {
    glyphs.set(char, parseGlyph(rows));
  }
  if (!glyphs.has(SPACE)) {
    throw new Error("Font is missing the space glyph");
  }
  return glyphs;
}

const GLYPHS = buildGlyphMap(glyphData);

/**
 * Read-only view of the font
 */
export interface GlyphTable {
  lookup(char: string): GlyphPattern | undefined;
  supports(char: string): boolean;
  supportedCharacters(): string[];
  spaceGlyph(): GlyphPattern;
}

function spaceGlyph(): GlyphPattern {
  const glyph = GLYPHS.get(SPACE);
  if (!glyph) {
    throw new Error("Font is missing the space glyph");
  }
  return glyph;
}

export const glyphTable: GlyphTable = Object.freeze({
  lookup: (char: string) => GLYPHS.get(char),
  supports: (char: string) => GLYPHS.has(char),
  // Insertion order from glyphs.json: A-Z, a-z, space
  supportedCharacters: () => [...GLYPHS.keys()],
  spaceGlyph,
});
