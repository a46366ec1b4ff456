/**
 * Core types for the pixel banner font
 */

/** A single pixel: 1 = on, 0 = off */
export type Bit = 0 | 1;

/** Fixed glyph height in pixel rows */
export const GLYPH_HEIGHT = 5;

/** Widest glyph the font allows */
export const MAX_GLYPH_WIDTH = 5;

/** One character's bitmap */
export interface GlyphPattern {
  /** Number of pixel columns (1-5) */
  readonly width: number;
  /** Exactly GLYPH_HEIGHT rows, each `width` bits long */
  readonly rows: ReadonlyArray<ReadonlyArray<Bit>>;
}

/** Rendered output: equal-length rows over '0' and '1' */
export type PixelArt = string[];

/** How lookup treats characters the font lacks */
export type FallbackPolicy = "strict" | "space";

/** Rendering configuration */
export interface RenderOptions {
  /** Maximum number of characters accepted (default: 100) */
  maxLength?: number;
}
