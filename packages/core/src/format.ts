/**
 * Helpers for displaying and inspecting rendered rows
 */

import type { PixelArt } from "./types";

export interface FormatOptions {
  /** Character for on pixels (default: "1") */
  on?: string;
  /** Character for off pixels (default: "0") */
  off?: string;
}

/** Solid block preview for terminals */
export const BLOCK_PREVIEW: Required<FormatOptions> = { on: "█", off: " " };

/**
 * Re-draw rows with custom on/off characters
 */
export function formatRows(rows: PixelArt, options: FormatOptions = {}): string[] {
  const on = options.on ?? "1";
  const off = options.off ?? "0";
  return rows.map((row) => Array.from(row, (bit) => (bit === "1" ? on : off)).join(""));
}

/**
 * Column count of a rendered result; rows must share one length
 */
export function countColumns(rows: PixelArt): number {
  if (rows.length === 0) return 0;
  const width = rows[0].length;
  const ragged = rows.findIndex((row) => row.length !== width);
  if (ragged !== -1) {
    throw new Error(`Row ${ragged} has length ${rows[ragged].length}, expected ${width}`);
  }
  return width;
}

/**
 * Number of on pixels in each column
 */
export function columnInk(rows: PixelArt): number[] {
  const ink = new Array<number>(countColumns(rows)).fill(0);
  for (const row of rows) {
    for (let x = 0; x < row.length; x++) {
      if (row[x] === "1") ink[x]++;
    }
  }
  return ink;
}
