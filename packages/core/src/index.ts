/**
 * Pixel banner core: font, renderer and row helpers
 */

export * from "./types";
export * from "./errors";
export * from "./glyph-table";
export * from "./renderer";
export * from "./format";
