import { describe, it, expect } from "vitest";
import {
  render,
  renderLossy,
  validate,
  measureText,
  lookupGlyph,
  DEFAULT_MAX_LENGTH,
} from "./renderer";
import { glyphTable } from "./glyph-table";
import { countColumns } from "./format";

function rowsOf(result: ReturnType<typeof render>): string[] {
  if (!result.success) {
    throw new Error(`expected success, got ${result.error.kind}`);
  }
  return result.value;
}

describe("render", () => {
  it("composes narrow glyphs with single-pixel spacing", () => {
    expect(rowsOf(render("ill"))).toEqual([
      "0000000",
      "0101010",
      "0001010",
      "0101010",
      "0101010",
      "0101010",
      "0000000",
    ]);
  });

  it("wraps a single glyph in a border", () => {
    expect(rowsOf(render("A"))).toEqual([
      "0000000",
      "0011100",
      "0100010",
      "0111110",
      "0100010",
      "0100010",
      "0000000",
    ]);
  });

  it("places glyphs of different widths side by side", () => {
    expect(rowsOf(render("Hi"))).toEqual([
      "000000000",
      "010001010",
      "010001000",
      "011111010",
      "010001010",
      "010001010",
      "000000000",
    ]);
  });

  it("produces 7 equal rows sized by the width formula", () => {
    // H5 e4 l1 l1 o4 _3 W5 o4 r3 l1 d4 = 35, plus 10 spacing, plus 2 border
    const rows = rowsOf(render("Hello World"));
    expect(rows).toHaveLength(7);
    for (const row of rows) {
      expect(row).toHaveLength(47);
    }
  });

  it("sizes every single supported character as width + 2", () => {
    for (const char of glyphTable.supportedCharacters()) {
      const width = glyphTable.lookup(char)?.width ?? 0;
      const rows = rowsOf(render(char));
      expect(rows).toHaveLength(7);
      expect(countColumns(rows)).toBe(width + 2);
    }
  });

  it("only emits 0 and 1", () => {
    const rows = rowsOf(render("The quick brown fox"));
    expect(rows.every((row) => /^[01]+$/.test(row))).toBe(true);
  });

  it("is deterministic", () => {
    expect(render("Pixel Art")).toEqual(render("Pixel Art"));
  });

  it("returns a fresh result each call", () => {
    const first = rowsOf(render("ab"));
    first[0] = "mutated";
    expect(rowsOf(render("ab"))[0]).toBe("00000000000");
  });

  it("fails on the first unsupported character", () => {
    expect(render("Hi!?")).toEqual({
      success: false,
      error: { kind: "character-not-found", character: "!" },
    });
  });

  it("fails on empty text", () => {
    expect(render("")).toEqual({ success: false, error: { kind: "empty-text" } });
  });

  it("reports length before unsupported characters", () => {
    expect(render("!".repeat(101))).toEqual({
      success: false,
      error: { kind: "text-too-long", length: 101, maxLength: 100 },
    });
  });

  it("matches the round-trip column count", () => {
    const text = "Jumping Wizards";
    expect(countColumns(rowsOf(render(text)))).toBe(measureText(text) + 2);
  });
});

describe("renderLossy", () => {
  it("draws unsupported characters as space", () => {
    const rows = rowsOf(renderLossy("Hi!"));
    // H5 + 1 + i1 + 1 + space3 + 2 border
    expect(rows).toHaveLength(7);
    expect(rows[1]).toBe("0100010100000");
    expect(rows[3]).toBe("0111110100000");
    for (const row of rows) {
      expect(row.slice(9, 12)).toBe("000");
    }
  });

  it("renders like render when every character is supported", () => {
    expect(renderLossy("ill")).toEqual(render("ill"));
  });

  it("still enforces the length limit", () => {
    expect(renderLossy("!".repeat(101))).toEqual({
      success: false,
      error: { kind: "text-too-long", length: 101, maxLength: 100 },
    });
  });

  it("still rejects empty text", () => {
    expect(renderLossy("")).toEqual({ success: false, error: { kind: "empty-text" } });
  });
});

describe("validate", () => {
  it("accepts supported text", () => {
    expect(validate("Hello World")).toEqual({ success: true, value: undefined });
  });

  it("reports the unsupported character", () => {
    expect(validate("Hello!")).toEqual({
      success: false,
      error: { kind: "character-not-found", character: "!" },
    });
  });

  it("reports only the first offender", () => {
    expect(validate("café 2")).toEqual({
      success: false,
      error: { kind: "character-not-found", character: "é" },
    });
  });

  it("accepts text at the maximum length", () => {
    expect(validate("a".repeat(DEFAULT_MAX_LENGTH)).success).toBe(true);
  });

  it("rejects text one past the maximum length", () => {
    expect(validate("a".repeat(DEFAULT_MAX_LENGTH + 1))).toEqual({
      success: false,
      error: { kind: "text-too-long", length: 101, maxLength: 100 },
    });
  });

  it("honours a custom maximum length", () => {
    expect(validate("abc", { maxLength: 3 }).success).toBe(true);
    expect(validate("abcd", { maxLength: 3 })).toEqual({
      success: false,
      error: { kind: "text-too-long", length: 4, maxLength: 3 },
    });
  });

  it("counts code points, not UTF-16 units", () => {
    const emoji = "\u{1F600}";
    expect(validate(emoji.repeat(100))).toEqual({
      success: false,
      error: { kind: "character-not-found", character: emoji },
    });
  });

  it("rejects empty text like render does", () => {
    expect(validate("")).toEqual({ success: false, error: { kind: "empty-text" } });
  });

  it("throws on an invalid maximum length", () => {
    expect(() => validate("a", { maxLength: 0 })).toThrow(RangeError);
    expect(() => render("a", { maxLength: 2.5 })).toThrow(RangeError);
  });
});

describe("measureText", () => {
  it("returns 0 for empty text", () => {
    expect(measureText("")).toBe(0);
  });

  it("adds one spacing column between glyphs", () => {
    expect(measureText("ill")).toBe(5);
    expect(measureText("Hello World")).toBe(45);
  });

  it("measures unsupported characters as space in lossy mode", () => {
    expect(measureText("!", "space")).toBe(3);
  });

  it("throws on unsupported characters in strict mode", () => {
    expect(() => measureText("!")).toThrow(
      "measureText: text contains characters the font does not support"
    );
  });
});

describe("lookupGlyph", () => {
  it("returns nothing for unsupported characters in strict mode", () => {
    expect(lookupGlyph("#", "strict")).toBeUndefined();
  });

  it("falls back to the space glyph in space mode", () => {
    expect(lookupGlyph("#", "space")).toBe(glyphTable.spaceGlyph());
  });

  it("prefers the real glyph when one exists", () => {
    expect(lookupGlyph("Q", "space")).toBe(glyphTable.lookup("Q"));
  });
});
