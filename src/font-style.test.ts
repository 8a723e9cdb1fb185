import { describe, expect, it } from "vitest";
import { deriveFontStyle, matchesAnyStyle, stylesMatch } from "./font-style.ts";
import { DEFAULT_OUTLINE_CONFIG, resolveOutlineConfig } from "./outline-config.ts";
import type { FontRun, FontStyle, TextLine } from "./pdf-types.ts";

function lineWithRun(run: Partial<FontRun>): TextLine {
  const text = run.text ?? "Sample heading";
  return {
    text,
    size: run.size ?? 12,
    bbox: { x0: 0, y0: 100, x1: 200, y1: 112 },
    pageIndex: 0,
    runs: [{ text, size: 12, flags: 0, fontName: "Helvetica", color: 0, ...run }],
  };
}

function style(overrides: Partial<FontStyle>): FontStyle {
  return { roundedSize: 12, bold: false, italic: false, fontName: "helvetica", color: 0, ...overrides };
}

describe("deriveFontStyle", () => {
  it("reads bold and italic from the flag bits", () => {
    expect(deriveFontStyle(lineWithRun({ flags: 16 }), DEFAULT_OUTLINE_CONFIG)).toEqual({
      roundedSize: 12,
      bold: true,
      italic: false,
      fontName: "helvetica",
      color: 0,
    });
    expect(deriveFontStyle(lineWithRun({ flags: 64 }), DEFAULT_OUTLINE_CONFIG).italic).toBe(true);
  });

  it("reads weight and slant markers from the font name", () => {
    const derived = deriveFontStyle(lineWithRun({ fontName: "Garamond-BoldItalic" }), DEFAULT_OUTLINE_CONFIG);
    expect(derived.bold).toBe(true);
    expect(derived.italic).toBe(true);
    expect(derived.fontName).toBe("garamond-bolditalic");
    expect(deriveFontStyle(lineWithRun({ fontName: "Arial-Black" }), DEFAULT_OUTLINE_CONFIG).bold).toBe(true);
  });

  it("rounds the first run's size", () => {
    expect(deriveFontStyle(lineWithRun({ size: 11.6 }), DEFAULT_OUTLINE_CONFIG).roundedSize).toBe(12);
    expect(deriveFontStyle(lineWithRun({ size: 12.5 }), DEFAULT_OUTLINE_CONFIG).roundedSize).toBe(12);
  });

  it("uses an empty zero-size style for a line without runs", () => {
    const line: TextLine = { ...lineWithRun({}), runs: [] };
    expect(deriveFontStyle(line, DEFAULT_OUTLINE_CONFIG)).toEqual(
      style({ roundedSize: 0, fontName: "" }),
    );
  });

  it("uses the configured font-name markers", () => {
    const config = resolveOutlineConfig({ boldFontNameMarkers: ["semibold"] });
    expect(deriveFontStyle(lineWithRun({ fontName: "Inter-SemiBold" }), config).bold).toBe(true);
    expect(deriveFontStyle(lineWithRun({ fontName: "Inter-Bold" }), config).bold).toBe(false);
  });
});

describe("stylesMatch", () => {
  it("tolerates a one point size difference", () => {
    expect(stylesMatch(style({ roundedSize: 12 }), style({ roundedSize: 13 }), 1)).toBe(true);
    expect(stylesMatch(style({ roundedSize: 12 }), style({ roundedSize: 14 }), 1)).toBe(false);
  });

  it("requires identical weight, slant and font name", () => {
    expect(stylesMatch(style({}), style({ bold: true }), 1)).toBe(false);
    expect(stylesMatch(style({}), style({ italic: true }), 1)).toBe(false);
    expect(stylesMatch(style({}), style({ fontName: "times" }), 1)).toBe(false);
  });

  it("ignores colour", () => {
    expect(stylesMatch(style({ color: 0 }), style({ color: 255 }), 1)).toBe(true);
  });

  it("matches against any style in a set", () => {
    const known = [style({ roundedSize: 18 }), style({ roundedSize: 14, bold: true })];
    expect(matchesAnyStyle(style({ roundedSize: 15, bold: true }), known, 1)).toBe(true);
    expect(matchesAnyStyle(style({ roundedSize: 15 }), known, 1)).toBe(false);
  });
});
