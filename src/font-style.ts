import type { OutlineConfig } from "./outline-config.ts";
import type { FontStyle, TextLine } from "./pdf-types.ts";
import { roundHalfToEven } from "./text-lines.ts";

const EMPTY_STYLE: FontStyle = { roundedSize: 0, bold: false, italic: false, fontName: "", color: 0 };

/** Style of the line's first run; lines without runs get a zero-size style. */
export function deriveFontStyle(line: TextLine, config: OutlineConfig): FontStyle {
  const [firstRun] = line.runs;
  if (!firstRun) return EMPTY_STYLE;

  const fontName = firstRun.fontName.toLowerCase();
  return {
    roundedSize: Math.max(0, roundHalfToEven(firstRun.size)),
    bold:
      (firstRun.flags & config.fontFlags.bold) !== 0 ||
      config.boldFontNameMarkers.some((marker) => fontName.includes(marker)),
    italic:
      (firstRun.flags & config.fontFlags.italic) !== 0 ||
      config.italicFontNameMarkers.some((marker) => fontName.includes(marker)),
    fontName,
    color: firstRun.color,
  };
}

export function stylesMatch(left: FontStyle, right: FontStyle, sizeTolerance: number): boolean {
  return (
    Math.abs(left.roundedSize - right.roundedSize) <= sizeTolerance &&
    left.bold === right.bold &&
    left.italic === right.italic &&
    left.fontName === right.fontName
  );
}

export function matchesAnyStyle(
  style: FontStyle,
  candidates: readonly FontStyle[],
  sizeTolerance: number,
): boolean {
  return candidates.some((candidate) => stylesMatch(style, candidate, sizeTolerance));
}
