import type { LayoutDocument, TextLine } from "./pdf-types.ts";

export function collectDocumentLines(document: LayoutDocument): TextLine[] {
  const lines: TextLine[] = [];
  for (const page of document.pages) {
    for (const line of page.lines) {
      if (line.text.trim().length > 0) lines.push(line);
    }
  }
  return lines;
}

export function buildPageHeightIndex(document: LayoutDocument): Map<number, number> {
  return new Map(document.pages.map((page) => [page.pageIndex, page.height]));
}

/**
 * Most frequent rounded size among lines longer than `minTextLength`
 * characters, or among all lines when none qualifies. Ties go to the size
 * seen first in reading order.
 */
export function estimateBodyFontSize(
  lines: readonly TextLine[],
  minTextLength: number,
): number | undefined {
  const qualifying = lines.filter((line) => line.text.length > minTextLength);
  const sample = qualifying.length > 0 ? qualifying : lines;

  const frequencies = new Map<number, number>();
  for (const line of sample) {
    const rounded = roundHalfToEven(line.size);
    frequencies.set(rounded, (frequencies.get(rounded) ?? 0) + 1);
  }
  const [mostFrequent] = [...frequencies.entries()].sort((left, right) => right[1] - left[1]);
  return mostFrequent?.[0];
}

/** Rounds to the nearest integer, sending exact halves to the even neighbour. */
export function roundHalfToEven(value: number): number {
  const floor = Math.floor(value);
  if (value - floor !== 0.5) return Math.round(value);
  return floor % 2 === 0 ? floor : floor + 1;
}

/** Whether the line's top edge lies strictly inside the page's vertical margins. */
export function isInsidePageMargins(line: TextLine, pageHeight: number, margin: number): boolean {
  const top = line.bbox.y0;
  return margin * pageHeight < top && top < (1 - margin) * pageHeight;
}

export function lineHeight(line: TextLine): number {
  return line.bbox.y1 - line.bbox.y0;
}
