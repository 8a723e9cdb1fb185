import type { PlacedHeading, TextLine } from "./pdf-types.ts";
import { lineHeight, roundHalfToEven } from "./text-lines.ts";

/**
 * Ranks the distinct rounded sizes of the accepted headings, largest first.
 * Headings whose size falls outside the top `maxLevels` sizes are dropped.
 */
export function assignHeadingLevels(headings: readonly TextLine[], maxLevels: number): PlacedHeading[] {
  const rankedSizes = [...new Set(headings.map((line) => roundHalfToEven(line.size)))]
    .sort((left, right) => right - left)
    .slice(0, maxLevels);
  const levelBySize = new Map(rankedSizes.map((size, index) => [size, index + 1]));

  const placed: PlacedHeading[] = [];
  for (const line of headings) {
    const level = levelBySize.get(roundHalfToEven(line.size));
    if (level === undefined) continue;
    placed.push({
      level,
      text: line.text,
      pageIndex: line.pageIndex,
      bbox: { ...line.bbox },
      lineHeight: lineHeight(line),
    });
  }
  return placed;
}
