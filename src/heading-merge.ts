import type { OutlineConfig } from "./outline-config.ts";
import type { PlacedHeading } from "./pdf-types.ts";

/** Joins a heading wrapped over several lines into one entry. */
export function mergeWrappedHeadings(
  headings: readonly PlacedHeading[],
  config: OutlineConfig,
): PlacedHeading[] {
  const sorted = [...headings].sort(
    (left, right) => left.pageIndex - right.pageIndex || left.bbox.y0 - right.bbox.y0,
  );
  const merged: PlacedHeading[] = [];

  for (const heading of sorted) {
    const previous = merged[merged.length - 1];
    if (previous && continuesHeading(previous, heading, config)) {
      merged[merged.length - 1] = {
        ...previous,
        text: `${previous.text.trimEnd()} ${heading.text}`,
        bbox: {
          x0: Math.min(previous.bbox.x0, heading.bbox.x0),
          y0: previous.bbox.y0,
          x1: Math.max(previous.bbox.x1, heading.bbox.x1),
          y1: Math.max(previous.bbox.y1, heading.bbox.y1),
        },
        lineHeight: heading.lineHeight,
      };
      continue;
    }
    merged.push({ ...heading, bbox: { ...heading.bbox } });
  }

  return merged;
}

function continuesHeading(
  previous: PlacedHeading,
  current: PlacedHeading,
  config: OutlineConfig,
): boolean {
  if (current.pageIndex !== previous.pageIndex || current.level !== previous.level) return false;
  const gap = current.bbox.y0 - previous.bbox.y1;
  return gap >= config.merge.minGap && gap < previous.lineHeight * config.merge.maxGapLineHeightRatio;
}
