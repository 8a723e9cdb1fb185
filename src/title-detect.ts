import type { OutlineConfig, TitlePassConfig } from "./outline-config.ts";
import type { LayoutDocument, TextLine } from "./pdf-types.ts";
import { normalizeSpacing } from "./string-utils.ts";

export interface TitleLine {
  text: string;
  size: number;
  top: number;
  bottom: number;
}

/** Title from the first page's typography; empty when nothing qualifies. */
export function findDocumentTitle(document: LayoutDocument, config: OutlineConfig): string {
  const firstPage = document.pages[0];
  if (!firstPage) return "";
  const lines = collectTitleLines(firstPage.lines);
  if (lines.length === 0) return "";

  const strictTitle = findTitleCandidate(lines, config.title.strict, config.titleMaxWords);
  if (strictTitle.length >= config.title.minStrictLength) return strictTitle;

  const flexibleTitle = findTitleCandidate(lines, config.title.flexible, config.titleMaxWords);
  return flexibleTitle.length > strictTitle.length ? flexibleTitle : strictTitle;
}

function collectTitleLines(pageLines: readonly TextLine[]): TitleLine[] {
  const lines: TitleLine[] = [];
  for (const line of pageLines) {
    const text = normalizeSpacing(line.text);
    if (text.length === 0) continue;
    lines.push({
      text,
      size: line.runs[0]?.size ?? line.size,
      top: line.bbox.y0,
      bottom: line.bbox.y1,
    });
  }
  return lines;
}

export function findTitleCandidate(
  lines: readonly TitleLine[],
  pass: TitlePassConfig,
  maxWords: number,
): string {
  const maxSize = Math.max(0, ...lines.map((line) => line.size));
  if (maxSize <= 0) return "";

  const threshold = maxSize * pass.sizeRatio;
  const kept = lines
    .filter((line) => line.size >= threshold)
    .sort((left, right) => left.top - right.top);
  const clusters = clusterStackedLines(kept, pass.lineSpacingFactor);
  const chosen = pass.pickLargestCluster ? pickLargestCluster(clusters) : clusters[0];
  if (!chosen) return "";

  const title = chosen.map((line) => line.text).join(" ").trim();
  const wordCount = title.split(/\s+/).filter((part) => part.length > 0).length;
  if (wordCount > maxWords || title.endsWith("!")) return "";
  return title;
}

function clusterStackedLines(lines: readonly TitleLine[], lineSpacingFactor: number): TitleLine[][] {
  const clusters: TitleLine[][] = [];
  let current: TitleLine[] = [];
  for (const line of lines) {
    const previous = current[current.length - 1];
    if (previous && line.top - previous.bottom < previous.size * lineSpacingFactor) {
      current.push(line);
      continue;
    }
    if (current.length > 0) clusters.push(current);
    current = [line];
  }
  if (current.length > 0) clusters.push(current);
  return clusters;
}

function pickLargestCluster(clusters: readonly TitleLine[][]): TitleLine[] | undefined {
  let best: TitleLine[] | undefined;
  for (const cluster of clusters) {
    if (!best || cluster.length > best.length) {
      best = cluster;
      continue;
    }
    if (cluster.length === best.length && cluster[0].top < best[0].top) best = cluster;
  }
  return best;
}

export const titleDetectInternals = {
  collectTitleLines,
  clusterStackedLines,
  pickLargestCluster,
};
