import type { LayoutDocument, OutlineCandidate } from "./pdf-types.ts";
import { isContainedInTitle, normalizeForSearch } from "./string-utils.ts";

export function buildNormalizedPageTexts(document: LayoutDocument): Map<number, string> {
  return new Map(document.pages.map((page) => [page.pageIndex, normalizeForSearch(page.text)]));
}

/**
 * Keeps entries whose text appears on the page they point at and that do
 * not repeat the title.
 */
export function validateOutlineEntries<T extends OutlineCandidate>(
  entries: readonly T[],
  normalizedPageTexts: ReadonlyMap<number, string>,
  normalizedTitle: string,
): T[] {
  return entries.filter((entry) => {
    const pageText = normalizedPageTexts.get(entry.pageIndex);
    if (pageText === undefined) return false;
    const normalizedText = normalizeForSearch(entry.text);
    if (!pageText.includes(normalizedText)) return false;
    return !isContainedInTitle(normalizedText, normalizedTitle);
  });
}
