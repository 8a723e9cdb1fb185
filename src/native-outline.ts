import type { NativeOutlineEntry, OutlineCandidate } from "./pdf-types.ts";

/**
 * Shifts bookmark depths so the shallowest becomes level 1. Entries that do
 * not point at a page are discarded first.
 */
export function renumberNativeOutline(
  entries: readonly NativeOutlineEntry[],
  maxLevels: number,
): OutlineCandidate[] {
  const placed = entries.filter((entry) => entry.page > 0);
  if (placed.length === 0) return [];

  const minLevel = Math.min(...placed.map((entry) => entry.level));
  return placed.map((entry) => ({
    level: Math.min(Math.max(entry.level - minLevel + 1, 1), maxLevels),
    text: entry.title.trim(),
    pageIndex: entry.page - 1,
  }));
}
