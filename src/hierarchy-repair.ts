import type { OutlineCandidate } from "./pdf-types.ts";

/**
 * Rewrites levels so that the first entry is level 1 and no entry sits more
 * than one level below its nearest open ancestor.
 */
export function repairHierarchy<T extends OutlineCandidate>(
  entries: readonly T[],
  maxLevels: number,
): T[] {
  const repaired: T[] = [];
  const openLevels: number[] = [];

  for (const entry of entries) {
    if (repaired.length === 0) {
      openLevels.push(1);
      repaired.push({ ...entry, level: 1 });
      continue;
    }
    const level = nextLevel(openLevels, entry.level, maxLevels);
    repaired.push(level === entry.level ? { ...entry } : { ...entry, level });
  }

  return repaired;
}

function nextLevel(openLevels: number[], level: number, maxLevels: number): number {
  const top = openLevels[openLevels.length - 1] ?? 1;
  if (level === top) return level;
  if (level === top + 1) {
    openLevels.push(level);
    return level;
  }
  if (level > top + 1) {
    const clamped = Math.min(top + 1, maxLevels);
    openLevels.push(clamped);
    return clamped;
  }

  while (openLevels.length > 0 && openLevels[openLevels.length - 1] >= level) openLevels.pop();
  if (openLevels.length === 0 || level <= Math.max(...openLevels) + 1) {
    if (!openLevels.includes(level)) openLevels.push(level);
    return level;
  }
  const clamped = Math.min(Math.max(...openLevels) + 1, maxLevels);
  openLevels.push(clamped);
  return clamped;
}
