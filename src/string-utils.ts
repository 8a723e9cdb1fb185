const LATIN_LETTER_PATTERN = /\p{Script=Latin}/u;
const LETTER_OR_DIGIT_PATTERN = /[\p{L}\p{N}]/u;
const COMBINING_MARK_PATTERN = /\p{M}/gu;

export function normalizeSpacing(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/**
 * Comparison key for substring checks: letters and digits only, with Latin
 * letters lowercased and stripped of diacritics.
 */
export function normalizeForSearch(text: string): string {
  let normalized = "";
  for (const character of text) {
    if (!LETTER_OR_DIGIT_PATTERN.test(character)) continue;
    normalized += LATIN_LETTER_PATTERN.test(character) ? foldLatinLetter(character) : character;
  }
  return normalized;
}

export function isContainedInTitle(normalizedText: string, normalizedTitle: string): boolean {
  return normalizedTitle.length > 0 && normalizedTitle.includes(normalizedText);
}

function foldLatinLetter(character: string): string {
  return character.normalize("NFKD").replace(COMBINING_MARK_PATTERN, "").toLowerCase();
}
