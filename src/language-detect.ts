import { franc } from "franc";
import type { OutlineConfig } from "./outline-config.ts";
import type { LayoutDocument } from "./pdf-types.ts";

export type LanguageIdentifier = (sample: string) => string;

const LANGUAGE_SAMPLE_PAGE_COUNT = 3;
const UNDETERMINED_LANGUAGE = "und";

export const identifyLanguageWithFranc: LanguageIdentifier = (sample) => franc(sample);

export function detectDocumentLanguage(
  document: LayoutDocument,
  config: OutlineConfig,
  identify: LanguageIdentifier = identifyLanguageWithFranc,
): string {
  const sample = document.pages
    .slice(0, LANGUAGE_SAMPLE_PAGE_COUNT)
    .map((page) => page.text)
    .join("");
  if (sample.trim().length === 0) return config.defaultLanguage;

  const code = identify(sample).trim();
  if (code.length === 0 || code === UNDETERMINED_LANGUAGE) return config.defaultLanguage;
  return code;
}
