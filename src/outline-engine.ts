import { collectHeadingStyles, findHeadingCandidates, generalizeHeadingStyles } from "./heading-detect.ts";
import type { HeadingContext } from "./heading-detect.ts";
import { assignHeadingLevels } from "./heading-levels.ts";
import { mergeWrappedHeadings } from "./heading-merge.ts";
import { repairHierarchy } from "./hierarchy-repair.ts";
import { renumberNativeOutline } from "./native-outline.ts";
import type { OutlineConfig } from "./outline-config.ts";
import { DEFAULT_OUTLINE_CONFIG } from "./outline-config.ts";
import { buildNormalizedPageTexts, validateOutlineEntries } from "./outline-validate.ts";
import type {
  DocumentOutline,
  LayoutDocument,
  OutlineCandidate,
  OutlineEntry,
  PlacedHeading,
} from "./pdf-types.ts";
import { classifyScript } from "./script-class.ts";
import type { ScriptProfile } from "./script-class.ts";
import { normalizeForSearch } from "./string-utils.ts";
import { buildPageHeightIndex, collectDocumentLines, estimateBodyFontSize } from "./text-lines.ts";
import { findDocumentTitle } from "./title-detect.ts";

export type OutlineStage = "title" | "outline";

export interface InferOutlineOptions {
  config?: OutlineConfig;
  languageCode?: string;
  /** Receives faults that were degraded to an empty title or outline. */
  onStageError?: (stage: OutlineStage, error: unknown) => void;
}

export function inferDocumentOutline(
  document: LayoutDocument,
  options: InferOutlineOptions = {},
): DocumentOutline {
  const config = options.config ?? DEFAULT_OUTLINE_CONFIG;
  const profile = classifyScript(options.languageCode ?? config.defaultLanguage, config);
  const recover = <T>(stage: OutlineStage, fallback: T, run: () => T): T => {
    try {
      return run();
    } catch (error: unknown) {
      options.onStageError?.(stage, error);
      return fallback;
    }
  };

  const title = recover("title", "", () => findDocumentTitle(document, config));
  const outline = recover<OutlineEntry[]>("outline", [], () => buildOutline(document, title, profile, config));
  return { title, outline };
}

function buildOutline(
  document: LayoutDocument,
  title: string,
  profile: ScriptProfile,
  config: OutlineConfig,
): OutlineEntry[] {
  const normalizedTitle = normalizeForSearch(title);
  const candidates: OutlineCandidate[] =
    document.nativeOutline && document.nativeOutline.length > 0
      ? renumberNativeOutline(document.nativeOutline, config.maxHeadingLevels)
      : generateHeuristicOutline(document, normalizedTitle, profile, config);

  const validated = validateOutlineEntries(
    candidates,
    buildNormalizedPageTexts(document),
    normalizedTitle,
  );
  return repairHierarchy(validated, config.maxHeadingLevels).map(toOutlineEntry);
}

export function generateHeuristicOutline(
  document: LayoutDocument,
  normalizedTitle: string,
  profile: ScriptProfile,
  config: OutlineConfig,
): PlacedHeading[] {
  const lines = collectDocumentLines(document);
  if (lines.length === 0) return [];

  const bodySize = estimateBodyFontSize(lines, profile.minBodyTextLength);
  if (bodySize === undefined) return [];

  const context: HeadingContext = {
    config,
    profile,
    bodySize,
    normalizedTitle,
    pageHeights: buildPageHeightIndex(document),
  };
  const candidates = findHeadingCandidates(lines, context);
  if (candidates.length === 0) return [];

  const headingStyles = collectHeadingStyles(candidates, config);
  if (headingStyles.length === 0) return [];

  const promoted = generalizeHeadingStyles(lines, candidates, headingStyles, context);
  const leveled = assignHeadingLevels([...candidates, ...promoted], config.maxHeadingLevels);
  return mergeWrappedHeadings(leveled, config);
}

function toOutlineEntry(entry: OutlineCandidate): OutlineEntry {
  return { level: `H${entry.level}`, text: entry.text, page: entry.pageIndex };
}
