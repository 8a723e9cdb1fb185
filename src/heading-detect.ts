import { deriveFontStyle, matchesAnyStyle } from "./font-style.ts";
import type { OutlineConfig } from "./outline-config.ts";
import type { FontStyle, TextLine } from "./pdf-types.ts";
import type { ScriptProfile } from "./script-class.ts";
import { countTokens } from "./script-class.ts";
import { isContainedInTitle, normalizeForSearch } from "./string-utils.ts";
import { isInsidePageMargins, roundHalfToEven } from "./text-lines.ts";

export interface HeadingContext {
  config: OutlineConfig;
  profile: ScriptProfile;
  bodySize: number;
  normalizedTitle: string;
  pageHeights: ReadonlyMap<number, number>;
}

const TERMINAL_PUNCTUATION = [".", ",", ";", ":", "!", "?", '"', "'", ")", "]", "}"];
const ELLIPSIS = "...";

const LABEL_ONLY_PATTERNS = [
  /^\d+\.\s*$/u,
  /^[\p{L}\p{N}_]+\.\s*$/u,
  /^[A-Z][a-z]*\s+of\s+[\p{L}\p{N}_]+\s*[.:]?\s*$/u,
];

const BOILERPLATE_PATTERNS = [
  /copyright\s*[©®™]?/i,
  /copyright notice/i,
  /©\s*\d{4}/i,
  /version\s*\d+/i,
  /v\.\s*\d+/i,
  /ver\.\s*\d+/i,
  /edition\s*\d*/i,
  /published\s+(?:by|in)/i,
  /isbn[\s:-]*\d/i,
  /issn[\s:-]*\d/i,
  /doi[\s:-]*\d/i,
  /all\s+rights\s+reserved/i,
  /proprietary\s+(?:and\s+)?confidential/i,
  /patent\s+(?:no\.?|number)/i,
  /trademark\s*[™®]?/i,
  /license\s+(?:agreement|terms)/i,
  /terms\s+of\s+use/i,
  /legal\s+notice/i,
  /disclaimer/i,
  /privacy\s+policy/i,
  /www\.\w+\.\w+/i,
  /https?:\/\//i,
];

export function findHeadingCandidates(lines: readonly TextLine[], context: HeadingContext): TextLine[] {
  const candidates: TextLine[] = [];
  lines.forEach((line, index) => {
    if (!isHeadingShaped(line, context)) return;
    if (isRejectedHeadingText(line.text, context.config)) return;
    if (hasBodyTextContext(lines, index, context)) candidates.push(line);
  });
  return candidates;
}

export function collectHeadingStyles(candidates: readonly TextLine[], config: OutlineConfig): FontStyle[] {
  return candidates
    .map((line) => deriveFontStyle(line, config))
    .filter((style) => style.roundedSize > 0);
}

/**
 * Promotes lines sharing a confirmed heading style that were not accepted on
 * their own, typically because another heading follows them directly.
 */
export function generalizeHeadingStyles(
  lines: readonly TextLine[],
  candidates: readonly TextLine[],
  headingStyles: readonly FontStyle[],
  context: HeadingContext,
): TextLine[] {
  const headingTexts = new Set(candidates.map((line) => line.text));
  const promoted: TextLine[] = [];

  for (const line of lines) {
    if (headingTexts.has(line.text)) continue;
    const style = deriveFontStyle(line, context.config);
    if (style.roundedSize === 0) continue;
    if (!matchesAnyStyle(style, headingStyles, context.config.styleSizeTolerance)) continue;
    if (!isHeadingShaped(line, context, style)) continue;
    promoted.push(line);
    headingTexts.add(line.text);
  }

  return promoted;
}

export function isHeadingShaped(
  line: TextLine,
  context: HeadingContext,
  style: FontStyle = deriveFontStyle(line, context.config),
): boolean {
  const { config, bodySize } = context;
  const pageHeight = context.pageHeights.get(line.pageIndex) ?? 0;
  if (!isInsidePageMargins(line, pageHeight, config.pageMargin)) return false;
  if (isContainedInTitle(normalizeForSearch(line.text), context.normalizedTitle)) return false;

  const tokenCount = countTokens(line.text, context.profile);
  const isLargerThanBody =
    line.size >= config.headingSizeFactor * bodySize &&
    tokenCount >= 1 &&
    tokenCount <= config.headingMaxTokens;
  if (isLargerThanBody) return true;

  const { boldHeading } = config;
  return (
    style.bold &&
    style.roundedSize >= bodySize - boldHeading.sizeBelowBody &&
    style.roundedSize <= bodySize + boldHeading.sizeAboveBody &&
    tokenCount >= boldHeading.minTokens &&
    tokenCount <= config.headingMaxTokens &&
    line.text.length >= boldHeading.minLength
  );
}

export function isRejectedHeadingText(text: string, config: OutlineConfig): boolean {
  const trimmed = text.trim();
  if (trimmed.length < config.minHeadingLength) return true;
  if (endsWithTerminalPunctuation(trimmed)) return true;
  if (LABEL_ONLY_PATTERNS.some((pattern) => pattern.test(trimmed))) return true;
  return BOILERPLATE_PATTERNS.some((pattern) => pattern.test(trimmed));
}

function endsWithTerminalPunctuation(text: string): boolean {
  if (text.endsWith(ELLIPSIS)) return false;
  return TERMINAL_PUNCTUATION.some((mark) => text.endsWith(mark));
}

/**
 * Looks ahead on the same page for ordinary paragraph lines. Stops at a page
 * break or at a line clearly larger than the candidate.
 */
export function hasBodyTextContext(
  lines: readonly TextLine[],
  index: number,
  context: HeadingContext,
): boolean {
  const line = lines[index];
  const { profile, bodySize } = context;
  const settings = context.config.context;
  const minBodyTokens = profile.minBodyTextLength;
  let confirmingLines = 0;

  for (let offset = 1; offset <= settings.lookaheadLines; offset += 1) {
    const next = lines[index + offset];
    if (!next || next.pageIndex !== line.pageIndex) break;

    const nextText = next.text.trim();
    if (nextText.length < settings.minLineLength) continue;

    const nextSize = roundHalfToEven(next.size);
    if (nextSize > line.size + settings.maxSizeIncrease) break;

    const nextTokens = countTokens(nextText, profile);
    const isBodyLine =
      Math.abs(nextSize - bodySize) <= settings.bodySizeTolerance &&
      nextTokens >= minBodyTokens &&
      nextText.length >= settings.minBodyLineLength;
    if (isBodyLine) {
      confirmingLines += 1;
      if (nextTokens >= minBodyTokens * settings.acceptTokenFactor) return true;
    }

    if (offset > settings.rejectAfterLines && confirmingLines === 0) break;
  }

  return false;
}
