import { z } from "zod";
import { FONT_FLAG_BOLD, FONT_FLAG_ITALIC } from "./pdf-types.ts";

export interface TitlePassConfig {
  /** Lines must reach this fraction of the page's largest line size. */
  sizeRatio: number;
  /** Maximum gap between stacked lines, in multiples of the upper line's size. */
  lineSpacingFactor: number;
  pickLargestCluster: boolean;
}

export interface ContextCheckConfig {
  lookaheadLines: number;
  rejectAfterLines: number;
  /** Lookahead lines shorter than this are skipped. */
  minLineLength: number;
  bodySizeTolerance: number;
  minBodyLineLength: number;
  acceptTokenFactor: number;
  maxSizeIncrease: number;
}

export interface OutlineConfig {
  headingSizeFactor: number;
  pageMargin: number;
  maxHeadingLevels: number;
  headingMaxTokens: number;
  titleMaxWords: number;
  title: {
    strict: TitlePassConfig;
    flexible: TitlePassConfig;
    minStrictLength: number;
  };
  context: ContextCheckConfig;
  boldHeading: {
    sizeBelowBody: number;
    sizeAboveBody: number;
    minTokens: number;
    minLength: number;
  };
  minHeadingLength: number;
  styleSizeTolerance: number;
  merge: {
    minGap: number;
    maxGapLineHeightRatio: number;
  };
  fontFlags: {
    bold: number;
    italic: number;
  };
  boldFontNameMarkers: string[];
  italicFontNameMarkers: string[];
  minBodyTextLength: {
    characterCounted: number;
    indic: number;
    wordCounted: number;
  };
  characterCountedLanguages: string[];
  indicLanguages: string[];
  defaultLanguage: string;
}

export const DEFAULT_OUTLINE_CONFIG: Readonly<OutlineConfig> = Object.freeze({
  headingSizeFactor: 1.05,
  pageMargin: 0,
  maxHeadingLevels: 4,
  headingMaxTokens: 30,
  titleMaxWords: 35,
  title: {
    strict: { sizeRatio: 0.9, lineSpacingFactor: 1.5, pickLargestCluster: false },
    flexible: { sizeRatio: 0.8, lineSpacingFactor: 1.8, pickLargestCluster: true },
    minStrictLength: 15,
  },
  context: {
    lookaheadLines: 8,
    rejectAfterLines: 4,
    minLineLength: 3,
    bodySizeTolerance: 1,
    minBodyLineLength: 20,
    acceptTokenFactor: 1.5,
    maxSizeIncrease: 2,
  },
  boldHeading: {
    sizeBelowBody: 1,
    sizeAboveBody: 2,
    minTokens: 2,
    minLength: 3,
  },
  minHeadingLength: 3,
  styleSizeTolerance: 1,
  merge: {
    minGap: -2,
    maxGapLineHeightRatio: 0.75,
  },
  fontFlags: {
    bold: FONT_FLAG_BOLD,
    italic: FONT_FLAG_ITALIC,
  },
  boldFontNameMarkers: ["bold", "bd", "blk", "black", "heavy"],
  italicFontNameMarkers: ["italic", "oblique", "slant"],
  minBodyTextLength: {
    characterCounted: 5,
    indic: 5,
    wordCounted: 5,
  },
  characterCountedLanguages: ["zh", "ja", "ko", "th", "cmn", "jpn", "kor", "tha"],
  indicLanguages: [
    "hi", "bn", "mr", "gu", "ta", "te", "kn", "ml", "or",
    "hin", "ben", "mar", "guj", "tam", "tel", "kan", "mal", "ory",
  ],
  defaultLanguage: "en",
});

const positive = z.number().positive();
const nonNegative = z.number().nonnegative();
const positiveInt = z.number().int().positive();

const titlePassSchema = z
  .object({
    sizeRatio: positive.max(1),
    lineSpacingFactor: positive,
    pickLargestCluster: z.boolean(),
  })
  .partial();

export const outlineConfigOverridesSchema = z
  .object({
    headingSizeFactor: positive,
    pageMargin: nonNegative.lt(0.5),
    maxHeadingLevels: positiveInt,
    headingMaxTokens: positiveInt,
    titleMaxWords: positiveInt,
    title: z
      .object({
        strict: titlePassSchema,
        flexible: titlePassSchema,
        minStrictLength: nonNegative,
      })
      .partial(),
    context: z
      .object({
        lookaheadLines: positiveInt,
        rejectAfterLines: positiveInt,
        minLineLength: nonNegative,
        bodySizeTolerance: nonNegative,
        minBodyLineLength: nonNegative,
        acceptTokenFactor: positive,
        maxSizeIncrease: nonNegative,
      })
      .partial(),
    boldHeading: z
      .object({
        sizeBelowBody: nonNegative,
        sizeAboveBody: nonNegative,
        minTokens: positiveInt,
        minLength: nonNegative,
      })
      .partial(),
    minHeadingLength: nonNegative,
    styleSizeTolerance: nonNegative,
    merge: z
      .object({
        minGap: z.number(),
        maxGapLineHeightRatio: positive,
      })
      .partial(),
    fontFlags: z
      .object({
        bold: positiveInt,
        italic: positiveInt,
      })
      .partial(),
    boldFontNameMarkers: z.array(z.string().min(1)),
    italicFontNameMarkers: z.array(z.string().min(1)),
    minBodyTextLength: z
      .object({
        characterCounted: nonNegative,
        indic: nonNegative,
        wordCounted: nonNegative,
      })
      .partial(),
    characterCountedLanguages: z.array(z.string().min(1)),
    indicLanguages: z.array(z.string().min(1)),
    defaultLanguage: z.string().min(1),
  })
  .partial()
  .strict();

export type OutlineConfigOverrides = z.infer<typeof outlineConfigOverridesSchema>;

export function resolveOutlineConfig(overrides: OutlineConfigOverrides = {}): OutlineConfig {
  const base = DEFAULT_OUTLINE_CONFIG;
  return {
    headingSizeFactor: overrides.headingSizeFactor ?? base.headingSizeFactor,
    pageMargin: overrides.pageMargin ?? base.pageMargin,
    maxHeadingLevels: overrides.maxHeadingLevels ?? base.maxHeadingLevels,
    headingMaxTokens: overrides.headingMaxTokens ?? base.headingMaxTokens,
    titleMaxWords: overrides.titleMaxWords ?? base.titleMaxWords,
    title: {
      strict: { ...base.title.strict, ...overrides.title?.strict },
      flexible: { ...base.title.flexible, ...overrides.title?.flexible },
      minStrictLength: overrides.title?.minStrictLength ?? base.title.minStrictLength,
    },
    context: { ...base.context, ...overrides.context },
    boldHeading: { ...base.boldHeading, ...overrides.boldHeading },
    minHeadingLength: overrides.minHeadingLength ?? base.minHeadingLength,
    styleSizeTolerance: overrides.styleSizeTolerance ?? base.styleSizeTolerance,
    merge: { ...base.merge, ...overrides.merge },
    fontFlags: { ...base.fontFlags, ...overrides.fontFlags },
    boldFontNameMarkers: [...(overrides.boldFontNameMarkers ?? base.boldFontNameMarkers)],
    italicFontNameMarkers: [...(overrides.italicFontNameMarkers ?? base.italicFontNameMarkers)],
    minBodyTextLength: { ...base.minBodyTextLength, ...overrides.minBodyTextLength },
    characterCountedLanguages: [
      ...(overrides.characterCountedLanguages ?? base.characterCountedLanguages),
    ],
    indicLanguages: [...(overrides.indicLanguages ?? base.indicLanguages)],
    defaultLanguage: overrides.defaultLanguage ?? base.defaultLanguage,
  };
}

export function parseOutlineConfigOverrides(input: unknown): OutlineConfigOverrides {
  const result = outlineConfigOverridesSchema.safeParse(input);
  if (result.success) return result.data;
  const details = result.error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
  throw new Error(`Invalid outline configuration: ${details}`);
}
