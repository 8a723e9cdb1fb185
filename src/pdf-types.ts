export interface BoundingBox {
  x0: number;
  /** Top edge, measured downward from the top of the page. */
  y0: number;
  x1: number;
  y1: number;
}

export interface FontRun {
  text: string;
  size: number;
  /** Bit set: 16 = bold, 64 = italic (see `OutlineConfig.fontFlags`). */
  flags: number;
  fontName: string;
  color: number;
}

export interface FontStyle {
  roundedSize: number;
  bold: boolean;
  italic: boolean;
  /** Lowercased. */
  fontName: string;
  color: number;
}

export interface TextLine {
  text: string;
  /** Glyph-length weighted average of the run sizes. */
  size: number;
  bbox: BoundingBox;
  pageIndex: number;
  runs: readonly FontRun[];
}

export interface LayoutPage {
  pageIndex: number;
  width: number;
  height: number;
  lines: TextLine[];
  /** Full rendered text of the page, used to verify outline entries. */
  text: string;
}

export interface NativeOutlineEntry {
  /** Nesting depth as stored in the document, starting at 1. */
  level: number;
  title: string;
  /** 1-based page number; 0 or less when the destination is unresolved. */
  page: number;
}

export interface LayoutDocument {
  pages: LayoutPage[];
  nativeOutline?: NativeOutlineEntry[];
}

export interface OutlineCandidate {
  level: number;
  text: string;
  pageIndex: number;
}

export interface PlacedHeading extends OutlineCandidate {
  /** Union of the heading's lines. */
  bbox: BoundingBox;
  /** Height of the heading's last line. */
  lineHeight: number;
}

export type HeadingLabel = `H${number}`;

export interface OutlineEntry {
  level: HeadingLabel;
  text: string;
  page: number;
}

export interface DocumentOutline {
  title: string;
  outline: OutlineEntry[];
}

export const FONT_FLAG_BOLD = 1 << 4;
export const FONT_FLAG_ITALIC = 1 << 6;
export const LINE_Y_BUCKET_SIZE = 2;
export const MAX_REASONABLE_Y_MULTIPLIER = 2.5;
export const GLYPH_ASCENT_RATIO = 0.8;
export const GLYPH_DESCENT_RATIO = 0.2;
