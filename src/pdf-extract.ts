import { readFile } from "node:fs/promises";
import { getDocument } from "pdfjs-dist/legacy/build/pdf.mjs";
import type {
  FontRun,
  LayoutDocument,
  LayoutPage,
  NativeOutlineEntry,
  TextLine,
} from "./pdf-types.ts";
import {
  FONT_FLAG_BOLD,
  FONT_FLAG_ITALIC,
  GLYPH_ASCENT_RATIO,
  GLYPH_DESCENT_RATIO,
  LINE_Y_BUCKET_SIZE,
  MAX_REASONABLE_Y_MULTIPLIER,
} from "./pdf-types.ts";
import { normalizeSpacing } from "./string-utils.ts";

type PdfDocument = Awaited<ReturnType<typeof getDocument>["promise"]>;
type PdfPage = Awaited<ReturnType<PdfDocument["getPage"]>>;

interface PdfTextItem {
  str: string;
  transform: number[];
  width: number;
  fontName: string;
  hasEOL?: boolean;
}

interface PositionedRun extends FontRun {
  x: number;
  /** Baseline, measured upward from the bottom of the page. */
  y: number;
  width: number;
}

interface ResolvedFont {
  name: string;
  flags: number;
}

interface FontObjectStore {
  has(id: string): boolean;
  get(id: string): unknown;
}

interface PdfOutlineNode {
  title: string;
  dest: unknown;
  items: PdfOutlineNode[];
}

type DestinationResolver = (dest: unknown) => Promise<number>;

interface PageReference {
  num: number;
  gen: number;
}

/** The part of a pdfjs document that bookmark resolution needs. */
interface OutlineSource {
  getOutline(): Promise<unknown>;
  getDestination(id: string): Promise<unknown>;
  getPageIndex(ref: PageReference): Promise<number>;
}

const FONT_SUBSET_PREFIX_PATTERN = /^[A-Z]{6}\+/;
const WORD_GAP_RATIO = 0.15;

export async function extractLayoutDocument(inputPdfPath: string): Promise<LayoutDocument> {
  const data = new Uint8Array(await readFile(inputPdfPath));
  return extractLayoutDocumentFromBuffer(data);
}

export async function extractLayoutDocumentFromBuffer(data: Uint8Array): Promise<LayoutDocument> {
  const pdf = await getDocument({ data, useSystemFonts: true }).promise;
  const pages: LayoutPage[] = [];

  try {
    for (let i = 0; i < pdf.numPages; i++) {
      const page = await pdf.getPage(i + 1);
      pages.push(await extractPage(page, i));
    }
    const nativeOutline = await readNativeOutline(pdf);
    return nativeOutline.length > 0 ? { pages, nativeOutline } : { pages };
  } finally {
    await pdf.destroy();
  }
}

async function extractPage(page: PdfPage, pageIndex: number): Promise<LayoutPage> {
  const viewport = page.getViewport({ scale: 1 });
  const textContent = await page.getTextContent();
  const items: PdfTextItem[] = [];
  for (const item of textContent.items) {
    if (isPdfTextItem(item)) items.push(item);
  }

  // Font objects (with their real names and weights) only load with the operator list.
  await page.getOperatorList();
  const fonts = resolvePageFonts(
    page.commonObjs,
    new Set(items.map((item) => item.fontName)),
  );

  return {
    pageIndex,
    width: viewport.width,
    height: viewport.height,
    lines: groupRunsIntoLines(collectPageRuns(items, fonts), pageIndex, viewport.height),
    text: items.map((item) => item.str + (item.hasEOL ? "\n" : "")).join(""),
  };
}

function isPdfTextItem(item: unknown): item is PdfTextItem {
  return (
    typeof item === "object" &&
    item !== null &&
    "str" in item &&
    typeof item.str === "string" &&
    "transform" in item &&
    Array.isArray(item.transform) &&
    "width" in item &&
    typeof item.width === "number" &&
    "fontName" in item &&
    typeof item.fontName === "string"
  );
}

function resolvePageFonts(store: FontObjectStore, fontIds: Set<string>): Map<string, ResolvedFont> {
  const fonts = new Map<string, ResolvedFont>();
  for (const id of fontIds) {
    const font = store.has(id) ? store.get(id) : undefined;
    fonts.set(id, toResolvedFont(id, font));
  }
  return fonts;
}

function toResolvedFont(id: string, font: unknown): ResolvedFont {
  if (typeof font !== "object" || font === null) return { name: id, flags: 0 };
  const name = "name" in font && typeof font.name === "string" ? font.name : id;
  const bold = ("bold" in font && font.bold === true) || ("black" in font && font.black === true);
  const italic = "italic" in font && font.italic === true;
  return {
    name: name.replace(FONT_SUBSET_PREFIX_PATTERN, ""),
    flags: (bold ? FONT_FLAG_BOLD : 0) | (italic ? FONT_FLAG_ITALIC : 0),
  };
}

function collectPageRuns(
  items: readonly PdfTextItem[],
  fonts: ReadonlyMap<string, ResolvedFont>,
): PositionedRun[] {
  const runs: PositionedRun[] = [];
  for (const item of items) {
    if (item.str.trim().length === 0) continue;
    const font = fonts.get(item.fontName) ?? { name: item.fontName, flags: 0 };
    runs.push({
      text: item.str,
      size: Math.hypot(item.transform[2], item.transform[3]),
      flags: font.flags,
      fontName: font.name,
      color: 0,
      x: item.transform[4],
      y: item.transform[5],
      width: item.width,
    });
  }
  return runs;
}

/** Groups runs sharing a baseline bucket into top-to-bottom, left-to-right lines. */
function groupRunsIntoLines(
  runs: readonly PositionedRun[],
  pageIndex: number,
  pageHeight: number,
): TextLine[] {
  const buckets = new Map<number, PositionedRun[]>();
  for (const run of runs) {
    if (run.y > pageHeight * MAX_REASONABLE_Y_MULTIPLIER) continue;
    const bucket = Math.round(run.y / LINE_Y_BUCKET_SIZE) * LINE_Y_BUCKET_SIZE;
    const existing = buckets.get(bucket);
    if (existing) {
      existing.push(run);
    } else {
      buckets.set(bucket, [run]);
    }
  }

  const lines: TextLine[] = [];
  for (const [baseline, bucketRuns] of buckets) {
    const sorted = [...bucketRuns].sort((left, right) => left.x - right.x);
    const line = toTextLine(sorted, baseline, pageIndex, pageHeight);
    if (line) lines.push(line);
  }
  return lines.sort((left, right) => left.bbox.y0 - right.bbox.y0 || left.bbox.x0 - right.bbox.x0);
}

function toTextLine(
  runs: readonly PositionedRun[],
  baseline: number,
  pageIndex: number,
  pageHeight: number,
): TextLine | undefined {
  const text = joinRunTexts(runs);
  if (text.length === 0) return undefined;

  const maxSize = Math.max(...runs.map((run) => run.size));
  const fromTop = pageHeight - baseline;
  return {
    text,
    size: weightedAverageSize(runs),
    bbox: {
      x0: Math.min(...runs.map((run) => run.x)),
      y0: fromTop - maxSize * GLYPH_ASCENT_RATIO,
      x1: Math.max(...runs.map((run) => run.x + run.width)),
      y1: fromTop + maxSize * GLYPH_DESCENT_RATIO,
    },
    pageIndex,
    runs: runs.map(({ text: runText, size, flags, fontName, color }) => ({
      text: runText,
      size,
      flags,
      fontName,
      color,
    })),
  };
}

function joinRunTexts(runs: readonly PositionedRun[]): string {
  let joined = "";
  let previous: PositionedRun | undefined;
  for (const run of runs) {
    if (previous && needsWordGap(previous, run, joined)) joined += " ";
    joined += run.text;
    previous = run;
  }
  return normalizeSpacing(joined);
}

function needsWordGap(previous: PositionedRun, next: PositionedRun, joined: string): boolean {
  if (/\s$/.test(joined) || /^\s/.test(next.text)) return false;
  const gap = next.x - (previous.x + previous.width);
  return gap > Math.max(previous.size, next.size) * WORD_GAP_RATIO;
}

function weightedAverageSize(runs: readonly FontRun[]): number {
  const totalLength = runs.reduce((sum, run) => sum + run.text.length, 0);
  if (totalLength === 0) return 0;
  return runs.reduce((sum, run) => sum + run.size * run.text.length, 0) / totalLength;
}

function isOutlineNodeList(value: unknown): value is PdfOutlineNode[] {
  return Array.isArray(value) && value.every(isOutlineNode);
}

function isOutlineNode(value: unknown): value is PdfOutlineNode {
  return (
    typeof value === "object" &&
    value !== null &&
    "title" in value &&
    typeof value.title === "string" &&
    "dest" in value &&
    "items" in value &&
    isOutlineNodeList(value.items)
  );
}

/** An unreadable outline tree counts as no outline. */
async function readNativeOutline(source: OutlineSource): Promise<NativeOutlineEntry[]> {
  let outline: unknown;
  try {
    outline = await source.getOutline();
  } catch {
    return [];
  }
  return flattenOutline(
    isOutlineNodeList(outline) ? outline : [],
    (dest) => resolveDestinationPage(source, dest),
  );
}

/**
 * Depth-first walk; depth 1 is the outermost bookmark level. A destination
 * that fails to resolve maps to page 0.
 */
async function flattenOutline(
  nodes: readonly PdfOutlineNode[],
  resolvePage: DestinationResolver,
  depth = 1,
): Promise<NativeOutlineEntry[]> {
  const entries: NativeOutlineEntry[] = [];
  for (const node of nodes) {
    const page = await resolvePageOrZero(resolvePage, node.dest);
    entries.push({ level: depth, title: node.title, page });
    entries.push(...(await flattenOutline(node.items, resolvePage, depth + 1)));
  }
  return entries;
}

async function resolvePageOrZero(resolvePage: DestinationResolver, dest: unknown): Promise<number> {
  try {
    return await resolvePage(dest);
  } catch {
    return 0;
  }
}

async function resolveDestinationPage(source: OutlineSource, dest: unknown): Promise<number> {
  const explicit: unknown = typeof dest === "string" ? await source.getDestination(dest) : dest;
  if (!Array.isArray(explicit) || explicit.length === 0) return 0;
  const target: unknown = explicit[0];
  if (typeof target === "number" && Number.isInteger(target)) return target + 1;
  if (!isPageReference(target)) return 0;
  return (await source.getPageIndex(target)) + 1;
}

function isPageReference(value: unknown): value is PageReference {
  return (
    typeof value === "object" &&
    value !== null &&
    "num" in value &&
    typeof value.num === "number" &&
    "gen" in value &&
    typeof value.gen === "number"
  );
}

export const pdfExtractInternals = {
  isPdfTextItem,
  toResolvedFont,
  resolvePageFonts,
  collectPageRuns,
  groupRunsIntoLines,
  joinRunTexts,
  weightedAverageSize,
  isOutlineNodeList,
  flattenOutline,
  readNativeOutline,
};
