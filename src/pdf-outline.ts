import { mkdir, readdir, writeFile } from "node:fs/promises";
import { join, parse, resolve } from "node:path";
import { assertReadableDirectory, assertReadableFile } from "./file-access.ts";
import type { LanguageIdentifier } from "./language-detect.ts";
import { detectDocumentLanguage, identifyLanguageWithFranc } from "./language-detect.ts";
import type { OutlineConfig } from "./outline-config.ts";
import { DEFAULT_OUTLINE_CONFIG } from "./outline-config.ts";
import { inferDocumentOutline } from "./outline-engine.ts";
import { extractLayoutDocument } from "./pdf-extract.ts";
import type { DocumentOutline, LayoutDocument } from "./pdf-types.ts";

export interface ExtractOutlineInput {
  inputPdfPath: string;
  config?: OutlineConfig;
}

export interface ExtractOutlineDependencies {
  assertReadableFile: (filePath: string) => Promise<void>;
  loadDocument: (filePath: string) => Promise<LayoutDocument>;
  identifyLanguage: LanguageIdentifier;
  reportError: (message: string) => void;
}

export interface ProcessPdfDirectoryInput {
  inputDirPath: string;
  outputDirPath: string;
  config?: OutlineConfig;
}

export interface ProcessPdfDirectoryResult {
  outputDirPath: string;
  generatedFiles: string[];
}

export interface ProcessPdfDirectoryDependencies {
  assertReadableDirectory: (dirPath: string) => Promise<void>;
  readInputDir: (dirPath: string) => Promise<string[]>;
  ensureOutputDir: (dirPath: string) => Promise<void>;
  writeOutputFile: (filePath: string, content: string) => Promise<void>;
  extractOutline: (input: ExtractOutlineInput) => Promise<DocumentOutline>;
  reportError: (message: string) => void;
}

export async function extractOutlineFromPdf(
  input: ExtractOutlineInput,
  dependencies?: ExtractOutlineDependencies,
): Promise<DocumentOutline> {
  const resolvedDependencies = dependencies ?? createDefaultExtractDependencies();
  const config = input.config ?? DEFAULT_OUTLINE_CONFIG;
  const resolvedInputPdfPath = resolve(input.inputPdfPath);

  await resolvedDependencies.assertReadableFile(resolvedInputPdfPath);

  let document: LayoutDocument;
  try {
    document = await resolvedDependencies.loadDocument(resolvedInputPdfPath);
  } catch (error: unknown) {
    resolvedDependencies.reportError(
      `${resolvedInputPdfPath}: failed to open PDF: ${describeError(error)}`,
    );
    return emptyOutline();
  }

  const languageCode = detectDocumentLanguage(document, config, resolvedDependencies.identifyLanguage);
  return inferDocumentOutline(document, {
    config,
    languageCode,
    onStageError: (stage, error) => {
      resolvedDependencies.reportError(
        `${resolvedInputPdfPath}: ${stage} detection failed: ${describeError(error)}`,
      );
    },
  });
}

export function collectPdfFileNames(fileNames: string[]): string[] {
  return fileNames
    .filter((fileName) => parse(fileName).ext.toLowerCase() === ".pdf")
    .sort((left, right) => left.localeCompare(right));
}

export function getOutputFileName(pdfFileName: string): string {
  return `${parse(pdfFileName).name}.json`;
}

export function serializeOutline(result: DocumentOutline): string {
  return JSON.stringify({ title: result.title, outline: result.outline }, null, 4);
}

export async function processPdfDirectory(
  input: ProcessPdfDirectoryInput,
  dependencies?: ProcessPdfDirectoryDependencies,
): Promise<ProcessPdfDirectoryResult> {
  const resolvedDependencies = dependencies ?? createDefaultBatchDependencies();
  const resolvedInputDirPath = resolve(input.inputDirPath);
  const resolvedOutputDirPath = resolve(input.outputDirPath);

  await resolvedDependencies.assertReadableDirectory(resolvedInputDirPath);
  await resolvedDependencies.ensureOutputDir(resolvedOutputDirPath);

  const pdfFileNames = collectPdfFileNames(
    await resolvedDependencies.readInputDir(resolvedInputDirPath),
  );
  const generatedFiles: string[] = [];

  for (const pdfFileName of pdfFileNames) {
    const inputPdfPath = join(resolvedInputDirPath, pdfFileName);
    let result: DocumentOutline;
    try {
      result = await resolvedDependencies.extractOutline({ inputPdfPath, config: input.config });
    } catch (error: unknown) {
      resolvedDependencies.reportError(`${inputPdfPath}: ${describeError(error)}`);
      result = emptyOutline();
    }

    const outputPath = join(resolvedOutputDirPath, getOutputFileName(pdfFileName));
    await resolvedDependencies.writeOutputFile(outputPath, serializeOutline(result));
    generatedFiles.push(outputPath);
  }

  return { outputDirPath: resolvedOutputDirPath, generatedFiles };
}

function emptyOutline(): DocumentOutline {
  return { title: "", outline: [] };
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : "Unknown error";
}

function reportToConsole(message: string): void {
  console.error(message);
}

function createDefaultExtractDependencies(): ExtractOutlineDependencies {
  return {
    assertReadableFile,
    loadDocument: extractLayoutDocument,
    identifyLanguage: identifyLanguageWithFranc,
    reportError: reportToConsole,
  };
}

function createDefaultBatchDependencies(): ProcessPdfDirectoryDependencies {
  return {
    assertReadableDirectory,
    readInputDir: (dirPath: string) => readdir(dirPath),
    ensureOutputDir: async (dirPath: string) => {
      await mkdir(dirPath, { recursive: true });
    },
    writeOutputFile: (filePath: string, content: string) => writeFile(filePath, content, "utf8"),
    extractOutline: (input: ExtractOutlineInput) => extractOutlineFromPdf(input),
    reportError: reportToConsole,
  };
}
