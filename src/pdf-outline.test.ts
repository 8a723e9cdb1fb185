import { join, resolve } from "node:path";
import { describe, expect, it, vi } from "vitest";

import { resolveOutlineConfig } from "./outline-config.ts";
import type { LayoutDocument, LayoutPage, TextLine } from "./pdf-types.ts";
import {
  collectPdfFileNames,
  extractOutlineFromPdf,
  getOutputFileName,
  processPdfDirectory,
  serializeOutline,
} from "./pdf-outline.ts";

type ExtractDependencies = NonNullable<Parameters<typeof extractOutlineFromPdf>[1]>;
type BatchDependencies = NonNullable<Parameters<typeof processPdfDirectory>[1]>;

const BODY_TEXT = "Unpack the kit and check every part against the packing list";

function line(text: string, top: number, size = 10): TextLine {
  return {
    text,
    size,
    bbox: { x0: 50, y0: top, x1: 500, y1: top + size },
    pageIndex: 0,
    runs: [{ text, size, flags: 0, fontName: "Times-Roman", color: 0 }],
  };
}

function guideDocument(): LayoutDocument {
  const lines = [
    line("Field Guide", 40, 20),
    line("Getting Started", 100, 14),
    line(BODY_TEXT, 120),
    line(BODY_TEXT, 134),
    line(BODY_TEXT, 148),
  ];
  return {
    pages: [{ pageIndex: 0, width: 600, height: 800, lines, text: lines.map((entry) => entry.text).join("\n") }],
  };
}

function createExtractDependencies(overrides: Partial<ExtractDependencies> = {}): ExtractDependencies {
  return {
    assertReadableFile: async () => {},
    loadDocument: async () => guideDocument(),
    identifyLanguage: () => "eng",
    reportError: () => {},
    ...overrides,
  };
}

function createBatchDependencies(overrides: Partial<BatchDependencies> = {}): BatchDependencies {
  return {
    assertReadableDirectory: async () => {},
    readInputDir: async () => [],
    ensureOutputDir: async () => {},
    writeOutputFile: async () => {},
    extractOutline: async () => ({ title: "", outline: [] }),
    reportError: () => {},
    ...overrides,
  };
}

describe("collectPdfFileNames", () => {
  it("keeps PDF files regardless of extension case and sorts them", () => {
    expect(
      collectPdfFileNames(["report-b.pdf", "Annex.PDF", "notes.txt", "draft.pdf.bak", "appendix.pdf"]),
    ).toEqual(["Annex.PDF", "appendix.pdf", "report-b.pdf"]);
  });
});

describe("getOutputFileName", () => {
  it("replaces the last extension with .json", () => {
    expect(getOutputFileName("report.final.pdf")).toBe("report.final.json");
  });
});

describe("serializeOutline", () => {
  it("writes title and outline with four-space indentation", () => {
    expect(
      serializeOutline({ title: "Guide", outline: [{ level: "H1", text: "Setup", page: 0 }] }),
    ).toBe(
      [
        "{",
        '    "title": "Guide",',
        '    "outline": [',
        "        {",
        '            "level": "H1",',
        '            "text": "Setup",',
        '            "page": 0',
        "        }",
        "    ]",
        "}",
      ].join("\n"),
    );
  });
});

describe("extractOutlineFromPdf", () => {
  it("loads the document and infers its outline", async () => {
    const identifyLanguage = vi.fn(() => "eng");
    const loadDocument = vi.fn(async () => guideDocument());

    const result = await extractOutlineFromPdf(
      { inputPdfPath: "/tmp/guide.pdf" },
      createExtractDependencies({ identifyLanguage, loadDocument }),
    );

    expect(loadDocument).toHaveBeenCalledWith(resolve("/tmp/guide.pdf"));
    expect(identifyLanguage).toHaveBeenCalledTimes(1);
    expect(result).toEqual({
      title: "Field Guide",
      outline: [{ level: "H1", text: "Getting Started", page: 0 }],
    });
  });

  it("throws when the input PDF is not readable", async () => {
    const dependencies = createExtractDependencies({
      assertReadableFile: async () => {
        throw new Error("Cannot read input PDF: /tmp/missing.pdf");
      },
    });

    await expect(
      extractOutlineFromPdf({ inputPdfPath: "/tmp/missing.pdf" }, dependencies),
    ).rejects.toThrow("Cannot read input PDF: /tmp/missing.pdf");
  });

  it("reports an unopenable PDF and returns an empty result", async () => {
    const reportError = vi.fn();
    const dependencies = createExtractDependencies({
      loadDocument: async () => {
        throw new Error("Invalid PDF structure");
      },
      reportError,
    });

    const result = await extractOutlineFromPdf({ inputPdfPath: "/tmp/broken.pdf" }, dependencies);

    expect(result).toEqual({ title: "", outline: [] });
    expect(reportError).toHaveBeenCalledWith(
      `${resolve("/tmp/broken.pdf")}: failed to open PDF: Invalid PDF structure`,
    );
  });

  it("reports stage failures and keeps going", async () => {
    const brokenPage: LayoutPage = {
      pageIndex: 0,
      width: 600,
      height: 800,
      text: "",
      get lines(): TextLine[] {
        throw new Error("corrupt content stream");
      },
    };
    const reportError = vi.fn();
    const dependencies = createExtractDependencies({
      loadDocument: async () => ({ pages: [brokenPage] }),
      reportError,
    });

    const result = await extractOutlineFromPdf({ inputPdfPath: "/tmp/damaged.pdf" }, dependencies);
    const inputPath = resolve("/tmp/damaged.pdf");

    expect(result).toEqual({ title: "", outline: [] });
    expect(reportError.mock.calls).toEqual([
      [`${inputPath}: title detection failed: corrupt content stream`],
      [`${inputPath}: outline detection failed: corrupt content stream`],
    ]);
  });
});

describe("processPdfDirectory", () => {
  it("writes one JSON file per PDF in sorted order", async () => {
    const writes: Array<[string, string]> = [];
    const dependencies = createBatchDependencies({
      readInputDir: async () => ["beta.pdf", "notes.txt", "alpha.pdf"],
      extractOutline: async ({ inputPdfPath }) => ({
        title: inputPdfPath.endsWith("alpha.pdf") ? "Alpha" : "Beta",
        outline: [],
      }),
      writeOutputFile: async (filePath, content) => {
        writes.push([filePath, content]);
      },
    });

    const result = await processPdfDirectory(
      { inputDirPath: "/tmp/pdfs", outputDirPath: "/tmp/json" },
      dependencies,
    );

    const resolvedOutput = resolve("/tmp/json");
    expect(result).toEqual({
      outputDirPath: resolvedOutput,
      generatedFiles: [join(resolvedOutput, "alpha.json"), join(resolvedOutput, "beta.json")],
    });
    expect(writes).toEqual([
      [join(resolvedOutput, "alpha.json"), serializeOutline({ title: "Alpha", outline: [] })],
      [join(resolvedOutput, "beta.json"), serializeOutline({ title: "Beta", outline: [] })],
    ]);
  });

  it("writes an empty result for a PDF that fails and continues", async () => {
    const reportError = vi.fn();
    const writes: Array<[string, string]> = [];
    const dependencies = createBatchDependencies({
      readInputDir: async () => ["bad.pdf", "good.pdf"],
      extractOutline: async ({ inputPdfPath }) => {
        if (inputPdfPath.endsWith("bad.pdf")) throw new Error("Cannot read input PDF");
        return { title: "Good", outline: [{ level: "H1", text: "Scope", page: 1 }] };
      },
      writeOutputFile: async (filePath, content) => {
        writes.push([filePath, content]);
      },
      reportError,
    });

    await processPdfDirectory({ inputDirPath: "/tmp/pdfs", outputDirPath: "/tmp/json" }, dependencies);

    const resolvedInput = resolve("/tmp/pdfs");
    const resolvedOutput = resolve("/tmp/json");
    expect(reportError).toHaveBeenCalledWith(`${join(resolvedInput, "bad.pdf")}: Cannot read input PDF`);
    expect(writes).toEqual([
      [join(resolvedOutput, "bad.json"), serializeOutline({ title: "", outline: [] })],
      [
        join(resolvedOutput, "good.json"),
        serializeOutline({ title: "Good", outline: [{ level: "H1", text: "Scope", page: 1 }] }),
      ],
    ]);
  });

  it("passes the configuration to every extraction", async () => {
    const extractOutline = vi.fn(async () => ({ title: "", outline: [] }));
    const config = resolveOutlineConfig({ maxHeadingLevels: 3 });
    const dependencies = createBatchDependencies({
      readInputDir: async () => ["only.pdf"],
      extractOutline,
    });

    await processPdfDirectory(
      { inputDirPath: "/tmp/pdfs", outputDirPath: "/tmp/json", config },
      dependencies,
    );

    expect(extractOutline).toHaveBeenCalledWith({
      inputPdfPath: join(resolve("/tmp/pdfs"), "only.pdf"),
      config,
    });
  });

  it("throws when the input directory is not readable", async () => {
    const dependencies = createBatchDependencies({
      assertReadableDirectory: async () => {
        throw new Error("Cannot read input directory: /tmp/missing");
      },
    });

    await expect(
      processPdfDirectory({ inputDirPath: "/tmp/missing", outputDirPath: "/tmp/json" }, dependencies),
    ).rejects.toThrow("Cannot read input directory: /tmp/missing");
  });
});
