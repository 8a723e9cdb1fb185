import { describe, expect, it, vi } from "vitest";
import { detectDocumentLanguage, identifyLanguageWithFranc } from "./language-detect.ts";
import { DEFAULT_OUTLINE_CONFIG } from "./outline-config.ts";
import type { LayoutDocument } from "./pdf-types.ts";

function documentWithTexts(texts: string[]): LayoutDocument {
  return {
    pages: texts.map((text, pageIndex) => ({ pageIndex, width: 600, height: 800, lines: [], text })),
  };
}

describe("detectDocumentLanguage", () => {
  it("samples the text of the first three pages", () => {
    const identify = vi.fn(() => "fra");

    const code = detectDocumentLanguage(
      documentWithTexts(["alpha ", "beta ", "gamma ", "delta"]),
      DEFAULT_OUTLINE_CONFIG,
      identify,
    );

    expect(code).toBe("fra");
    expect(identify).toHaveBeenCalledWith("alpha beta gamma ");
  });

  it("falls back to the default language for blank documents", () => {
    const identify = vi.fn(() => "fra");

    expect(detectDocumentLanguage(documentWithTexts([" ", "\n"]), DEFAULT_OUTLINE_CONFIG, identify)).toBe("en");
    expect(identify).not.toHaveBeenCalled();
  });

  it("falls back to the default language when identification is undetermined", () => {
    expect(detectDocumentLanguage(documentWithTexts(["zzz"]), DEFAULT_OUTLINE_CONFIG, () => "und")).toBe("en");
  });
});

describe("identifyLanguageWithFranc", () => {
  it("identifies kana text as Japanese", () => {
    expect(identifyLanguageWithFranc("これはにほんごのぶんしょうです。とてもながいぶんしょうをかいています。")).toBe("jpn");
  });
});
