import type { OutlineConfig } from "./outline-config.ts";

export type ScriptClass = "character-counted" | "indic" | "word-counted";

export interface ScriptProfile {
  scriptClass: ScriptClass;
  minBodyTextLength: number;
}

export function classifyScript(languageCode: string, config: OutlineConfig): ScriptProfile {
  const code = languageCode.trim().toLowerCase();
  if (config.characterCountedLanguages.includes(code)) {
    return {
      scriptClass: "character-counted",
      minBodyTextLength: config.minBodyTextLength.characterCounted,
    };
  }
  if (config.indicLanguages.includes(code)) {
    return { scriptClass: "indic", minBodyTextLength: config.minBodyTextLength.indic };
  }
  return { scriptClass: "word-counted", minBodyTextLength: config.minBodyTextLength.wordCounted };
}

export function countTokens(text: string, profile: ScriptProfile): number {
  const trimmed = text.trim();
  if (profile.scriptClass === "character-counted") return [...trimmed].length;
  return trimmed.split(/\s+/).filter((part) => part.length > 0).length;
}
