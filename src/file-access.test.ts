import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { assertReadableDirectory, assertReadableFile, readJsonFile } from "./file-access.ts";

let workDir: string;

beforeEach(async () => {
  workDir = await mkdtemp(join(tmpdir(), "pdf-outline-"));
});

afterEach(async () => {
  await rm(workDir, { recursive: true, force: true });
});

describe("file access", () => {
  it("rejects missing inputs with their path", async () => {
    const missing = join(workDir, "missing.pdf");

    await expect(assertReadableFile(missing)).rejects.toThrow(`Cannot read input PDF: ${missing}`);
    await expect(assertReadableDirectory(missing)).rejects.toThrow(`Cannot read input directory: ${missing}`);
  });

  it("accepts an existing directory", async () => {
    await expect(assertReadableDirectory(workDir)).resolves.toBeUndefined();
  });

  it("parses JSON files", async () => {
    const configPath = join(workDir, "config.json");
    await writeFile(configPath, '{"maxHeadingLevels": 3}', "utf8");

    await expect(readJsonFile(configPath)).resolves.toEqual({ maxHeadingLevels: 3 });
  });

  it("names the file holding malformed JSON", async () => {
    const configPath = join(workDir, "broken.json");
    await writeFile(configPath, "{ nope", "utf8");

    await expect(readJsonFile(configPath)).rejects.toThrow(`Invalid JSON in ${configPath}:`);
  });
});
