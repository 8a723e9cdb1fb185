#!/usr/bin/env node

import { writeFile } from "node:fs/promises";
import { resolve } from "node:path";
import { Command } from "commander";
import { readJsonFile } from "./file-access.ts";
import type { OutlineConfig } from "./outline-config.ts";
import { parseOutlineConfigOverrides, resolveOutlineConfig } from "./outline-config.ts";
import { extractOutlineFromPdf, processPdfDirectory, serializeOutline } from "./pdf-outline.ts";

interface ConfigOption {
  config?: string;
}

const program = new Command();

program
  .name("pdf-outline")
  .description("Infer a title and heading outline (H1-H4) from PDF documents")
  .showHelpAfterError();

program
  .command("outline")
  .description("Extract the title and outline of one PDF as JSON")
  .argument("<pdfPath>", "Path to input PDF file")
  .argument("[outputJsonPath]", "Write the JSON here instead of stdout")
  .option("-c, --config <path>", "JSON file overriding heuristic thresholds")
  .action(async (pdfPath: string, outputJsonPath: string | undefined, options: ConfigOption) => {
    const result = await extractOutlineFromPdf({
      inputPdfPath: pdfPath,
      config: await loadConfig(options.config),
    });
    const json = serializeOutline(result);

    if (outputJsonPath === undefined) {
      console.log(json);
      return;
    }
    const resolvedOutputPath = resolve(outputJsonPath);
    await writeFile(resolvedOutputPath, json, "utf8");
    console.log(`Generated outline with ${result.outline.length} heading(s) at ${resolvedOutputPath}`);
  });

program
  .command("batch")
  .description("Extract outlines for every PDF in a directory into <name>.json files")
  .argument("<inputDir>", "Directory containing PDF files")
  .argument("<outputDir>", "Directory for JSON output")
  .option("-c, --config <path>", "JSON file overriding heuristic thresholds")
  .action(async (inputDir: string, outputDir: string, options: ConfigOption) => {
    const batch = await processPdfDirectory({
      inputDirPath: inputDir,
      outputDirPath: outputDir,
      config: await loadConfig(options.config),
    });

    console.log(`Generated ${batch.generatedFiles.length} JSON file(s) in ${batch.outputDirPath}`);
  });

program.action(() => {
  program.outputHelp();
});

async function loadConfig(configPath: string | undefined): Promise<OutlineConfig | undefined> {
  if (configPath === undefined) return undefined;
  return resolveOutlineConfig(parseOutlineConfigOverrides(await readJsonFile(resolve(configPath))));
}

void program.parseAsync(process.argv).catch((error: unknown) => {
  const message = error instanceof Error ? error.message : "Unknown error";
  console.error(`Error: ${message}`);
  process.exitCode = 1;
});
