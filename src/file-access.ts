import { constants } from "node:fs";
import { access, readFile } from "node:fs/promises";

export async function assertReadableFile(filePath: string): Promise<void> {
  try {
    await access(filePath, constants.R_OK);
  } catch {
    throw new Error(`Cannot read input PDF: ${filePath}`);
  }
}

export async function assertReadableDirectory(dirPath: string): Promise<void> {
  try {
    await access(dirPath, constants.R_OK | constants.X_OK);
  } catch {
    throw new Error(`Cannot read input directory: ${dirPath}`);
  }
}

export async function readJsonFile(filePath: string): Promise<unknown> {
  const content = await readFile(filePath, "utf8");
  try {
    return JSON.parse(content);
  } catch (error: unknown) {
    const detail = error instanceof Error ? error.message : "Unknown error";
    throw new Error(`Invalid JSON in ${filePath}: ${detail}`);
  }
}
