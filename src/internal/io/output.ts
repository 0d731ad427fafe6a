import { randomBytes } from "node:crypto";
import { rename, rm, writeFile } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import type { AnalysisResult } from "../../types";

export function nonFinitePlaceholder(value: number): string {
  if (Number.isNaN(value)) {
    return "NaN";
  }
  return value > 0 ? "Infinity" : "-Infinity";
}

export function serializeResult(result: AnalysisResult, indent: number): string {
  return JSON.stringify(
    result,
    (_key, value: unknown) =>
      typeof value === "number" && !Number.isFinite(value) ? nonFinitePlaceholder(value) : value,
    indent
  );
}

export async function writeFileAtomic(path: string, text: string): Promise<void> {
  const tempPath = join(dirname(path), `.${basename(path)}.${randomBytes(6).toString("hex")}.tmp`);
  try {
    await writeFile(tempPath, text, "utf8");
    await rename(tempPath, path);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw error;
  }
}
