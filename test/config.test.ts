import { afterAll, describe, expect, test } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  loadConfigFile,
  parseConfigInput,
  resolveAnalyzeOptions,
  resolveConfig,
  resolveOutputOptions,
} from "../src/config";
import { AnalysisError, ConfigError, ExitCode, InputNotFoundError } from "../src/errors";

const tempDir = mkdtempSync(join(tmpdir(), "colstat-config-"));

afterAll(() => {
  rmSync(tempDir, { recursive: true, force: true });
});

function captureError(run: () => unknown): unknown {
  try {
    run();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe("resolveAnalyzeOptions", () => {
  test("fills defaults", () => {
    expect(resolveAnalyzeOptions()).toEqual({
      group_by: [],
      sample_size: 100,
      top_k: 5,
      numeric_threshold: 0.8,
      list_threshold: 0.8,
      na_values: [""],
      column_types: {},
    });
    expect(resolveOutputOptions()).toEqual({ indent: 4 });
  });

  test("lists every invalid field", () => {
    const error = captureError(() => resolveAnalyzeOptions({ sample_size: 0, numeric_threshold: 1.5 }));

    expect(error).toBeInstanceOf(ConfigError);
    if (error instanceof ConfigError) {
      expect(error.issues).toEqual([
        "sample_size: Number must be greater than 0",
        "numeric_threshold: Number must be less than or equal to 1",
      ]);
      expect(error.exitCode).toBe(ExitCode.CONFIG_ERROR);
      expect(error.code).toBe("config_invalid");
    }
  });

  test("rejects unknown keys and column types", () => {
    expect(() => parseConfigInput({ bogus: 1 }, "Invalid config")).toThrow(ConfigError);
    expect(() => parseConfigInput({ column_types: { a: "text" } }, "Invalid config")).toThrow(ConfigError);
  });
});

describe("resolveConfig", () => {
  test("lets overrides win and merges column types", () => {
    const config = resolveConfig(
      { top_k: 3, group_by: ["a"], column_types: { x: "list" }, indent: 2, sep: ";" },
      { top_k: 7, column_types: { y: "numeric" } }
    );

    expect(config.analysis).toMatchObject({
      top_k: 7,
      group_by: ["a"],
      sample_size: 100,
      column_types: { x: "list", y: "numeric" },
    });
    expect(config.source).toEqual({ sep: ";" });
    expect(config.output).toEqual({ indent: 2 });
  });
});

describe("loadConfigFile", () => {
  test("reads and validates a JSON file", async () => {
    const path = join(tempDir, "colstat.json");
    writeFileSync(path, JSON.stringify({ group_by: ["country"], na_values: ["", "NA"] }));
    expect(await loadConfigFile(path)).toEqual({ group_by: ["country"], na_values: ["", "NA"] });
  });

  test("reports unreadable and malformed files", async () => {
    const broken = join(tempDir, "broken.json");
    writeFileSync(broken, "{ not json");

    await expect(loadConfigFile(broken)).rejects.toThrow(`Config file '${broken}' is not valid JSON.`);
    await expect(loadConfigFile(join(tempDir, "absent.json"))).rejects.toBeInstanceOf(ConfigError);
  });
});

describe("AnalysisError", () => {
  test("serializes to a structured error", () => {
    const cause = new Error("ENOENT");
    expect(new InputNotFoundError("data.csv", cause).toJSON()).toEqual({
      error: {
        code: "input_not_found",
        message: "Input file 'data.csv' does not exist.",
        exitCode: 7,
        details: { path: "data.csv" },
        cause: "ENOENT",
      },
    });
  });

  test("formats hint and details without colors", () => {
    const error = new AnalysisError("Broken.", { hint: "Try again.", details: { rows: 3 } });
    expect(error.format(false)).toBe("Error: Broken.\nHint: Try again.\nDetails:\n  rows: 3");
  });
});
