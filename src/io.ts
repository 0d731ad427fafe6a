import { stat } from "node:fs/promises";
import { StreamingAnalyzer, analyze_rows_sync, type AnalyzeRowsOptions, type AnalyzerOptions } from "./analyzer";
import { resolveOutputOptions, type OutputOptionsInput } from "./config";
import { InputNotFoundError, UnsupportedFormatError } from "./errors";
import { openCsvSource, parseCsvText } from "./internal/io/csv";
import { openExcelSource } from "./internal/io/excelRead";
import { openJsonLinesSource } from "./internal/io/json";
import { serializeResult, writeFileAtomic } from "./internal/io/output";
import { openParquetSource } from "./internal/io/parquetRead";
import { inferFormat } from "./internal/io/shared";
import type { AnalysisDiagnostics, AnalysisResult, RawRow, SourceFormat, TableSource } from "./types";

export interface ReadSourceOptions {
  format?: SourceFormat;
  sep?: string;
  sheet_name?: string | number;
}

export interface ParseCSVOptions {
  sep?: string;
}

export interface AnalyzeCSVOptions extends AnalyzerOptions, ParseCSVOptions {}

export interface AnalyzeFileOptions extends AnalyzeRowsOptions, ReadSourceOptions {}

export interface AnalyzeFileReport {
  result: AnalysisResult;
  diagnostics: AnalysisDiagnostics;
  completed: boolean;
}

export function infer_format(path: string): SourceFormat {
  return inferFormat(path);
}

export function parse_csv(text: string, options: ParseCSVOptions = {}): { header: string[]; rows: RawRow[] } {
  return parseCsvText(text, options.sep ?? ",");
}

export function analyze_csv(text: string, options: AnalyzeCSVOptions = {}): AnalysisResult {
  const { sep, ...analyzerOptions } = options;
  const { header, rows } = parseCsvText(text, sep ?? ",");
  return analyze_rows_sync(header, rows, analyzerOptions);
}

export async function read_source(path: string, options: ReadSourceOptions = {}): Promise<TableSource> {
  await assertInputExists(path);
  const format = options.format ?? inferFormat(path);

  switch (format) {
    case "csv":
      return openCsvSource(path, options.sep ?? ",");
    case "tsv":
      return openCsvSource(path, options.sep ?? "\t");
    case "jsonl":
      return openJsonLinesSource(path);
    case "xlsx":
      return openExcelSource(path, options.sheet_name);
    case "parquet":
      return openParquetSource(path);
    default:
      throw new UnsupportedFormatError(String(format));
  }
}

export async function analyze_source(
  source: TableSource,
  options: AnalyzeRowsOptions = {}
): Promise<AnalyzeFileReport> {
  const { signal, ...analyzerOptions } = options;
  const analyzer = new StreamingAnalyzer(analyzerOptions);
  try {
    const completed = await analyzer.scan(source.header, source.rows, signal);
    return { result: analyzer.finalize(), diagnostics: analyzer.diagnostics(), completed };
  } finally {
    await source.close();
  }
}

export async function analyze_file_report(path: string, options: AnalyzeFileOptions = {}): Promise<AnalyzeFileReport> {
  const { format, sep, sheet_name, ...analyzeOptions } = options;
  const source = await read_source(path, { format, sep, sheet_name });
  return analyze_source(source, analyzeOptions);
}

export async function analyze_file(path: string, options: AnalyzeFileOptions = {}): Promise<AnalysisResult> {
  const report = await analyze_file_report(path, options);
  return report.result;
}

export function to_json(result: AnalysisResult, options: OutputOptionsInput = {}): string {
  const { indent } = resolveOutputOptions(options);
  return serializeResult(result, indent);
}

export async function write_result(
  path: string,
  result: AnalysisResult,
  options: OutputOptionsInput = {}
): Promise<void> {
  await writeFileAtomic(path, `${to_json(result, options)}\n`);
}

async function assertInputExists(path: string): Promise<void> {
  try {
    const info = await stat(path);
    if (!info.isFile()) {
      throw new InputNotFoundError(path);
    }
  } catch (error) {
    if (error instanceof InputNotFoundError) {
      throw error;
    }
    if (isErrnoException(error) && (error.code === "ENOENT" || error.code === "ENOTDIR")) {
      throw new InputNotFoundError(path, error);
    }
    throw error;
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}
