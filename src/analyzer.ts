import { resolveAnalyzeOptions, type AnalyzeOptions, type AnalyzeOptionsInput } from "./config";
import { AnalysisStateError, UnknownGroupColumnError } from "./errors";
import { detectColumnTypes } from "./internal/analysis/detect";
import { buildResult } from "./internal/analysis/finalize";
import { GroupRouter, type MeasuredColumn } from "./internal/analysis/router";
import { silentLogger, type Logger } from "./logger";
import type { AnalysisDiagnostics, AnalysisResult, ColumnTypes, RawRow } from "./types";
import { deepFreeze, isMissingRaw } from "./utils";

export type AnalyzerState = "uninitialized" | "types_detected" | "accumulating" | "finalized";

export interface AnalyzerOptions extends AnalyzeOptionsInput {
  logger?: Logger;
}

export interface AnalyzeRowsOptions extends AnalyzerOptions {
  signal?: AbortSignal;
}

export interface AnalyzeChunksOptions extends AnalyzerOptions {
  chunk_size?: number;
}

export class StreamingAnalyzer {
  private state: AnalyzerState = "uninitialized";
  private readonly options: AnalyzeOptions;
  private readonly logger: Logger;
  private readonly naValues: Set<string>;
  private header: string[] = [];
  private types: ColumnTypes = {};
  private measured: MeasuredColumn[] = [];
  private router: GroupRouter | null = null;
  private totalRows = 0;
  private readonly counters: AnalysisDiagnostics = {
    skipped_rows: 0,
    dropped_values: 0,
    list_fallbacks: 0,
  };
  private result: AnalysisResult | null = null;

  constructor(options: AnalyzerOptions = {}) {
    const { logger, ...analysisOptions } = options;
    this.options = resolveAnalyzeOptions(analysisOptions);
    this.logger = logger ?? silentLogger;
    this.naValues = new Set(this.options.na_values);
  }

  get status(): AnalyzerState {
    return this.state;
  }

  get column_types(): Readonly<ColumnTypes> {
    return { ...this.types };
  }

  get rows_processed(): number {
    return this.totalRows;
  }

  get settings(): Readonly<AnalyzeOptions> {
    return this.options;
  }

  diagnostics(): AnalysisDiagnostics {
    return { ...this.counters };
  }

  validateHeader(header: readonly string[]): void {
    const missing = this.options.group_by.filter((column) => !header.includes(column));
    if (missing.length > 0) {
      throw new UnknownGroupColumnError(missing, [...header]);
    }
  }

  detect(header: readonly string[], sample: readonly RawRow[]): ColumnTypes {
    this.assertState(["uninitialized"], "detect column types");
    this.validateHeader(header);

    const types = detectColumnTypes(header, sample, {
      numericThreshold: this.options.numeric_threshold,
      listThreshold: this.options.list_threshold,
      naValues: this.naValues,
      overrides: this.options.column_types,
    });
    this.initialize(header, types);

    this.logger.info("Column type detection complete.", { ...types });
    if (this.options.group_by.length > 0) {
      this.logger.info(`Performing grouped analysis, grouping by: ${this.options.group_by.join(", ")}`);
    } else {
      this.logger.info("Performing overall analysis (no grouping).");
    }
    return { ...types };
  }

  push(row: RawRow): boolean {
    this.assertState(["types_detected", "accumulating"], "accumulate rows");
    this.state = "accumulating";
    const router = this.requireRouter();

    if (row.length < this.header.length) {
      this.counters.skipped_rows += 1;
      return false;
    }
    this.totalRows += 1;

    const group = router.route(row);
    for (const column of this.measured) {
      const value = row[column.position];
      if (value === undefined || isMissingRaw(value, this.naValues)) {
        continue;
      }
      group.accumulators.get(column.name)?.ingest(value, this.counters);
    }
    return true;
  }

  async scan(
    header: readonly string[],
    rows: AsyncIterable<RawRow> | Iterable<RawRow>,
    signal?: AbortSignal
  ): Promise<boolean> {
    this.validateHeader(header);
    const sample: RawRow[] = [];
    let completed = true;

    for await (const row of rows) {
      if (signal?.aborted) {
        completed = false;
        break;
      }
      this.feed(header, row, sample);
    }
    this.flushSample(header, sample);

    if (!completed) {
      this.logger.warn("Analysis stopped early; reporting rows read so far.", {
        rows_processed: this.totalRows,
      });
    }
    return completed;
  }

  scanSync(header: readonly string[], rows: Iterable<RawRow>): void {
    this.validateHeader(header);
    const sample: RawRow[] = [];
    for (const row of rows) {
      this.feed(header, row, sample);
    }
    this.flushSample(header, sample);
  }

  fork(): StreamingAnalyzer {
    this.assertState(["types_detected", "accumulating"], "fork");
    const forked = new StreamingAnalyzer({ ...this.options, logger: this.logger });
    forked.initialize(this.header, this.types);
    return forked;
  }

  merge(other: StreamingAnalyzer): this {
    this.assertState(["types_detected", "accumulating"], "merge");
    other.assertState(["types_detected", "accumulating"], "be merged");
    if (other === this) {
      throw new AnalysisStateError("An analyzer cannot be merged into itself.");
    }
    if (!sameColumns(this.header, other.header) || !sameTypes(this.types, other.types)) {
      throw new AnalysisStateError("Cannot merge analyzers with different columns or column types.");
    }

    this.requireRouter().merge(other.requireRouter());
    this.totalRows += other.totalRows;
    this.counters.skipped_rows += other.counters.skipped_rows;
    this.counters.dropped_values += other.counters.dropped_values;
    this.counters.list_fallbacks += other.counters.list_fallbacks;
    this.state = "accumulating";
    return this;
  }

  finalize(): AnalysisResult {
    if (this.state === "finalized" && this.result) {
      return this.result;
    }
    this.assertState(["types_detected", "accumulating"], "finalize");

    const result = buildResult(this.requireRouter(), {
      groupBy: this.options.group_by,
      totalRows: this.totalRows,
      topK: this.options.top_k,
    });
    this.result = deepFreeze(result);
    this.state = "finalized";

    if (this.counters.skipped_rows > 0) {
      this.logger.warn(`Skipped ${this.counters.skipped_rows} row(s) shorter than the header.`);
    }
    if (this.counters.dropped_values > 0) {
      this.logger.warn(`Ignored ${this.counters.dropped_values} non-numeric value(s) in numeric columns.`);
    }
    this.logger.debug("Data processing complete.", {
      rows_processed: this.totalRows,
      ...this.counters,
    });
    return this.result;
  }

  private initialize(header: readonly string[], types: ColumnTypes): void {
    const groupBy = this.options.group_by;
    this.header = [...header];
    this.types = { ...types };
    this.measured = this.header
      .map((name, position) => ({ name, position }))
      .filter((column) => !groupBy.includes(column.name));

    const keyPositions = groupBy.map((column) => this.header.indexOf(column));
    this.router = new GroupRouter(this.types, keyPositions, this.measured);
    if (groupBy.length === 0) {
      this.router.route([]);
    }
    this.state = "types_detected";
  }

  private feed(header: readonly string[], row: RawRow, sample: RawRow[]): void {
    if (this.state !== "uninitialized") {
      this.push(row);
      return;
    }
    sample.push(row);
    if (sample.length >= this.options.sample_size) {
      this.flushSample(header, sample);
    }
  }

  private flushSample(header: readonly string[], sample: RawRow[]): void {
    if (this.state === "uninitialized") {
      this.detect(header, sample);
    }
    for (const row of sample.splice(0)) {
      this.push(row);
    }
  }

  private requireRouter(): GroupRouter {
    if (!this.router) {
      throw new AnalysisStateError("Column types have not been detected yet.");
    }
    return this.router;
  }

  private assertState(allowed: AnalyzerState[], action: string): void {
    if (!allowed.includes(this.state)) {
      throw new AnalysisStateError(`Cannot ${action} while analyzer is ${this.state}.`);
    }
  }
}

export async function analyze_rows(
  header: readonly string[],
  rows: AsyncIterable<RawRow> | Iterable<RawRow>,
  options: AnalyzeRowsOptions = {}
): Promise<AnalysisResult> {
  const { signal, ...analyzerOptions } = options;
  const analyzer = new StreamingAnalyzer(analyzerOptions);
  await analyzer.scan(header, rows, signal);
  return analyzer.finalize();
}

export function analyze_rows_sync(
  header: readonly string[],
  rows: Iterable<RawRow>,
  options: AnalyzerOptions = {}
): AnalysisResult {
  const analyzer = new StreamingAnalyzer(options);
  analyzer.scanSync(header, rows);
  return analyzer.finalize();
}

export function analyze_chunks(
  header: readonly string[],
  rows: readonly RawRow[],
  options: AnalyzeChunksOptions = {}
): AnalysisResult {
  const { chunk_size: chunkSize = 10_000, ...analyzerOptions } = options;
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new AnalysisStateError("chunk_size must be a positive integer.");
  }

  const analyzer = new StreamingAnalyzer(analyzerOptions);
  analyzer.detect(header, rows.slice(0, analyzer.settings.sample_size));

  const partials: StreamingAnalyzer[] = [];
  for (let start = 0; start < rows.length; start += chunkSize) {
    const partial = analyzer.fork();
    for (const row of rows.slice(start, start + chunkSize)) {
      partial.push(row);
    }
    partials.push(partial);
  }

  for (const partial of partials) {
    analyzer.merge(partial);
  }
  return analyzer.finalize();
}

function sameColumns(left: readonly string[], right: readonly string[]): boolean {
  return left.length === right.length && left.every((column, position) => right[position] === column);
}

function sameTypes(left: ColumnTypes, right: ColumnTypes): boolean {
  const leftKeys = Object.keys(left);
  if (leftKeys.length !== Object.keys(right).length) {
    return false;
  }
  return leftKeys.every((key) => left[key] === right[key]);
}
