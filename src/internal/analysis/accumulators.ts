import { AnalysisStateError } from "../../errors";
import type { AnalysisDiagnostics, ColumnType, FrequencyStats, NumericStats } from "../../types";
import { parseNumber } from "../../utils";
import { FrequencyTable } from "./counts";
import { explodeLiteral } from "./literal";

export interface ColumnAccumulator {
  readonly kind: ColumnType;
  ingest(raw: string, diagnostics: AnalysisDiagnostics): void;
  merge(other: ColumnAccumulator): void;
  finalize(topK: number): NumericStats | FrequencyStats;
}

export class NumericAccumulator implements ColumnAccumulator {
  readonly kind = "numeric";
  count = 0;
  sum = 0;
  sumSq = 0;
  min = Number.POSITIVE_INFINITY;
  max = Number.NEGATIVE_INFINITY;

  ingest(raw: string, diagnostics: AnalysisDiagnostics): void {
    const value = parseNumber(raw);
    if (value === null) {
      diagnostics.dropped_values += 1;
      return;
    }

    this.count += 1;
    this.sum += value;
    this.sumSq += value * value;
    if (value < this.min) {
      this.min = value;
    }
    if (value > this.max) {
      this.max = value;
    }
  }

  merge(other: ColumnAccumulator): void {
    if (!(other instanceof NumericAccumulator)) {
      throw mismatch(this.kind, other.kind);
    }
    this.count += other.count;
    this.sum += other.sum;
    this.sumSq += other.sumSq;
    this.min = Math.min(this.min, other.min);
    this.max = Math.max(this.max, other.max);
  }

  finalize(): NumericStats {
    if (this.count === 0) {
      return { count: 0, mean: 0, min: 0, max: 0, stdev: 0 };
    }

    const mean = this.sum / this.count;
    let stdev = 0;
    if (this.count > 1) {
      // NaN spread (from inf or nan inputs) clamps to zero like a negative one
      const spread = this.sumSq / this.count - mean ** 2;
      const variance = spread > 0 ? spread : 0;
      stdev = Math.sqrt(variance * (this.count / (this.count - 1)));
    }

    return {
      count: this.count,
      mean,
      min: this.min === Number.POSITIVE_INFINITY ? 0 : this.min,
      max: this.max === Number.NEGATIVE_INFINITY ? 0 : this.max,
      stdev,
    };
  }
}

export class CategoricalAccumulator implements ColumnAccumulator {
  readonly kind: "categorical" | "list" = "categorical";
  readonly frequencies = new FrequencyTable();

  ingest(raw: string, _diagnostics: AnalysisDiagnostics): void {
    this.frequencies.increment(raw);
  }

  merge(other: ColumnAccumulator): void {
    if (!(other instanceof CategoricalAccumulator) || other.kind !== this.kind) {
      throw mismatch(this.kind, other.kind);
    }
    this.frequencies.absorb(other.frequencies);
  }

  finalize(topK: number): FrequencyStats {
    return {
      count: this.frequencies.total,
      unique_count: this.frequencies.size,
      most_common: this.frequencies.top(topK),
    };
  }
}

export class ListAccumulator extends CategoricalAccumulator {
  override readonly kind = "list";

  override ingest(raw: string, diagnostics: AnalysisDiagnostics): void {
    const tokens = explodeLiteral(raw);
    if (tokens === null) {
      diagnostics.list_fallbacks += 1;
      this.frequencies.increment(raw);
      return;
    }
    for (const token of tokens) {
      this.frequencies.increment(token);
    }
  }
}

export function createAccumulator(kind: ColumnType): ColumnAccumulator {
  if (kind === "numeric") {
    return new NumericAccumulator();
  }
  if (kind === "list") {
    return new ListAccumulator();
  }
  return new CategoricalAccumulator();
}

function mismatch(expected: ColumnType, received: ColumnType): AnalysisStateError {
  return new AnalysisStateError(
    `Cannot merge a ${received} accumulator into a ${expected} accumulator.`
  );
}
