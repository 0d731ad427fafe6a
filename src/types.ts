export type ColumnType = "numeric" | "categorical" | "list";

export type ColumnTypes = Record<string, ColumnType>;

export type RawRow = string[];

export type AnalysisType = "overall" | "grouped";

export interface NumericStats {
  count: number;
  mean: number;
  min: number;
  max: number;
  stdev: number;
}

export type FrequencyPair = [token: string, frequency: number];

export interface FrequencyStats {
  count: number;
  unique_count: number;
  most_common: FrequencyPair[];
}

export type ColumnStats = NumericStats | FrequencyStats;

export type ColumnStatsMap = Record<string, ColumnStats>;

export interface AnalysisMetadata {
  total_rows_processed: number;
  analysis_type: AnalysisType;
  grouped_by?: string[];
}

export interface OverallAnalysisResult {
  analysis_metadata: AnalysisMetadata;
  overall_analysis: ColumnStatsMap;
}

export interface GroupedAnalysisResult {
  analysis_metadata: AnalysisMetadata;
  grouped_analysis: Record<string, ColumnStatsMap>;
}

export type AnalysisResult = OverallAnalysisResult | GroupedAnalysisResult;

export interface AnalysisDiagnostics {
  skipped_rows: number;
  dropped_values: number;
  list_fallbacks: number;
}

export type SourceFormat = "csv" | "tsv" | "jsonl" | "xlsx" | "parquet";

export interface TableSource {
  header: string[];
  rows: AsyncIterable<RawRow>;
  close(): Promise<void>;
}
