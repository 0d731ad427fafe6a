export {
  StreamingAnalyzer,
  analyze_chunks,
  analyze_rows,
  analyze_rows_sync,
  type AnalyzeChunksOptions,
  type AnalyzeRowsOptions,
  type AnalyzerOptions,
  type AnalyzerState,
} from "./analyzer";
export {
  analyze_csv,
  analyze_file,
  analyze_file_report,
  analyze_source,
  infer_format,
  parse_csv,
  read_source,
  to_json,
  write_result,
  type AnalyzeCSVOptions,
  type AnalyzeFileOptions,
  type AnalyzeFileReport,
  type ParseCSVOptions,
  type ReadSourceOptions,
} from "./io";
export {
  analyzeOptionsSchema,
  configFileSchema,
  loadConfigFile,
  parseConfigInput,
  resolveAnalyzeOptions,
  resolveConfig,
  type AnalyzeOptions,
  type AnalyzeOptionsInput,
  type ConfigFile,
  type ResolvedConfig,
} from "./config";
export {
  AnalysisError,
  AnalysisStateError,
  ConfigError,
  ErrorCode,
  ExitCode,
  InputNotFoundError,
  UnknownGroupColumnError,
  UnsupportedFormatError,
} from "./errors";
export { Logger, createLogger, type LogFields, type LogLevel, type LoggerOptions } from "./logger";
export { format_group_key } from "./internal/analysis/keys";
export { detectColumnTypes } from "./internal/analysis/detect";
export type {
  AnalysisDiagnostics,
  AnalysisMetadata,
  AnalysisResult,
  AnalysisType,
  ColumnStats,
  ColumnStatsMap,
  ColumnType,
  ColumnTypes,
  FrequencyPair,
  FrequencyStats,
  GroupedAnalysisResult,
  NumericStats,
  OverallAnalysisResult,
  RawRow,
  SourceFormat,
  TableSource,
} from "./types";
