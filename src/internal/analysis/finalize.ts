import type {
  AnalysisMetadata,
  AnalysisResult,
  ColumnStatsMap,
} from "../../types";
import { format_group_key } from "./keys";
import type { GroupRouter, GroupState } from "./router";

export interface FinalizeOptions {
  groupBy: readonly string[];
  totalRows: number;
  topK: number;
}

export function finalizeGroup(group: GroupState, topK: number): ColumnStatsMap {
  const stats: ColumnStatsMap = {};
  for (const [column, accumulator] of group.accumulators) {
    defineEntry(stats, column, accumulator.finalize(topK));
  }
  return stats;
}

export function buildResult(router: GroupRouter, options: FinalizeOptions): AnalysisResult {
  const grouped = options.groupBy.length > 0;
  const metadata: AnalysisMetadata = {
    total_rows_processed: options.totalRows,
    analysis_type: grouped ? "grouped" : "overall",
  };

  if (!grouped) {
    let overall: ColumnStatsMap = {};
    for (const group of router.groupStates()) {
      overall = finalizeGroup(group, options.topK);
    }
    return { analysis_metadata: metadata, overall_analysis: overall };
  }

  metadata.grouped_by = [...options.groupBy];
  const groupedAnalysis: Record<string, ColumnStatsMap> = {};
  for (const group of router.groupStates()) {
    defineEntry(groupedAnalysis, format_group_key(group.keyValues), finalizeGroup(group, options.topK));
  }
  return { analysis_metadata: metadata, grouped_analysis: groupedAnalysis };
}

function defineEntry<T>(target: Record<string, T>, key: string, value: T): void {
  Object.defineProperty(target, key, {
    value,
    enumerable: true,
    writable: true,
    configurable: true,
  });
}
