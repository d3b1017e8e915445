import { toRecordView } from "./records.js";
import type { AnnotatedRecord, Aggregations, SearchResults } from "./types.js";

export function assembleResults(
  total: number,
  hits: AnnotatedRecord[],
  aggregations: Aggregations | null
): SearchResults {
  return {
    total,
    records: hits.map(toRecordView),
    aggregations
  };
}
