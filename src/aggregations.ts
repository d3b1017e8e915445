import type { RecordStore } from "./store.js";
import type { Aggregations, BackendQuery, TermsField } from "./types.js";

export interface AggregationOptions {
  size: number;
}

export interface AggregationEngine {
  aggregate(dataset: string, query: Pick<BackendQuery, "filters" | "from">): Promise<Aggregations | null>;
}

const TERMS_FIELDS: readonly TermsField[] = [
  "predicted_as",
  "predicted_by",
  "annotated_as",
  "annotated_by",
  "status",
  "predicted",
  "words"
];

export function createAggregationEngine(
  store: RecordStore,
  options: AggregationOptions
): AggregationEngine {
  return {
    async aggregate(dataset, query) {
      // Only the first page pays for facets; scrolling pages skip them.
      if (query.from > 0) return null;

      const [terms, metadata, score] = await Promise.all([
        Promise.all(
          TERMS_FIELDS.map((field) => store.terms(dataset, query.filters, field, options.size))
        ),
        store.metadataTerms(dataset, query.filters, options.size),
        store.scoreHistogram(dataset, query.filters)
      ]);

      const [predictedAs, predictedBy, annotatedAs, annotatedBy, status, predicted, words] = terms;
      return {
        predicted_as: predictedAs,
        predicted_by: predictedBy,
        annotated_as: annotatedAs,
        annotated_by: annotatedBy,
        status,
        predicted,
        words,
        metadata,
        score
      };
    }
  };
}
