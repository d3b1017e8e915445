import { BadRequestError } from "./errors.js";
import { recordKey } from "./records.js";
import { parseTextQuery } from "./text-query.js";
import type {
  BackendQuery,
  Capabilities,
  Filter,
  IndexField,
  Page,
  SearchQuery,
  SearchRequest,
  SortKey,
  SortSpec,
  SortableField
} from "./types.js";

export const SORTABLE_FIELDS: readonly SortableField[] = [
  "id",
  "metadata",
  "score",
  "predicted",
  "predicted_as",
  "predicted_by",
  "annotated_as",
  "annotated_by",
  "status",
  "last_updated",
  "event_timestamp"
];

const DEFAULT_SORT: SortKey = { field: "id", order: "asc" };

export function translateSearch(
  request: SearchRequest,
  page: Page,
  capabilities: Capabilities
): BackendQuery {
  const vector = request.query.vector;
  if (vector && !capabilities.vectorSearch) {
    throw new BadRequestError("Vector search is not supported by the configured backend");
  }

  return {
    filters: translateFilters(request.query),
    sort: translateSort(request.sort),
    from: page.from,
    limit: page.limit,
    vector
  };
}

export function translateFilters(query: SearchQuery): Filter[] {
  const filters: Filter[] = [];

  if (query.query_text) {
    filters.push({ kind: "text", query: parseTextQuery(query.query_text) });
  }
  if (query.ids.length > 0) {
    pushTerms(filters, "id", query.ids.map(recordKey));
  }
  pushTerms(filters, "predicted_by", query.predicted_by);
  pushTerms(filters, "annotated_by", query.annotated_by);
  pushTerms(filters, "predicted_as", query.predicted_as);
  pushTerms(filters, "annotated_as", query.annotated_as);
  pushTerms(filters, "status", query.status);
  if (query.predicted) {
    pushTerms(filters, "predicted", [query.predicted]);
  }
  for (const [key, values] of Object.entries(query.metadata)) {
    if (values.length > 0) {
      filters.push({ kind: "terms", target: { kind: "metadata", key }, values });
    }
  }
  if (query.score) {
    filters.push({ kind: "score", gte: query.score.from, lte: query.score.to });
  }
  if (query.event_timestamp) {
    filters.push({
      kind: "timestamp",
      field: "event_timestamp",
      gte: query.event_timestamp.from,
      lte: query.event_timestamp.to
    });
  }

  return filters;
}

function pushTerms(filters: Filter[], field: IndexField, values: string[]) {
  if (values.length === 0) return;
  filters.push({ kind: "terms", target: { kind: "field", field }, values });
}

/** Appends an `id` ascending tie-break unless the caller already sorts by id. */
export function translateSort(sort: SortSpec[]): SortKey[] {
  if (sort.length === 0) return [DEFAULT_SORT];
  const keys = sort.map(parseSortKey);
  const sortsById = keys.some((key) => key.field === "id" && !("key" in key));
  return sortsById ? keys : [...keys, DEFAULT_SORT];
}

export function parseSortKey(spec: SortSpec): SortKey {
  if (spec.id.startsWith("metadata.") && spec.id.length > "metadata.".length) {
    return { field: "metadata", key: spec.id.slice("metadata.".length), order: spec.order };
  }
  const field = SORTABLE_FIELDS.find((candidate) => candidate === spec.id);
  if (!field) {
    throw new BadRequestError(
      `Wrong sort id ${spec.id}. Valid values are: ${formatAllowList(SORTABLE_FIELDS)}`
    );
  }
  return { field, order: spec.order };
}

function formatAllowList(values: readonly string[]): string {
  return `[${values.map((value) => `'${value}'`).join(", ")}]`;
}
