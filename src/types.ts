export type TaskType = "TextClassification" | "TokenClassification";

export type RecordStatus = "Default" | "Validated" | "Discarded" | "Edited";

export type PredictionStatus = "OK" | "KO";

export type RecordId = string | number;

export type MetadataValue =
  | string
  | number
  | boolean
  | null
  | MetadataValue[]
  | { [key: string]: MetadataValue };

export type Metadata = { [key: string]: MetadataValue };

export type InputValue = string | string[];

export type Inputs = Record<string, InputValue>;

export interface ClassLabel {
  class: string;
  score?: number;
}

export interface SpanLabel extends ClassLabel {
  start: number;
  end: number;
}

export type Label = ClassLabel | SpanLabel;

export interface Labelling {
  agent: string;
  labels: Label[];
}

export type Vectors = Record<string, { value: number[] }>;

export interface RecordMetrics {
  text_length: number;
  tokens_length: number;
}

export interface AnnotatedRecord {
  id: RecordId;
  inputs: Inputs;
  multi_label: boolean;
  prediction: Labelling | null;
  annotation: Labelling | null;
  metadata: Metadata;
  status: RecordStatus;
  event_timestamp: string;
  last_updated: string;
  metrics: RecordMetrics;
  vectors: Vectors;
}

export interface RecordPatch {
  id: RecordId;
  inputs: Inputs;
  multi_label?: boolean;
  prediction?: Labelling;
  annotation?: Labelling;
  metadata?: Metadata;
  status?: RecordStatus;
  event_timestamp?: string;
  vectors?: Vectors;
}

export interface RecordView extends AnnotatedRecord {
  predicted: PredictionStatus | null;
}

export interface SearchIndex {
  id: string[];
  status: string[];
  predicted: string[];
  predicted_as: string[];
  predicted_by: string[];
  annotated_as: string[];
  annotated_by: string[];
  text: string[];
  text_exact: string[];
  words: string[];
  inputs: Record<string, string[]>;
  inputs_exact: Record<string, string[]>;
  metadata: Record<string, string[]>;
  score: number | null;
}

export type IndexField =
  | "id"
  | "status"
  | "predicted"
  | "predicted_as"
  | "predicted_by"
  | "annotated_as"
  | "annotated_by"
  | "text"
  | "text_exact"
  | "words";

export type TermTarget =
  | { kind: "field"; field: IndexField }
  | { kind: "input"; name: string; exact: boolean }
  | { kind: "metadata"; key: string };

export type TextQuery =
  | { kind: "term"; target: TermTarget; value: string; prefix: boolean }
  | { kind: "and"; clauses: TextQuery[] }
  | { kind: "or"; clauses: TextQuery[] }
  | { kind: "not"; clause: TextQuery };

export type Filter =
  | { kind: "terms"; target: TermTarget; values: string[] }
  | { kind: "score"; gte: number | null; lte: number | null }
  | {
      kind: "timestamp";
      field: "event_timestamp" | "last_updated";
      gte: string | null;
      lte: string | null;
    }
  | { kind: "text"; query: TextQuery };

export type SortOrder = "asc" | "desc";

export type SortableField =
  | "id"
  | "metadata"
  | "score"
  | "predicted"
  | "predicted_as"
  | "predicted_by"
  | "annotated_as"
  | "annotated_by"
  | "status"
  | "last_updated"
  | "event_timestamp";

export type SortKey =
  | { field: SortableField; order: SortOrder }
  | { field: "metadata"; key: string; order: SortOrder };

export interface VectorQuery {
  name: string;
  value: number[];
}

export interface BackendQuery {
  filters: Filter[];
  sort: SortKey[];
  from: number;
  limit: number;
  vector: VectorQuery | null;
}

export interface Range<T> {
  from: T | null;
  to: T | null;
}

export interface SearchQuery {
  query_text: string | null;
  ids: RecordId[];
  predicted_by: string[];
  annotated_by: string[];
  predicted_as: string[];
  annotated_as: string[];
  status: RecordStatus[];
  predicted: PredictionStatus | null;
  metadata: Record<string, string[]>;
  score: Range<number> | null;
  event_timestamp: Range<string> | null;
  vector: VectorQuery | null;
}

export interface SortSpec {
  id: string;
  order: SortOrder;
}

export interface SearchRequest {
  query: SearchQuery;
  sort: SortSpec[];
}

export interface Page {
  from: number;
  limit: number;
}

export type Counts = Record<string, number>;

export type TermsField =
  | "predicted_as"
  | "predicted_by"
  | "annotated_as"
  | "annotated_by"
  | "status"
  | "predicted"
  | "words";

export interface Aggregations {
  predicted_as: Counts;
  predicted_by: Counts;
  annotated_as: Counts;
  annotated_by: Counts;
  status: Counts;
  predicted: Counts;
  words: Counts;
  metadata: Record<string, Counts>;
  score: Counts;
}

export interface SearchResults {
  total: number;
  records: RecordView[];
  aggregations: Aggregations | null;
}

export interface BulkRequest {
  tags: Record<string, string>;
  metadata: Metadata;
  records: unknown[];
}

export interface BulkResult {
  dataset: string;
  processed: number;
  failed: number;
}

export interface DatasetRecord {
  name: string;
  task: TaskType;
  tags: Record<string, string>;
  metadata: Metadata;
  created_at: string;
  updated_at: string;
}

export interface Capabilities {
  vectorSearch: boolean;
}
