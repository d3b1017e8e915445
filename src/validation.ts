import { ValidationError } from "./errors.js";
import type {
  BulkRequest,
  Capabilities,
  ClassLabel,
  Inputs,
  Label,
  Labelling,
  Metadata,
  MetadataValue,
  Page,
  PredictionStatus,
  Range,
  RecordId,
  RecordPatch,
  RecordStatus,
  SearchQuery,
  SearchRequest,
  SortOrder,
  SortSpec,
  TaskType,
  VectorQuery,
  Vectors
} from "./types.js";

const TASKS: readonly TaskType[] = ["TextClassification", "TokenClassification"];

const STATUSES: readonly RecordStatus[] = ["Default", "Validated", "Discarded", "Edited"];

const DATASET_NAME = /^[a-z0-9][a-z0-9_-]*$/;

const MAX_METADATA_DEPTH = 16;
const MAX_VECTOR_SIZE = 4096;
const MAX_QUERY_TEXT = 10_000;

export interface PageLimits {
  defaultLimit: number;
  maxLimit: number;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isPresent(value: unknown): boolean {
  return value !== undefined && value !== null;
}

export function normalizeDatasetName(value: unknown): string {
  const name = normalizeRequiredString(value, "dataset name", 128);
  if (!DATASET_NAME.test(name)) {
    throw new ValidationError(
      "dataset name must contain only lowercase letters, digits, '-' and '_', and start with a letter or digit"
    );
  }
  return name;
}

export function normalizeTask(value: unknown): TaskType {
  const raw = normalizeRequiredString(value, "task", 32);
  const task = TASKS.find((candidate) => candidate === raw);
  if (!task) {
    throw new ValidationError(`task must be one of: ${TASKS.join(", ")}`);
  }
  return task;
}

export function normalizeStatus(value: unknown, field = "status"): RecordStatus {
  const raw = normalizeRequiredString(value, field, 16);
  const status = STATUSES.find((candidate) => candidate === raw);
  if (!status) {
    throw new ValidationError(`${field} must be one of: ${STATUSES.join(", ")}`);
  }
  return status;
}

export function normalizeRecordId(value: unknown): RecordId {
  if (typeof value === "number") {
    if (!Number.isSafeInteger(value)) {
      throw new ValidationError("id must be an integer or a string");
    }
    return value;
  }
  if (typeof value === "string") {
    return normalizeRequiredString(value, "id", 256);
  }
  if (value === undefined || value === null) {
    throw new ValidationError("id is required");
  }
  throw new ValidationError("id must be an integer or a string");
}

export function normalizeInputs(value: unknown): Inputs {
  if (!isPlainObject(value)) {
    throw new ValidationError("inputs must be an object");
  }
  const inputs: Inputs = {};
  for (const [key, raw] of Object.entries(value)) {
    const name = normalizeRequiredString(key, "input name", 128);
    if (typeof raw === "string") {
      inputs[name] = ensureNoNul(raw, `inputs.${name}`);
    } else if (Array.isArray(raw) && raw.every((item): item is string => typeof item === "string")) {
      inputs[name] = raw.map((item) => ensureNoNul(item, `inputs.${name}`));
    } else {
      throw new ValidationError(`inputs.${name} must be a string or a list of strings`);
    }
  }
  if (Object.keys(inputs).length === 0) {
    throw new ValidationError("inputs must not be empty");
  }
  return inputs;
}

export function normalizeLabelling(
  value: unknown,
  field: "prediction" | "annotation",
  task: TaskType
): Labelling {
  if (!isPlainObject(value)) {
    throw new ValidationError(`${field} must be an object`);
  }
  const agent = normalizeRequiredString(value.agent, `${field}.agent`, 256);
  const rawLabels = value.labels ?? [];
  if (!Array.isArray(rawLabels)) {
    throw new ValidationError(`${field}.labels must be an array`);
  }
  const labels = rawLabels.map((label, index) =>
    normalizeLabel(label, `${field}.labels[${index}]`, task)
  );
  return {
    agent,
    labels: field === "prediction" ? scoredLabelSet(labels) : annotatedLabelSet(labels)
  };
}

function normalizeLabel(value: unknown, field: string, task: TaskType): Label {
  if (!isPlainObject(value)) {
    throw new ValidationError(`${field} must be an object`);
  }
  const label: ClassLabel = { class: normalizeRequiredString(value.class, `${field}.class`, 256) };
  if (isPresent(value.score)) {
    label.score = normalizeScore(value.score, `${field}.score`);
  }

  if (task === "TextClassification") {
    if (isPresent(value.start) || isPresent(value.end)) {
      throw new ValidationError(`${field} spans are only allowed for TokenClassification`);
    }
    return label;
  }

  const start = normalizeOffset(value.start, `${field}.start`);
  const end = normalizeOffset(value.end, `${field}.end`);
  if (end <= start) {
    throw new ValidationError(`${field}.end must be greater than start`);
  }
  return { ...label, start, end };
}

export function labelKey(label: Label): string {
  return "start" in label ? `${label.class}:${label.start}:${label.end}` : label.class;
}

function scoredLabelSet(labels: Label[]): Label[] {
  const byKey = new Map<string, Label>();
  for (const label of labels) {
    const scored = { ...label, score: label.score ?? 1 };
    const key = labelKey(scored);
    const current = byKey.get(key);
    if (!current || (current.score ?? 0) < scored.score) {
      byKey.set(key, scored);
    }
  }
  return [...byKey.values()].sort((a, b) => (b.score ?? 0) - (a.score ?? 0));
}

function annotatedLabelSet(labels: Label[]): Label[] {
  const byKey = new Map<string, Label>();
  for (const label of labels) {
    const unscored: Label =
      "start" in label
        ? { class: label.class, start: label.start, end: label.end }
        : { class: label.class };
    const key = labelKey(unscored);
    if (!byKey.has(key)) {
      byKey.set(key, unscored);
    }
  }
  return [...byKey.values()];
}

function normalizeScore(value: unknown, field: string): number {
  const num = Number(value);
  if (typeof value === "boolean" || !Number.isFinite(num) || num < 0 || num > 1) {
    throw new ValidationError(`${field} must be a number between 0 and 1`);
  }
  return num;
}

function normalizeOffset(value: unknown, field: string): number {
  if (typeof value !== "number" || !Number.isSafeInteger(value) || value < 0) {
    throw new ValidationError(`${field} must be a non-negative integer`);
  }
  return value;
}

export function normalizeMetadata(value: unknown, field = "metadata"): Metadata {
  if (!isPresent(value)) return {};
  if (!isPlainObject(value)) {
    throw new ValidationError(`${field} must be an object`);
  }
  const metadata: Metadata = {};
  for (const [key, raw] of Object.entries(value)) {
    metadata[ensureNoNul(key, `${field} key`)] = normalizeMetadataValue(raw, `${field}.${key}`, 1);
  }
  return metadata;
}

function normalizeMetadataValue(value: unknown, field: string, depth: number): MetadataValue {
  if (depth > MAX_METADATA_DEPTH) {
    throw new ValidationError(`${field} is nested too deeply`);
  }
  if (typeof value === "string") {
    return ensureNoNul(value, field);
  }
  if (value === null || typeof value === "boolean") {
    return value;
  }
  if (typeof value === "number") {
    if (!Number.isFinite(value)) {
      throw new ValidationError(`${field} must be a finite number`);
    }
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item, index) => normalizeMetadataValue(item, `${field}[${index}]`, depth + 1));
  }
  if (isPlainObject(value)) {
    const nested: Metadata = {};
    for (const [key, raw] of Object.entries(value)) {
      const name = ensureNoNul(key, `${field} key`);
      nested[name] = normalizeMetadataValue(raw, `${field}.${key}`, depth + 1);
    }
    return nested;
  }
  throw new ValidationError(`${field} must be a JSON value`);
}

export function normalizeTags(value: unknown): Record<string, string> {
  if (!isPresent(value)) return {};
  if (!isPlainObject(value)) {
    throw new ValidationError("tags must be an object of strings");
  }
  const tags: Record<string, string> = {};
  for (const [key, raw] of Object.entries(value)) {
    if (typeof raw !== "string") {
      throw new ValidationError(`tags.${key} must be a string`);
    }
    tags[normalizeRequiredString(key, "tag name", 128)] = ensureNoNul(raw, `tags.${key}`);
  }
  return tags;
}

export function normalizeTimestamp(value: unknown, field: string): string {
  const date =
    typeof value === "number" ? new Date(value) : typeof value === "string" ? new Date(value) : null;
  if (!date || Number.isNaN(date.getTime())) {
    throw new ValidationError(`${field} must be an ISO timestamp`);
  }
  return date.toISOString();
}

export function normalizeVector(value: unknown, field: string): number[] {
  if (!Array.isArray(value) || value.length === 0) {
    throw new ValidationError(`${field} must be a non-empty array of numbers`);
  }
  if (value.length > MAX_VECTOR_SIZE) {
    throw new ValidationError(`${field} is too large`);
  }
  return value.map((item) => {
    if (typeof item !== "number" || !Number.isFinite(item)) {
      throw new ValidationError(`${field} must contain only numbers`);
    }
    return item;
  });
}

export function normalizeVectors(value: unknown): Vectors {
  if (!isPlainObject(value)) {
    throw new ValidationError("vectors must be an object");
  }
  const vectors: Vectors = {};
  for (const [name, raw] of Object.entries(value)) {
    const key = normalizeIdentifier(name, "vector name", 128);
    if (!isPlainObject(raw)) {
      throw new ValidationError(`vectors.${key} must be an object with a value`);
    }
    vectors[key] = { value: normalizeVector(raw.value, `vectors.${key}.value`) };
  }
  return vectors;
}

export function normalizeRecord(
  value: unknown,
  task: TaskType,
  capabilities: Capabilities
): RecordPatch {
  if (!isPlainObject(value)) {
    throw new ValidationError("record must be an object");
  }

  const patch: RecordPatch = {
    id: normalizeRecordId(value.id),
    inputs: normalizeInputs(value.inputs)
  };

  if (isPresent(value.multi_label)) {
    if (typeof value.multi_label !== "boolean") {
      throw new ValidationError("multi_label must be a boolean");
    }
    if (value.multi_label && task !== "TextClassification") {
      throw new ValidationError("multi_label is only supported for TextClassification");
    }
    patch.multi_label = value.multi_label;
  }
  if (isPresent(value.prediction)) {
    patch.prediction = normalizeLabelling(value.prediction, "prediction", task);
  }
  if (isPresent(value.annotation)) {
    patch.annotation = normalizeLabelling(value.annotation, "annotation", task);
  }
  if (isPresent(value.metadata)) {
    patch.metadata = normalizeMetadata(value.metadata);
  }
  if (isPresent(value.status)) {
    patch.status = normalizeStatus(value.status);
  }
  if (isPresent(value.event_timestamp)) {
    patch.event_timestamp = normalizeTimestamp(value.event_timestamp, "event_timestamp");
  }
  if (isPresent(value.vectors)) {
    if (!capabilities.vectorSearch) {
      throw new ValidationError("vectors provided but vector search is not enabled");
    }
    patch.vectors = normalizeVectors(value.vectors);
  }

  return patch;
}

export function normalizeBulkRequest(value: unknown): BulkRequest {
  if (!isPlainObject(value)) {
    throw new ValidationError("bulk request must be an object");
  }
  if (!Array.isArray(value.records)) {
    throw new ValidationError("records must be an array");
  }
  return {
    tags: normalizeTags(value.tags),
    metadata: normalizeMetadata(value.metadata),
    records: value.records
  };
}

export function normalizeSearchRequest(value: unknown): SearchRequest {
  if (!isPresent(value)) {
    return { query: normalizeSearchQuery(undefined), sort: [] };
  }
  if (!isPlainObject(value)) {
    throw new ValidationError("search request must be an object");
  }
  return {
    query: normalizeSearchQuery(value.query),
    sort: normalizeSort(value.sort)
  };
}

export function normalizeSearchQuery(value: unknown): SearchQuery {
  const params = isPresent(value) ? asObject(value, "query") : {};
  return {
    query_text: normalizeQueryText(params.query_text),
    ids: normalizeList(params.ids, "ids", normalizeRecordId),
    predicted_by: normalizeStringList(params.predicted_by, "predicted_by"),
    annotated_by: normalizeStringList(params.annotated_by, "annotated_by"),
    predicted_as: normalizeStringList(params.predicted_as, "predicted_as"),
    annotated_as: normalizeStringList(params.annotated_as, "annotated_as"),
    status: normalizeList(params.status, "status", normalizeStatus),
    predicted: isPresent(params.predicted) ? normalizePredicted(params.predicted) : null,
    metadata: normalizeMetadataFilter(params.metadata),
    score: isPresent(params.score)
      ? normalizeRange(params.score, "score", (item, field) => normalizeScore(item, field))
      : null,
    event_timestamp: isPresent(params.event_timestamp)
      ? normalizeRange(params.event_timestamp, "event_timestamp", normalizeTimestamp)
      : null,
    vector: isPresent(params.vector) ? normalizeVectorQuery(params.vector) : null
  };
}

/** Returned untrimmed so parse errors quote the text as sent. */
function normalizeQueryText(value: unknown): string | null {
  if (value === undefined || value === null) return null;
  if (typeof value !== "string") {
    throw new ValidationError("query_text must be a string");
  }
  if (value.length > MAX_QUERY_TEXT) {
    throw new ValidationError(`query_text exceeds ${MAX_QUERY_TEXT} characters`);
  }
  ensureNoNul(value, "query_text");
  return value.trim() ? value : null;
}

function normalizePredicted(value: unknown): PredictionStatus {
  if (value === "OK" || value === "KO") return value;
  throw new ValidationError("predicted must be OK or KO");
}

function normalizeMetadataFilter(value: unknown): Record<string, string[]> {
  if (!isPresent(value)) return {};
  const params = asObject(value, "metadata");
  const filter: Record<string, string[]> = {};
  for (const [key, raw] of Object.entries(params)) {
    const items = Array.isArray(raw) ? raw : [raw];
    filter[ensureNoNul(key, "metadata key")] = items.map((item) => {
      if (typeof item === "string" || typeof item === "number" || typeof item === "boolean") {
        return ensureNoNul(String(item), `metadata.${key}`);
      }
      throw new ValidationError(`metadata.${key} must be a value or a list of values`);
    });
  }
  return filter;
}

function normalizeRange<T>(
  value: unknown,
  field: string,
  normalize: (item: unknown, field: string) => T
): Range<T> {
  const params = asObject(value, field);
  return {
    from: isPresent(params.from) ? normalize(params.from, `${field}.from`) : null,
    to: isPresent(params.to) ? normalize(params.to, `${field}.to`) : null
  };
}

function normalizeVectorQuery(value: unknown): VectorQuery {
  const params = asObject(value, "vector");
  return {
    name: normalizeIdentifier(params.name, "vector.name", 128),
    value: normalizeVector(params.value, "vector.value")
  };
}

export function normalizeSort(value: unknown): SortSpec[] {
  if (!isPresent(value)) return [];
  if (!Array.isArray(value)) {
    throw new ValidationError("sort must be an array");
  }
  return value.map((item, index) => {
    const params = asObject(item, `sort[${index}]`);
    return {
      id: normalizeRequiredString(params.id, `sort[${index}].id`, 256),
      order: normalizeSortOrder(params.order, `sort[${index}].order`)
    };
  });
}

function normalizeSortOrder(value: unknown, field: string): SortOrder {
  if (!isPresent(value)) return "asc";
  if (value === "asc" || value === "desc") return value;
  throw new ValidationError(`${field} must be asc or desc`);
}

export function normalizePage(
  params: { from?: unknown; limit?: unknown },
  limits: PageLimits
): Page {
  const from = normalizeNonNegativeInteger(params.from, "from") ?? 0;
  const limit = normalizeNonNegativeInteger(params.limit, "limit") ?? limits.defaultLimit;
  return { from, limit: Math.min(limit, limits.maxLimit) };
}

function normalizeNonNegativeInteger(value: unknown, field: string): number | null {
  if (value === undefined || value === null || value === "") return null;
  const num = Number(value);
  if (!Number.isSafeInteger(num) || num < 0) {
    throw new ValidationError(`${field} must be a non-negative integer`);
  }
  return num;
}

function normalizeStringList(value: unknown, field: string): string[] {
  return normalizeList(value, field, (item, itemField) =>
    normalizeRequiredString(item, itemField, 256)
  );
}

function normalizeList<T>(
  value: unknown,
  field: string,
  normalize: (item: unknown, field: string) => T
): T[] {
  if (!isPresent(value)) return [];
  const items = Array.isArray(value) ? value : [value];
  return items.map((item, index) => normalize(item, `${field}[${index}]`));
}

function asObject(value: unknown, field: string): Record<string, unknown> {
  if (!isPlainObject(value)) {
    throw new ValidationError(`${field} must be an object`);
  }
  return value;
}

export function normalizeOptionalString(
  value: unknown,
  field: string,
  maxLength: number
): string | null {
  if (value === undefined || value === null) return null;
  if (typeof value !== "string") {
    throw new ValidationError(`${field} must be a string`);
  }
  const trimmed = value.trim();
  if (!trimmed) return null;
  if (trimmed.length > maxLength) {
    throw new ValidationError(`${field} exceeds ${maxLength} characters`);
  }
  ensureNoControlChars(trimmed, field);
  return trimmed;
}

export function normalizeRequiredString(
  value: unknown,
  field: string,
  maxLength: number
): string {
  const normalized = normalizeOptionalString(value, field, maxLength);
  if (!normalized) {
    throw new ValidationError(`${field} is required`);
  }
  return normalized;
}

export function normalizeIdentifier(value: unknown, field: string, maxLength: number): string {
  const normalized = normalizeRequiredString(value, field, maxLength);
  if (/\s/.test(normalized)) {
    throw new ValidationError(`${field} must not contain spaces`);
  }
  return normalized;
}

function ensureNoNul(value: string, field: string): string {
  if (value.includes("\u0000")) {
    throw new ValidationError(`${field} must not contain NUL characters`);
  }
  return value;
}

function ensureNoControlChars(value: string, field: string) {
  if (/[\u0000-\u001F]/.test(value)) {
    throw new ValidationError(`${field} contains control characters`);
  }
}
