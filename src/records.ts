import { analyze, inputText, tokenize, wordCloudTerms } from "./text.js";
import { labelKey } from "./validation.js";
import type {
  AnnotatedRecord,
  Inputs,
  Labelling,
  Metadata,
  MetadataValue,
  PredictionStatus,
  RecordId,
  RecordMetrics,
  RecordPatch,
  RecordStatus,
  RecordView,
  SearchIndex
} from "./types.js";

export const MULTI_LABEL_THRESHOLD = 0.5;

export interface MergePolicy {
  annotatedStatus: RecordStatus;
}

export function recordKey(id: RecordId): string {
  return String(id);
}

/**
 * Applies a patch on top of the stored record. Top-level fields present in the
 * patch replace the stored value; omitted fields are kept.
 */
export function mergeRecord(
  base: AnnotatedRecord | null,
  patch: RecordPatch,
  now: Date,
  policy: MergePolicy
): AnnotatedRecord {
  const annotation = patch.annotation ?? base?.annotation ?? null;
  const status =
    patch.status ??
    (patch.annotation ? policy.annotatedStatus : base?.status ?? "Default");

  return {
    id: base?.id ?? patch.id,
    inputs: patch.inputs,
    multi_label: patch.multi_label ?? base?.multi_label ?? false,
    prediction: patch.prediction ?? base?.prediction ?? null,
    annotation,
    metadata: patch.metadata ?? base?.metadata ?? {},
    status,
    event_timestamp: patch.event_timestamp ?? base?.event_timestamp ?? now.toISOString(),
    last_updated: nextTimestamp(base?.last_updated ?? null, now),
    metrics: computeMetrics(patch.inputs),
    vectors: patch.vectors ?? base?.vectors ?? {}
  };
}

export function nextTimestamp(previous: string | null, now: Date): string {
  if (!previous) return now.toISOString();
  const floor = Date.parse(previous) + 1;
  return new Date(Math.max(now.getTime(), floor)).toISOString();
}

export function computeMetrics(inputs: Inputs): RecordMetrics {
  let textLength = 0;
  let tokensLength = 0;
  for (const value of Object.values(inputs)) {
    const text = inputText(value);
    textLength += text.length;
    tokensLength += tokenize(text).length;
  }
  return { text_length: textLength, tokens_length: tokensLength };
}

export function predictedLabels(record: AnnotatedRecord): string[] {
  if (!record.prediction) return [];
  return labelClasses(record.prediction, record.multi_label, true);
}

export function annotatedLabels(record: AnnotatedRecord): string[] {
  if (!record.annotation) return [];
  return labelClasses(record.annotation, record.multi_label, false);
}

function labelClasses(labelling: Labelling, multiLabel: boolean, scored: boolean): string[] {
  const labels = labelling.labels;
  if (labels.length === 0) return [];
  const isSpanSet = labels.some((label) => "start" in label);
  if (!isSpanSet && !multiLabel) {
    return [labels[0].class];
  }
  const selected =
    !isSpanSet && scored
      ? labels.filter((label) => (label.score ?? 1) >= MULTI_LABEL_THRESHOLD)
      : labels;
  return unique(selected.map((label) => label.class));
}

export function predictionStatus(record: AnnotatedRecord): PredictionStatus | null {
  if (!record.prediction || !record.annotation) return null;

  const isSpanSet = record.annotation.labels.some((label) => "start" in label);
  const predicted = isSpanSet
    ? record.prediction.labels.map(labelKey)
    : predictedLabels(record);
  const annotated = isSpanSet
    ? record.annotation.labels.map(labelKey)
    : annotatedLabels(record);

  return sameMembers(predicted, annotated) ? "OK" : "KO";
}

export function topScore(record: AnnotatedRecord): number | null {
  const top = record.prediction?.labels[0];
  return top ? top.score ?? 1 : null;
}

export function buildSearchIndex(record: AnnotatedRecord): SearchIndex {
  const inputs: Record<string, string[]> = {};
  const inputsExact: Record<string, string[]> = {};
  for (const [name, value] of Object.entries(record.inputs)) {
    const text = inputText(value);
    inputs[name] = unique(analyze(text));
    inputsExact[name] = unique(tokenize(text));
  }

  const predicted = predictionStatus(record);

  return {
    id: [recordKey(record.id)],
    status: [record.status],
    predicted: predicted ? [predicted] : [],
    predicted_as: predictedLabels(record),
    predicted_by: record.prediction ? [record.prediction.agent] : [],
    annotated_as: annotatedLabels(record),
    annotated_by: record.annotation ? [record.annotation.agent] : [],
    text: unique(Object.values(inputs).flat()),
    text_exact: unique(Object.values(inputsExact).flat()),
    words: wordCloudTerms(record.inputs),
    inputs,
    inputs_exact: inputsExact,
    metadata: metadataTerms(record.metadata),
    score: topScore(record)
  };
}

/** Stringified scalar values per metadata key; nested objects are not counted. */
export function metadataTerms(metadata: Metadata): Record<string, string[]> {
  const terms: Record<string, string[]> = {};
  for (const [key, value] of Object.entries(metadata)) {
    const values = unique(scalarTerms(value));
    if (values.length > 0) {
      terms[key] = values;
    }
  }
  return terms;
}

function scalarTerms(value: MetadataValue): string[] {
  if (value === null) return [];
  if (Array.isArray(value)) {
    return value.flatMap((item) => (Array.isArray(item) ? [] : scalarTerms(item)));
  }
  if (typeof value === "object") return [];
  return [String(value)];
}

export function toRecordView(record: AnnotatedRecord): RecordView {
  return { ...record, predicted: predictionStatus(record) };
}

function unique(values: string[]): string[] {
  return [...new Set(values)];
}

function sameMembers(left: string[], right: string[]): boolean {
  const a = new Set(left);
  const b = new Set(right);
  return a.size === b.size && [...a].every((value) => b.has(value));
}
