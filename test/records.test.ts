import test from "node:test";
import assert from "node:assert/strict";
import {
  buildSearchIndex,
  mergeRecord,
  metadataTerms,
  nextTimestamp,
  predictedLabels,
  predictionStatus
} from "../src/records.js";
import type { AnnotatedRecord, RecordPatch } from "../src/types.js";

const policy = { annotatedStatus: "Validated" } as const;
const now = new Date("2024-05-01T10:00:00.000Z");

function record(patch: RecordPatch): AnnotatedRecord {
  return mergeRecord(null, patch, now, policy);
}

test("a new record gets defaults and metrics", () => {
  assert.deepEqual(record({ id: 1, inputs: { text: "Hello world" } }), {
    id: 1,
    inputs: { text: "Hello world" },
    multi_label: false,
    prediction: null,
    annotation: null,
    metadata: {},
    status: "Default",
    event_timestamp: "2024-05-01T10:00:00.000Z",
    last_updated: "2024-05-01T10:00:00.000Z",
    metrics: { text_length: 11, tokens_length: 2 },
    vectors: {}
  });
});

test("partial updates keep fields the patch omits", () => {
  const first = record({
    id: 1,
    inputs: { text: "great product" },
    prediction: { agent: "clf-v1", labels: [{ class: "positive", score: 0.8 }] },
    metadata: { source: "web" },
    event_timestamp: "2024-04-01T00:00:00.000Z"
  });
  const merged = mergeRecord(
    first,
    { id: 1, inputs: { text: "great product" }, annotation: { agent: "reviewer", labels: [{ class: "positive" }] } },
    new Date("2024-05-02T00:00:00.000Z"),
    policy
  );
  assert.deepEqual(merged.prediction, first.prediction);
  assert.deepEqual(merged.annotation, { agent: "reviewer", labels: [{ class: "positive" }] });
  assert.deepEqual(merged.metadata, { source: "web" });
  assert.equal(merged.status, "Validated");
  assert.equal(merged.event_timestamp, "2024-04-01T00:00:00.000Z");
  assert.equal(merged.last_updated, "2024-05-02T00:00:00.000Z");
  assert.equal(predictionStatus(merged), "OK");
});

test("an explicit status wins over the annotation policy", () => {
  const merged = record({
    id: 2,
    inputs: { text: "x" },
    annotation: { agent: "reviewer", labels: [{ class: "negative" }] },
    status: "Discarded"
  });
  assert.equal(merged.status, "Discarded");

  const later = mergeRecord(merged, { id: 2, inputs: { text: "x" } }, now, policy);
  assert.equal(later.status, "Discarded");
});

test("last_updated always moves forward", () => {
  assert.equal(nextTimestamp(null, now), "2024-05-01T10:00:00.000Z");
  assert.equal(nextTimestamp("2024-05-01T10:00:00.000Z", now), "2024-05-01T10:00:00.001Z");
  assert.equal(
    nextTimestamp("2024-05-01T10:00:05.000Z", now),
    "2024-05-01T10:00:05.001Z"
  );
  assert.equal(
    nextTimestamp("2024-05-01T09:00:00.000Z", now),
    "2024-05-01T10:00:00.000Z"
  );
});

test("single-label prediction status compares the top label", () => {
  const base: RecordPatch = {
    id: 3,
    inputs: { text: "x" },
    prediction: {
      agent: "clf-v1",
      labels: [
        { class: "ham", score: 0.7 },
        { class: "spam", score: 0.3 }
      ]
    }
  };
  assert.equal(predictionStatus(record(base)), null);
  assert.equal(
    predictionStatus(record({ ...base, annotation: { agent: "r", labels: [{ class: "ham" }] } })),
    "OK"
  );
  assert.equal(
    predictionStatus(record({ ...base, annotation: { agent: "r", labels: [{ class: "spam" }] } })),
    "KO"
  );
});

test("multi-label predictions keep labels above the threshold", () => {
  const multi = record({
    id: 4,
    inputs: { text: "x" },
    multi_label: true,
    prediction: {
      agent: "clf-v1",
      labels: [
        { class: "a", score: 0.7 },
        { class: "b", score: 0.6 },
        { class: "c", score: 0.2 }
      ]
    },
    annotation: { agent: "r", labels: [{ class: "b" }, { class: "a" }] }
  });
  assert.deepEqual(predictedLabels(multi), ["a", "b"]);
  assert.equal(predictionStatus(multi), "OK");
});

test("span predictions compare class and offsets", () => {
  const prediction = { agent: "ner", labels: [{ class: "PER", start: 0, end: 4, score: 0.9 }] };
  assert.equal(
    predictionStatus(
      record({ id: 5, inputs: { text: "Anna" }, prediction, annotation: { agent: "r", labels: [{ class: "PER", start: 0, end: 4 }] } })
    ),
    "OK"
  );
  assert.equal(
    predictionStatus(
      record({ id: 5, inputs: { text: "Anna" }, prediction, annotation: { agent: "r", labels: [{ class: "PER", start: 0, end: 3 }] } })
    ),
    "KO"
  );
});

test("search index carries analysed text and word cloud terms", () => {
  const index = buildSearchIndex(
    record({ id: 6, inputs: { title: "Refund Request", body: ["my", "order is late"] } })
  );
  assert.deepEqual(index.id, ["6"]);
  assert.deepEqual(index.status, ["Default"]);
  assert.deepEqual(index.text, ["refund", "request", "my", "order", "is", "late"]);
  assert.deepEqual(index.text_exact, ["Refund", "Request", "my", "order", "is", "late"]);
  assert.deepEqual(index.words, ["refund", "request", "order", "late"]);
  assert.deepEqual(index.inputs, { title: ["refund", "request"], body: ["my", "order", "is", "late"] });
  assert.equal(index.score, null);
});

test("metadata terms skip nested objects and nulls", () => {
  assert.deepEqual(
    metadataTerms({ "field.one": 1, tags: ["a", "b", "a"], nested: { x: 1 }, flag: true, none: null }),
    { "field.one": ["1"], tags: ["a", "b"], flag: ["true"] }
  );
});
