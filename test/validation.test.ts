import test from "node:test";
import assert from "node:assert/strict";
import { ValidationError } from "../src/errors.js";
import {
  normalizeDatasetName,
  normalizeLabelling,
  normalizeMetadata,
  normalizePage,
  normalizeRecord,
  normalizeRecordId,
  normalizeSearchQuery,
  normalizeSearchRequest,
  normalizeSort
} from "../src/validation.js";

const limits = { defaultLimit: 50, maxLimit: 1000 };

test("normalizeDatasetName accepts valid values", () => {
  assert.equal(normalizeDatasetName("support-tickets_v2"), "support-tickets_v2");
});

test("normalizeDatasetName rejects spaces and upper case", () => {
  assert.throws(() => normalizeDatasetName("Bad Name"), ValidationError);
});

test("normalizeDatasetName enforces length", () => {
  assert.throws(() => normalizeDatasetName("a".repeat(200)), ValidationError);
});

test("normalizeRecordId keeps integers and strings", () => {
  assert.equal(normalizeRecordId(7), 7);
  assert.equal(normalizeRecordId("abc"), "abc");
  assert.throws(() => normalizeRecordId(1.5), ValidationError);
  assert.throws(() => normalizeRecordId(undefined), ValidationError);
});

test("prediction labels default their score, dedupe and sort by score", () => {
  const labelling = normalizeLabelling(
    {
      agent: "clf-v1",
      labels: [
        { class: "spam", score: 0.2 },
        { class: "ham", score: 0.9 },
        { class: "spam", score: 0.4 },
        { class: "other" }
      ]
    },
    "prediction",
    "TextClassification"
  );
  assert.deepEqual(labelling, {
    agent: "clf-v1",
    labels: [
      { class: "other", score: 1 },
      { class: "ham", score: 0.9 },
      { class: "spam", score: 0.4 }
    ]
  });
});

test("annotation labels drop scores", () => {
  const labelling = normalizeLabelling(
    { agent: "reviewer", labels: [{ class: "ham", score: 0.5 }, { class: "ham" }] },
    "annotation",
    "TextClassification"
  );
  assert.deepEqual(labelling, { agent: "reviewer", labels: [{ class: "ham" }] });
});

test("span labels require a valid range", () => {
  assert.throws(
    () =>
      normalizeLabelling(
        { agent: "ner", labels: [{ class: "PER", start: 4, end: 4 }] },
        "prediction",
        "TokenClassification"
      ),
    ValidationError
  );
  assert.throws(
    () =>
      normalizeLabelling(
        { agent: "clf", labels: [{ class: "PER", start: 0, end: 4 }] },
        "prediction",
        "TextClassification"
      ),
    ValidationError
  );
});

test("labelling requires an agent", () => {
  assert.throws(
    () => normalizeLabelling({ labels: [] }, "annotation", "TextClassification"),
    ValidationError
  );
});

test("normalizeMetadata keeps dotted keys and nested values", () => {
  assert.deepEqual(normalizeMetadata({ "field.one": 1, nested: { a: [true, null] } }), {
    "field.one": 1,
    nested: { a: [true, null] }
  });
});

test("normalizeMetadata rejects NUL characters in keys and values", () => {
  assert.throws(
    () => normalizeMetadata({ "a\u0000b": 1 }),
    (err: unknown) => err instanceof ValidationError && err.message === "metadata key must not contain NUL characters"
  );
  assert.throws(
    () => normalizeMetadata({ outer: { note: "x\u0000" } }),
    (err: unknown) =>
      err instanceof ValidationError && err.message === "metadata.outer.note must not contain NUL characters"
  );
});

test("normalizeRecord rejects vectors without vector support", () => {
  assert.throws(
    () =>
      normalizeRecord(
        { id: 1, inputs: { text: "hello" }, vectors: { emb: { value: [0.1, 0.2] } } },
        "TextClassification",
        { vectorSearch: false }
      ),
    (err: unknown) =>
      err instanceof ValidationError &&
      err.message === "vectors provided but vector search is not enabled"
  );
});

test("normalizeRecord rejects multi_label for token classification", () => {
  assert.throws(
    () =>
      normalizeRecord({ id: 1, inputs: { text: "x" }, multi_label: true }, "TokenClassification", {
        vectorSearch: false
      }),
    ValidationError
  );
});

test("normalizeRecord only sets the fields it was given", () => {
  const patch = normalizeRecord(
    { id: "a", inputs: { text: ["first", "second"] }, event_timestamp: "2024-01-02T03:04:05Z" },
    "TextClassification",
    { vectorSearch: false }
  );
  assert.deepEqual(patch, {
    id: "a",
    inputs: { text: ["first", "second"] },
    event_timestamp: "2024-01-02T03:04:05.000Z"
  });
});

test("normalizeSearchRequest defaults an empty body", () => {
  assert.deepEqual(normalizeSearchRequest(null), {
    query: {
      query_text: null,
      ids: [],
      predicted_by: [],
      annotated_by: [],
      predicted_as: [],
      annotated_as: [],
      status: [],
      predicted: null,
      metadata: {},
      score: null,
      event_timestamp: null,
      vector: null
    },
    sort: []
  });
});

test("normalizeSearchQuery wraps single values and stringifies metadata", () => {
  const query = normalizeSearchQuery({
    predicted_by: "bot-a",
    status: ["Validated"],
    metadata: { "field.one": 1, flag: [true, "x"] },
    score: { from: 0.5 }
  });
  assert.deepEqual(query.predicted_by, ["bot-a"]);
  assert.deepEqual(query.status, ["Validated"]);
  assert.deepEqual(query.metadata, { "field.one": ["1"], flag: ["true", "x"] });
  assert.deepEqual(query.score, { from: 0.5, to: null });
});

test("normalizeSearchQuery keeps query text as sent", () => {
  assert.equal(normalizeSearchQuery({ query_text: "hello\tworld" }).query_text, "hello\tworld");
  assert.equal(normalizeSearchQuery({ query_text: " ! " }).query_text, " ! ");
  assert.equal(normalizeSearchQuery({ query_text: "  " }).query_text, null);
  assert.throws(() => normalizeSearchQuery({ query_text: "a\u0000" }), ValidationError);
});

test("normalizeSearchQuery rejects unknown statuses and predicted values", () => {
  assert.throws(() => normalizeSearchQuery({ status: "Pending" }), ValidationError);
  assert.throws(() => normalizeSearchQuery({ predicted: "maybe" }), ValidationError);
});

test("normalizeSort defaults the order to asc", () => {
  assert.deepEqual(normalizeSort([{ id: "score" }]), [{ id: "score", order: "asc" }]);
  assert.throws(() => normalizeSort([{ id: "score", order: "up" }]), ValidationError);
});

test("normalizePage applies defaults and clamps the limit", () => {
  assert.deepEqual(normalizePage({}, limits), { from: 0, limit: 50 });
  assert.deepEqual(normalizePage({ from: "10", limit: "5000" }, limits), { from: 10, limit: 1000 });
  assert.deepEqual(normalizePage({ from: "", limit: "0" }, limits), { from: 0, limit: 0 });
  assert.throws(() => normalizePage({ from: "-1" }, limits), ValidationError);
});
