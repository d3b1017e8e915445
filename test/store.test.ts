import test from "node:test";
import assert from "node:assert/strict";
import type { QueryResult, QueryResultRow } from "pg";
import type { ConnectionPool, PooledClient } from "../src/db.js";
import { BadRequestError, ValidationError } from "../src/errors.js";
import { assertQueryDimensions, assertVectorDimensions, createStore } from "../src/store.js";

interface Statement {
  text: string;
  values: unknown[];
}

function createRecordingPool(failOn?: RegExp) {
  const statements: Statement[] = [];
  let released = 0;

  const client: PooledClient = {
    async query<R extends QueryResultRow = QueryResultRow>(
      text: string,
      values: unknown[] = []
    ): Promise<QueryResult<R>> {
      const compact = text.replace(/\s+/g, " ").trim();
      statements.push({ text: compact, values });
      if (failOn && failOn.test(compact)) {
        throw new Error("write failed");
      }
      return { command: "", rowCount: 0, oid: 0, fields: [], rows: [] };
    },
    release() {
      released += 1;
    }
  };

  const pool: ConnectionPool = {
    query: client.query,
    connect: async () => client
  };

  return {
    pool,
    statements,
    released: () => released
  };
}

const policy = { annotatedStatus: "Validated" } as const;
const clock = () => new Date("2024-03-01T09:00:00.000Z");

test("upsert locks the record id before reading it", async () => {
  const { pool, statements, released } = createRecordingPool();
  const store = createStore(pool, { vectorEnabled: false, policy, clock });

  const record = await store.upsert("tickets", { id: 7, inputs: { text: "first" } });
  assert.equal(record.id, 7);

  const texts = statements.map((statement) => statement.text);
  assert.equal(texts.length, 5);
  assert.deepEqual(texts.slice(0, 3), [
    "BEGIN",
    "SELECT pg_advisory_xact_lock(hashtext($1), hashtext($2))",
    "SELECT record FROM records WHERE dataset = $1 AND id = $2 FOR UPDATE"
  ]);
  assert.match(texts[3], /^INSERT INTO records \(dataset, id, record, search, event_timestamp, last_updated\)/);
  assert.equal(texts[4], "COMMIT");
  assert.deepEqual(statements[1].values, ["tickets", "7"]);
  assert.equal(released(), 1);
});

test("upsert locks each vector name in order and checks its dimensions", async () => {
  const { pool, statements } = createRecordingPool();
  const store = createStore(pool, { vectorEnabled: true, policy, clock });

  await store.upsert("tickets", {
    id: "a",
    inputs: { text: "first" },
    vectors: { title: { value: [1, 2] }, body: { value: [3, 4, 5] } }
  });

  const vectorLock = "SELECT pg_advisory_xact_lock(hashtextextended($1 || ':' || $2, 0))";
  const dims =
    "SELECT vector_dims(embedding) AS dims FROM record_vectors WHERE dataset = $1 AND name = $2 LIMIT 1";
  const insert =
    "INSERT INTO record_vectors (dataset, record_id, name, embedding) VALUES ($1, $2, $3, $4::vector)";
  assert.deepEqual(
    statements.slice(4).map((statement) => statement.text),
    [
      "DELETE FROM record_vectors WHERE dataset = $1 AND record_id = $2",
      vectorLock,
      dims,
      insert,
      vectorLock,
      dims,
      insert,
      "COMMIT"
    ]
  );
  assert.deepEqual(statements[5].values, ["tickets", "body"]);
  assert.deepEqual(statements[8].values, ["tickets", "title"]);
});

test("a failed write rolls the transaction back", async () => {
  const { pool, statements, released } = createRecordingPool(/^INSERT INTO records/);
  const store = createStore(pool, { vectorEnabled: false, policy, clock });

  await assert.rejects(
    () => store.upsert("tickets", { id: 7, inputs: { text: "first" } }),
    /write failed/
  );
  assert.equal(statements.at(-1)?.text, "ROLLBACK");
  assert.equal(released(), 1);
});

test("vector dimensions must match the stored ones", () => {
  assert.doesNotThrow(() => assertVectorDimensions("emb", null, 3));
  assert.doesNotThrow(() => assertVectorDimensions("emb", 3, 3));
  assert.throws(
    () => assertVectorDimensions("emb", 2, 3),
    (err: unknown) => err instanceof ValidationError && err.message === "vectors.emb must have 2 dimensions, got 3"
  );
  assert.throws(
    () => assertQueryDimensions({ name: "emb", value: [1, 2, 3] }, 2),
    (err: unknown) =>
      err instanceof BadRequestError && err.message === "Vector emb has 2 dimensions, query has 3"
  );
});
