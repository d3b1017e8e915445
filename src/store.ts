import { query, withTransaction, type ConnectionPool, type Queryable } from "./db.js";
import { BadRequestError, ValidationError } from "./errors.js";
import { buildSearchIndex, mergeRecord, recordKey, type MergePolicy } from "./records.js";
import {
  buildCountSql,
  buildMetadataTermsSql,
  buildScoreHistogramSql,
  buildSearchSql,
  buildTermsSql,
  toVectorLiteral
} from "./sql.js";
import type {
  AnnotatedRecord,
  BackendQuery,
  Counts,
  Filter,
  RecordId,
  RecordPatch,
  TermsField,
  VectorQuery,
  Vectors
} from "./types.js";

export interface StoreOptions {
  vectorEnabled: boolean;
  policy: MergePolicy;
  clock?: () => Date;
}

export interface SearchHits {
  total: number;
  hits: AnnotatedRecord[];
}

export interface RecordStore {
  upsert(dataset: string, patch: RecordPatch): Promise<AnnotatedRecord>;
  get(dataset: string, id: RecordId): Promise<AnnotatedRecord | null>;
  search(dataset: string, query: BackendQuery): Promise<SearchHits>;
  terms(dataset: string, filters: Filter[], field: TermsField, size: number): Promise<Counts>;
  metadataTerms(dataset: string, filters: Filter[], size: number): Promise<Record<string, Counts>>;
  scoreHistogram(dataset: string, filters: Filter[]): Promise<Counts>;
}

interface RecordRow {
  record: AnnotatedRecord;
}

export function createStore(pool: ConnectionPool, storeOptions: StoreOptions): RecordStore {
  const clock = storeOptions.clock ?? (() => new Date());

  return {
    async upsert(dataset, patch) {
      const id = recordKey(patch.id);
      return withTransaction(pool, async (client) => {
        // Serializes writers of one id, including the first insert of a new one.
        await query(client, "SELECT pg_advisory_xact_lock(hashtext($1), hashtext($2))", [dataset, id]);
        const existing = await query<RecordRow>(
          client,
          "SELECT record FROM records WHERE dataset = $1 AND id = $2 FOR UPDATE",
          [dataset, id]
        );
        const base = (existing.rowCount ?? 0) > 0 ? existing.rows[0].record : null;
        const record = mergeRecord(base, patch, clock(), storeOptions.policy);

        await query(
          client,
          `
          INSERT INTO records (dataset, id, record, search, event_timestamp, last_updated)
          VALUES ($1, $2, $3::jsonb, $4::jsonb, $5, $6)
          ON CONFLICT (dataset, id) DO UPDATE SET
            record = EXCLUDED.record,
            search = EXCLUDED.search,
            event_timestamp = EXCLUDED.event_timestamp,
            last_updated = EXCLUDED.last_updated
          `,
          [
            dataset,
            id,
            JSON.stringify(record),
            JSON.stringify(buildSearchIndex(record)),
            record.event_timestamp,
            record.last_updated
          ]
        );

        if (storeOptions.vectorEnabled && patch.vectors) {
          await replaceVectors(client, dataset, id, patch.vectors);
        }

        return record;
      });
    },

    async get(dataset, id) {
      const result = await query<RecordRow>(
        pool,
        "SELECT record FROM records WHERE dataset = $1 AND id = $2",
        [dataset, recordKey(id)]
      );
      if ((result.rowCount ?? 0) === 0) return null;
      return result.rows[0].record;
    },

    async search(dataset, backendQuery) {
      if (backendQuery.vector && storeOptions.vectorEnabled) {
        const stored = await storedDimensions(pool, dataset, backendQuery.vector.name);
        assertQueryDimensions(backendQuery.vector, stored);
      }
      const count = buildCountSql(dataset, backendQuery.filters);
      const page = buildSearchSql(dataset, backendQuery, storeOptions.vectorEnabled);
      const [totalResult, hitsResult] = await Promise.all([
        query<{ total: number }>(pool, count.text, count.values),
        backendQuery.limit > 0
          ? query<RecordRow>(pool, page.text, page.values)
          : Promise.resolve(null)
      ]);
      return {
        total: totalResult.rows[0]?.total ?? 0,
        hits: hitsResult ? hitsResult.rows.map((row) => row.record) : []
      };
    },

    async terms(dataset, filters, field, size) {
      const sql = buildTermsSql(dataset, filters, field, size);
      const result = await query<{ key: string; count: number }>(pool, sql.text, sql.values);
      return toCounts(result.rows);
    },

    async metadataTerms(dataset, filters, size) {
      const sql = buildMetadataTermsSql(dataset, filters);
      const result = await query<{ field: string; key: string; count: number }>(
        pool,
        sql.text,
        sql.values
      );
      const byField: Record<string, Counts> = {};
      for (const row of result.rows) {
        const counts = (byField[row.field] ??= {});
        if (Object.keys(counts).length < size) {
          counts[row.key] = row.count;
        }
      }
      return byField;
    },

    async scoreHistogram(dataset, filters) {
      const sql = buildScoreHistogramSql(dataset, filters);
      const result = await query<{ bucket: number; count: number }>(pool, sql.text, sql.values);
      return toCounts(result.rows.map((row) => ({ key: scoreBucketKey(row.bucket), count: row.count })));
    }
  };
}

async function replaceVectors(client: Queryable, dataset: string, id: string, vectors: Vectors) {
  await query(client, "DELETE FROM record_vectors WHERE dataset = $1 AND record_id = $2", [
    dataset,
    id
  ]);
  const named = Object.entries(vectors).sort(([a], [b]) => (a < b ? -1 : 1));
  for (const [name, vector] of named) {
    await query(client, "SELECT pg_advisory_xact_lock(hashtextextended($1 || ':' || $2, 0))", [
      dataset,
      name
    ]);
    assertVectorDimensions(name, await storedDimensions(client, dataset, name), vector.value.length);
    await query(
      client,
      "INSERT INTO record_vectors (dataset, record_id, name, embedding) VALUES ($1, $2, $3, $4::vector)",
      [dataset, id, name, toVectorLiteral(vector.value)]
    );
  }
}

async function storedDimensions(db: Queryable, dataset: string, name: string): Promise<number | null> {
  const result = await query<{ dims: number }>(
    db,
    "SELECT vector_dims(embedding) AS dims FROM record_vectors WHERE dataset = $1 AND name = $2 LIMIT 1",
    [dataset, name]
  );
  return result.rows[0]?.dims ?? null;
}

/** Every vector stored under one name in a dataset shares the first one's dimensions. */
export function assertVectorDimensions(name: string, stored: number | null, given: number) {
  if (stored !== null && stored !== given) {
    throw new ValidationError(`vectors.${name} must have ${stored} dimensions, got ${given}`);
  }
}

export function assertQueryDimensions(vector: VectorQuery, stored: number | null) {
  if (stored !== null && stored !== vector.value.length) {
    throw new BadRequestError(
      `Vector ${vector.name} has ${stored} dimensions, query has ${vector.value.length}`
    );
  }
}

export function scoreBucketKey(bucket: number): string {
  return (bucket / 10).toFixed(1);
}

function toCounts(rows: Array<{ key: string; count: number }>): Counts {
  const counts: Counts = {};
  for (const row of rows) {
    counts[row.key] = row.count;
  }
  return counts;
}
