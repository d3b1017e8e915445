import { readFile } from "node:fs/promises";
import pg from "pg";
import { BackendUnavailableError } from "./errors.js";

export interface DbInfo {
  vectorExtension: boolean;
  vectorTable: boolean;
}

export interface Queryable {
  query<R extends pg.QueryResultRow = pg.QueryResultRow>(
    text: string,
    values?: unknown[]
  ): Promise<pg.QueryResult<R>>;
}

export interface PooledClient extends Queryable {
  release(err?: Error | boolean): void;
}

export interface ConnectionPool extends Queryable {
  connect(): Promise<PooledClient>;
}

const { Pool } = pg;

const CONNECTION_ERROR_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ENOTFOUND",
  "ETIMEDOUT",
  "EPIPE",
  "57P01",
  "57P02",
  "57P03"
]);

export function createPool(databaseUrl: string): pg.Pool {
  return new Pool({
    connectionString: databaseUrl,
    max: 10
  });
}

export async function applySchema(pool: pg.Pool, options: { vectors: boolean }): Promise<void> {
  await runSqlFile(pool, "schema.sql");
  if (options.vectors) {
    await runSqlFile(pool, "vectors.sql");
  }
}

async function runSqlFile(pool: pg.Pool, name: string): Promise<void> {
  const text = await readFile(new URL(`../sql/${name}`, import.meta.url), "utf8");
  await query(pool, text);
}

export async function detectDbInfo(pool: pg.Pool): Promise<DbInfo> {
  const vectorExtension = await hasVectorExtension(pool);
  const vectorTable = await hasVectorTable(pool);
  return { vectorExtension, vectorTable };
}

async function hasVectorExtension(pool: pg.Pool): Promise<boolean> {
  const result = await query(pool, "SELECT 1 FROM pg_extension WHERE extname = 'vector'");
  return (result.rowCount ?? 0) > 0;
}

async function hasVectorTable(pool: pg.Pool): Promise<boolean> {
  const result = await query(
    pool,
    "SELECT 1 FROM information_schema.tables WHERE table_name = 'record_vectors'"
  );
  return (result.rowCount ?? 0) > 0;
}

export async function query<R extends pg.QueryResultRow = pg.QueryResultRow>(
  db: Queryable,
  text: string,
  values: unknown[] = []
): Promise<pg.QueryResult<R>> {
  try {
    return await db.query<R>(text, values);
  } catch (err) {
    throw asBackendError(err);
  }
}

export async function withTransaction<T>(
  pool: ConnectionPool,
  fn: (client: PooledClient) => Promise<T>
): Promise<T> {
  let client: PooledClient;
  try {
    client = await pool.connect();
  } catch (err) {
    throw asBackendError(err);
  }

  try {
    await query(client, "BEGIN");
    const result = await fn(client);
    await query(client, "COMMIT");
    return result;
  } catch (err) {
    await client.query("ROLLBACK").catch(() => undefined);
    throw err;
  } finally {
    client.release();
  }
}

export function asBackendError(err: unknown): unknown {
  if (err instanceof BackendUnavailableError) return err;
  const code = errorCode(err);
  if (code && (CONNECTION_ERROR_CODES.has(code) || code.startsWith("08"))) {
    const message = err instanceof Error ? err.message : code;
    return new BackendUnavailableError(`Backend unavailable: ${message}`);
  }
  return err;
}

function errorCode(err: unknown): string | null {
  if (typeof err === "object" && err !== null && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return null;
}
