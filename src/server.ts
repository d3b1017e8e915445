import http, { IncomingMessage, ServerResponse } from "node:http";
import type { Config } from "./config.js";
import { createDatasetRegistry, type DatasetRegistry } from "./datasets.js";
import { applySchema, createPool, detectDbInfo } from "./db.js";
import { EngineError, NotFoundError, PayloadTooLargeError, ValidationError } from "./errors.js";
import { createBulkIngest, type BulkIngest } from "./ingest.js";
import { createLogger, errorMeta, type Logger } from "./logger.js";
import { createSearchService, type SearchService } from "./search.js";
import { createStore } from "./store.js";
import type { Capabilities } from "./types.js";
import { normalizeDatasetName, normalizeRecordId, normalizeTask } from "./validation.js";

export interface AppOptions {
  config: Pick<Config, "apiKey" | "maxBodyBytes" | "allowOrigin">;
  logger: Logger;
  capabilities: Capabilities;
  datasets: DatasetRegistry;
  ingest: BulkIngest;
  search: SearchService;
}

export interface RunningServer {
  server: http.Server;
  close(): Promise<void>;
}

const DATASET_PATH = /^\/api\/datasets\/([^/]+)$/;
const ACTION_PATH = /^\/api\/datasets\/([^/]+)\/([A-Za-z]+):(bulk|search)$/;
const RECORD_PATH = /^\/api\/datasets\/([^/]+)\/([A-Za-z]+)\/records\/([^/]+)$/;

export function createApp(options: AppOptions): http.Server {
  const { config, logger } = options;

  return http.createServer(async (req: IncomingMessage, res: ServerResponse) => {
    try {
      setSecurityHeaders(res, config.allowOrigin);

      if (req.method === "OPTIONS") {
        res.statusCode = 204;
        res.end();
        return;
      }

      const url = new URL(req.url ?? "/", "http://localhost");
      const path = url.pathname;

      if (req.method === "GET" && path === "/health") {
        respondJson(res, 200, { status: "ok", vectorSearch: options.capabilities.vectorSearch });
        return;
      }

      if (!isAuthorized(req, config.apiKey)) {
        respondJson(res, 401, { error: "unauthorized" });
        return;
      }

      const action = ACTION_PATH.exec(path);
      if (action && req.method === "POST") {
        const dataset = normalizeDatasetName(decodePathSegment(action[1]));
        const task = normalizeTask(action[2]);
        const body = await readJson(req, config.maxBodyBytes);
        if (action[3] === "bulk") {
          respondJson(res, 200, await options.ingest.bulk(dataset, task, body));
        } else {
          const page = {
            from: url.searchParams.get("from"),
            limit: url.searchParams.get("limit")
          };
          respondJson(res, 200, await options.search.search(dataset, task, body, page));
        }
        return;
      }

      const record = RECORD_PATH.exec(path);
      if (record && req.method === "GET") {
        const dataset = normalizeDatasetName(decodePathSegment(record[1]));
        const task = normalizeTask(record[2]);
        const id = normalizeRecordId(decodePathSegment(record[3]));
        respondJson(res, 200, await options.search.getRecord(dataset, task, id));
        return;
      }

      const datasetMatch = DATASET_PATH.exec(path);
      if (datasetMatch && (req.method === "GET" || req.method === "DELETE")) {
        const name = normalizeDatasetName(decodePathSegment(datasetMatch[1]));
        if (req.method === "DELETE") {
          respondJson(res, 200, { deleted: await options.datasets.delete(name) });
          return;
        }
        const dataset = await options.datasets.get(name);
        if (!dataset) {
          throw new NotFoundError(`Dataset ${name} not found`);
        }
        respondJson(res, 200, dataset);
        return;
      }

      respondJson(res, 404, { error: "not found" });
    } catch (err) {
      if (err instanceof EngineError) {
        if (err.httpStatus >= 500) {
          logger.error("request failed", { path: req.url, ...errorMeta(err) });
        }
        respondJson(res, err.httpStatus, { detail: err.toDetail() });
        return;
      }
      const message = err instanceof Error ? err.message : "internal error";
      logger.error("request failed", { path: req.url, ...errorMeta(err) });
      respondJson(res, 500, { error: message });
    }
  });
}

export async function startServer(config: Config): Promise<RunningServer> {
  const logger = createLogger(config.logLevel);
  const pool = createPool(config.databaseUrl);

  if (config.applySchema) {
    await applySchema(pool, { vectors: config.enableVectorSearch });
  }
  const dbInfo = await detectDbInfo(pool);
  const capabilities: Capabilities = Object.freeze({
    vectorSearch: config.enableVectorSearch && dbInfo.vectorExtension && dbInfo.vectorTable
  });

  const store = createStore(pool, {
    vectorEnabled: capabilities.vectorSearch,
    policy: { annotatedStatus: config.annotatedStatus }
  });
  const datasets = createDatasetRegistry(pool);

  const server = createApp({
    config,
    logger,
    capabilities,
    datasets,
    ingest: createBulkIngest({ store, datasets, capabilities, logger }),
    search: createSearchService({
      store,
      datasets,
      capabilities,
      limits: { defaultLimit: config.defaultPageLimit, maxLimit: config.maxPageLimit },
      aggregationSize: config.aggregationSize,
      logger
    })
  });

  await new Promise<void>((resolve) => server.listen(config.port, resolve));
  logger.info("server listening", { port: config.port, ...capabilities });

  return {
    server,
    async close() {
      await new Promise<void>((resolve, reject) =>
        server.close((err) => (err ? reject(err) : resolve()))
      );
      await pool.end();
      logger.info("server stopped");
    }
  };
}

function setSecurityHeaders(res: ServerResponse, allowOrigin: string) {
  res.setHeader("Content-Type", "application/json; charset=utf-8");
  res.setHeader("Access-Control-Allow-Origin", allowOrigin);
  res.setHeader("Access-Control-Allow-Methods", "POST, GET, DELETE, OPTIONS");
  res.setHeader("Access-Control-Allow-Headers", "Authorization, Content-Type, X-API-Key");
  res.setHeader("X-Content-Type-Options", "nosniff");
}

function decodePathSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    throw new ValidationError(`invalid path segment: ${segment}`);
  }
}

function isAuthorized(req: IncomingMessage, apiKey?: string): boolean {
  if (!apiKey) return true;
  const auth = req.headers.authorization?.trim();
  if (auth && auth.startsWith("Bearer ")) {
    return auth.slice("Bearer ".length) === apiKey;
  }
  const headerKey = req.headers["x-api-key"];
  if (typeof headerKey === "string") {
    return headerKey === apiKey;
  }
  return false;
}

async function readJson(req: IncomingMessage, maxBytes: number): Promise<unknown> {
  const chunks: Buffer[] = [];
  let total = 0;

  return new Promise((resolve, reject) => {
    req.on("data", (chunk: Buffer) => {
      total += chunk.length;
      if (total > maxBytes) {
        reject(new PayloadTooLargeError("payload too large"));
        req.destroy();
        return;
      }
      chunks.push(chunk);
    });
    req.on("end", () => {
      const body = Buffer.concat(chunks).toString("utf8");
      if (!body.trim()) {
        resolve(null);
        return;
      }
      try {
        resolve(JSON.parse(body));
      } catch {
        reject(new ValidationError("invalid json"));
      }
    });
    req.on("error", reject);
  });
}

function respondJson(res: ServerResponse, status: number, payload: unknown) {
  res.statusCode = status;
  res.end(JSON.stringify(payload));
}
