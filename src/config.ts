import type { LogLevel } from "./logger.js";
import type { RecordStatus } from "./types.js";

export interface Config {
  port: number;
  databaseUrl: string;
  apiKey?: string;
  maxBodyBytes: number;
  logLevel: LogLevel;
  allowOrigin: string;
  enableVectorSearch: boolean;
  applySchema: boolean;
  defaultPageLimit: number;
  maxPageLimit: number;
  aggregationSize: number;
  annotatedStatus: RecordStatus;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const databaseUrl = required(env.DATABASE_URL, "DATABASE_URL");
  const defaultPageLimit = parseNumber(env.DEFAULT_PAGE_LIMIT, 50, "DEFAULT_PAGE_LIMIT");
  const maxPageLimit = parseNumber(env.MAX_PAGE_LIMIT, 1_000, "MAX_PAGE_LIMIT");
  if (defaultPageLimit > maxPageLimit) {
    throw new Error("DEFAULT_PAGE_LIMIT must not exceed MAX_PAGE_LIMIT");
  }

  return {
    port: parseNumber(env.PORT, 8080, "PORT"),
    databaseUrl,
    apiKey: env.API_KEY || undefined,
    maxBodyBytes: parseNumber(env.MAX_BODY_BYTES, 10_485_760, "MAX_BODY_BYTES"),
    logLevel: parseLogLevel(env.LOG_LEVEL),
    allowOrigin: env.ALLOW_ORIGIN ?? "*",
    enableVectorSearch: parseBoolean(env.ENABLE_VECTOR_SEARCH, false, "ENABLE_VECTOR_SEARCH"),
    applySchema: parseBoolean(env.APPLY_SCHEMA, true, "APPLY_SCHEMA"),
    defaultPageLimit,
    maxPageLimit,
    aggregationSize: parseNumber(env.AGGREGATION_SIZE, 50, "AGGREGATION_SIZE"),
    annotatedStatus: parseStatus(env.ANNOTATED_STATUS)
  };
}

function required(value: string | undefined, name: string): string {
  if (!value) {
    throw new Error(`${name} is required`);
  }
  return value;
}

function parseNumber(value: string | undefined, fallback: number, name: string): number {
  if (!value) return fallback;
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`${name} must be a positive number`);
  }
  return Math.floor(parsed);
}

function parseBoolean(value: string | undefined, fallback: boolean, name: string): boolean {
  if (!value) return fallback;
  switch (value.toLowerCase()) {
    case "true":
    case "1":
      return true;
    case "false":
    case "0":
      return false;
    default:
      throw new Error(`${name} must be true or false`);
  }
}

function parseLogLevel(value: string | undefined): LogLevel {
  switch ((value ?? "info").toLowerCase()) {
    case "debug":
      return "debug";
    case "info":
      return "info";
    case "warn":
      return "warn";
    case "error":
      return "error";
    default:
      throw new Error("LOG_LEVEL must be one of debug, info, warn, error");
  }
}

function parseStatus(value: string | undefined): RecordStatus {
  switch (value ?? "Validated") {
    case "Default":
      return "Default";
    case "Validated":
      return "Validated";
    case "Edited":
      return "Edited";
    default:
      throw new Error("ANNOTATED_STATUS must be one of Default, Validated, Edited");
  }
}
