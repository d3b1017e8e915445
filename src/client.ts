import axios, { type AxiosInstance, type AxiosRequestConfig } from "axios";
import type {
  BulkResult,
  DatasetRecord,
  Inputs,
  Labelling,
  Metadata,
  RecordId,
  RecordStatus,
  RecordView,
  SearchQuery,
  SearchResults,
  SortOrder,
  TaskType,
  Vectors
} from "./types.js";
import { isPlainObject } from "./validation.js";

export interface ApiClientOptions {
  baseUrl: string;
  apiKey?: string;
  timeoutMs?: number;
}

export interface RecordInput {
  id: RecordId;
  inputs: Inputs;
  multi_label?: boolean;
  prediction?: Labelling | null;
  annotation?: Labelling | null;
  metadata?: Metadata;
  status?: RecordStatus;
  event_timestamp?: string;
  vectors?: Vectors;
}

export interface BulkBody {
  tags?: Record<string, string>;
  metadata?: Metadata;
  records: RecordInput[];
}

export interface SearchBody {
  query?: Partial<SearchQuery>;
  sort?: Array<{ id: string; order?: SortOrder }>;
}

export interface ApiClient {
  bulk(dataset: string, task: TaskType, body: BulkBody): Promise<BulkResult>;
  search(
    dataset: string,
    task: TaskType,
    body?: SearchBody,
    page?: { from?: number; limit?: number }
  ): Promise<SearchResults>;
  getRecord(dataset: string, task: TaskType, id: RecordId): Promise<RecordView>;
  getDataset(name: string): Promise<DatasetRecord>;
  deleteDataset(name: string): Promise<boolean>;
}

export class ApiRequestError extends Error {
  constructor(
    readonly status: number,
    readonly code: string,
    message: string
  ) {
    super(message);
    this.name = "ApiRequestError";
  }
}

export function createApiClient(options: ApiClientOptions): ApiClient {
  const http = axios.create({
    baseURL: options.baseUrl.replace(/\/+$/, ""),
    timeout: options.timeoutMs ?? 60_000,
    headers: options.apiKey ? { "X-API-Key": options.apiKey } : {},
    validateStatus: () => true
  });

  const datasetPath = (name: string) => `/api/datasets/${encodeURIComponent(name)}`;

  return {
    bulk(dataset, task, body) {
      return send<BulkResult>(http, {
        method: "POST",
        url: `${datasetPath(dataset)}/${task}:bulk`,
        data: body
      });
    },

    search(dataset, task, body = {}, page = {}) {
      return send<SearchResults>(http, {
        method: "POST",
        url: `${datasetPath(dataset)}/${task}:search`,
        params: page,
        data: body
      });
    },

    getRecord(dataset, task, id) {
      return send<RecordView>(http, {
        method: "GET",
        url: `${datasetPath(dataset)}/${task}/records/${encodeURIComponent(String(id))}`
      });
    },

    getDataset(name) {
      return send<DatasetRecord>(http, { method: "GET", url: datasetPath(name) });
    },

    async deleteDataset(name) {
      const result = await send<{ deleted: boolean }>(http, {
        method: "DELETE",
        url: datasetPath(name)
      });
      return result.deleted;
    }
  };
}

async function send<T>(http: AxiosInstance, config: AxiosRequestConfig): Promise<T> {
  const response = await http.request<T>(config);
  if (response.status >= 200 && response.status < 300) {
    return response.data;
  }
  throw toRequestError(response.status, response.data);
}

function toRequestError(status: number, data: unknown): ApiRequestError {
  const detail = isPlainObject(data) ? data.detail : null;
  if (isPlainObject(detail)) {
    const code = typeof detail.code === "string" ? detail.code : "unknown";
    const params = detail.params;
    const message =
      isPlainObject(params) && typeof params.message === "string"
        ? params.message
        : `request failed with status ${status}`;
    return new ApiRequestError(status, code, message);
  }
  const message =
    isPlainObject(data) && typeof data.error === "string"
      ? data.error
      : `request failed with status ${status}`;
  return new ApiRequestError(status, "unknown", message);
}
