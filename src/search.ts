import { createAggregationEngine } from "./aggregations.js";
import type { DatasetRegistry } from "./datasets.js";
import { BadRequestError, NotFoundError } from "./errors.js";
import type { Logger } from "./logger.js";
import { translateSearch } from "./query.js";
import { toRecordView } from "./records.js";
import { assembleResults } from "./results.js";
import type { RecordStore } from "./store.js";
import type {
  Capabilities,
  DatasetRecord,
  RecordId,
  RecordView,
  SearchResults,
  TaskType
} from "./types.js";
import { normalizePage, normalizeSearchRequest, type PageLimits } from "./validation.js";

export interface SearchService {
  search(
    dataset: string,
    task: TaskType,
    body: unknown,
    page: { from?: unknown; limit?: unknown }
  ): Promise<SearchResults>;
  getRecord(dataset: string, task: TaskType, id: RecordId): Promise<RecordView>;
}

export interface SearchServiceOptions {
  store: RecordStore;
  datasets: DatasetRegistry;
  capabilities: Capabilities;
  limits: PageLimits;
  aggregationSize: number;
  logger: Logger;
}

export function createSearchService(options: SearchServiceOptions): SearchService {
  const logger = options.logger.child({ component: "search" });
  const aggregations = createAggregationEngine(options.store, { size: options.aggregationSize });

  async function requireDataset(name: string, task: TaskType): Promise<DatasetRecord> {
    const dataset = await options.datasets.get(name);
    if (!dataset) {
      throw new NotFoundError(`Dataset ${name} not found`);
    }
    if (dataset.task !== task) {
      throw new BadRequestError(`Dataset ${name} is a ${dataset.task} dataset, not ${task}`);
    }
    return dataset;
  }

  return {
    async search(dataset, task, body, page) {
      await requireDataset(dataset, task);
      const request = normalizeSearchRequest(body);
      const query = translateSearch(
        request,
        normalizePage(page, options.limits),
        options.capabilities
      );

      const [hits, aggs] = await Promise.all([
        options.store.search(dataset, query),
        aggregations.aggregate(dataset, query)
      ]);

      logger.debug("search finished", {
        dataset,
        total: hits.total,
        from: query.from,
        limit: query.limit
      });
      return assembleResults(hits.total, hits.hits, aggs);
    },

    async getRecord(dataset, task, id) {
      await requireDataset(dataset, task);
      const record = await options.store.get(dataset, id);
      if (!record) {
        throw new NotFoundError(`Record ${id} not found in dataset ${dataset}`);
      }
      return toRecordView(record);
    }
  };
}
