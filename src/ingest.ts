import { ValidationError } from "./errors.js";
import type { DatasetRegistry } from "./datasets.js";
import type { Logger } from "./logger.js";
import type { RecordStore } from "./store.js";
import type { BulkResult, Capabilities, TaskType } from "./types.js";
import { normalizeBulkRequest, normalizeRecord } from "./validation.js";

export interface BulkIngest {
  bulk(dataset: string, task: TaskType, body: unknown): Promise<BulkResult>;
}

export interface BulkIngestOptions {
  store: RecordStore;
  datasets: DatasetRegistry;
  capabilities: Capabilities;
  logger: Logger;
}

export function createBulkIngest(options: BulkIngestOptions): BulkIngest {
  const logger = options.logger.child({ component: "ingest" });

  return {
    async bulk(dataset, task, body) {
      const request = normalizeBulkRequest(body);

      await options.datasets.ensure({
        name: dataset,
        task,
        tags: request.tags,
        metadata: request.metadata
      });

      let processed = 0;
      let failed = 0;

      for (const [index, candidate] of request.records.entries()) {
        try {
          const patch = normalizeRecord(candidate, task, options.capabilities);
          await options.store.upsert(dataset, patch);
          processed += 1;
        } catch (err) {
          if (!(err instanceof ValidationError)) throw err;
          failed += 1;
          logger.debug("record rejected", { dataset, index, message: err.message });
        }
      }

      logger.info("bulk ingest finished", { dataset, task, processed, failed });
      return { dataset, processed, failed };
    }
  };
}
