import type pg from "pg";
import { query } from "./db.js";
import { BadRequestError } from "./errors.js";
import { normalizeTask } from "./validation.js";
import type { DatasetRecord, Metadata, TaskType } from "./types.js";

export interface DatasetRegistry {
  ensure(input: {
    name: string;
    task: TaskType;
    tags: Record<string, string>;
    metadata: Metadata;
  }): Promise<DatasetRecord>;
  get(name: string): Promise<DatasetRecord | null>;
  delete(name: string): Promise<boolean>;
}

interface DatasetRow {
  name: string;
  task: string;
  tags: Record<string, string>;
  metadata: Metadata;
  created_at: Date;
  updated_at: Date;
}

export function createDatasetRegistry(pool: pg.Pool): DatasetRegistry {
  const registry: DatasetRegistry = {
    async ensure(input) {
      const result = await query<DatasetRow>(
        pool,
        `
        INSERT INTO datasets (name, task, tags, metadata)
        VALUES ($1, $2, $3::jsonb, $4::jsonb)
        ON CONFLICT (name) DO UPDATE SET
          tags = datasets.tags || EXCLUDED.tags,
          metadata = datasets.metadata || EXCLUDED.metadata,
          updated_at = now()
        WHERE datasets.task = EXCLUDED.task
        RETURNING *
        `,
        [input.name, input.task, JSON.stringify(input.tags), JSON.stringify(input.metadata)]
      );

      if ((result.rowCount ?? 0) === 0) {
        const existing = await registry.get(input.name);
        throw new BadRequestError(
          `Dataset ${input.name} is a ${existing?.task ?? "different"} dataset, not ${input.task}`
        );
      }
      return toDatasetRecord(result.rows[0]);
    },

    async get(name) {
      const result = await query<DatasetRow>(pool, "SELECT * FROM datasets WHERE name = $1", [name]);
      if ((result.rowCount ?? 0) === 0) return null;
      return toDatasetRecord(result.rows[0]);
    },

    async delete(name) {
      const result = await query(pool, "DELETE FROM datasets WHERE name = $1", [name]);
      return (result.rowCount ?? 0) > 0;
    }
  };

  return registry;
}

function toDatasetRecord(row: DatasetRow): DatasetRecord {
  return {
    name: row.name,
    task: normalizeTask(row.task),
    tags: row.tags,
    metadata: row.metadata,
    created_at: row.created_at.toISOString(),
    updated_at: row.updated_at.toISOString()
  };
}
