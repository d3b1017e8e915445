import type { BackendQuery, Filter, SortKey, TermTarget, TermsField, TextQuery } from "./types.js";

export interface SqlQuery {
  text: string;
  values: unknown[];
}

function bind(values: unknown[], value: unknown): string {
  values.push(value);
  return `$${values.length}`;
}

export function buildWhere(dataset: string, filters: Filter[], values: unknown[]): string {
  const where = [`r.dataset = ${bind(values, dataset)}`];
  for (const filter of filters) {
    where.push(compileFilter(filter, values));
  }
  return where.join(" AND ");
}

function compileFilter(filter: Filter, values: unknown[]): string {
  switch (filter.kind) {
    case "terms":
      return `${targetPath(filter.target, values)} ?| ${bind(values, filter.values)}::text[]`;
    case "score": {
      const clauses = ["r.search->>'score' IS NOT NULL"];
      if (filter.gte !== null) {
        clauses.push(`(r.search->>'score')::float8 >= ${bind(values, filter.gte)}`);
      }
      if (filter.lte !== null) {
        clauses.push(`(r.search->>'score')::float8 <= ${bind(values, filter.lte)}`);
      }
      return `(${clauses.join(" AND ")})`;
    }
    case "timestamp": {
      const clauses: string[] = [];
      if (filter.gte !== null) {
        clauses.push(`r.${filter.field} >= ${bind(values, filter.gte)}::timestamptz`);
      }
      if (filter.lte !== null) {
        clauses.push(`r.${filter.field} <= ${bind(values, filter.lte)}::timestamptz`);
      }
      return clauses.length > 0 ? `(${clauses.join(" AND ")})` : "TRUE";
    }
    case "text":
      return compileText(filter.query, values);
  }
}

export function compileText(query: TextQuery, values: unknown[]): string {
  switch (query.kind) {
    case "term": {
      const path = targetPath(query.target, values);
      if (query.prefix) {
        const pattern = bind(values, `${escapeLike(query.value)}%`);
        return `EXISTS (SELECT 1 FROM jsonb_array_elements_text(${path}) AS t(term) WHERE t.term LIKE ${pattern})`;
      }
      return `${path} ? ${bind(values, query.value)}`;
    }
    case "and":
      return `(${query.clauses.map((clause) => compileText(clause, values)).join(" AND ")})`;
    case "or":
      return `(${query.clauses.map((clause) => compileText(clause, values)).join(" OR ")})`;
    case "not":
      return `NOT (${compileText(query.clause, values)})`;
  }
}

export function targetPath(target: TermTarget, values: unknown[]): string {
  switch (target.kind) {
    case "field":
      return `(r.search->'${target.field}')`;
    case "input": {
      const column = target.exact ? "inputs_exact" : "inputs";
      return `COALESCE(r.search->'${column}'->${bind(values, target.name)}, '[]'::jsonb)`;
    }
    case "metadata":
      return `COALESCE(r.search->'metadata'->${bind(values, target.key)}, '[]'::jsonb)`;
  }
}

export function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (char) => `\\${char}`);
}

export function sortExpression(key: SortKey, values: unknown[]): string {
  if ("key" in key) {
    return `(r.record->'metadata'->>${bind(values, key.key)}) COLLATE "C"`;
  }
  switch (key.field) {
    case "id":
      return `r.id COLLATE "C"`;
    case "metadata":
      return `(r.record->>'metadata') COLLATE "C"`;
    case "score":
      return `(r.search->>'score')::float8`;
    case "last_updated":
    case "event_timestamp":
      return `r.${key.field}`;
    default:
      return `(r.search->'${key.field}'->>0) COLLATE "C"`;
  }
}

export function toVectorLiteral(value: number[]): string {
  return `[${value.join(",")}]`;
}

export function buildSearchSql(dataset: string, query: BackendQuery, vectorEnabled: boolean): SqlQuery {
  const values: unknown[] = [];
  const order: string[] = [];
  let join = "";

  if (query.vector && vectorEnabled) {
    const name = bind(values, query.vector.name);
    join = `LEFT JOIN record_vectors v ON v.dataset = r.dataset AND v.record_id = r.id AND v.name = ${name}`;
    order.push(`v.embedding <-> ${bind(values, toVectorLiteral(query.vector.value))}::vector ASC NULLS LAST`);
  }

  const where = buildWhere(dataset, query.filters, values);
  for (const key of query.sort) {
    order.push(`${sortExpression(key, values)} ${key.order === "desc" ? "DESC" : "ASC"} NULLS LAST`);
  }

  const offset = bind(values, query.from);
  const limit = bind(values, query.limit);

  const text = `
    SELECT r.record
    FROM records r
    ${join}
    WHERE ${where}
    ORDER BY ${order.join(", ")}
    OFFSET ${offset}
    LIMIT ${limit}
  `;

  return { text, values };
}

export function buildCountSql(dataset: string, filters: Filter[]): SqlQuery {
  const values: unknown[] = [];
  const where = buildWhere(dataset, filters, values);
  return {
    text: `SELECT count(*)::int AS total FROM records r WHERE ${where}`,
    values
  };
}

export function buildTermsSql(
  dataset: string,
  filters: Filter[],
  field: TermsField,
  size: number
): SqlQuery {
  const values: unknown[] = [];
  const where = buildWhere(dataset, filters, values);
  const limit = bind(values, size);
  return {
    text: `
      SELECT t.term AS key, count(*)::int AS count
      FROM records r
      CROSS JOIN LATERAL jsonb_array_elements_text(r.search->'${field}') AS t(term)
      WHERE ${where}
      GROUP BY t.term
      ORDER BY count DESC, t.term COLLATE "C" ASC
      LIMIT ${limit}
    `,
    values
  };
}

export function buildMetadataTermsSql(dataset: string, filters: Filter[]): SqlQuery {
  const values: unknown[] = [];
  const where = buildWhere(dataset, filters, values);
  return {
    text: `
      SELECT m.key AS field, t.term AS key, count(*)::int AS count
      FROM records r
      CROSS JOIN LATERAL jsonb_each(r.search->'metadata') AS m(key, terms)
      CROSS JOIN LATERAL jsonb_array_elements_text(m.terms) AS t(term)
      WHERE ${where}
      GROUP BY m.key, t.term
      ORDER BY m.key COLLATE "C" ASC, count DESC, t.term COLLATE "C" ASC
    `,
    values
  };
}

export function buildScoreHistogramSql(dataset: string, filters: Filter[]): SqlQuery {
  const values: unknown[] = [];
  const where = buildWhere(dataset, filters, values);
  return {
    text: `
      SELECT LEAST(FLOOR((r.search->>'score')::float8 * 10), 9)::int AS bucket, count(*)::int AS count
      FROM records r
      WHERE ${where} AND r.search->>'score' IS NOT NULL
      GROUP BY bucket
      ORDER BY bucket ASC
    `,
    values
  };
}
