// Copyright 2026 jem-sec-attest contributors
//
// Licensed under the Apache License, Version 2.0 (the "License");
// you may not use this file except in compliance with the License.
// You may obtain a copy of the License at
//
//     http://www.apache.org/licenses/LICENSE-2.0
//
// Unless required by applicable law or agreed to in writing, software
// distributed under the License is distributed on an "AS IS" BASIS,
// WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
// See the License for the specific language governing permissions and
// limitations under the License.

/**
 * PostgreSQL-backed StorageAdapter implementation using postgres.js.
 * Payloads are stored as JSONB; filters compare the text form of payload fields.
 */

import postgres from "postgres";
import type { StorageAdapter } from "./adapter";
import {
  RecordNotFoundError,
  UniqueConstraintError,
  assertIdentifier,
  errorCode,
  errorMessage,
  escapeLike,
  isPlainObject,
} from "./errors";
import type {
  QueryFilter,
  Scalar,
  StorageMetadata,
  StoredRecord,
  TransactionContext,
  WhereFilter,
} from "./types";

export interface PostgresAdapterOptions {
  connectionString: string;
  max?: number;
}

const UNIQUE_VIOLATION = "23505";

type Queryable = Pick<postgres.Sql, "unsafe">;

class ParamList {
  readonly values: postgres.SerializableParameter[] = [];

  add(value: postgres.SerializableParameter): string {
    this.values.push(value);
    return `$${this.values.length}`;
  }
}

function fieldText(field: string): string {
  assertIdentifier(field, "field");
  return `data->>'${field}'`;
}

function expectationSql(params: ParamList, where: Record<string, Scalar>): string[] {
  return Object.entries(where).map(([key, value]) =>
    value === null
      ? `${fieldText(key)} IS NULL`
      : `${fieldText(key)} = ${params.add(String(value))}`,
  );
}

function buildWhere(params: ParamList, collection: string, filter: WhereFilter): string {
  const conditions: string[] = [`collection = ${params.add(collection)}`];
  conditions.push(...expectationSql(params, filter.where ?? {}));

  for (const range of filter.range ?? []) {
    const text = fieldText(range.field);
    if (range.gt !== undefined) conditions.push(`${text} > ${params.add(range.gt)}`);
    if (range.gte !== undefined) conditions.push(`${text} >= ${params.add(range.gte)}`);
    if (range.lt !== undefined) conditions.push(`${text} < ${params.add(range.lt)}`);
    if (range.lte !== undefined) conditions.push(`${text} <= ${params.add(range.lte)}`);
  }

  if (filter.search && filter.search.term !== "" && filter.search.fields.length > 0) {
    const search = filter.search;
    const pattern = params.add(`%${escapeLike(search.term)}%`);
    const ors = search.fields.map((f) => `${fieldText(f)} ILIKE ${pattern} ESCAPE '\\'`);
    conditions.push(`(${ors.join(" OR ")})`);
  }

  return conditions.join(" AND ");
}

function toRecord(row: unknown): StoredRecord | null {
  if (!isPlainObject(row)) {
    return null;
  }
  const { id, data } = row;
  if (typeof id !== "number" || !isPlainObject(data)) {
    return null;
  }
  return { ...data, id };
}

function toRecords(rows: Iterable<unknown>): StoredRecord[] {
  const records: StoredRecord[] = [];
  for (const row of rows) {
    const record = toRecord(row);
    if (record) {
      records.push(record);
    }
  }
  return records;
}

/**
 * Runs record operations against either the pool or a reserved transaction connection.
 */
class PostgresExecutor implements TransactionContext {
  constructor(private readonly sql: Queryable) {}

  async create(collection: string, data: Record<string, unknown>): Promise<StoredRecord> {
    const now = new Date().toISOString();
    const rows = await this.run(
      collection,
      "INSERT INTO records (collection, data, created_at, updated_at) VALUES ($1, $2::jsonb, $3, $4) RETURNING id",
      [collection, JSON.stringify(data), now, now],
    );
    const first: unknown = rows[0];
    if (!isPlainObject(first) || typeof first.id !== "number") {
      throw new Error(`Failed to create record in ${collection}: no id returned`);
    }
    return { ...data, id: first.id };
  }

  async findById(collection: string, id: number): Promise<StoredRecord | null> {
    const rows = await this.run(
      collection,
      "SELECT id, data FROM records WHERE id = $1 AND collection = $2",
      [id, collection],
    );
    return toRecords(rows)[0] ?? null;
  }

  async findMany(collection: string, query: QueryFilter): Promise<StoredRecord[]> {
    const params = new ParamList();
    let sql = `SELECT id, data FROM records WHERE ${buildWhere(params, collection, query)}`;

    if (query.orderBy && query.orderBy.length > 0) {
      const orderClauses = query.orderBy.map((o) => {
        const dir = o.direction === "desc" ? "DESC" : "ASC";
        return o.field === "id" ? `id ${dir}` : `${fieldText(o.field)} ${dir}`;
      });
      sql += ` ORDER BY ${orderClauses.join(", ")}`;
    }

    if (query.limit !== undefined) {
      sql += ` LIMIT ${params.add(query.limit)}`;
    }

    if (query.offset !== undefined) {
      sql += ` OFFSET ${params.add(query.offset)}`;
    }

    return toRecords(await this.run(collection, sql, params.values));
  }

  async count(collection: string, filter: WhereFilter = {}): Promise<number> {
    const params = new ParamList();
    const rows = await this.run(
      collection,
      `SELECT COUNT(*)::int AS total FROM records WHERE ${buildWhere(params, collection, filter)}`,
      params.values,
    );
    const first: unknown = rows[0];
    return isPlainObject(first) && typeof first.total === "number" ? first.total : 0;
  }

  async update(
    collection: string,
    id: number,
    data: Record<string, unknown>,
  ): Promise<StoredRecord> {
    const updated = await this.updateIf(collection, id, {}, data);
    if (!updated) {
      throw new RecordNotFoundError(collection, id);
    }
    return updated;
  }

  async updateIf(
    collection: string,
    id: number,
    expected: Record<string, Scalar>,
    data: Record<string, unknown>,
  ): Promise<StoredRecord | null> {
    const params = new ParamList();
    const patch = params.add(JSON.stringify(data));
    const now = params.add(new Date().toISOString());
    const conditions = [
      `id = ${params.add(id)}`,
      `collection = ${params.add(collection)}`,
      ...expectationSql(params, expected),
    ];
    const rows = await this.run(
      collection,
      `UPDATE records SET data = data || ${patch}::jsonb, updated_at = ${now}
         WHERE ${conditions.join(" AND ")} RETURNING id, data`,
      params.values,
    );
    return toRecords(rows)[0] ?? null;
  }

  async delete(collection: string, id: number): Promise<void> {
    await this.run(collection, "DELETE FROM records WHERE id = $1 AND collection = $2", [
      id,
      collection,
    ]);
  }

  async deleteMany(collection: string, where: Record<string, Scalar>): Promise<number> {
    const params = new ParamList();
    const rows = await this.run(
      collection,
      `DELETE FROM records WHERE ${buildWhere(params, collection, { where })}`,
      params.values,
    );
    return rows.count;
  }

  async run(
    collection: string,
    query: string,
    params: postgres.SerializableParameter[],
  ) {
    try {
      return await this.sql.unsafe(query, params);
    } catch (error) {
      if (errorCode(error) === UNIQUE_VIOLATION) {
        throw new UniqueConstraintError(collection, error);
      }
      throw new Error(`Failed to query ${collection}: ${errorMessage(error)}`, { cause: error });
    }
  }
}

export class PostgresAdapter implements StorageAdapter {
  private sql: postgres.Sql;
  private executor: PostgresExecutor;
  private initialized = false;

  constructor(options: PostgresAdapterOptions) {
    this.sql = postgres(options.connectionString, {
      max: options.max ?? 10,
    });
    this.executor = new PostgresExecutor(this.sql);
  }

  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }

    try {
      await this.sql.unsafe(`
        CREATE TABLE IF NOT EXISTS records (
          id SERIAL PRIMARY KEY,
          collection TEXT NOT NULL,
          data JSONB NOT NULL,
          created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
          updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
        );

        CREATE INDEX IF NOT EXISTS idx_records_collection
          ON records (collection);
      `);

      this.initialized = true;
    } catch (error) {
      throw new Error(`Failed to initialize database schema: ${errorMessage(error)}`);
    }
  }

  async ensureUniqueIndex(collection: string, field: string): Promise<void> {
    assertIdentifier(collection, "collection");
    await this.sql.unsafe(
      `CREATE UNIQUE INDEX IF NOT EXISTS uq_${collection}_${field}
         ON records ((${fieldText(field)})) WHERE collection = '${collection}'`,
    );
  }

  create(collection: string, data: Record<string, unknown>): Promise<StoredRecord> {
    return this.executor.create(collection, data);
  }

  findById(collection: string, id: number): Promise<StoredRecord | null> {
    return this.executor.findById(collection, id);
  }

  findMany(collection: string, query: QueryFilter): Promise<StoredRecord[]> {
    return this.executor.findMany(collection, query);
  }

  count(collection: string, filter?: WhereFilter): Promise<number> {
    return this.executor.count(collection, filter);
  }

  update(collection: string, id: number, data: Record<string, unknown>): Promise<StoredRecord> {
    return this.executor.update(collection, id, data);
  }

  updateIf(
    collection: string,
    id: number,
    expected: Record<string, Scalar>,
    data: Record<string, unknown>,
  ): Promise<StoredRecord | null> {
    return this.executor.updateIf(collection, id, expected, data);
  }

  delete(collection: string, id: number): Promise<void> {
    return this.executor.delete(collection, id);
  }

  deleteMany(collection: string, where: Record<string, Scalar>): Promise<number> {
    return this.executor.deleteMany(collection, where);
  }

  /**
   * Runs `fn` on a reserved connection between BEGIN and COMMIT, rolling back on error.
   */
  async transaction<R>(fn: (tx: TransactionContext) => Promise<R>): Promise<R> {
    const reserved = await this.sql.reserve();
    try {
      await reserved.unsafe("BEGIN");
      try {
        const result = await fn(new PostgresExecutor(reserved));
        await reserved.unsafe("COMMIT");
        return result;
      } catch (error) {
        await reserved.unsafe("ROLLBACK");
        throw error;
      }
    } finally {
      reserved.release();
    }
  }

  getMetadata(): StorageMetadata {
    return {
      adapterName: "postgres",
      adapterVersion: "2.0.0",
    };
  }

  async close(): Promise<void> {
    await this.sql.end();
  }
}
