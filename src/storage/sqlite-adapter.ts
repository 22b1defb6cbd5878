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
 * SQLite-backed StorageAdapter implementation using better-sqlite3.
 * Every statement is synchronous, so read-modify-write helpers are atomic on the
 * single connection. Calls and transactions run one at a time through a queue.
 */

import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import type { StorageAdapter } from "./adapter";
import {
  RecordNotFoundError,
  UniqueConstraintError,
  assertIdentifier,
  errorCode,
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

export interface SQLiteAdapterOptions {
  dbPath: string;
}

type SqlParam = string | number | null;

function jsonPath(field: string): string {
  assertIdentifier(field, "field");
  return `json_extract(data, '$.${field}')`;
}

function toParam(value: Scalar): SqlParam {
  if (typeof value === "boolean") {
    return value ? 1 : 0;
  }
  return value;
}

function toRecord(row: unknown): StoredRecord | null {
  if (!isPlainObject(row)) {
    return null;
  }
  const { id, data } = row;
  if (typeof id !== "number" || typeof data !== "string") {
    return null;
  }
  const payload: unknown = JSON.parse(data);
  if (!isPlainObject(payload)) {
    return null;
  }
  return { ...payload, id };
}

function buildWhere(collection: string, filter: WhereFilter): { sql: string; params: SqlParam[] } {
  const conditions: string[] = ["collection = ?"];
  const params: SqlParam[] = [collection];

  for (const [key, value] of Object.entries(filter.where ?? {})) {
    if (value === null) {
      conditions.push(`${jsonPath(key)} IS NULL`);
    } else {
      conditions.push(`${jsonPath(key)} = ?`);
      params.push(toParam(value));
    }
  }

  for (const range of filter.range ?? []) {
    const path = jsonPath(range.field);
    const bounds: Array<[string, string | undefined]> = [
      [">", range.gt],
      [">=", range.gte],
      ["<", range.lt],
      ["<=", range.lte],
    ];
    for (const [op, bound] of bounds) {
      if (bound !== undefined) {
        conditions.push(`${path} ${op} ?`);
        params.push(bound);
      }
    }
  }

  if (filter.search && filter.search.term !== "" && filter.search.fields.length > 0) {
    const pattern = `%${escapeLike(filter.search.term.toLowerCase())}%`;
    const ors = filter.search.fields.map((f) => `LOWER(${jsonPath(f)}) LIKE ? ESCAPE '\\'`);
    conditions.push(`(${ors.join(" OR ")})`);
    for (let i = 0; i < ors.length; i++) {
      params.push(pattern);
    }
  }

  return { sql: conditions.join(" AND "), params };
}

export class SQLiteAdapter implements StorageAdapter {
  private db: Database.Database;
  private initialized = false;
  /** Settles when every queued operation, transactions included, has finished. */
  private queueTail: Promise<void> = Promise.resolve();

  constructor(options: SQLiteAdapterOptions) {
    if (options.dbPath !== ":memory:") {
      mkdirSync(dirname(options.dbPath), { recursive: true });
    }
    this.db = new Database(options.dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("foreign_keys = ON");
  }

  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS records (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        collection TEXT NOT NULL,
        data TEXT NOT NULL,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_records_collection
        ON records (collection);
    `);

    this.initialized = true;
  }

  ensureUniqueIndex(collection: string, field: string): Promise<void> {
    return this.enqueue(() => {
      assertIdentifier(collection, "collection");
      this.db.exec(
        `CREATE UNIQUE INDEX IF NOT EXISTS uq_${collection}_${field}
           ON records (${jsonPath(field)}) WHERE collection = '${collection}'`,
      );
    });
  }

  create(collection: string, data: Record<string, unknown>): Promise<StoredRecord> {
    return this.enqueue(() => this.insert(collection, data));
  }

  findById(collection: string, id: number): Promise<StoredRecord | null> {
    return this.enqueue(() => this.readById(collection, id));
  }

  findMany(collection: string, query: QueryFilter): Promise<StoredRecord[]> {
    return this.enqueue(() => this.select(collection, query));
  }

  count(collection: string, filter: WhereFilter = {}): Promise<number> {
    return this.enqueue(() => {
      const where = buildWhere(collection, filter);
      const row: unknown = this.db
        .prepare(`SELECT COUNT(*) AS total FROM records WHERE ${where.sql}`)
        .get(...where.params);
      return isPlainObject(row) && typeof row.total === "number" ? row.total : 0;
    });
  }

  update(collection: string, id: number, data: Record<string, unknown>): Promise<StoredRecord> {
    return this.enqueue(() => this.updateNow(collection, id, data));
  }

  updateIf(
    collection: string,
    id: number,
    expected: Record<string, Scalar>,
    data: Record<string, unknown>,
  ): Promise<StoredRecord | null> {
    return this.enqueue(() => this.updateIfNow(collection, id, expected, data));
  }

  delete(collection: string, id: number): Promise<void> {
    return this.enqueue(() => this.deleteNow(collection, id));
  }

  deleteMany(collection: string, where: Record<string, Scalar>): Promise<number> {
    return this.enqueue(() => this.deleteManyNow(collection, where));
  }

  transaction<R>(fn: (tx: TransactionContext) => Promise<R>): Promise<R> {
    const txContext: TransactionContext = {
      create: async (collection, data) => this.insert(collection, data),
      findById: async (collection, id) => this.readById(collection, id),
      findMany: async (collection, query) => this.select(collection, query),
      update: async (collection, id, data) => this.updateNow(collection, id, data),
      updateIf: async (collection, id, expected, data) =>
        this.updateIfNow(collection, id, expected, data),
      delete: async (collection, id) => this.deleteNow(collection, id),
      deleteMany: async (collection, where) => this.deleteManyNow(collection, where),
    };

    // better-sqlite3 has one connection: anything run while the callback awaits
    // would land inside this transaction, so the whole callback holds the queue.
    return this.enqueue(async () => {
      this.db.exec("BEGIN IMMEDIATE");
      try {
        const result = await fn(txContext);
        this.db.exec("COMMIT");
        return result;
      } catch (error) {
        this.db.exec("ROLLBACK");
        throw error;
      }
    });
  }

  getMetadata(): StorageMetadata {
    return {
      adapterName: "sqlite",
      adapterVersion: "2.0.0",
    };
  }

  close(): Promise<void> {
    return this.enqueue<void>(() => {
      this.db.close();
    });
  }

  /** Runs `op` after every operation queued before it has settled. */
  private enqueue<T>(op: () => T | Promise<T>): Promise<T> {
    const result = this.queueTail.then(op);
    this.queueTail = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  private insert(collection: string, data: Record<string, unknown>): StoredRecord {
    const now = new Date().toISOString();
    const result = this.write(collection, () =>
      this.db
        .prepare(
          "INSERT INTO records (collection, data, created_at, updated_at) VALUES (?, ?, ?, ?)",
        )
        .run(collection, JSON.stringify(data), now, now),
    );
    return { ...data, id: Number(result.lastInsertRowid) };
  }

  private select(collection: string, query: QueryFilter): StoredRecord[] {
    const where = buildWhere(collection, query);
    const params = [...where.params];
    let sql = `SELECT id, data FROM records WHERE ${where.sql}`;

    if (query.orderBy && query.orderBy.length > 0) {
      const orderClauses = query.orderBy.map((o) => {
        const dir = o.direction === "desc" ? "DESC" : "ASC";
        return o.field === "id" ? `id ${dir}` : `${jsonPath(o.field)} ${dir}`;
      });
      sql += ` ORDER BY ${orderClauses.join(", ")}`;
    }

    if (query.limit !== undefined) {
      sql += " LIMIT ?";
      params.push(query.limit);
    }

    if (query.offset !== undefined) {
      if (query.limit === undefined) {
        sql += " LIMIT -1";
      }
      sql += " OFFSET ?";
      params.push(query.offset);
    }

    const rows = this.db.prepare(sql).all(...params);
    const records: StoredRecord[] = [];
    for (const row of rows) {
      const record = toRecord(row);
      if (record) {
        records.push(record);
      }
    }
    return records;
  }

  private updateNow(collection: string, id: number, data: Record<string, unknown>): StoredRecord {
    const existing = this.readById(collection, id);
    if (!existing) {
      throw new RecordNotFoundError(collection, id);
    }
    return this.writeMerged(collection, existing, data);
  }

  private updateIfNow(
    collection: string,
    id: number,
    expected: Record<string, Scalar>,
    data: Record<string, unknown>,
  ): StoredRecord | null {
    const existing = this.readById(collection, id);
    if (!existing) {
      return null;
    }
    for (const [field, value] of Object.entries(expected)) {
      if ((existing[field] ?? null) !== value) {
        return null;
      }
    }
    return this.writeMerged(collection, existing, data);
  }

  private deleteNow(collection: string, id: number): void {
    this.db.prepare("DELETE FROM records WHERE id = ? AND collection = ?").run(id, collection);
  }

  private deleteManyNow(collection: string, where: Record<string, Scalar>): number {
    const built = buildWhere(collection, { where });
    return this.db.prepare(`DELETE FROM records WHERE ${built.sql}`).run(...built.params).changes;
  }

  private readById(collection: string, id: number): StoredRecord | null {
    const row: unknown = this.db
      .prepare("SELECT id, data FROM records WHERE id = ? AND collection = ?")
      .get(id, collection);
    return toRecord(row);
  }

  private writeMerged(
    collection: string,
    existing: StoredRecord,
    data: Record<string, unknown>,
  ): StoredRecord {
    const { id, ...payload } = existing;
    const merged: Record<string, unknown> = { ...payload };
    // Undefined patch values leave the field untouched, as with a JSONB merge.
    for (const [field, value] of Object.entries(data)) {
      if (value !== undefined) {
        merged[field] = value;
      }
    }
    const now = new Date().toISOString();

    this.write(collection, () =>
      this.db
        .prepare("UPDATE records SET data = ?, updated_at = ? WHERE id = ? AND collection = ?")
        .run(JSON.stringify(merged), now, id, collection),
    );

    return { ...merged, id };
  }

  private write<T>(collection: string, statement: () => T): T {
    try {
      return statement();
    } catch (error) {
      if (errorCode(error) === "SQLITE_CONSTRAINT_UNIQUE") {
        throw new UniqueConstraintError(collection, error);
      }
      throw error;
    }
  }
}
