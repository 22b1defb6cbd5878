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
 * StorageAdapter interface: the pluggable record store behind every repository.
 * Records live in named collections with a JSON payload and a numeric id.
 */

import type {
  QueryFilter,
  Scalar,
  StorageMetadata,
  StoredRecord,
  TransactionContext,
  WhereFilter,
} from "./types";

export interface StorageAdapter {
  initialize(): Promise<void>;

  /**
   * Declare a unique payload field for a collection. Idempotent.
   * Inserts or updates that would duplicate the value throw UniqueConstraintError.
   */
  ensureUniqueIndex(collection: string, field: string): Promise<void>;

  create(collection: string, data: Record<string, unknown>): Promise<StoredRecord>;

  findById(collection: string, id: number): Promise<StoredRecord | null>;

  findMany(collection: string, query: QueryFilter): Promise<StoredRecord[]>;

  count(collection: string, filter?: WhereFilter): Promise<number>;

  /** Shallow-merges `data` into the stored payload. */
  update(collection: string, id: number, data: Record<string, unknown>): Promise<StoredRecord>;

  /**
   * Compare-and-set: applies `data` only while every `expected` field still holds.
   * Returns null when the record is missing or the expectation failed.
   */
  updateIf(
    collection: string,
    id: number,
    expected: Record<string, Scalar>,
    data: Record<string, unknown>,
  ): Promise<StoredRecord | null>;

  delete(collection: string, id: number): Promise<void>;

  deleteMany(collection: string, where: Record<string, Scalar>): Promise<number>;

  /** Must not be nested: the callback uses `tx`, never the adapter itself. */
  transaction<R>(fn: (tx: TransactionContext) => Promise<R>): Promise<R>;

  getMetadata(): StorageMetadata;

  close(): Promise<void>;
}
