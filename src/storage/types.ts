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
 * Shared storage types: query filters, transaction context and metadata.
 */

export type Scalar = string | number | boolean | null;

/**
 * A persisted record: the JSON payload plus the numeric id assigned on insert.
 */
export interface StoredRecord {
  id: number;
  [field: string]: unknown;
}

export interface RangeCondition {
  field: string;
  gt?: string;
  gte?: string;
  lt?: string;
  lte?: string;
}

export interface SearchCondition {
  fields: string[];
  term: string;
}

export interface OrderClause {
  field: string;
  direction: "asc" | "desc";
}

export interface WhereFilter {
  where?: Record<string, Scalar>;
  /** String comparisons, used for ISO-8601 timestamps. */
  range?: RangeCondition[];
  /** Case-insensitive substring match on any of the listed fields. */
  search?: SearchCondition;
}

export interface QueryFilter extends WhereFilter {
  orderBy?: OrderClause[];
  limit?: number;
  offset?: number;
}

export interface TransactionContext {
  create(collection: string, data: Record<string, unknown>): Promise<StoredRecord>;
  findById(collection: string, id: number): Promise<StoredRecord | null>;
  findMany(collection: string, query: QueryFilter): Promise<StoredRecord[]>;
  update(collection: string, id: number, data: Record<string, unknown>): Promise<StoredRecord>;
  updateIf(
    collection: string,
    id: number,
    expected: Record<string, Scalar>,
    data: Record<string, unknown>,
  ): Promise<StoredRecord | null>;
  delete(collection: string, id: number): Promise<void>;
  deleteMany(collection: string, where: Record<string, Scalar>): Promise<number>;
}

export interface StorageMetadata {
  adapterName: string;
  adapterVersion: string;
}
