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
 * Account storage operations.
 */

import { DuplicateEmailError } from "../errors";
import type { StorageAdapter } from "../storage/adapter";
import { UniqueConstraintError } from "../storage/errors";
import { RecordCodec } from "../storage/record-codec";
import type { Scalar } from "../storage/types";
import { type Account, AccountSchema } from "./types";

export const ACCOUNTS_COLLECTION = "accounts";

const SEARCH_FIELDS = ["name", "email", "company", "phone"];

const codec = new RecordCodec(ACCOUNTS_COLLECTION, AccountSchema);

export interface AccountFilter {
  active?: boolean;
  search?: string;
}

export type AccountData = Omit<Account, "id">;

export type AccountUpdate = Partial<Omit<Account, "id" | "email" | "createdAt">>;

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

function toWhereFilter(filter: AccountFilter) {
  const where: Record<string, Scalar> = {};
  if (filter.active !== undefined) where.active = filter.active;
  const term = filter.search?.trim();
  return {
    where,
    search: term ? { fields: SEARCH_FIELDS, term } : undefined,
  };
}

export class AccountRepository {
  constructor(private readonly storage: StorageAdapter) {}

  async ensureIndexes(): Promise<void> {
    await this.storage.ensureUniqueIndex(ACCOUNTS_COLLECTION, "email");
  }

  /**
   * @throws DuplicateEmailError when the email is already taken
   */
  async insert(data: AccountData): Promise<Account> {
    try {
      const created = await this.storage.create(ACCOUNTS_COLLECTION, { ...data });
      return codec.decode(created);
    } catch (error) {
      if (error instanceof UniqueConstraintError) {
        throw new DuplicateEmailError(data.email);
      }
      throw error;
    }
  }

  async findById(id: number): Promise<Account | null> {
    return codec.decodeOrNull(await this.storage.findById(ACCOUNTS_COLLECTION, id));
  }

  async findByEmail(email: string): Promise<Account | null> {
    const results = await this.storage.findMany(ACCOUNTS_COLLECTION, {
      where: { email: normalizeEmail(email) },
      limit: 1,
    });
    const first = results[0];
    return first ? codec.decode(first) : null;
  }

  /** Returns null when the account does not exist. */
  async update(id: number, patch: AccountUpdate): Promise<Account | null> {
    return codec.decodeOrNull(await this.storage.updateIf(ACCOUNTS_COLLECTION, id, {}, patch));
  }

  async list(filter: AccountFilter, limit: number, offset: number): Promise<Account[]> {
    const records = await this.storage.findMany(ACCOUNTS_COLLECTION, {
      ...toWhereFilter(filter),
      orderBy: [{ field: "id", direction: "desc" }],
      limit,
      offset,
    });
    return codec.decodeAll(records);
  }

  count(filter: AccountFilter = {}): Promise<number> {
    return this.storage.count(ACCOUNTS_COLLECTION, toWhereFilter(filter));
  }

  /** Accounts whose last access is at or after `since` (ISO-8601). */
  countAccessedSince(since: string): Promise<number> {
    return this.storage.count(ACCOUNTS_COLLECTION, {
      range: [{ field: "lastAccessAt", gte: since }],
    });
  }
}
