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
 * Immutable audit log.
 * Entries are appended and queried; nothing is updated or deleted.
 */

import type { StorageAdapter } from "../storage/adapter";
import { RecordCodec } from "../storage/record-codec";
import type { Scalar } from "../storage/types";
import {
  type AuditEntry,
  type AuditEntryInput,
  AuditEntryInputSchema,
  AuditEntrySchema,
  type AuditQuery,
} from "./audit-types";

export const AUDIT_COLLECTION = "audit_log";

const DEFAULT_MAX_QUERY_LIMIT = 500;

const codec = new RecordCodec(AUDIT_COLLECTION, AuditEntrySchema);

export interface AuditLoggerOptions {
  maxQueryLimit?: number;
  now?: () => Date;
}

export class AuditLogger {
  private readonly storage: StorageAdapter;
  private readonly maxQueryLimit: number;
  private readonly now: () => Date;

  constructor(storage: StorageAdapter, options: AuditLoggerOptions = {}) {
    this.storage = storage;
    this.maxQueryLimit = options.maxQueryLimit ?? DEFAULT_MAX_QUERY_LIMIT;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Append an audit entry. Never throws: invalid input and storage failures
   * are reported on stderr and dropped.
   */
  async record(entry: AuditEntryInput): Promise<void> {
    const parsed = AuditEntryInputSchema.safeParse(entry);
    if (!parsed.success) {
      console.error("Audit entry validation failed:", parsed.error.message);
      return;
    }

    try {
      await this.storage.create(AUDIT_COLLECTION, {
        accountId: parsed.data.accountId ?? null,
        action: parsed.data.action,
        description: parsed.data.description ?? null,
        ipAddress: parsed.data.ipAddress ?? null,
        userAgent: parsed.data.userAgent ?? null,
        severity: parsed.data.severity,
        createdAt: this.now().toISOString(),
        payload: parsed.data.payload,
      });
    } catch (error) {
      console.error(`Audit logging failed (${parsed.data.action}):`, error);
    }
  }

  /**
   * Newest entries first. `limit` is clamped to [1, maxQueryLimit].
   */
  async query(filter: AuditQuery = {}, limit = 100): Promise<AuditEntry[]> {
    const where: Record<string, Scalar> = {};
    if (filter.accountId !== undefined) where.accountId = filter.accountId;
    if (filter.action !== undefined) where.action = filter.action;
    if (filter.severity !== undefined) where.severity = filter.severity;

    const records = await this.storage.findMany(AUDIT_COLLECTION, {
      where,
      orderBy: [{ field: "id", direction: "desc" }],
      limit: this.clampLimit(limit),
    });
    return codec.decodeAll(records);
  }

  private clampLimit(limit: number): number {
    if (!Number.isFinite(limit)) {
      return this.maxQueryLimit;
    }
    return Math.min(Math.max(Math.trunc(limit), 1), this.maxQueryLimit);
  }
}
