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
 * Log of network connections observed on client devices.
 */

import { z } from "zod";
import type { StorageAdapter } from "../storage/adapter";
import { type Page, pageWindow, toPage } from "../storage/paging";
import { RecordCodec } from "../storage/record-codec";
import type { RangeCondition, Scalar } from "../storage/types";

export const CONNECTIONS_COLLECTION = "connections";

const optionalText = z.string().nullable().default(null);
const optionalInt = z.number().int().nullable().default(null);

export const ConnectionSchema = z.object({
  id: z.number().int(),
  accountId: z.number().int().nullable(),
  deviceId: z.number().int().nullable(),
  sourceIp: optionalText,
  destinationIp: optionalText,
  sourcePort: optionalInt,
  destinationPort: optionalInt,
  protocol: z.string(),
  status: z.string(),
  processName: optionalText,
  pid: optionalInt,
  observedAt: z.string(),
  durationSeconds: optionalInt,
  bytesSent: z.number().int().default(0),
  bytesReceived: z.number().int().default(0),
});

export type Connection = z.infer<typeof ConnectionSchema>;

export interface ObservedConnection {
  sourceIp?: string | null;
  destinationIp?: string | null;
  sourcePort?: number | null;
  destinationPort?: number | null;
  protocol?: string;
  status?: string;
  processName?: string | null;
  pid?: number | null;
  durationSeconds?: number | null;
  bytesSent?: number;
  bytesReceived?: number;
}

export interface ConnectionOwner {
  deviceId?: number | null;
  accountId?: number | null;
}

export interface ConnectionListQuery {
  deviceId?: number;
  accountId?: number;
  /** Inclusive ISO-8601 bounds on observedAt. */
  from?: string;
  to?: string;
  page?: number;
  perPage?: number;
}

const codec = new RecordCodec(CONNECTIONS_COLLECTION, ConnectionSchema);

export class ConnectionRepository {
  private readonly now: () => Date;

  constructor(
    private readonly storage: StorageAdapter,
    options: { now?: () => Date } = {},
  ) {
    this.now = options.now ?? (() => new Date());
  }

  /** Stores a batch atomically and returns how many were recorded. */
  async recordMany(connections: ObservedConnection[], owner: ConnectionOwner = {}): Promise<number> {
    if (connections.length === 0) {
      return 0;
    }

    const observedAt = this.now().toISOString();
    return this.storage.transaction(async (tx) => {
      for (const conn of connections) {
        await tx.create(CONNECTIONS_COLLECTION, {
          accountId: owner.accountId ?? null,
          deviceId: owner.deviceId ?? null,
          sourceIp: conn.sourceIp ?? null,
          destinationIp: conn.destinationIp ?? null,
          sourcePort: conn.sourcePort ?? null,
          destinationPort: conn.destinationPort ?? null,
          protocol: conn.protocol ?? "TCP",
          status: conn.status ?? "ESTABLISHED",
          processName: conn.processName ?? null,
          pid: conn.pid ?? null,
          observedAt,
          durationSeconds: conn.durationSeconds ?? null,
          bytesSent: conn.bytesSent ?? 0,
          bytesReceived: conn.bytesReceived ?? 0,
        });
      }
      return connections.length;
    });
  }

  /** Newest first. */
  async list(query: ConnectionListQuery = {}): Promise<Page<Connection>> {
    const window = pageWindow(query);
    const where: Record<string, Scalar> = {};
    if (query.deviceId !== undefined) where.deviceId = query.deviceId;
    if (query.accountId !== undefined) where.accountId = query.accountId;

    const range: RangeCondition[] = [];
    if (query.from !== undefined || query.to !== undefined) {
      range.push({ field: "observedAt", gte: query.from, lte: query.to });
    }

    const [records, total] = await Promise.all([
      this.storage.findMany(CONNECTIONS_COLLECTION, {
        where,
        range,
        orderBy: [{ field: "id", direction: "desc" }],
        limit: window.limit,
        offset: window.offset,
      }),
      this.storage.count(CONNECTIONS_COLLECTION, { where, range }),
    ]);

    return toPage(codec.decodeAll(records), total, window);
  }

  count(): Promise<number> {
    return this.storage.count(CONNECTIONS_COLLECTION);
  }
}
