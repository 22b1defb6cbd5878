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
 * Device inventory: registration, heartbeats and listing with online status.
 */

import type { AuditLogger } from "../audit/audit-logger";
import type { StorageAdapter } from "../storage/adapter";
import { type Page, pageWindow, toPage } from "../storage/paging";
import { RecordCodec } from "../storage/record-codec";
import type { Scalar, TransactionContext } from "../storage/types";
import {
  type Device,
  type DeviceListQuery,
  type DeviceRegistration,
  DeviceSchema,
  type DeviceWithStatus,
  type RegistrationContext,
} from "./types";

export const DEVICES_COLLECTION = "devices";

export const DEFAULT_ONLINE_WINDOW_MS = 5 * 60 * 1000;

const codec = new RecordCodec(DEVICES_COLLECTION, DeviceSchema);

export interface DeviceRepositoryOptions {
  onlineWindowMs?: number;
  now?: () => Date;
}

export interface RegisteredDevice {
  device: Device;
  isNew: boolean;
}

export class DeviceRepository {
  private readonly onlineWindowMs: number;
  private readonly now: () => Date;

  constructor(
    private readonly storage: StorageAdapter,
    private readonly audit: AuditLogger,
    options: DeviceRepositoryOptions = {},
  ) {
    this.onlineWindowMs = options.onlineWindowMs ?? DEFAULT_ONLINE_WINDOW_MS;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Registers a device, or refreshes the one already known by MAC address
   * (then hostname): heartbeat, IPs and, when given, the owning account.
   */
  async register(
    info: DeviceRegistration,
    context: RegistrationContext = {},
  ): Promise<RegisteredDevice> {
    const now = this.now().toISOString();
    const publicIp = context.ipAddress ?? info.publicIp ?? null;
    const accountId = context.accountId ?? null;

    const result = await this.storage.transaction(async (tx) => {
      const existing = await this.findExisting(tx, info);

      if (existing) {
        const patch: Record<string, unknown> = {
          lastHeartbeatAt: now,
          localIp: info.localIp ?? null,
          publicIp,
        };
        if (accountId !== null) patch.accountId = accountId;
        const updated = await tx.update(DEVICES_COLLECTION, existing.id, patch);
        return { device: codec.decode(updated), isNew: false };
      }

      const created = await tx.create(DEVICES_COLLECTION, {
        accountId,
        name: info.name ?? info.hostname ?? null,
        type: info.type ?? "desktop",
        operatingSystem: info.operatingSystem ?? null,
        osVersion: info.osVersion ?? null,
        hostname: info.hostname ?? null,
        localIp: info.localIp ?? null,
        publicIp,
        macAddress: info.macAddress ?? null,
        processor: info.processor ?? null,
        memoryTotal: info.memoryTotal ?? null,
        diskTotal: info.diskTotal ?? null,
        isVirtual: info.isVirtual ?? false,
        virtualType: info.virtualType ?? null,
        active: true,
        lastHeartbeatAt: now,
        registeredAt: now,
        extra: info.extra ?? {},
      });
      return { device: codec.decode(created), isNew: true };
    });

    if (result.isNew) {
      await this.audit.record({
        accountId,
        action: "device_registered",
        description: `Device registered: ${result.device.hostname ?? result.device.id}`,
        ipAddress: publicIp ?? undefined,
        payload: { deviceId: result.device.id },
      });
    }

    return result;
  }

  /** Most recent heartbeat first. */
  async list(query: DeviceListQuery = {}): Promise<Page<DeviceWithStatus>> {
    const window = pageWindow(query);
    const where: Record<string, Scalar> = {};
    if (query.accountId !== undefined) where.accountId = query.accountId;
    if (query.active !== undefined) where.active = query.active;

    const [records, total] = await Promise.all([
      this.storage.findMany(DEVICES_COLLECTION, {
        where,
        orderBy: [
          { field: "lastHeartbeatAt", direction: "desc" },
          { field: "id", direction: "desc" },
        ],
        limit: window.limit,
        offset: window.offset,
      }),
      this.storage.count(DEVICES_COLLECTION, { where }),
    ]);

    return toPage(
      codec.decodeAll(records).map((device) => this.withStatus(device)),
      total,
      window,
    );
  }

  async get(id: number): Promise<DeviceWithStatus | null> {
    const device = codec.decodeOrNull(await this.storage.findById(DEVICES_COLLECTION, id));
    return device ? this.withStatus(device) : null;
  }

  /** Returns false when the device does not exist. */
  async heartbeat(id: number): Promise<boolean> {
    const updated = await this.storage.updateIf(
      DEVICES_COLLECTION,
      id,
      {},
      { lastHeartbeatAt: this.now().toISOString() },
    );
    return updated !== null;
  }

  count(): Promise<number> {
    return this.storage.count(DEVICES_COLLECTION);
  }

  countOnline(): Promise<number> {
    return this.storage.count(DEVICES_COLLECTION, {
      range: [{ field: "lastHeartbeatAt", gt: this.onlineThreshold() }],
    });
  }

  countByAccount(accountId: number): Promise<number> {
    return this.storage.count(DEVICES_COLLECTION, { where: { accountId } });
  }

  private withStatus(device: Device): DeviceWithStatus {
    const online =
      device.lastHeartbeatAt !== null && device.lastHeartbeatAt > this.onlineThreshold();
    return { ...device, online };
  }

  private onlineThreshold(): string {
    return new Date(this.now().getTime() - this.onlineWindowMs).toISOString();
  }

  private async findExisting(
    tx: TransactionContext,
    info: DeviceRegistration,
  ): Promise<Device | null> {
    const lookups: Array<Record<string, Scalar>> = [];
    if (info.macAddress) lookups.push({ macAddress: info.macAddress });
    if (info.hostname) lookups.push({ hostname: info.hostname });

    for (const where of lookups) {
      const [match] = await tx.findMany(DEVICES_COLLECTION, { where, limit: 1 });
      if (match) {
        return codec.decode(match);
      }
    }
    return null;
  }
}
