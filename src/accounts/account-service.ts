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
 * Account management: lookup, listing, profile updates and deletion.
 */

import type { AuditLogger } from "../audit/audit-logger";
import { MESSAGES_COLLECTION } from "../chat/message-repository";
import { CONNECTIONS_COLLECTION } from "../connections/connection-repository";
import { DEVICES_COLLECTION, type DeviceRepository } from "../devices/device-repository";
import { ValidationError } from "../errors";
import { SESSIONS_COLLECTION, type SessionRegistry } from "../sessions/session-registry";
import type { StorageAdapter } from "../storage/adapter";
import { type Page, type PageRequest, pageWindow, toPage } from "../storage/paging";
import {
  ACCOUNTS_COLLECTION,
  type AccountFilter,
  type AccountRepository,
  type AccountUpdate,
} from "./account-repository";
import type { PasswordHasher } from "./password-hasher";
import { type Account, type AccountPatch, PROFILE_FIELDS, type RequestContext } from "./types";

export interface AccountListQuery extends AccountFilter, PageRequest {}

export interface DeleteAccountOptions {
  hard?: boolean;
}

/** Collections whose records reference an account and go with it on hard delete. */
const OWNED_COLLECTIONS = [
  SESSIONS_COLLECTION,
  DEVICES_COLLECTION,
  CONNECTIONS_COLLECTION,
  MESSAGES_COLLECTION,
];

export class AccountService {
  constructor(
    private readonly storage: StorageAdapter,
    private readonly accounts: AccountRepository,
    private readonly sessions: SessionRegistry,
    private readonly devices: DeviceRepository,
    private readonly hasher: PasswordHasher,
    private readonly audit: AuditLogger,
  ) {}

  getAccount(id: number): Promise<Account | null> {
    return this.accounts.findById(id);
  }

  findByEmail(email: string): Promise<Account | null> {
    return this.accounts.findByEmail(email);
  }

  /** Newest accounts first. */
  async listAccounts(query: AccountListQuery = {}): Promise<Page<Account>> {
    const window = pageWindow(query);
    const filter: AccountFilter = { active: query.active, search: query.search };
    const [items, total] = await Promise.all([
      this.accounts.list(filter, window.limit, window.offset),
      this.accounts.count(filter),
    ]);
    return toPage(items, total, window);
  }

  /**
   * Apply a profile patch. Email is immutable. Returns null when the account is absent.
   * Deactivating an account revokes its live sessions.
   */
  async updateAccount(
    id: number,
    patch: AccountPatch,
    context: RequestContext = {},
  ): Promise<Account | null> {
    const existing = await this.accounts.findById(id);
    if (!existing) {
      return null;
    }

    const update: AccountUpdate = {};
    for (const field of PROFILE_FIELDS) {
      const value = patch[field];
      if (value !== undefined) update[field] = value;
    }
    if (patch.name !== undefined) {
      const name = patch.name.trim();
      if (!name) throw new ValidationError("Name is required");
      update.name = name;
    }
    if (patch.accessLevel !== undefined) update.accessLevel = patch.accessLevel;
    if (patch.active !== undefined) update.active = patch.active;
    if (patch.extra !== undefined) update.extra = patch.extra;
    if (patch.password !== undefined) {
      if (patch.password === "") throw new ValidationError("Password must not be empty");
      update.passwordHash = await this.hasher.hash(patch.password);
    }

    const updated = await this.accounts.update(id, update);
    if (!updated) {
      return null;
    }

    if (existing.active && !updated.active) {
      await this.sessions.revokeAccountSessions(id);
    }

    await this.audit.record({
      accountId: id,
      action: "account_updated",
      description: `Account updated: ${updated.email}`,
      ipAddress: context.ipAddress,
      userAgent: context.userAgent,
      payload: { fields: Object.keys(update).join(",") },
    });

    return updated;
  }

  /**
   * Soft delete deactivates the account and revokes its sessions. Hard delete removes it
   * with its sessions, devices, connections and messages; audit entries are kept.
   * Returns false when the account is absent.
   */
  async deleteAccount(
    id: number,
    options: DeleteAccountOptions = {},
    context: RequestContext = {},
  ): Promise<boolean> {
    const account = await this.accounts.findById(id);
    if (!account) {
      return false;
    }

    if (!options.hard) {
      await this.accounts.update(id, { active: false });
      await this.sessions.revokeAccountSessions(id);
      await this.audit.record({
        accountId: id,
        action: "account_deactivated",
        description: `Account deactivated: ${account.email}`,
        ipAddress: context.ipAddress,
        userAgent: context.userAgent,
        severity: "warning",
      });
      return true;
    }

    await this.storage.transaction(async (tx) => {
      const devices = await tx.findMany(DEVICES_COLLECTION, { where: { accountId: id } });
      for (const device of devices) {
        await tx.deleteMany(CONNECTIONS_COLLECTION, { deviceId: device.id });
      }
      for (const collection of OWNED_COLLECTIONS) {
        await tx.deleteMany(collection, { accountId: id });
      }
      await tx.delete(ACCOUNTS_COLLECTION, id);
    });

    await this.audit.record({
      accountId: null,
      action: "account_deleted",
      description: `Account deleted: ${account.email}`,
      ipAddress: context.ipAddress,
      userAgent: context.userAgent,
      severity: "warning",
      payload: { deletedAccountId: id },
    });
    return true;
  }

  countDevices(accountId: number): Promise<number> {
    return this.devices.countByAccount(accountId);
  }
}
