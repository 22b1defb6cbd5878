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
 * Assigns each client address a persistent pseudonymous identity.
 * Clients behind one NAT or proxy share an identity.
 */

import type { AuditLogger } from "../audit/audit-logger";
import { InternalError } from "../errors";
import type { StorageAdapter } from "../storage/adapter";
import { UniqueConstraintError } from "../storage/errors";
import { RecordCodec } from "../storage/record-codec";
import type { TransactionContext } from "../storage/types";
import { mergeMetadata, sanitizeMetadata } from "./metadata";
import { normalizeIp } from "./normalize-ip";
import { type AssignedIdentity, type IpIdentity, IpIdentitySchema } from "./types";
import { UsernameGenerator } from "./username-generator";

export const IDENTITIES_COLLECTION = "ip_identities";

const MAX_ASSIGN_ATTEMPTS = 5;
const MAX_USERNAME_ATTEMPTS = 20;
const MAX_USER_AGENT = 512;

const codec = new RecordCodec(IDENTITIES_COLLECTION, IpIdentitySchema);

export interface IpIdentityAssignerOptions {
  usernames?: UsernameGenerator;
  now?: () => Date;
}

export class IpIdentityAssigner {
  private readonly usernames: UsernameGenerator;
  private readonly now: () => Date;

  constructor(
    private readonly storage: StorageAdapter,
    private readonly audit: AuditLogger,
    options: IpIdentityAssignerOptions = {},
  ) {
    this.usernames = options.usernames ?? new UsernameGenerator();
    this.now = options.now ?? (() => new Date());
  }

  async ensureIndexes(): Promise<void> {
    await this.storage.ensureUniqueIndex(IDENTITIES_COLLECTION, "ip");
    await this.storage.ensureUniqueIndex(IDENTITIES_COLLECTION, "username");
  }

  /**
   * Returns the identity for `ip`, creating it on first contact. Returning visits bump
   * `visits` and merge metadata. Racing first contacts resolve to one identity: the
   * loser hits the unique index and retries into the returning path.
   */
  async getOrCreate(
    ip: string | null | undefined,
    userAgent?: string | null,
    metadata: unknown = {},
  ): Promise<AssignedIdentity> {
    const normalized = normalizeIp(ip);
    const incoming = sanitizeMetadata(metadata);
    const agent = userAgent ? userAgent.slice(0, MAX_USER_AGENT) : null;

    for (let attempt = 1; attempt <= MAX_ASSIGN_ATTEMPTS; attempt++) {
      let assigned: AssignedIdentity | null;
      try {
        assigned = await this.storage.transaction((tx) =>
          this.assign(tx, normalized, agent, incoming),
        );
      } catch (error) {
        if (error instanceof UniqueConstraintError && attempt < MAX_ASSIGN_ATTEMPTS) {
          continue;
        }
        throw error;
      }

      if (assigned) {
        await this.audit.record({
          action: assigned.isNew ? "identity_created" : "identity_returning",
          description: `${assigned.isNew ? "New" : "Returning"} identity: ${assigned.identity.username}`,
          ipAddress: normalized,
          userAgent: agent ?? undefined,
          payload: { username: assigned.identity.username, visits: assigned.identity.visits },
        });
        return assigned;
      }
    }

    throw new InternalError(`Could not assign an identity for ${normalized}`);
  }

  /** Read-only lookup; does not count as a visit. */
  async get(ip: string | null | undefined): Promise<IpIdentity | null> {
    const results = await this.storage.findMany(IDENTITIES_COLLECTION, {
      where: { ip: normalizeIp(ip) },
      limit: 1,
    });
    const first = results[0];
    return first ? codec.decode(first) : null;
  }

  /** All identities, most recently seen first. */
  async list(): Promise<IpIdentity[]> {
    const records = await this.storage.findMany(IDENTITIES_COLLECTION, {
      orderBy: [
        { field: "lastSeenAt", direction: "desc" },
        { field: "id", direction: "desc" },
      ],
    });
    return codec.decodeAll(records);
  }

  /** Returns null when a concurrent visit won the compare-and-set. */
  private async assign(
    tx: TransactionContext,
    ip: string,
    userAgent: string | null,
    metadata: Record<string, string | number | boolean | null>,
  ): Promise<AssignedIdentity | null> {
    const now = this.now().toISOString();
    const [existingRecord] = await tx.findMany(IDENTITIES_COLLECTION, { where: { ip }, limit: 1 });

    if (existingRecord) {
      const existing = codec.decode(existingRecord);
      const updated = await tx.updateIf(
        IDENTITIES_COLLECTION,
        existing.id,
        { visits: existing.visits },
        {
          visits: existing.visits + 1,
          lastSeenAt: now,
          userAgent: userAgent ?? existing.userAgent,
          metadata: mergeMetadata(existing.metadata, metadata),
        },
      );
      return updated ? { identity: codec.decode(updated), isNew: false } : null;
    }

    const created = await tx.create(IDENTITIES_COLLECTION, {
      ip,
      username: await this.uniqueUsername(tx),
      firstSeenAt: now,
      lastSeenAt: now,
      visits: 1,
      userAgent,
      metadata,
    });
    return { identity: codec.decode(created), isNew: true };
  }

  private async uniqueUsername(tx: TransactionContext): Promise<string> {
    for (let attempt = 0; attempt < MAX_USERNAME_ATTEMPTS; attempt++) {
      const candidate = this.usernames.next();
      const taken = await tx.findMany(IDENTITIES_COLLECTION, {
        where: { username: candidate },
        limit: 1,
      });
      if (taken.length === 0) {
        return candidate;
      }
    }
    throw new InternalError("Username space exhausted");
  }
}
