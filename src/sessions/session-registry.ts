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
 * Session registry: opaque tokens mapped to an account or an anonymous identity.
 *
 * A session is Active until it is revoked or observed past its expiry. Expiry is lazy:
 * validateSession flips `active` the first time it sees an expired session. Every
 * transition goes through a compare-and-set on `active`, so concurrent validations and
 * revocations apply it exactly once.
 */

import type { AccountRepository } from "../accounts/account-repository";
import type { RequestContext } from "../accounts/types";
import type { AuditLogger } from "../audit/audit-logger";
import { InternalError, UnauthorizedError, ValidationError } from "../errors";
import type { StorageAdapter } from "../storage/adapter";
import { UniqueConstraintError } from "../storage/errors";
import { RecordCodec } from "../storage/record-codec";
import { generateSessionToken } from "./token";
import { type CreateSessionInput, type Session, SessionSchema } from "./types";

export const SESSIONS_COLLECTION = "sessions";

export const DEFAULT_SESSION_TTL_MS = 24 * 60 * 60 * 1000;

const codec = new RecordCodec(SESSIONS_COLLECTION, SessionSchema);

export interface SessionRegistryOptions {
  ttlMs?: number;
  now?: () => Date;
  generateToken?: () => string;
}

export class SessionRegistry {
  private readonly ttlMs: number;
  private readonly now: () => Date;
  private readonly generateToken: () => string;

  constructor(
    private readonly storage: StorageAdapter,
    private readonly accounts: AccountRepository,
    private readonly audit: AuditLogger,
    options: SessionRegistryOptions = {},
  ) {
    this.ttlMs = options.ttlMs ?? DEFAULT_SESSION_TTL_MS;
    this.now = options.now ?? (() => new Date());
    this.generateToken = options.generateToken ?? generateSessionToken;
  }

  async ensureIndexes(): Promise<void> {
    await this.storage.ensureUniqueIndex(SESSIONS_COLLECTION, "token");
  }

  /**
   * @throws UnauthorizedError when the account is missing or inactive
   * @throws InternalError on a token collision
   */
  async createSession(input: CreateSessionInput): Promise<Session> {
    const ttlMs = input.ttlMs ?? this.ttlMs;
    if (!Number.isFinite(ttlMs) || ttlMs < 0) {
      throw new ValidationError("Session TTL must be a non-negative number");
    }

    const accountId = input.accountId ?? null;
    if (accountId !== null) {
      const account = await this.accounts.findById(accountId);
      if (!account || !account.active) {
        throw new UnauthorizedError("Account is not active");
      }
    }

    const now = this.now();
    const data = {
      accountId,
      identityUsername: input.identityUsername ?? null,
      token: this.generateToken(),
      ipAddress: input.ipAddress ?? null,
      userAgent: input.userAgent ?? null,
      createdAt: now.toISOString(),
      expiresAt: new Date(now.getTime() + ttlMs).toISOString(),
      lastActivityAt: now.toISOString(),
      active: true,
    };

    try {
      return codec.decode(await this.storage.create(SESSIONS_COLLECTION, data));
    } catch (error) {
      if (error instanceof UniqueConstraintError) {
        throw new InternalError("Session token collision", error);
      }
      throw error;
    }
  }

  /**
   * Returns the live session for `token`, or null when it is unknown, revoked or expired.
   * A successful validation refreshes lastActivityAt.
   */
  async validateSession(token: string | null | undefined): Promise<Session | null> {
    if (!token) {
      return null;
    }

    const session = await this.findByToken(token, true);
    if (!session) {
      return null;
    }

    const now = this.now();
    if (Date.parse(session.expiresAt) <= now.getTime()) {
      await this.storage.updateIf(
        SESSIONS_COLLECTION,
        session.id,
        { active: true },
        { active: false },
      );
      return null;
    }

    const touched = await this.storage.updateIf(
      SESSIONS_COLLECTION,
      session.id,
      { active: true },
      { lastActivityAt: now.toISOString() },
    );
    return codec.decodeOrNull(touched);
  }

  /**
   * Deactivate a session. Idempotent: returns true whenever the token exists.
   */
  async revokeSession(token: string, context: RequestContext = {}): Promise<boolean> {
    const session = await this.findByToken(token, false);
    if (!session) {
      return false;
    }

    if (session.active) {
      const revoked = await this.storage.updateIf(
        SESSIONS_COLLECTION,
        session.id,
        { active: true },
        { active: false },
      );
      if (revoked && session.accountId !== null) {
        await this.audit.record({
          accountId: session.accountId,
          action: "logout",
          description: "Session ended",
          ipAddress: context.ipAddress,
          userAgent: context.userAgent,
        });
      }
    }

    return true;
  }

  /** Revokes every live session of an account and returns how many were revoked. */
  async revokeAccountSessions(accountId: number): Promise<number> {
    const records = await this.storage.findMany(SESSIONS_COLLECTION, {
      where: { accountId, active: true },
    });

    let revoked = 0;
    for (const session of codec.decodeAll(records)) {
      const result = await this.storage.updateIf(
        SESSIONS_COLLECTION,
        session.id,
        { active: true },
        { active: false },
      );
      if (result) revoked++;
    }
    return revoked;
  }

  /** Sessions that are active and not yet past their expiry. */
  countActive(): Promise<number> {
    return this.storage.count(SESSIONS_COLLECTION, {
      where: { active: true },
      range: [{ field: "expiresAt", gt: this.now().toISOString() }],
    });
  }

  private async findByToken(token: string, activeOnly: boolean): Promise<Session | null> {
    const results = await this.storage.findMany(SESSIONS_COLLECTION, {
      where: activeOnly ? { token, active: true } : { token },
      limit: 1,
    });
    const first = results[0];
    return first ? codec.decode(first) : null;
  }
}
