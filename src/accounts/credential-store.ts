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
 * Credential store: account creation, password hashing and login verification.
 * Authentication failures are indistinguishable to the caller.
 */

import { z } from "zod";
import type { AuditLogger } from "../audit/audit-logger";
import { ValidationError } from "../errors";
import { type AccountRepository, normalizeEmail } from "./account-repository";
import type { PasswordHasher } from "./password-hasher";
import {
  type Account,
  type AuthResult,
  type NewAccountAttributes,
  PROFILE_FIELDS,
  type RequestContext,
} from "./types";

const EmailSchema = z.string().email();

export interface CredentialStoreOptions {
  defaultCountry: string;
  now?: () => Date;
}

export class CredentialStore {
  private readonly now: () => Date;

  constructor(
    private readonly accounts: AccountRepository,
    private readonly hasher: PasswordHasher,
    private readonly audit: AuditLogger,
    private readonly options: CredentialStoreOptions,
  ) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Create an account. Without a password the account cannot log in until one is set.
   * @throws DuplicateEmailError when the email is already registered (any casing)
   * @throws ValidationError on an empty name or malformed email
   */
  async createAccount(
    name: string,
    email: string,
    rawPassword?: string | null,
    attrs: NewAccountAttributes = {},
    context: RequestContext = {},
  ): Promise<Account> {
    const trimmedName = name.trim();
    const normalizedEmail = normalizeEmail(email);
    if (!trimmedName) {
      throw new ValidationError("Name is required");
    }
    if (!EmailSchema.safeParse(normalizedEmail).success) {
      throw new ValidationError("Invalid email");
    }
    if (rawPassword === "") {
      throw new ValidationError("Password must not be empty");
    }

    const passwordHash = rawPassword ? await this.hasher.hash(rawPassword) : null;

    const profile: Record<(typeof PROFILE_FIELDS)[number], string | null> = {
      phone: null,
      company: null,
      jobTitle: null,
      address: null,
      city: null,
      state: null,
      country: this.options.defaultCountry,
      postalCode: null,
      taxId: null,
      notes: null,
    };
    for (const field of PROFILE_FIELDS) {
      const value = attrs[field];
      if (value !== undefined) profile[field] = value;
    }

    const account = await this.accounts.insert({
      email: normalizedEmail,
      name: trimmedName,
      passwordHash,
      accessLevel: attrs.accessLevel ?? "user",
      active: attrs.active ?? true,
      createdAt: this.now().toISOString(),
      lastAccessAt: null,
      ...profile,
      extra: attrs.extra ?? {},
    });

    await this.audit.record({
      accountId: account.id,
      action: "account_created",
      description: `Account created: ${account.email}`,
      ipAddress: context.ipAddress,
      userAgent: context.userAgent,
    });

    return account;
  }

  /**
   * Create an administrator unless an account already uses the email.
   * An existing account is returned untouched, whatever its access level.
   */
  async ensureAdmin(
    email: string,
    rawPassword: string,
  ): Promise<{ account: Account; created: boolean }> {
    const existing = await this.accounts.findByEmail(email);
    if (existing) {
      return { account: existing, created: false };
    }
    const account = await this.createAccount("Administrador", email, rawPassword, {
      accessLevel: "admin",
    });
    return { account, created: true };
  }

  /** Replace the password hash. The plaintext is never stored or logged. */
  async setPassword(
    account: Account,
    rawPassword: string,
    context: RequestContext = {},
  ): Promise<Account> {
    if (rawPassword === "") {
      throw new ValidationError("Password must not be empty");
    }
    const passwordHash = await this.hasher.hash(rawPassword);
    const updated = (await this.accounts.update(account.id, { passwordHash })) ?? {
      ...account,
      passwordHash,
    };

    await this.audit.record({
      accountId: account.id,
      action: "password_changed",
      description: "Password changed",
      ipAddress: context.ipAddress,
      userAgent: context.userAgent,
    });

    return updated;
  }

  async verifyPassword(account: Account, rawPassword: string): Promise<boolean> {
    if (!account.passwordHash) {
      return false;
    }
    return this.hasher.verify(rawPassword, account.passwordHash);
  }

  /**
   * Verify an email/password login. Unknown email, inactive account, missing hash and
   * wrong password all yield the same failure.
   */
  async authenticate(
    email: string,
    rawPassword: string,
    context: RequestContext = {},
  ): Promise<AuthResult> {
    const account = await this.accounts.findByEmail(email);

    const verified =
      account?.active && account.passwordHash
        ? await this.hasher.verify(rawPassword, account.passwordHash)
        : await this.hasher.verifyDummy(rawPassword);

    if (!account || !verified) {
      await this.audit.record({
        accountId: account?.id ?? null,
        action: "login_failed",
        description: "Login failed",
        ipAddress: context.ipAddress,
        userAgent: context.userAgent,
        severity: "warning",
        payload: { email: normalizeEmail(email) },
      });
      return { ok: false, reason: "invalid_credentials" };
    }

    const lastAccessAt = this.now().toISOString();
    const touched = await this.accounts.update(account.id, { lastAccessAt });

    await this.audit.record({
      accountId: account.id,
      action: "login",
      description: `Login: ${account.email}`,
      ipAddress: context.ipAddress,
      userAgent: context.userAgent,
    });

    return { ok: true, account: touched ?? { ...account, lastAccessAt } };
  }
}
