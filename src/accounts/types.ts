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
 * Account types and schemas.
 */

import { z } from "zod";
import { ScalarMapSchema } from "../storage/record-codec";

export const AccessLevelSchema = z.enum(["admin", "moderator", "user"]);

export type AccessLevel = z.infer<typeof AccessLevelSchema>;

/** Optional profile fields, all nullable strings. */
export const PROFILE_FIELDS = [
  "phone",
  "company",
  "jobTitle",
  "address",
  "city",
  "state",
  "country",
  "postalCode",
  "taxId",
  "notes",
] as const;

export type ProfileField = (typeof PROFILE_FIELDS)[number];

const nullableText = z.string().nullable().default(null);

export const AccountSchema = z.object({
  id: z.number().int(),
  email: z.string(),
  name: z.string(),
  passwordHash: z.string().nullable(),
  accessLevel: AccessLevelSchema,
  active: z.boolean(),
  createdAt: z.string(),
  lastAccessAt: z.string().nullable(),
  phone: nullableText,
  company: nullableText,
  jobTitle: nullableText,
  address: nullableText,
  city: nullableText,
  state: nullableText,
  country: nullableText,
  postalCode: nullableText,
  taxId: nullableText,
  notes: nullableText,
  extra: ScalarMapSchema.default({}),
});

export type Account = z.infer<typeof AccountSchema>;

export type AccountProfile = { [K in ProfileField]?: string | null };

export interface NewAccountAttributes extends AccountProfile {
  accessLevel?: AccessLevel;
  active?: boolean;
  extra?: Record<string, string | number | boolean | null>;
}

export interface AccountPatch extends AccountProfile {
  name?: string;
  accessLevel?: AccessLevel;
  active?: boolean;
  extra?: Record<string, string | number | boolean | null>;
  /** Plaintext; rehashed before storage. */
  password?: string;
}

export interface RequestContext {
  ipAddress?: string;
  userAgent?: string;
}

export type AuthFailureReason = "invalid_credentials";

export type AuthResult =
  | { ok: true; account: Account }
  | { ok: false; reason: AuthFailureReason };
