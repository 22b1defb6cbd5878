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
 * Session entity types.
 */

import { z } from "zod";

export const SessionSchema = z.object({
  id: z.number().int(),
  /** Null for anonymous sessions minted for an IP identity. */
  accountId: z.number().int().nullable(),
  identityUsername: z.string().nullable(),
  token: z.string(),
  ipAddress: z.string().nullable(),
  userAgent: z.string().nullable(),
  createdAt: z.string(),
  expiresAt: z.string(),
  lastActivityAt: z.string(),
  active: z.boolean(),
});

export type Session = z.infer<typeof SessionSchema>;

export interface CreateSessionInput {
  accountId?: number | null;
  identityUsername?: string | null;
  ipAddress?: string;
  userAgent?: string;
  /** Lifetime in milliseconds; defaults to the configured TTL. */
  ttlMs?: number;
}
