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
 * IP identity types.
 */

import { z } from "zod";
import { ScalarMapSchema } from "../storage/record-codec";

export const IpIdentitySchema = z.object({
  id: z.number().int(),
  ip: z.string(),
  username: z.string(),
  firstSeenAt: z.string(),
  lastSeenAt: z.string(),
  visits: z.number().int(),
  userAgent: z.string().nullable(),
  metadata: ScalarMapSchema.default({}),
});

export type IpIdentity = z.infer<typeof IpIdentitySchema>;

export interface AssignedIdentity {
  identity: IpIdentity;
  isNew: boolean;
}
