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
 * Device entity types.
 */

import { z } from "zod";
import { type ScalarMap, ScalarMapSchema } from "../storage/record-codec";

const optionalText = z.string().nullable().default(null);

export const DeviceSchema = z.object({
  id: z.number().int(),
  accountId: z.number().int().nullable(),
  name: optionalText,
  type: z.string(),
  operatingSystem: optionalText,
  osVersion: optionalText,
  hostname: optionalText,
  localIp: optionalText,
  publicIp: optionalText,
  macAddress: optionalText,
  processor: optionalText,
  memoryTotal: optionalText,
  diskTotal: optionalText,
  isVirtual: z.boolean(),
  virtualType: optionalText,
  active: z.boolean(),
  lastHeartbeatAt: z.string().nullable(),
  registeredAt: z.string(),
  extra: ScalarMapSchema.default({}),
});

export type Device = z.infer<typeof DeviceSchema>;

export interface DeviceWithStatus extends Device {
  /** Heartbeat seen within the online window. */
  online: boolean;
}

export interface DeviceRegistration {
  name?: string;
  type?: string;
  operatingSystem?: string;
  osVersion?: string;
  hostname?: string;
  localIp?: string;
  publicIp?: string;
  macAddress?: string;
  processor?: string;
  memoryTotal?: string;
  diskTotal?: string;
  isVirtual?: boolean;
  virtualType?: string;
  /** The submitted system information, kept as scalars. */
  extra?: ScalarMap;
}

export interface RegistrationContext {
  accountId?: number | null;
  /** Address the registration arrived from; preferred over a self-reported public IP. */
  ipAddress?: string;
}

export interface DeviceListQuery {
  accountId?: number;
  active?: boolean;
  page?: number;
  perPage?: number;
}
