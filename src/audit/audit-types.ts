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
 * Audit entry types and schemas.
 * Entries are append-only: the logger exposes no update or delete.
 */

import { z } from "zod";
import { ScalarMapSchema } from "../storage/record-codec";

export const AuditSeveritySchema = z.enum(["info", "warning", "error", "critical"]);

export type AuditSeverity = z.infer<typeof AuditSeveritySchema>;

export const AuditEntryInputSchema = z.object({
  accountId: z.number().int().positive().nullable().optional(),
  action: z.string().min(1).max(100),
  description: z.string().max(2000).optional(),
  ipAddress: z.string().optional(),
  userAgent: z.string().optional(),
  severity: AuditSeveritySchema.default("info"),
  payload: ScalarMapSchema.default({}),
});

export type AuditEntryInput = z.input<typeof AuditEntryInputSchema>;

export const AuditEntrySchema = z.object({
  id: z.number().int(),
  accountId: z.number().int().nullable(),
  action: z.string(),
  description: z.string().nullable(),
  ipAddress: z.string().nullable(),
  userAgent: z.string().nullable(),
  severity: AuditSeveritySchema,
  createdAt: z.string(),
  payload: ScalarMapSchema,
});

export type AuditEntry = z.infer<typeof AuditEntrySchema>;

export interface AuditQuery {
  accountId?: number;
  action?: string;
  severity?: AuditSeverity;
}
