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
 * Zod schemas for application configuration.
 * All sections use .strict() to reject unknown fields.
 */

import { z } from "zod";

export const ServerConfigSchema = z
  .object({
    host: z.string().min(1).default("0.0.0.0"),
    port: z.number().int().min(0).max(65535).default(5000),
    trustProxy: z.boolean().default(false),
    exposeErrorDetails: z.boolean().default(false),
  })
  .strict();

export const DatabaseConfigSchema = z
  .object({
    url: z.string().nullable().optional(),
    sqlitePath: z.string().min(1).default("data/clientdesk.db"),
    poolSize: z.number().int().positive().default(10),
  })
  .strict();

export const SessionsConfigSchema = z
  .object({
    ttlHours: z.number().nonnegative().default(24),
    cookieSecure: z.boolean().default(false),
  })
  .strict();

export const PasswordsConfigSchema = z
  .object({
    bcryptRounds: z.number().int().min(4).max(15).default(12),
  })
  .strict();

export const AuditConfigSchema = z
  .object({
    maxQueryLimit: z.number().int().positive().default(500),
  })
  .strict();

export const DevicesConfigSchema = z
  .object({
    onlineWindowMinutes: z.number().int().positive().default(5),
  })
  .strict();

export const AccountsConfigSchema = z
  .object({
    defaultCountry: z.string().min(1).default("Brasil"),
    /** Administrator created at startup when no account has this email. */
    adminEmail: z.string().email().nullable().optional(),
    adminPassword: z.string().min(1).nullable().optional(),
  })
  .strict();

export const ChatConfigSchema = z
  .object({
    defaultRoom: z.string().min(1).default("geral"),
    maxHistory: z.number().int().positive().default(500),
  })
  .strict();

export const LoggingConfigSchema = z
  .object({
    requests: z.boolean().default(true),
    level: z.enum(["fatal", "error", "warn", "info", "debug", "trace"]).default("info"),
  })
  .strict();

export const AppConfigSchema = z
  .object({
    server: ServerConfigSchema.default({}),
    database: DatabaseConfigSchema.default({}),
    sessions: SessionsConfigSchema.default({}),
    passwords: PasswordsConfigSchema.default({}),
    audit: AuditConfigSchema.default({}),
    devices: DevicesConfigSchema.default({}),
    accounts: AccountsConfigSchema.default({}),
    chat: ChatConfigSchema.default({}),
    logging: LoggingConfigSchema.default({}),
  })
  .strict();

export type AppConfigInput = z.input<typeof AppConfigSchema>;
export type AppConfig = z.output<typeof AppConfigSchema>;
export type ServerConfig = z.output<typeof ServerConfigSchema>;
export type DatabaseConfig = z.output<typeof DatabaseConfigSchema>;
export type SessionsConfig = z.output<typeof SessionsConfigSchema>;
export type LoggingConfig = z.output<typeof LoggingConfigSchema>;
