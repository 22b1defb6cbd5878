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
 * Zod schemas for request bodies, query strings and path params.
 * Wire field names follow the existing clients (Portuguese).
 */

import { z } from "zod";
import { AccessLevelSchema } from "../accounts/types";
import { AuditSeveritySchema } from "../audit/audit-types";
import { ValidationError } from "../errors";
import { MAX_PAGE } from "../storage/paging";
import { ScalarMapSchema } from "../storage/record-codec";

/**
 * Parse `value` or throw a ValidationError carrying `message`
 * (or the first issue when no message is given).
 */
export function parseOrThrow<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  value: unknown,
  message?: string,
): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issue = result.error.issues[0];
    const detail = issue ? `${issue.path.join(".") || "body"}: ${issue.message}` : "invalid";
    throw new ValidationError(message ?? `Invalid request (${detail})`);
  }
  return result.data;
}

const text = z.string().trim();
const optionalText = text.nullish();
/** Clients send some hardware figures as numbers. */
const textOrNumber = z.union([z.string(), z.number()]).transform(String).nullish();
const queryInt = z.coerce.number().int();
const pageNumber = queryInt.min(1).max(MAX_PAGE).default(1);
const queryBool = z.enum(["true", "false"]).transform((v) => v === "true");
const isoInstant = z
  .string()
  .refine((v) => !Number.isNaN(Date.parse(v)), "Invalid date")
  .transform((v) => new Date(v).toISOString());

// ---------------------------------------------------------------------------
// Common
// ---------------------------------------------------------------------------

export const IdParamsSchema = z.object({
  id: queryInt.positive(),
});

export const BodyObjectSchema = z.record(z.string(), z.unknown());

// ---------------------------------------------------------------------------
// Auth
// ---------------------------------------------------------------------------

export const LoginBodySchema = z.object({
  email: text.min(1),
  senha: z.string().min(1),
});

export const LogoutBodySchema = z.object({
  token: z.string().optional(),
});

// ---------------------------------------------------------------------------
// Terms / identity
// ---------------------------------------------------------------------------

export const AcceptTermsBodySchema = z.object({
  system_info: BodyObjectSchema.optional(),
});

export const ApiAcceptTermsBodySchema = z.object({
  accept_terms: z.literal(true),
  system_info: BodyObjectSchema.optional(),
});

// ---------------------------------------------------------------------------
// Accounts
// ---------------------------------------------------------------------------

const accountProfileShape = {
  telefone: optionalText,
  empresa: optionalText,
  cargo: optionalText,
  endereco: optionalText,
  cidade: optionalText,
  estado: optionalText,
  pais: optionalText,
  cep: optionalText,
  cpf_cnpj: optionalText,
  observacoes: optionalText,
  nivel_acesso: AccessLevelSchema.optional(),
  dados_extras: ScalarMapSchema.optional(),
};

export const AccountCreateBodySchema = z.object({
  nome: text.min(1),
  email: text.min(1),
  senha: z.string().min(1).nullish(),
  ...accountProfileShape,
});

export type AccountCreateBody = z.infer<typeof AccountCreateBodySchema>;

export const AccountUpdateBodySchema = z.object({
  nome: text.min(1).optional(),
  senha: z.string().min(1).optional(),
  ativo: z.boolean().optional(),
  ...accountProfileShape,
});

export type AccountUpdateBody = z.infer<typeof AccountUpdateBodySchema>;

export const AccountListQuerySchema = z.object({
  pagina: pageNumber,
  por_pagina: queryInt.min(1).default(20).transform((n) => Math.min(n, 100)),
  busca: z.string().optional(),
  ativo: queryBool.optional(),
});

export const DeleteQuerySchema = z.object({
  hard: z
    .string()
    .optional()
    .transform((v) => v?.toLowerCase() === "true"),
});

// ---------------------------------------------------------------------------
// Devices
// ---------------------------------------------------------------------------

export const SystemInfoSchema = z
  .object({
    nome: optionalText,
    tipo: optionalText,
    hostname: optionalText,
    computador: optionalText,
    sistema: optionalText,
    sistema_operacional: optionalText,
    versao: textOrNumber,
    ip_local: optionalText,
    ip_publico: optionalText,
    mac_address: optionalText,
    processador: optionalText,
    memoria: textOrNumber,
    disco: textOrNumber,
    is_virtual: z.boolean().nullish(),
    virtual_type: optionalText,
  })
  .passthrough();

export type SystemInfo = z.infer<typeof SystemInfoSchema>;

export const DeviceRegisterBodySchema = z
  .object({
    system_info: BodyObjectSchema.optional(),
    cliente_id: z.number().int().positive().nullish(),
  })
  .passthrough();

export const DeviceListQuerySchema = z.object({
  cliente_id: queryInt.positive().optional(),
  pagina: pageNumber,
  por_pagina: queryInt.min(1).default(50).transform((n) => Math.min(n, 100)),
});

// ---------------------------------------------------------------------------
// Connections
// ---------------------------------------------------------------------------

const EndpointSchema = z.object({
  ip: z.string().nullish(),
  port: z.number().int().nullish(),
});

export const ConnectionInputSchema = z.object({
  ip_local: z.string().nullish(),
  ip_remoto: z.string().nullish(),
  porta_local: z.number().int().nullish(),
  porta_remota: z.number().int().nullish(),
  laddr: EndpointSchema.nullish(),
  raddr: EndpointSchema.nullish(),
  type: z.string().nullish(),
  status: z.string().nullish(),
  processo: z.string().nullish(),
  name: z.string().nullish(),
  pid: z.number().int().nullish(),
  duracao_segundos: z.number().int().nullish(),
  bytes_enviados: z.number().int().nonnegative().nullish(),
  bytes_recebidos: z.number().int().nonnegative().nullish(),
});

export type ConnectionInput = z.infer<typeof ConnectionInputSchema>;

export const ConnectionRegisterBodySchema = z.object({
  conexoes: z.array(ConnectionInputSchema).max(1000).default([]),
  dispositivo_id: z.number().int().positive().nullish(),
  cliente_id: z.number().int().positive().nullish(),
});

export const ConnectionListQuerySchema = z.object({
  dispositivo_id: queryInt.positive().optional(),
  cliente_id: queryInt.positive().optional(),
  pagina: pageNumber,
  por_pagina: queryInt.min(1).default(100).transform((n) => Math.min(n, 100)),
  data_inicio: isoInstant.optional(),
  data_fim: isoInstant.optional(),
});

// ---------------------------------------------------------------------------
// Audit log, chat
// ---------------------------------------------------------------------------

export const AuditQuerySchema = z.object({
  cliente_id: queryInt.positive().optional(),
  acao: z.string().min(1).optional(),
  nivel: AuditSeveritySchema.optional(),
  limite: queryInt.default(100),
});

export const ChatHistoryQuerySchema = z.object({
  sala: z.string().min(1).optional(),
  limite: queryInt.min(1).default(100).transform((n) => Math.min(n, 500)),
  antes_de: isoInstant.optional(),
});

export const ChatPostBodySchema = z.object({
  mensagem: text.min(1),
  usuario: optionalText,
  sala: optionalText,
  cliente_id: z.number().int().positive().nullish(),
});
