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

import type { FastifyInstance } from "fastify";
import type { ObservedConnection } from "../../connections/connection-repository";
import { adminGuard } from "../request-auth";
import type { RouteContext } from "../route-context";
import {
  type ConnectionInput,
  ConnectionListQuerySchema,
  ConnectionRegisterBodySchema,
  parseOrThrow,
} from "../schemas";
import { connectionView, pageView } from "../views";

/** Agents report either flat fields or psutil-style laddr/raddr pairs. */
export function toObservedConnection(input: ConnectionInput): ObservedConnection {
  return {
    sourceIp: input.ip_local ?? input.laddr?.ip ?? null,
    destinationIp: input.ip_remoto ?? input.raddr?.ip ?? null,
    sourcePort: input.porta_local ?? input.laddr?.port ?? null,
    destinationPort: input.porta_remota ?? input.raddr?.port ?? null,
    protocol: input.type ?? undefined,
    status: input.status ?? undefined,
    processName: input.processo ?? input.name ?? null,
    pid: input.pid ?? null,
    durationSeconds: input.duracao_segundos ?? null,
    bytesSent: input.bytes_enviados ?? undefined,
    bytesReceived: input.bytes_recebidos ?? undefined,
  };
}

export function registerConnectionRoutes(app: FastifyInstance, ctx: RouteContext): void {
  const { connections } = ctx.services;

  app.get("/api/db/conexoes", { preHandler: adminGuard(ctx) }, async (req) => {
    const query = parseOrThrow(ConnectionListQuerySchema, req.query);
    const page = await connections.list({
      deviceId: query.dispositivo_id,
      accountId: query.cliente_id,
      from: query.data_inicio,
      to: query.data_fim,
      page: query.pagina,
      perPage: query.por_pagina,
    });
    return pageView("conexoes", page, connectionView);
  });

  app.post("/api/db/conexoes/registrar", async (req) => {
    const body = parseOrThrow(ConnectionRegisterBodySchema, req.body ?? {});
    const registered = await connections.recordMany(body.conexoes.map(toObservedConnection), {
      deviceId: body.dispositivo_id ?? null,
      accountId: body.cliente_id ?? null,
    });
    return { success: true, registradas: registered };
  });
}
