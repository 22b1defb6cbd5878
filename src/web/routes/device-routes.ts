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
 * Device inventory routes. Listing and detail are admin-only; registration and
 * heartbeats come from the client agents.
 */

import type { FastifyInstance } from "fastify";
import type { DeviceRegistration } from "../../devices/types";
import { NotFoundError } from "../../errors";
import { sanitizeMetadata } from "../../identity/metadata";
import { adminGuard } from "../request-auth";
import type { RouteContext } from "../route-context";
import {
  DeviceListQuerySchema,
  DeviceRegisterBodySchema,
  IdParamsSchema,
  type SystemInfo,
  SystemInfoSchema,
  parseOrThrow,
} from "../schemas";
import { deviceView, pageView } from "../views";

const NOT_FOUND = "Dispositivo não encontrado";

export function toDeviceRegistration(info: SystemInfo): DeviceRegistration {
  return {
    name: info.nome ?? undefined,
    type: info.tipo ?? undefined,
    hostname: info.hostname ?? info.computador ?? undefined,
    operatingSystem: info.sistema ?? info.sistema_operacional ?? undefined,
    osVersion: info.versao ?? undefined,
    localIp: info.ip_local ?? undefined,
    publicIp: info.ip_publico ?? undefined,
    macAddress: info.mac_address ?? undefined,
    processor: info.processador ?? undefined,
    memoryTotal: info.memoria ?? undefined,
    diskTotal: info.disco ?? undefined,
    isVirtual: info.is_virtual ?? undefined,
    virtualType: info.virtual_type ?? undefined,
    extra: sanitizeMetadata(info),
  };
}

export function registerDeviceRoutes(app: FastifyInstance, ctx: RouteContext): void {
  const { devices, accounts } = ctx.services;
  const preHandler = adminGuard(ctx);

  app.get("/api/db/dispositivos", { preHandler }, async (req) => {
    const query = parseOrThrow(DeviceListQuerySchema, req.query);
    const page = await devices.list({
      accountId: query.cliente_id,
      page: query.pagina,
      perPage: query.por_pagina,
    });
    return pageView("dispositivos", page, deviceView);
  });

  app.get("/api/db/dispositivos/:id", { preHandler }, async (req) => {
    const { id } = parseOrThrow(IdParamsSchema, req.params);
    const device = await devices.get(id);
    if (!device) {
      throw new NotFoundError(NOT_FOUND);
    }
    return { success: true, dispositivo: deviceView(device) };
  });

  app.post("/api/db/dispositivos/registrar", async (req) => {
    const body = parseOrThrow(DeviceRegisterBodySchema, req.body ?? {});
    const { system_info: nested, cliente_id: accountId, ...flat } = body;
    const info = parseOrThrow(SystemInfoSchema, nested ?? flat);

    if (accountId && !(await accounts.findById(accountId))) {
      throw new NotFoundError("Cliente não encontrado");
    }

    const { device } = await devices.register(toDeviceRegistration(info), {
      accountId: accountId ?? null,
      ipAddress: req.ip,
    });
    return { success: true, message: "Dispositivo registrado", dispositivo_id: device.id };
  });

  app.post("/api/db/dispositivos/:id/heartbeat", async (req) => {
    const { id } = parseOrThrow(IdParamsSchema, req.params);
    if (!(await devices.heartbeat(id))) {
      throw new NotFoundError(NOT_FOUND);
    }
    return { success: true };
  });
}
