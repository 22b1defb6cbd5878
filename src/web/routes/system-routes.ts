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
 * Health, statistics and audit log routes.
 */

import type { FastifyInstance } from "fastify";
import { adminGuard } from "../request-auth";
import type { RouteContext } from "../route-context";
import { AuditQuerySchema, parseOrThrow } from "../schemas";
import { auditEntryView, statisticsView } from "../views";

export function registerSystemRoutes(app: FastifyInstance, ctx: RouteContext): void {
  const { statistics, audit } = ctx.services;
  const preHandler = adminGuard(ctx);

  app.get("/api/health", async () => {
    return {
      status: "healthy",
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    };
  });

  app.get("/api/db/estatisticas", { preHandler }, async () => {
    const stats = await statistics.collect();
    return {
      success: true,
      estatisticas: statisticsView(stats),
      timestamp: new Date().toISOString(),
    };
  });

  app.get("/api/db/logs", { preHandler }, async (req) => {
    const query = parseOrThrow(AuditQuerySchema, req.query);
    const entries = await audit.query(
      { accountId: query.cliente_id, action: query.acao, severity: query.nivel },
      query.limite,
    );
    return { success: true, logs: entries.map(auditEntryView) };
  });
}
