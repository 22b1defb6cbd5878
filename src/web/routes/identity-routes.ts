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
 * Terms acceptance and per-IP identity lookups. Accepting the terms assigns the
 * caller's address an identity and opens an anonymous session for it.
 * Administrators can list the whole registry.
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { NotFoundError, ValidationError } from "../../errors";
import type { AssignedIdentity } from "../../identity/types";
import type { Session } from "../../sessions/types";
import { adminGuard, cookieSettings, requestContext, setSessionCookies } from "../request-auth";
import type { RouteContext } from "../route-context";
import { AcceptTermsBodySchema, ApiAcceptTermsBodySchema, parseOrThrow } from "../schemas";
import { identityDataView, truncateToken } from "../views";

function isJsonRequest(req: FastifyRequest): boolean {
  return req.headers["content-type"]?.toLowerCase().includes("application/json") ?? false;
}

export function registerIdentityRoutes(app: FastifyInstance, ctx: RouteContext): void {
  const { identities, sessions } = ctx.services;

  async function admit(
    req: FastifyRequest,
    reply: FastifyReply,
    systemInfo: Record<string, unknown>,
  ): Promise<{ assigned: AssignedIdentity; session: Session }> {
    const { ipAddress, userAgent } = requestContext(req);
    const metadata = {
      ...systemInfo,
      userAgent: systemInfo.userAgent ?? userAgent,
      ipPublico: systemInfo.ipPublico ?? ipAddress,
      timestamp: systemInfo.timestamp ?? new Date().toISOString(),
    };

    const assigned = await identities.getOrCreate(ipAddress, userAgent, metadata);
    const session = await sessions.createSession({
      identityUsername: assigned.identity.username,
      ipAddress,
      userAgent,
    });
    setSessionCookies(reply, session.token, cookieSettings(ctx.config));

    req.log.info(
      { username: assigned.identity.username, visits: assigned.identity.visits },
      assigned.isNew ? "new identity" : "returning identity",
    );
    return { assigned, session };
  }

  app.post("/accept_terms", async (req, reply) => {
    const systemInfo = isJsonRequest(req)
      ? parseOrThrow(AcceptTermsBodySchema, req.body ?? {}).system_info
      : undefined;
    const { assigned } = await admit(req, reply, systemInfo ?? {});

    return {
      success: true,
      redirect: "/chat",
      username: assigned.identity.username,
      is_new_user: assigned.isNew,
      total_visits: assigned.identity.visits,
    };
  });

  app.post("/api/accept_terms", async (req, reply) => {
    if (!isJsonRequest(req)) {
      throw new ValidationError("Esta rota aceita apenas JSON");
    }
    const body = parseOrThrow(
      ApiAcceptTermsBodySchema,
      req.body ?? {},
      "Você deve aceitar os termos para continuar",
    );
    const { assigned, session } = await admit(req, reply, body.system_info ?? {});
    const username = assigned.identity.username;

    return {
      success: true,
      message: `Bem-vindo, ${username}!`,
      username,
      is_new_user: assigned.isNew,
      total_visits: assigned.identity.visits,
      session_id: truncateToken(session.token),
      timestamp: new Date().toISOString(),
    };
  });

  app.get("/api/user_info", async (req) => {
    const identity = await identities.get(req.ip);
    if (!identity) {
      return {
        exists: false,
        ip: req.ip,
        message: "Usuário será criado ao aceitar os termos",
      };
    }
    return {
      exists: true,
      username: identity.username,
      ip: req.ip,
      total_visits: identity.visits,
      first_visit: identity.firstSeenAt,
      last_seen: identity.lastSeenAt,
    };
  });

  app.get("/api/monitor/registered_users", { preHandler: adminGuard(ctx) }, async () => {
    const registered = await identities.list();
    return {
      success: true,
      users: registered.map(identityDataView),
      total: registered.length,
      timestamp: new Date().toISOString(),
    };
  });

  app.get("/api/my_data", async (req) => {
    const identity = await identities.get(req.ip);
    if (!identity) {
      throw new NotFoundError("Nenhum dado encontrado para seu IP");
    }
    return { success: true, data: identityDataView(identity) };
  });
}
