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
 * Email/password login, logout and session validation.
 */

import type { FastifyInstance } from "fastify";
import { UnauthorizedError } from "../../errors";
import {
  bearerToken,
  clearSessionCookies,
  cookieSettings,
  extractToken,
  requestContext,
  setSessionCookies,
} from "../request-auth";
import type { RouteContext } from "../route-context";
import { LoginBodySchema, LogoutBodySchema, parseOrThrow } from "../schemas";
import { accountView } from "../views";

export function registerAuthRoutes(app: FastifyInstance, ctx: RouteContext): void {
  const { credentials, sessions, accounts, accountService } = ctx.services;

  app.post("/api/db/auth/login", async (req, reply) => {
    const { email, senha } = parseOrThrow(
      LoginBodySchema,
      req.body ?? {},
      "Email e senha são obrigatórios",
    );
    const context = requestContext(req);

    const result = await credentials.authenticate(email, senha, context);
    if (!result.ok) {
      throw new UnauthorizedError("Credenciais inválidas");
    }

    const session = await sessions.createSession({
      accountId: result.account.id,
      ipAddress: context.ipAddress,
      userAgent: context.userAgent,
    });
    setSessionCookies(reply, session.token, cookieSettings(ctx.config));
    req.log.info({ accountId: result.account.id }, "login succeeded");

    return {
      success: true,
      message: "Login realizado com sucesso",
      token: session.token,
      cliente: accountView(result.account, await accountService.countDevices(result.account.id)),
    };
  });

  app.post("/api/db/auth/logout", async (req, reply) => {
    const body = parseOrThrow(LogoutBodySchema, req.body ?? {});
    const token = bearerToken(req) || body.token || extractToken(req);
    if (token) {
      await sessions.revokeSession(token, requestContext(req));
    }
    clearSessionCookies(reply);
    return { success: true, message: "Logout realizado" };
  });

  app.get("/api/db/auth/validar", async (req) => {
    const token = extractToken(req);
    if (!token) {
      throw new UnauthorizedError("Token não fornecido");
    }
    const session = await sessions.validateSession(token);
    if (!session) {
      throw new UnauthorizedError("Sessão inválida ou expirada");
    }

    const account = session.accountId !== null ? await accounts.findById(session.accountId) : null;
    return {
      success: true,
      valido: true,
      cliente: account ? accountView(account, await accountService.countDevices(account.id)) : null,
    };
  });
}
