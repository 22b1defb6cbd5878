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
 * Session transport: cookies and bearer tokens, plus the admin guard.
 */

import type { FastifyReply, FastifyRequest, preHandlerAsyncHookHandler } from "fastify";
import type { Account, RequestContext } from "../accounts/types";
import type { AppConfig } from "../config/schema";
import { ForbiddenError, UnauthorizedError } from "../errors";
import type { Session } from "../sessions/types";
import type { RouteContext } from "./route-context";

export const SESSION_ID_COOKIE = "session_id";
export const SESSION_TOKEN_COOKIE = "session_token";

const BEARER_PREFIX = "Bearer ";

export interface CookieSettings {
  secure: boolean;
  /** Cookie lifetime in seconds; matches the session TTL. */
  maxAgeSeconds: number;
}

export function cookieSettings(config: AppConfig): CookieSettings {
  return {
    secure: config.sessions.cookieSecure,
    maxAgeSeconds: Math.round(config.sessions.ttlHours * 60 * 60),
  };
}

export function setSessionCookies(reply: FastifyReply, token: string, settings: CookieSettings): void {
  const options = {
    httpOnly: true,
    secure: settings.secure,
    sameSite: "lax" as const,
    maxAge: settings.maxAgeSeconds,
    path: "/",
  };
  reply.setCookie(SESSION_ID_COOKIE, token, options);
  reply.setCookie(SESSION_TOKEN_COOKIE, token, options);
}

export function clearSessionCookies(reply: FastifyReply): void {
  reply.clearCookie(SESSION_ID_COOKIE, { path: "/" });
  reply.clearCookie(SESSION_TOKEN_COOKIE, { path: "/" });
}

export function bearerToken(req: FastifyRequest): string | null {
  const header = req.headers.authorization;
  if (!header?.startsWith(BEARER_PREFIX)) {
    return null;
  }
  const token = header.slice(BEARER_PREFIX.length).trim();
  return token || null;
}

/** Bearer header first, then the session cookies. */
export function extractToken(req: FastifyRequest): string | null {
  return (
    bearerToken(req) || req.cookies[SESSION_TOKEN_COOKIE] || req.cookies[SESSION_ID_COOKIE] || null
  );
}

export function requestContext(req: FastifyRequest): RequestContext {
  return {
    ipAddress: req.ip,
    userAgent: req.headers["user-agent"],
  };
}

export interface AuthenticatedAccount {
  session: Session;
  account: Account;
}

/**
 * Resolve the request's session to an active account.
 * @throws UnauthorizedError when there is no valid account session
 */
export async function requireAccount(
  ctx: RouteContext,
  req: FastifyRequest,
): Promise<AuthenticatedAccount> {
  const session = await ctx.services.sessions.validateSession(extractToken(req));
  if (!session || session.accountId === null) {
    throw new UnauthorizedError("Sessão inválida ou expirada");
  }
  const account = await ctx.services.accounts.findById(session.accountId);
  if (!account || !account.active) {
    throw new UnauthorizedError("Sessão inválida ou expirada");
  }
  return { session, account };
}

/** preHandler for admin-only routes: 401 without a valid session, 403 for non-admins. */
export function adminGuard(ctx: RouteContext): preHandlerAsyncHookHandler {
  return async (req) => {
    const { account } = await requireAccount(ctx, req);
    if (account.accessLevel !== "admin") {
      throw new ForbiddenError("Acesso restrito a administradores");
    }
  };
}
