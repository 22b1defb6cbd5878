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
 * Fastify application: cookie support, error mapping and the route modules.
 */

import fastifyCookie from "@fastify/cookie";
import Fastify, { type FastifyError, type FastifyInstance } from "fastify";
import type { AppConfig } from "../config/schema";
import { AppError } from "../errors";
import type { Services } from "../services";
import type { RouteContext } from "./route-context";
import {
  registerAccountRoutes,
  registerAuthRoutes,
  registerChatRoutes,
  registerConnectionRoutes,
  registerDeviceRoutes,
  registerIdentityRoutes,
  registerSystemRoutes,
} from "./routes/index";

const GENERIC_ERROR = "Erro interno do servidor";

export interface ErrorBody {
  success: false;
  error: string;
}

/** Maps an error to the status and body sent to the client. */
export function toErrorResponse(
  error: FastifyError | Error,
  exposeDetails: boolean,
): { status: number; body: ErrorBody } {
  if (error instanceof AppError && error.status < 500) {
    return { status: error.status, body: { success: false, error: error.message } };
  }

  // Fastify's own client errors: malformed JSON, unsupported media type, oversized body.
  const statusCode =
    "statusCode" in error && typeof error.statusCode === "number" ? error.statusCode : undefined;
  if (statusCode !== undefined && statusCode >= 400 && statusCode < 500) {
    return { status: statusCode, body: { success: false, error: error.message } };
  }

  return {
    status: 500,
    body: { success: false, error: exposeDetails ? error.message : GENERIC_ERROR },
  };
}

export async function buildApp(services: Services, config: AppConfig): Promise<FastifyInstance> {
  const app = Fastify({
    logger: config.logging.requests ? { level: config.logging.level } : false,
    trustProxy: config.server.trustProxy,
  });

  await app.register(fastifyCookie);

  app.setErrorHandler((error: FastifyError, req, reply) => {
    const { status, body } = toErrorResponse(error, config.server.exposeErrorDetails);
    if (status >= 500) {
      req.log.error({ err: error }, "request failed");
    }
    reply.code(status).send(body);
  });

  app.setNotFoundHandler((req, reply) => {
    reply.code(404).send({ success: false, error: `Rota não encontrada: ${req.method} ${req.url}` });
  });

  const ctx: RouteContext = { services, config };
  registerAuthRoutes(app, ctx);
  registerIdentityRoutes(app, ctx);
  registerAccountRoutes(app, ctx);
  registerDeviceRoutes(app, ctx);
  registerConnectionRoutes(app, ctx);
  registerChatRoutes(app, ctx);
  registerSystemRoutes(app, ctx);

  return app;
}
