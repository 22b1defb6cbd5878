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
import { requestContext } from "../request-auth";
import type { RouteContext } from "../route-context";
import { ChatHistoryQuerySchema, ChatPostBodySchema, parseOrThrow } from "../schemas";
import { messageView } from "../views";

export function registerChatRoutes(app: FastifyInstance, ctx: RouteContext): void {
  const { messages, audit } = ctx.services;

  app.get("/api/db/chat/mensagens", async (req) => {
    const query = parseOrThrow(ChatHistoryQuerySchema, req.query);
    const history = await messages.list({
      room: query.sala,
      limit: query.limite,
      before: query.antes_de,
    });
    return { success: true, mensagens: history.map(messageView) };
  });

  app.post("/api/db/chat/mensagens", async (req) => {
    const body = parseOrThrow(ChatPostBodySchema, req.body ?? {}, "Mensagem é obrigatória");
    const message = await messages.save({
      text: body.mensagem,
      author: body.usuario ?? undefined,
      room: body.sala ?? undefined,
      accountId: body.cliente_id ?? null,
    });

    const context = requestContext(req);
    await audit.record({
      accountId: message.accountId,
      action: "chat_message",
      description: `Message in ${message.room}`,
      ipAddress: context.ipAddress,
      userAgent: context.userAgent,
      payload: { messageId: message.id, room: message.room },
    });

    return { success: true, mensagem: messageView(message) };
  });
}
