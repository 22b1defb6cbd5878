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
 * Admin account CRUD under /api/db/clientes.
 */

import type { FastifyInstance } from "fastify";
import type { AccountPatch, AccountProfile, NewAccountAttributes } from "../../accounts/types";
import { ConflictError, DuplicateEmailError, NotFoundError } from "../../errors";
import { adminGuard, requestContext } from "../request-auth";
import type { RouteContext } from "../route-context";
import {
  type AccountCreateBody,
  AccountCreateBodySchema,
  AccountListQuerySchema,
  type AccountUpdateBody,
  AccountUpdateBodySchema,
  DeleteQuerySchema,
  IdParamsSchema,
  parseOrThrow,
} from "../schemas";
import { accountView, pageView } from "../views";

const NOT_FOUND = "Cliente não encontrado";

function profileFromBody(body: AccountCreateBody | AccountUpdateBody): AccountProfile {
  return {
    phone: body.telefone,
    company: body.empresa,
    jobTitle: body.cargo,
    address: body.endereco,
    city: body.cidade,
    state: body.estado,
    country: body.pais,
    postalCode: body.cep,
    taxId: body.cpf_cnpj,
    notes: body.observacoes,
  };
}

export function registerAccountRoutes(app: FastifyInstance, ctx: RouteContext): void {
  const { accountService, credentials } = ctx.services;
  const preHandler = adminGuard(ctx);

  app.get("/api/db/clientes", { preHandler }, async (req) => {
    const query = parseOrThrow(AccountListQuerySchema, req.query);
    const page = await accountService.listAccounts({
      active: query.ativo,
      search: query.busca,
      page: query.pagina,
      perPage: query.por_pagina,
    });
    const counts = await Promise.all(page.items.map((a) => accountService.countDevices(a.id)));
    const views = page.items.map((account, i) => accountView(account, counts[i] ?? 0));
    return pageView("clientes", { ...page, items: views }, (view) => view);
  });

  app.get("/api/db/clientes/:id", { preHandler }, async (req) => {
    const { id } = parseOrThrow(IdParamsSchema, req.params);
    const account = await accountService.getAccount(id);
    if (!account) {
      throw new NotFoundError(NOT_FOUND);
    }
    return {
      success: true,
      cliente: accountView(account, await accountService.countDevices(id)),
    };
  });

  app.post("/api/db/clientes", { preHandler }, async (req, reply) => {
    const raw = req.body ?? {};
    parseOrThrow(AccountCreateBodySchema.pick({ nome: true }), raw, "Nome é obrigatório");
    parseOrThrow(AccountCreateBodySchema.pick({ email: true }), raw, "Email é obrigatório");
    const body = parseOrThrow(AccountCreateBodySchema, raw);

    const attrs: NewAccountAttributes = {
      ...profileFromBody(body),
      accessLevel: body.nivel_acesso,
      extra: body.dados_extras,
    };
    const account = await credentials
      .createAccount(body.nome, body.email, body.senha, attrs, requestContext(req))
      .catch((error: unknown) => {
        throw error instanceof DuplicateEmailError ? new ConflictError("Email já cadastrado") : error;
      });

    reply.code(201);
    return {
      success: true,
      message: "Cliente criado com sucesso",
      cliente: accountView(account, 0),
    };
  });

  app.route({
    method: ["PUT", "PATCH"],
    url: "/api/db/clientes/:id",
    preHandler,
    handler: async (req) => {
      const { id } = parseOrThrow(IdParamsSchema, req.params);
      const body = parseOrThrow(AccountUpdateBodySchema, req.body ?? {});
      const patch: AccountPatch = {
        ...profileFromBody(body),
        name: body.nome,
        accessLevel: body.nivel_acesso,
        active: body.ativo,
        extra: body.dados_extras,
        password: body.senha,
      };

      const account = await accountService.updateAccount(id, patch, requestContext(req));
      if (!account) {
        throw new NotFoundError(NOT_FOUND);
      }
      return {
        success: true,
        message: "Cliente atualizado com sucesso",
        cliente: accountView(account, await accountService.countDevices(id)),
      };
    },
  });

  app.delete("/api/db/clientes/:id", { preHandler }, async (req) => {
    const { id } = parseOrThrow(IdParamsSchema, req.params);
    const { hard } = parseOrThrow(DeleteQuerySchema, req.query);

    const deleted = await accountService.deleteAccount(id, { hard }, requestContext(req));
    if (!deleted) {
      throw new NotFoundError(NOT_FOUND);
    }
    return { success: true, message: "Cliente deletado com sucesso" };
  });
}
