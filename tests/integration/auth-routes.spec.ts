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
 * Login, logout and session validation over HTTP.
 */

import {
  ADMIN_EMAIL,
  ADMIN_PASSWORD,
  type TestApp,
  createTestApp,
  loginHeaders,
  seedUsers,
} from "../fixtures/test-app";
import { createClock } from "../fixtures/test-env";

describe("auth routes", () => {
  let t: TestApp;
  let tokens: number;

  beforeEach(async () => {
    tokens = 0;
    t = await createTestApp({
      now: createClock("2026-03-10T12:00:00.000Z").now,
      generateToken: () => `test-token-${++tokens}`,
    });
    await seedUsers(t.services);
  });

  afterEach(async () => {
    await t.close();
  });

  describe("POST /api/db/auth/login", () => {
    it("returns the token and account view and sets both session cookies", async () => {
      const res = await t.app.inject({
        method: "POST",
        url: "/api/db/auth/login",
        payload: { email: ADMIN_EMAIL, senha: ADMIN_PASSWORD },
      });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({
        success: true,
        message: "Login realizado com sucesso",
        token: "test-token-1",
        cliente: {
          id: 1,
          nome: "Administrador",
          email: ADMIN_EMAIL,
          telefone: null,
          empresa: null,
          cargo: null,
          endereco: null,
          cidade: null,
          estado: null,
          pais: "Brasil",
          cep: null,
          cpf_cnpj: null,
          ativo: true,
          nivel_acesso: "admin",
          data_cadastro: "2026-03-10T12:00:00.000Z",
          ultimo_acesso: "2026-03-10T12:00:00.000Z",
          observacoes: null,
          dados_extras: {},
          total_dispositivos: 0,
        },
      });

      const cookies = res.cookies.map((c) => ({
        name: c.name,
        value: c.value,
        httpOnly: c.httpOnly,
        path: c.path,
        maxAge: c.maxAge,
      }));
      expect(cookies).toEqual([
        { name: "session_id", value: "test-token-1", httpOnly: true, path: "/", maxAge: 86400 },
        { name: "session_token", value: "test-token-1", httpOnly: true, path: "/", maxAge: 86400 },
      ]);
    });

    it("never serializes the password hash", async () => {
      const res = await t.app.inject({
        method: "POST",
        url: "/api/db/auth/login",
        payload: { email: ADMIN_EMAIL, senha: ADMIN_PASSWORD },
      });

      expect(Object.keys(res.json().cliente)).not.toContain("passwordHash");
      expect(res.body).not.toContain("$2");
    });

    it("answers 400 when a field is missing", async () => {
      const res = await t.app.inject({
        method: "POST",
        url: "/api/db/auth/login",
        payload: { email: ADMIN_EMAIL },
      });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({ success: false, error: "Email e senha são obrigatórios" });
    });

    it("answers 401 the same way for a wrong password and an unknown email", async () => {
      const wrong = await t.app.inject({
        method: "POST",
        url: "/api/db/auth/login",
        payload: { email: ADMIN_EMAIL, senha: "wrong" },
      });
      const unknown = await t.app.inject({
        method: "POST",
        url: "/api/db/auth/login",
        payload: { email: "ghost@example.com", senha: "wrong" },
      });

      expect(wrong.statusCode).toBe(401);
      expect(wrong.json()).toEqual({ success: false, error: "Credenciais inválidas" });
      expect(unknown.statusCode).toBe(401);
      expect(unknown.json()).toEqual(wrong.json());
    });

    it("answers 400 for a malformed JSON body", async () => {
      const res = await t.app.inject({
        method: "POST",
        url: "/api/db/auth/login",
        headers: { "content-type": "application/json" },
        payload: "{not json",
      });

      expect(res.statusCode).toBe(400);
      expect(res.json().success).toBe(false);
    });
  });

  describe("GET /api/db/auth/validar", () => {
    it("accepts a bearer token", async () => {
      const headers = await loginHeaders(t.app, ADMIN_EMAIL, ADMIN_PASSWORD);

      const res = await t.app.inject({ method: "GET", url: "/api/db/auth/validar", headers });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toMatchObject({ success: true, valido: true, cliente: { id: 1 } });
    });

    it("accepts the session cookie", async () => {
      await loginHeaders(t.app, "user@example.com", "user-pass");

      const res = await t.app.inject({
        method: "GET",
        url: "/api/db/auth/validar",
        cookies: { session_token: "test-token-1" },
      });

      expect(res.json()).toMatchObject({ valido: true, cliente: { email: "user@example.com" } });
    });

    it("answers 401 without a token", async () => {
      const res = await t.app.inject({ method: "GET", url: "/api/db/auth/validar" });

      expect(res.statusCode).toBe(401);
      expect(res.json()).toEqual({ success: false, error: "Token não fornecido" });
    });

    it("answers 401 for an unknown token", async () => {
      const res = await t.app.inject({
        method: "GET",
        url: "/api/db/auth/validar",
        headers: { authorization: "Bearer nope" },
      });

      expect(res.statusCode).toBe(401);
      expect(res.json()).toEqual({ success: false, error: "Sessão inválida ou expirada" });
    });
  });

  describe("POST /api/db/auth/logout", () => {
    it("revokes the bearer session and clears cookies", async () => {
      const headers = await loginHeaders(t.app, ADMIN_EMAIL, ADMIN_PASSWORD);

      const res = await t.app.inject({ method: "POST", url: "/api/db/auth/logout", headers });

      expect(res.json()).toEqual({ success: true, message: "Logout realizado" });
      expect(res.cookies.map((c) => [c.name, c.value])).toEqual([
        ["session_id", ""],
        ["session_token", ""],
      ]);
      const after = await t.app.inject({ method: "GET", url: "/api/db/auth/validar", headers });
      expect(after.statusCode).toBe(401);
    });

    it("revokes a token sent in the body", async () => {
      await loginHeaders(t.app, ADMIN_EMAIL, ADMIN_PASSWORD);

      await t.app.inject({
        method: "POST",
        url: "/api/db/auth/logout",
        payload: { token: "test-token-1" },
      });

      expect(await t.services.sessions.validateSession("test-token-1")).toBeNull();
    });

    it("succeeds without any session", async () => {
      const res = await t.app.inject({ method: "POST", url: "/api/db/auth/logout" });

      expect(res.statusCode).toBe(200);
    });
  });
});
