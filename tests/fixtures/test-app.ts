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
 * Fastify app over in-memory services, plus login helpers for route tests.
 */

import type { FastifyInstance } from "fastify";
import type { AppConfig } from "@/config/schema";
import type { ServiceOverrides, Services } from "@/services";
import { buildApp } from "@/web/app";
import { createTestServices, testConfig } from "./test-env";

export interface TestApp {
  app: FastifyInstance;
  services: Services;
  config: AppConfig;
  close(): Promise<void>;
}

export async function createTestApp(
  overrides: ServiceOverrides = {},
  config: AppConfig = testConfig(),
): Promise<TestApp> {
  const services = await createTestServices(overrides, config);
  const app = await buildApp(services, config);
  await app.ready();
  return {
    app,
    services,
    config,
    async close() {
      await app.close();
      await services.storage.close();
    },
  };
}

export const ADMIN_EMAIL = "admin@sistema.local";
export const ADMIN_PASSWORD = "admin123";

/** Creates the administrator and an ordinary user; returns their ids. */
export async function seedUsers(services: Services): Promise<{ adminId: number; userId: number }> {
  const admin = await services.credentials.ensureAdmin(ADMIN_EMAIL, ADMIN_PASSWORD);
  const user = await services.credentials.createAccount("Usuário", "user@example.com", "user-pass");
  return { adminId: admin.account.id, userId: user.id };
}

/** Logs in through the API and returns the bearer header for the session. */
export async function loginHeaders(
  app: FastifyInstance,
  email: string,
  senha: string,
): Promise<{ authorization: string }> {
  const res = await app.inject({
    method: "POST",
    url: "/api/db/auth/login",
    payload: { email, senha },
  });
  const body: unknown = res.json();
  if (res.statusCode !== 200 || typeof body !== "object" || body === null || !("token" in body)) {
    throw new Error(`Login failed for ${email}: ${res.statusCode} ${res.body}`);
  }
  return { authorization: `Bearer ${String(body.token)}` };
}
