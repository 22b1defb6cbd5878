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

import {
  ADMIN_EMAIL,
  ADMIN_PASSWORD,
  type TestApp,
  createTestApp,
  loginHeaders,
  seedUsers,
} from "../fixtures/test-app";
import { type TestClock, createClock } from "../fixtures/test-env";

describe("connection routes", () => {
  let t: TestApp;
  let clock: TestClock;
  let admin: { authorization: string };

  beforeEach(async () => {
    clock = createClock("2026-03-10T12:00:00.000Z");
    t = await createTestApp({ now: clock.now });
    await seedUsers(t.services);
    admin = await loginHeaders(t.app, ADMIN_EMAIL, ADMIN_PASSWORD);
  });

  afterEach(async () => {
    await t.close();
  });

  function report(payload: Record<string, unknown>) {
    return t.app.inject({ method: "POST", url: "/api/db/conexoes/registrar", payload });
  }

  function list(query = "") {
    return t.app.inject({ method: "GET", url: `/api/db/conexoes${query}`, headers: admin });
  }

  it("records flat and laddr/raddr entries", async () => {
    const res = await report({
      dispositivo_id: 1,
      cliente_id: 2,
      conexoes: [
        {
          ip_local: "192.168.0.10",
          ip_remoto: "93.184.216.34",
          porta_local: 50000,
          porta_remota: 443,
          processo: "browser",
          pid: 1200,
        },
        {
          laddr: { ip: "0.0.0.0", port: 53 },
          raddr: null,
          type: "UDP",
          status: "LISTEN",
          name: "dns",
          bytes_enviados: 10,
        },
      ],
    });

    expect(res.json()).toEqual({ success: true, registradas: 2 });

    const { conexoes } = (await list()).json();
    expect(conexoes).toEqual([
      {
        id: 2,
        cliente_id: 2,
        dispositivo_id: 1,
        ip_origem: "0.0.0.0",
        ip_destino: null,
        porta_origem: 53,
        porta_destino: null,
        protocolo: "UDP",
        status: "LISTEN",
        processo: "dns",
        pid: null,
        data_hora: "2026-03-10T12:00:00.000Z",
        duracao_segundos: null,
        bytes_enviados: 10,
        bytes_recebidos: 0,
      },
      {
        id: 1,
        cliente_id: 2,
        dispositivo_id: 1,
        ip_origem: "192.168.0.10",
        ip_destino: "93.184.216.34",
        porta_origem: 50000,
        porta_destino: 443,
        protocolo: "TCP",
        status: "ESTABLISHED",
        processo: "browser",
        pid: 1200,
        data_hora: "2026-03-10T12:00:00.000Z",
        duracao_segundos: null,
        bytes_enviados: 0,
        bytes_recebidos: 0,
      },
    ]);
  });

  it("accepts an empty batch", async () => {
    const res = await report({});

    expect(res.json()).toEqual({ success: true, registradas: 0 });
  });

  it("rejects a malformed batch", async () => {
    const res = await report({ conexoes: "not-a-list" });

    expect(res.statusCode).toBe(400);
  });

  it("filters by device and time window", async () => {
    await report({ dispositivo_id: 1, conexoes: [{ ip_remoto: "10.1.1.1" }] });
    clock.advance(60 * 60_000);
    await report({ dispositivo_id: 2, conexoes: [{ ip_remoto: "10.2.2.2" }] });

    const byDevice = await list("?dispositivo_id=1");
    const since = await list("?data_inicio=2026-03-10T12:30:00.000Z");
    const until = await list("?data_fim=2026-03-10T12:30:00.000Z");

    expect(byDevice.json()).toMatchObject({ total: 1, conexoes: [{ ip_destino: "10.1.1.1" }] });
    expect(since.json()).toMatchObject({ total: 1, conexoes: [{ ip_destino: "10.2.2.2" }] });
    expect(until.json()).toMatchObject({ total: 1, conexoes: [{ ip_destino: "10.1.1.1" }] });
  });

  it("keeps the listing admin-only", async () => {
    const res = await t.app.inject({ method: "GET", url: "/api/db/conexoes" });

    expect(res.statusCode).toBe(401);
  });
});
