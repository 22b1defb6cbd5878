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

import type { Services } from "@/services";
import { type TestClock, createClock, createTestServices } from "../../fixtures/test-env";

describe("ConnectionRepository", () => {
  let services: Services;
  let clock: TestClock;

  beforeEach(async () => {
    clock = createClock("2026-03-10T12:00:00.000Z");
    services = await createTestServices({ now: clock.now });
  });

  afterEach(async () => {
    await services.storage.close();
  });

  it("records a batch with defaults and the owner", async () => {
    const count = await services.connections.recordMany(
      [
        { sourceIp: "192.168.0.10", sourcePort: 51000, destinationIp: "203.0.113.5", destinationPort: 443 },
        { destinationIp: "203.0.113.6", protocol: "UDP", status: "NONE", bytesSent: 10 },
      ],
      { deviceId: 3, accountId: 4 },
    );

    expect(count).toBe(2);
    const page = await services.connections.list();
    expect(page.items).toEqual([
      {
        id: 2,
        accountId: 4,
        deviceId: 3,
        sourceIp: null,
        destinationIp: "203.0.113.6",
        sourcePort: null,
        destinationPort: null,
        protocol: "UDP",
        status: "NONE",
        processName: null,
        pid: null,
        observedAt: "2026-03-10T12:00:00.000Z",
        durationSeconds: null,
        bytesSent: 10,
        bytesReceived: 0,
      },
      {
        id: 1,
        accountId: 4,
        deviceId: 3,
        sourceIp: "192.168.0.10",
        destinationIp: "203.0.113.5",
        sourcePort: 51000,
        destinationPort: 443,
        protocol: "TCP",
        status: "ESTABLISHED",
        processName: null,
        pid: null,
        observedAt: "2026-03-10T12:00:00.000Z",
        durationSeconds: null,
        bytesSent: 0,
        bytesReceived: 0,
      },
    ]);
  });

  it("records nothing for an empty batch", async () => {
    expect(await services.connections.recordMany([])).toBe(0);
    expect(await services.connections.count()).toBe(0);
  });

  it("filters by device, account and inclusive time bounds", async () => {
    await services.connections.recordMany([{ destinationIp: "a" }], { deviceId: 1 });
    clock.set("2026-03-11T00:00:00.000Z");
    await services.connections.recordMany([{ destinationIp: "b" }], { deviceId: 1, accountId: 9 });
    clock.set("2026-03-12T00:00:00.000Z");
    await services.connections.recordMany([{ destinationIp: "c" }], { deviceId: 2 });

    const byDevice = await services.connections.list({ deviceId: 1 });
    const byAccount = await services.connections.list({ accountId: 9 });
    const byRange = await services.connections.list({
      from: "2026-03-11T00:00:00.000Z",
      to: "2026-03-12T00:00:00.000Z",
    });
    const fromOnly = await services.connections.list({ from: "2026-03-11T12:00:00.000Z" });

    expect(byDevice.items.map((c) => c.destinationIp)).toEqual(["b", "a"]);
    expect(byAccount.items.map((c) => c.destinationIp)).toEqual(["b"]);
    expect(byRange.items.map((c) => c.destinationIp)).toEqual(["c", "b"]);
    expect(byRange.total).toBe(2);
    expect(fromOnly.items.map((c) => c.destinationIp)).toEqual(["c"]);
  });

  it("pages results", async () => {
    await services.connections.recordMany([{ destinationIp: "a" }, { destinationIp: "b" }, { destinationIp: "c" }]);

    const page = await services.connections.list({ page: 2, perPage: 2 });

    expect(page.items.map((c) => c.destinationIp)).toEqual(["a"]);
    expect(page).toMatchObject({ total: 3, pages: 2, hasNext: false, hasPrev: true });
  });
});
