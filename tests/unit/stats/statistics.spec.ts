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

describe("StatisticsService", () => {
  let services: Services;
  let clock: TestClock;

  beforeEach(async () => {
    clock = createClock("2026-03-10T00:10:00.000Z");
    services = await createTestServices({ now: clock.now });
  });

  afterEach(async () => {
    await services.storage.close();
  });

  it("is all zeros for an empty store", async () => {
    expect(await services.statistics.collect()).toEqual({
      totalAccounts: 0,
      recentlyActiveAccounts: 0,
      totalDevices: 0,
      devicesOnline: 0,
      totalConnections: 0,
      messagesToday: 0,
      activeSessions: 0,
    });
  });

  it("aggregates every counter", async () => {
    // Yesterday: a message, a device and a login.
    clock.set("2026-03-09T23:00:00.000Z");
    await services.credentials.createAccount("Ana", "ana@example.com", "test-pass");
    await services.credentials.authenticate("ana@example.com", "test-pass");
    await services.devices.register({ hostname: "stale" });
    await services.messages.save({ text: "ontem" });

    clock.set("2026-03-10T00:10:00.000Z");
    const bia = await services.credentials.createAccount("Bia", "bia@example.com", "test-pass");
    await services.credentials.authenticate("bia@example.com", "test-pass");
    await services.devices.register({ hostname: "fresh" });
    await services.connections.recordMany([{ destinationIp: "a" }, { destinationIp: "b" }]);
    await services.messages.save({ text: "hoje" });
    await services.sessions.createSession({ accountId: bia.id });
    await services.sessions.createSession({ identityUsername: "BraveOtter100", ttlMs: 0 });

    expect(await services.statistics.collect()).toEqual({
      totalAccounts: 2,
      recentlyActiveAccounts: 1,
      totalDevices: 2,
      devicesOnline: 1,
      totalConnections: 2,
      messagesToday: 1,
      activeSessions: 1,
    });
  });
});
