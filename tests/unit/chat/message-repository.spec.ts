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

import { ValidationError } from "@/errors";
import type { Services } from "@/services";
import { type TestClock, createClock, createTestServices, testConfig } from "../../fixtures/test-env";

describe("MessageRepository", () => {
  let services: Services;
  let clock: TestClock;

  beforeEach(async () => {
    clock = createClock("2026-03-10T12:00:00.000Z");
    services = await createTestServices(
      { now: clock.now },
      testConfig("chat:\n  defaultRoom: geral\n  maxHistory: 3\n"),
    );
  });

  afterEach(async () => {
    await services.storage.close();
  });

  it("saves a trimmed message with defaults", async () => {
    const message = await services.messages.save({ text: "  olá  " });

    expect(message).toEqual({
      id: 1,
      accountId: null,
      room: "geral",
      author: "Anonymous",
      text: "olá",
      kind: "text",
      sentAt: "2026-03-10T12:00:00.000Z",
      edited: false,
      deleted: false,
      replyTo: null,
    });
  });

  it("rejects a blank message", async () => {
    await expect(services.messages.save({ text: "   " })).rejects.toThrow(
      new ValidationError("Message text is required"),
    );
  });

  it("returns the newest messages of a room, oldest first, capped at maxHistory", async () => {
    for (const text of ["m1", "m2", "m3", "m4"]) {
      await services.messages.save({ text, author: "Ana" });
    }
    await services.messages.save({ text: "elsewhere", room: "suporte" });

    const history = await services.messages.list({ limit: 100 });
    const support = await services.messages.list({ room: "suporte" });

    expect(history.map((m) => m.text)).toEqual(["m2", "m3", "m4"]);
    expect(support.map((m) => m.text)).toEqual(["elsewhere"]);
  });

  it("pages backwards with before", async () => {
    await services.messages.save({ text: "early" });
    clock.advance(1000);
    await services.messages.save({ text: "late" });

    const older = await services.messages.list({ before: "2026-03-10T12:00:01.000Z" });

    expect(older.map((m) => m.text)).toEqual(["early"]);
  });

  it("treats a non-finite limit as the default", async () => {
    await services.messages.save({ text: "only" });

    expect(await services.messages.list({ limit: Number.NaN })).toHaveLength(1);
  });

  it("counts messages since an instant", async () => {
    await services.messages.save({ text: "yesterday" });
    clock.set("2026-03-11T09:00:00.000Z");
    await services.messages.save({ text: "today" });

    expect(await services.messages.countSince("2026-03-11T00:00:00.000Z")).toBe(1);
  });
});
