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

import { AuditLogger } from "@/audit/audit-logger";
import { InternalError } from "@/errors";
import { IpIdentityAssigner } from "@/identity/ip-identity-assigner";
import { UsernameGenerator } from "@/identity/username-generator";
import { UniqueConstraintError } from "@/storage/errors";
import type { SQLiteAdapter } from "@/storage/sqlite-adapter";
import { type TestClock, createClock, createMemoryStorage } from "../../fixtures/test-env";

/** Cycles through adjectives, one per call, with a fixed number suffix. */
function sequentialUsernames(): UsernameGenerator {
  let calls = 0;
  return new UsernameGenerator(
    { adjectives: ["Brave", "Calm", "Eager", "Jolly"], nouns: ["Otter"] },
    (max) => {
      // Each next() draws adjective, noun, then number.
      const draw = calls++ % 3;
      if (draw === 0) return Math.floor(calls / 3) % max;
      return 0;
    },
  );
}

describe("IpIdentityAssigner", () => {
  let storage: SQLiteAdapter;
  let clock: TestClock;
  let audit: AuditLogger;
  let assigner: IpIdentityAssigner;

  beforeEach(async () => {
    storage = await createMemoryStorage();
    clock = createClock("2026-03-10T12:00:00.000Z");
    audit = new AuditLogger(storage, { now: clock.now });
    assigner = new IpIdentityAssigner(storage, audit, {
      usernames: sequentialUsernames(),
      now: clock.now,
    });
    await assigner.ensureIndexes();
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await storage.close();
  });

  it("creates an identity on first contact and reuses it afterwards", async () => {
    const first = await assigner.getOrCreate("10.0.0.5", "agent/1");
    clock.advance(60_000);
    const second = await assigner.getOrCreate("10.0.0.5");
    clock.advance(60_000);
    const third = await assigner.getOrCreate("::ffff:10.0.0.5", "agent/2");

    expect([first.isNew, second.isNew, third.isNew]).toEqual([true, false, false]);
    expect([first, second, third].map((r) => r.identity.visits)).toEqual([1, 2, 3]);
    expect(new Set([first, second, third].map((r) => r.identity.username)).size).toBe(1);
    expect(third.identity).toMatchObject({
      ip: "10.0.0.5",
      username: "BraveOtter100",
      firstSeenAt: "2026-03-10T12:00:00.000Z",
      lastSeenAt: "2026-03-10T12:02:00.000Z",
      userAgent: "agent/2",
    });
  });

  it("keeps the previous user agent when none is sent", async () => {
    await assigner.getOrCreate("10.0.0.5", "agent/1");

    const returning = await assigner.getOrCreate("10.0.0.5", null);

    expect(returning.identity.userAgent).toBe("agent/1");
  });

  it("merges metadata across visits", async () => {
    await assigner.getOrCreate("10.0.0.5", null, { os: "Windows", cores: 4 });

    const returning = await assigner.getOrCreate("10.0.0.5", null, { os: "Linux", nested: { a: 1 } });

    expect(returning.identity.metadata).toEqual({ os: "Linux", cores: 4 });
  });

  it("gives different addresses different usernames", async () => {
    const a = await assigner.getOrCreate("10.0.0.1");
    const b = await assigner.getOrCreate("10.0.0.2");

    expect(a.identity.username).toBe("BraveOtter100");
    expect(b.identity.username).toBe("CalmOtter100");
  });

  it("resolves concurrent first contacts to one identity", async () => {
    const results = await Promise.all([
      assigner.getOrCreate("10.0.0.9"),
      assigner.getOrCreate("10.0.0.9"),
      assigner.getOrCreate("10.0.0.9"),
    ]);

    expect(new Set(results.map((r) => r.identity.id)).size).toBe(1);
    expect(results.filter((r) => r.isNew)).toHaveLength(1);
    expect(results.map((r) => r.identity.visits).sort()).toEqual([1, 2, 3]);
    expect(await assigner.list()).toHaveLength(1);
  });

  it("retries into the returning path after a unique violation", async () => {
    await assigner.getOrCreate("10.0.0.5");
    const transaction = vi.spyOn(storage, "transaction");
    transaction.mockRejectedValueOnce(new UniqueConstraintError("ip_identities"));

    const result = await assigner.getOrCreate("10.0.0.5");

    expect(result).toMatchObject({ isNew: false, identity: { visits: 2 } });
    expect(transaction).toHaveBeenCalledTimes(2);
  });

  it("gives up after repeated unique violations", async () => {
    vi.spyOn(storage, "transaction").mockRejectedValue(new UniqueConstraintError("ip_identities"));

    await expect(assigner.getOrCreate("10.0.0.5")).rejects.toBeInstanceOf(UniqueConstraintError);
  });

  it("fails when no free username can be found", async () => {
    const stuck = new IpIdentityAssigner(storage, audit, {
      usernames: new UsernameGenerator({ adjectives: ["Brave"], nouns: ["Otter"] }, () => 0),
      now: clock.now,
    });
    await stuck.getOrCreate("10.0.0.1");

    await expect(stuck.getOrCreate("10.0.0.2")).rejects.toThrow(
      new InternalError("Username space exhausted"),
    );
  });

  it("normalizes unknown addresses into one shared identity", async () => {
    const a = await assigner.getOrCreate("");
    const b = await assigner.getOrCreate(undefined);

    expect(a.identity.ip).toBe("unknown");
    expect(b.identity.id).toBe(a.identity.id);
  });

  it("audits creation and return visits", async () => {
    await assigner.getOrCreate("10.0.0.5");
    await assigner.getOrCreate("10.0.0.5");

    const entries = await audit.query();
    expect(entries.map((e) => [e.action, e.payload])).toEqual([
      ["identity_returning", { username: "BraveOtter100", visits: 2 }],
      ["identity_created", { username: "BraveOtter100", visits: 1 }],
    ]);
    expect(entries[0]?.ipAddress).toBe("10.0.0.5");
  });

  describe("get and list", () => {
    it("looks up without counting a visit", async () => {
      await assigner.getOrCreate("10.0.0.5");

      const found = await assigner.get("10.0.0.5:443");

      expect(found?.visits).toBe(1);
      expect(await assigner.get("10.9.9.9")).toBeNull();
    });

    it("lists identities most recently seen first", async () => {
      await assigner.getOrCreate("10.0.0.1");
      clock.advance(1000);
      await assigner.getOrCreate("10.0.0.2");
      clock.advance(1000);
      await assigner.getOrCreate("10.0.0.1");

      expect((await assigner.list()).map((i) => i.ip)).toEqual(["10.0.0.1", "10.0.0.2"]);
    });
  });
});
