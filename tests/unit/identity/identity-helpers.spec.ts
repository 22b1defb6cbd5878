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

import { MAX_METADATA_KEYS, MAX_METADATA_STRING, mergeMetadata, sanitizeMetadata } from "@/identity/metadata";
import { UNKNOWN_IP, normalizeIp } from "@/identity/normalize-ip";
import { UsernameGenerator, loadWordList } from "@/identity/username-generator";

describe("normalizeIp", () => {
  it.each([
    ["10.0.0.5", "10.0.0.5"],
    ["  10.0.0.5 ", "10.0.0.5"],
    ["10.0.0.5:51234", "10.0.0.5"],
    ["::ffff:10.0.0.5", "10.0.0.5"],
    ["[::FFFF:10.0.0.5]:8080", "10.0.0.5"],
    ["FE80::1%eth0", "fe80::1"],
    ["[2001:DB8::1]", "2001:db8::1"],
    ["2001:db8::1", "2001:db8::1"],
  ])("normalizes %s to %s", (raw, expected) => {
    expect(normalizeIp(raw)).toBe(expected);
  });

  it("maps empty input to unknown", () => {
    expect(normalizeIp("")).toBe(UNKNOWN_IP);
    expect(normalizeIp("   ")).toBe(UNKNOWN_IP);
    expect(normalizeIp(null)).toBe(UNKNOWN_IP);
    expect(normalizeIp(undefined)).toBe(UNKNOWN_IP);
  });

  it("keeps a mapped address that is not valid IPv4", () => {
    expect(normalizeIp("::ffff:999.1.1.1")).toBe("::ffff:999.1.1.1");
  });
});

describe("sanitizeMetadata", () => {
  it("keeps scalar values and drops nested ones", () => {
    expect(
      sanitizeMetadata({
        platform: "Linux",
        cores: 8,
        virtual: false,
        gpu: null,
        disks: ["sda"],
        network: { ip: "10.0.0.5" },
        load: Number.NaN,
      }),
    ).toEqual({ platform: "Linux", cores: 8, virtual: false, gpu: null });
  });

  it("returns an empty map for non-objects", () => {
    expect(sanitizeMetadata("text")).toEqual({});
    expect(sanitizeMetadata(null)).toEqual({});
    expect(sanitizeMetadata([1, 2])).toEqual({});
  });

  it("cuts long strings and skips over-long keys", () => {
    const result = sanitizeMetadata({ note: "x".repeat(600), ["k".repeat(101)]: "dropped" });

    expect(result).toEqual({ note: "x".repeat(MAX_METADATA_STRING) });
  });

  it("keeps at most MAX_METADATA_KEYS entries", () => {
    const input = Object.fromEntries(Array.from({ length: 70 }, (_, i) => [`key${i}`, i]));

    expect(Object.keys(sanitizeMetadata(input))).toHaveLength(MAX_METADATA_KEYS);
  });

  it("merges with the incoming value winning", () => {
    expect(mergeMetadata({ os: "Windows", arch: "x64" }, { os: "Linux" })).toEqual({
      os: "Linux",
      arch: "x64",
    });
  });
});

describe("UsernameGenerator", () => {
  it("joins an adjective, a noun and a three-digit number", () => {
    const picks = [1, 0, 482];
    const generator = new UsernameGenerator(
      { adjectives: ["Brave", "Swift"], nouns: ["Otter", "Heron"] },
      () => picks.shift() ?? 0,
    );

    expect(generator.next()).toBe("SwiftOtter582");
  });

  it("produces names in the documented shape from the bundled word list", () => {
    const generator = new UsernameGenerator();

    expect(generator.next()).toMatch(/^[A-Z][a-z]+[A-Z][a-z]+[1-9]\d{2}$/);
  });

  it("loads a non-empty bundled word list", () => {
    const words = loadWordList();

    expect(words.adjectives.length).toBeGreaterThan(0);
    expect(words.nouns.length).toBeGreaterThan(0);
  });

  it("throws when the random source goes out of range", () => {
    const generator = new UsernameGenerator({ adjectives: ["Brave"], nouns: ["Otter"] }, () => 5);

    expect(() => generator.next()).toThrow(RangeError);
  });
});
