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

import { isIPv4 } from "node:net";

export const UNKNOWN_IP = "unknown";

const IPV4_WITH_PORT = /^(\d{1,3}(?:\.\d{1,3}){3}):\d+$/;
const BRACKETED = /^\[([^\]]+)\](?::\d+)?$/;
const MAPPED_IPV4 = /^::ffff:(\d{1,3}(?:\.\d{1,3}){3})$/;

/**
 * Canonical form of a client address: trimmed and lower-cased, without brackets,
 * port or IPv6 zone id, with IPv4-mapped IPv6 unwrapped to plain IPv4.
 * An empty address becomes "unknown".
 */
export function normalizeIp(raw: string | null | undefined): string {
  let ip = (raw ?? "").trim().toLowerCase();
  if (!ip) {
    return UNKNOWN_IP;
  }

  const bracketed = BRACKETED.exec(ip);
  if (bracketed?.[1]) {
    ip = bracketed[1];
  }

  const withPort = IPV4_WITH_PORT.exec(ip);
  if (withPort?.[1]) {
    ip = withPort[1];
  }

  const zoneIndex = ip.indexOf("%");
  if (zoneIndex !== -1) {
    ip = ip.slice(0, zoneIndex);
  }

  const mapped = MAPPED_IPV4.exec(ip);
  if (mapped?.[1] && isIPv4(mapped[1])) {
    ip = mapped[1];
  }

  return ip || UNKNOWN_IP;
}
