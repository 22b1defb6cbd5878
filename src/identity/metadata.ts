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

import type { ScalarMap } from "../storage/record-codec";

export const MAX_METADATA_KEYS = 64;
export const MAX_METADATA_STRING = 512;
const MAX_KEY_LENGTH = 100;

/**
 * Keeps the scalar entries of client-supplied metadata. Nested values, non-finite
 * numbers and over-long keys are dropped; strings are cut to MAX_METADATA_STRING.
 */
export function sanitizeMetadata(input: unknown): ScalarMap {
  const result: ScalarMap = {};
  if (typeof input !== "object" || input === null || Array.isArray(input)) {
    return result;
  }

  let kept = 0;
  for (const [key, value] of Object.entries(input)) {
    if (kept >= MAX_METADATA_KEYS) break;
    if (key.length === 0 || key.length > MAX_KEY_LENGTH) continue;

    if (typeof value === "string") {
      result[key] = value.slice(0, MAX_METADATA_STRING);
    } else if (typeof value === "number") {
      if (!Number.isFinite(value)) continue;
      result[key] = value;
    } else if (typeof value === "boolean" || value === null) {
      result[key] = value;
    } else {
      continue;
    }
    kept++;
  }
  return result;
}

/** Last write wins per key; the merged map still honours the key limit. */
export function mergeMetadata(current: ScalarMap, incoming: ScalarMap): ScalarMap {
  return sanitizeMetadata({ ...current, ...incoming });
}
