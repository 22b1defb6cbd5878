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
 * Zod-backed decoding of stored records into domain types.
 */

import { z } from "zod";
import type { StoredRecord } from "./types";

export const ScalarSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

/** Free-form metadata: string keys to scalar values, nothing nested. */
export const ScalarMapSchema = z.record(z.string(), ScalarSchema);

export type ScalarMap = z.infer<typeof ScalarMapSchema>;

export class MalformedRecordError extends Error {
  constructor(collection: string, id: number, detail: string) {
    super(`Malformed ${collection} record ${id}: ${detail}`);
    this.name = "MalformedRecordError";
  }
}

export class RecordCodec<T> {
  constructor(
    readonly collection: string,
    private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ) {}

  decode(record: StoredRecord): T {
    const parsed = this.schema.safeParse(record);
    if (!parsed.success) {
      throw new MalformedRecordError(this.collection, record.id, parsed.error.message);
    }
    return parsed.data;
  }

  decodeOrNull(record: StoredRecord | null): T | null {
    return record ? this.decode(record) : null;
  }

  decodeAll(records: StoredRecord[]): T[] {
    return records.map((record) => this.decode(record));
  }
}
