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
 * Storage error types and helpers shared by the adapters.
 */

const IDENTIFIER_PATTERN = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

export class UniqueConstraintError extends Error {
  readonly collection: string;

  constructor(collection: string, cause?: unknown) {
    super(`Unique constraint violated in collection ${collection}`, { cause });
    this.name = "UniqueConstraintError";
    this.collection = collection;
  }
}

export class RecordNotFoundError extends Error {
  constructor(collection: string, id: number) {
    super(`Record not found: ${id} in collection ${collection}`);
    this.name = "RecordNotFoundError";
  }
}

/**
 * Field and collection names are interpolated into SQL, so they must be plain identifiers.
 */
export function assertIdentifier(value: string, kind: string): void {
  if (!IDENTIFIER_PATTERN.test(value)) {
    throw new Error(`Invalid ${kind}: ${value}`);
  }
}

export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : "unknown error";
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Escapes LIKE wildcards so search terms match literally (escape char: backslash). */
export function escapeLike(term: string): string {
  return term.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}
