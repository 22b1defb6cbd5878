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
 * Adapter factory: selects a StorageAdapter from the database configuration.
 *   - postgres:// or postgresql:// → PostgresAdapter
 *   - sqlite:///path → SQLiteAdapter on that path
 *   - absent → SQLiteAdapter on the configured sqlitePath
 */

import type { DatabaseConfig } from "../config/schema";
import type { StorageAdapter } from "./adapter";
import { PostgresAdapter } from "./postgres-adapter";
import { SQLiteAdapter } from "./sqlite-adapter";

const SQLITE_URL_PREFIX = "sqlite:///";

function isPostgresUrl(url: string): boolean {
  return url.startsWith("postgres://") || url.startsWith("postgresql://");
}

export function createAdapter(database: DatabaseConfig): StorageAdapter {
  const url = database.url;

  if (url && isPostgresUrl(url)) {
    return new PostgresAdapter({ connectionString: url, max: database.poolSize });
  }

  if (url?.startsWith(SQLITE_URL_PREFIX)) {
    return new SQLiteAdapter({ dbPath: url.slice(SQLITE_URL_PREFIX.length) });
  }

  if (url) {
    throw new Error(`Unsupported database URL scheme: ${url.split(":")[0]}`);
  }

  return new SQLiteAdapter({ dbPath: database.sqlitePath });
}

/**
 * Creates and initializes the adapter. The caller owns it and must close it.
 */
export async function createStorage(database: DatabaseConfig): Promise<StorageAdapter> {
  const adapter = createAdapter(database);
  await adapter.initialize();
  return adapter;
}
