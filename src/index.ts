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
 * Application entry point.
 * Loads dotenv and config, opens storage, builds the services and starts the HTTP server.
 */

import { config as loadDotenv } from "dotenv";
import { loadConfig, redactSensitiveValues } from "./config/index";
import { createServices } from "./services";
import { createStorage } from "./storage/factory";
import { buildApp } from "./web/app";

async function main(): Promise<void> {
  loadDotenv();

  let loaded: Awaited<ReturnType<typeof loadConfig>>;
  try {
    loaded = await loadConfig();
  } catch (error) {
    console.error("ERROR: Config startup failed");
    console.error(error instanceof Error ? error.message : String(error));
    process.exit(1);
  }

  const { config, sourceFile, sensitiveVars } = loaded;
  console.log(`[config] Loaded ${sourceFile}`);
  console.log(
    `[config] Database: ${JSON.stringify(redactSensitiveValues(config.database, sensitiveVars))}`,
  );

  const storage = await createStorage(config.database);
  console.log(`[storage] Using ${storage.getMetadata().adapterName} adapter`);

  const services = await createServices(storage, config);

  const { adminEmail, adminPassword } = config.accounts;
  if (adminEmail && adminPassword) {
    const { account, created } = await services.credentials.ensureAdmin(adminEmail, adminPassword);
    if (created) {
      console.log(`[accounts] Created administrator ${account.email}`);
    }
  }

  const app = await buildApp(services, config);

  const shutdown = async (signal: string): Promise<void> => {
    console.log(`[server] ${signal} received, shutting down`);
    try {
      await app.close();
      await storage.close();
      process.exit(0);
    } catch (error) {
      console.error("[server] Shutdown failed:", error);
      process.exit(1);
    }
  };
  process.once("SIGINT", (signal) => void shutdown(signal));
  process.once("SIGTERM", (signal) => void shutdown(signal));

  await app.listen({ host: config.server.host, port: config.server.port });
  console.log(`[server] Listening on http://${config.server.host}:${config.server.port}`);
}

main().catch((error: unknown) => {
  console.error("ERROR: Startup failed");
  console.error(error);
  process.exit(1);
});
