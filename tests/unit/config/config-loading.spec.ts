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

import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  ConfigError,
  ConfigValidationError,
  DEFAULT_CONFIG_PATH,
  loadConfig,
  parseConfig,
} from "@/config/index";

describe("parseConfig", () => {
  it("yields the defaults for an empty document", () => {
    const { config } = parseConfig("", "app.yaml", {});

    expect(config.server).toEqual({
      host: "0.0.0.0",
      port: 5000,
      trustProxy: false,
      exposeErrorDetails: false,
    });
    expect(config.sessions).toEqual({ ttlHours: 24, cookieSecure: false });
    expect(config.passwords.bcryptRounds).toBe(12);
    expect(config.database.sqlitePath).toBe("data/clientdesk.db");
    expect(config.accounts.defaultCountry).toBe("Brasil");
    expect(config.chat).toEqual({ defaultRoom: "geral", maxHistory: 500 });
    expect(config.logging).toEqual({ requests: true, level: "info" });
  });

  it("substitutes variables before parsing so numbers and booleans keep their types", () => {
    const text = "server:\n  port: ${PORT:-5000}\n  trustProxy: ${TRUST_PROXY:-false}\n";

    const { config } = parseConfig(text, "app.yaml", { PORT: "8080", TRUST_PROXY: "true" });

    expect(config.server.port).toBe(8080);
    expect(config.server.trustProxy).toBe(true);
  });

  it("reports every invalid field", () => {
    const text = "server:\n  port: 70000\npasswords:\n  bcryptRounds: 2\n";

    let caught: unknown;
    try {
      parseConfig(text, "app.yaml", {});
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigValidationError);
    if (caught instanceof ConfigValidationError) {
      expect(caught.errors.map((e) => e.path)).toEqual(["server.port", "passwords.bcryptRounds"]);
      expect(caught.errors.every((e) => e.file === "app.yaml")).toBe(true);
    }
  });

  it("rejects unknown keys", () => {
    expect(() => parseConfig("sessions:\n  ttl: 5\n", "app.yaml", {})).toThrow(
      ConfigValidationError,
    );
  });

  it("wraps YAML syntax errors in ConfigError", () => {
    expect(() => parseConfig("server: [unclosed", "app.yaml", {})).toThrow(
      /^Failed to parse YAML: /,
    );
  });

  it("returns a frozen config", () => {
    const { config } = parseConfig("", "app.yaml", {});

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.server)).toBe(true);
  });

  it("exposes the sensitive variables the document referenced", () => {
    const { sensitiveVars } = parseConfig("database:\n  url: ${DATABASE_URL:-}\n", "app.yaml", {});
    expect([...sensitiveVars]).toEqual(["DATABASE_URL"]);
  });

  it("accepts a null database url from an empty substitution", () => {
    const { config } = parseConfig("database:\n  url: ${DATABASE_URL:-}\n", "app.yaml", {});
    expect(config.database.url).toBeNull();
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "clientdesk-config-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("reads the file named by APP_CONFIG", async () => {
    const file = join(dir, "custom.yaml");
    await writeFile(file, "chat:\n  defaultRoom: lobby\n");

    const loaded = await loadConfig({ env: { APP_CONFIG: file } });

    expect(loaded.sourceFile).toBe(file);
    expect(loaded.config.chat.defaultRoom).toBe("lobby");
  });

  it("prefers an explicit path over APP_CONFIG", async () => {
    const file = join(dir, "explicit.yaml");
    await writeFile(file, "devices:\n  onlineWindowMinutes: 2\n");

    const loaded = await loadConfig({ path: file, env: { APP_CONFIG: join(dir, "other.yaml") } });

    expect(loaded.config.devices.onlineWindowMinutes).toBe(2);
  });

  it("throws ConfigError when the file is missing", async () => {
    const file = join(dir, "absent.yaml");

    await expect(loadConfig({ path: file, env: {} })).rejects.toThrow(
      new ConfigError({ file, message: `Config file not found: ${file}` }),
    );
  });

  it("loads the shipped config file with its defaults", async () => {
    const loaded = await loadConfig({ path: DEFAULT_CONFIG_PATH, env: {} });

    expect(loaded.config.server.port).toBe(5000);
    expect(loaded.config.database.url).toBeNull();
    expect(loaded.config.accounts.adminEmail).toBeNull();
    expect(loaded.config.logging.level).toBe("info");
  });
});
