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
 * Public config API.
 * Orchestrates: read → substitute → parse → validate → freeze.
 */

import { readFile } from "node:fs/promises";
import { parse as parseYaml } from "yaml";
import { type Environment, substituteEnvVars } from "./env-substitute";
import { ConfigError, ConfigValidationError } from "./errors";
import { type AppConfig, AppConfigSchema } from "./schema";

export const DEFAULT_CONFIG_PATH = "config/app.yaml";

export interface LoadConfigOptions {
  /** Config file path; falls back to APP_CONFIG, then config/app.yaml. */
  path?: string;
  env?: Environment;
}

export interface LoadedConfig {
  config: AppConfig;
  sourceFile: string;
  /** Environment variables referenced by the file whose values must not be logged. */
  sensitiveVars: ReadonlySet<string>;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Substitute, parse and validate raw YAML text.
 * An empty document yields the schema defaults.
 */
export function parseConfig(
  text: string,
  sourceFile: string,
  env: Environment = process.env,
): LoadedConfig {
  const substituted = substituteEnvVars(text, sourceFile, env);

  let parsed: unknown;
  try {
    parsed = parseYaml(substituted.text);
  } catch (error) {
    throw new ConfigError({
      file: sourceFile,
      message: `Failed to parse YAML: ${error instanceof Error ? error.message : String(error)}`,
    });
  }

  const result = AppConfigSchema.safeParse(parsed ?? {});
  if (!result.success) {
    throw ConfigValidationError.fromIssues(sourceFile, result.error.issues);
  }

  return {
    config: deepFreeze(result.data),
    sourceFile,
    sensitiveVars: substituted.sensitiveVars,
  };
}

/**
 * Load the application configuration file. This is the main entry point for the config system.
 * @throws ConfigError when the file is missing or unreadable, ConfigValidationError when invalid.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<LoadedConfig> {
  const env = options.env ?? process.env;
  const sourceFile = options.path ?? env.APP_CONFIG ?? DEFAULT_CONFIG_PATH;

  let text: string;
  try {
    text = await readFile(sourceFile, "utf-8");
  } catch (error) {
    const code = error instanceof Error && "code" in error ? error.code : undefined;
    throw new ConfigError({
      file: sourceFile,
      message:
        code === "ENOENT"
          ? `Config file not found: ${sourceFile}`
          : `Failed to read config file: ${error instanceof Error ? error.message : String(error)}`,
    });
  }

  return parseConfig(text, sourceFile, env);
}

export { ConfigError, ConfigValidationError } from "./errors";
export { redactSensitiveValues } from "./env-substitute";
export type { AppConfig } from "./schema";
