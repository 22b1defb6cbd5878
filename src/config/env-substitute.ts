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
 * Environment variable substitution for the YAML config file.
 * Supports ${VAR} and ${VAR:-default}; runs on raw text before parsing.
 */

import { ConfigError } from "./errors";

export type Environment = Record<string, string | undefined>;

const ENV_VAR_PATTERN = /\$\{([^}]+)\}/g;

const SENSITIVE_PATTERNS = [/_SECRET$/i, /_KEY$/i, /_PASSWORD$/i, /_TOKEN$/i, /^DATABASE_URL$/i];

export interface SubstitutionResult {
  text: string;
  sensitiveVars: ReadonlySet<string>;
}

function isSensitiveVar(varName: string): boolean {
  return SENSITIVE_PATTERNS.some((pattern) => pattern.test(varName));
}

function splitExpression(expr: string): { varName: string; defaultValue?: string } {
  const defaultSepIndex = expr.indexOf(":-");
  if (defaultSepIndex === -1) {
    return { varName: expr };
  }
  return {
    varName: expr.slice(0, defaultSepIndex),
    defaultValue: expr.slice(defaultSepIndex + 2),
  };
}

/**
 * Substitute ${VAR} and ${VAR:-default} references in raw text.
 * @throws ConfigError naming the first variable that is unset and has no default.
 */
export function substituteEnvVars(
  text: string,
  sourceFile: string,
  env: Environment = process.env,
): SubstitutionResult {
  const unresolved: string[] = [];
  const sensitiveVars = new Set<string>();

  const result = text.replace(ENV_VAR_PATTERN, (match, expr: string) => {
    const { varName, defaultValue } = splitExpression(expr);

    if (isSensitiveVar(varName)) {
      sensitiveVars.add(varName);
    }

    const value = env[varName];
    if (value !== undefined) {
      return value;
    }
    if (defaultValue !== undefined) {
      return defaultValue;
    }

    unresolved.push(varName);
    return match;
  });

  const first = unresolved[0];
  if (first !== undefined) {
    throw new ConfigError({
      file: sourceFile,
      message: `Unresolved environment variable: \${${first}}`,
    });
  }

  return { text: result, sensitiveVars };
}

/**
 * Copy of a config section with every string containing a sensitive variable's value
 * replaced by [REDACTED]. Used before logging configuration.
 */
export function redactSensitiveValues(
  obj: Record<string, unknown>,
  sensitiveVars: ReadonlySet<string>,
  env: Environment = process.env,
): Record<string, unknown> {
  const secrets: string[] = [];
  for (const varName of sensitiveVars) {
    const envValue = env[varName];
    if (envValue) secrets.push(envValue);
  }

  const redact = (value: unknown): unknown => {
    if (typeof value === "string") {
      return secrets.some((secret) => value.includes(secret)) ? "[REDACTED]" : value;
    }
    if (typeof value === "object" && value !== null && !Array.isArray(value)) {
      return Object.fromEntries(Object.entries(value).map(([k, v]) => [k, redact(v)]));
    }
    return value;
  };

  return Object.fromEntries(Object.entries(obj).map(([k, v]) => [k, redact(v)]));
}
