/**
 * Input validation utilities for claude-sandbox.
 *
 * Centralized validation for user-supplied environment variables.
 *
 * Dependency direction:
 *   This module imports from: errors.ts
 *   It should NOT import from: cli, commands, session
 */

import { ValidationError } from "./errors.js";

/** POSIX environment variable key pattern: [A-Za-z_][A-Za-z0-9_]* */
const ENV_VAR_KEY_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

export interface EnvVar {
  key: string;
  value: string;
}

export function isValidEnvVarKey(key: string): boolean {
  return ENV_VAR_KEY_PATTERN.test(key);
}

/**
 * Validate an environment variable key and throw if invalid.
 *
 * @throws ValidationError if the key is not a POSIX name.
 */
export function validateEnvVarKey(key: string): void {
  if (!isValidEnvVarKey(key)) {
    throw new ValidationError(
      `Invalid env var key '${key}'. Must be alphanumeric/underscore, starting with letter or underscore.`
    );
  }
}

/**
 * Strip characters that would split one `-e KEY=VALUE` into several lines.
 */
export function sanitizeEnvValue(value: string): string {
  // eslint-disable-next-line no-control-regex
  return value.replace(/[\r\n\x00]/g, "");
}

/**
 * Parse a KEY=VALUE string, throwing on invalid format.
 *
 * @throws ValidationError if format or key is invalid.
 */
export function parseEnvVarStrict(envVar: string): EnvVar {
  const eqIdx = envVar.indexOf("=");
  if (eqIdx <= 0) {
    throw new ValidationError(`Invalid env format '${envVar}'. Expected KEY=VALUE`);
  }

  const key = envVar.slice(0, eqIdx);
  validateEnvVarKey(key);
  return { key, value: sanitizeEnvValue(envVar.slice(eqIdx + 1)) };
}

/**
 * Merge env sources into one record. Later sources override earlier keys.
 *
 * @throws ValidationError on the first invalid key or entry.
 */
export function buildEnvRecord(
  fromConfig: Readonly<Record<string, string>>,
  fromCli: readonly string[]
): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(fromConfig)) {
    validateEnvVarKey(key);
    result[key] = sanitizeEnvValue(value);
  }
  for (const entry of fromCli) {
    const { key, value } = parseEnvVarStrict(entry);
    result[key] = value;
  }
  return result;
}
