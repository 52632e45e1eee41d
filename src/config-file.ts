/**
 * Configuration file support for claude-sandbox.
 *
 * Loads settings from ccs.yaml or .ccsrc files.
 * Supports both per-project and global configuration.
 *
 * Config file locations (in order of precedence):
 *   1. ./ccs.yaml (project-specific)
 *   2. ./ccs.yml (project-specific, alternative)
 *   3. ./.ccsrc (project-specific, alternative)
 *   4. ~/.config/claude-sandbox/config.yaml (global)
 *
 * Example:
 *   image: claude-code-sandbox:latest
 *   cpus: 4
 *   memory: 8g
 *   sshKey: id_work
 *   env:
 *     GIT_AUTHOR_NAME: "Sandbox User"
 *
 * Dependency direction:
 *   This module imports from: constants.ts, errors.ts, logger.ts
 *   It should NOT import from: cli, commands, session
 */

import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";

import { GLOBAL_CONFIG_PATH } from "./constants.js";
import { ConfigError } from "./errors.js";
import { log } from "./logger.js";

/**
 * claude-sandbox configuration options.
 * All fields are optional - CLI flags and environment variables take precedence.
 */
export interface SandboxConfig {
  image?: string;
  /** Session base name */
  name?: string;
  cpus?: string;
  memory?: string;
  sshKey?: string;
  env?: Record<string, string>;
}

type ScalarValue = string | number | boolean;

interface ParsedYaml {
  values: Record<string, ScalarValue>;
  env: Record<string, string>;
}

const PROJECT_CONFIG_FILES = ["ccs.yaml", "ccs.yml", ".ccsrc"];

const STRING_KEYS = ["image", "name", "cpus", "memory", "sshKey"] as const;

function unquote(value: string): string {
  return value.trim().replace(/^["']|["']$/g, "");
}

/**
 * Parse YAML-like config (simple key: value format with one `env:` block).
 * Supports basic YAML without external dependencies.
 */
export function parseSimpleYaml(content: string): ParsedYaml {
  const values: Record<string, ScalarValue> = {};
  const env: Record<string, string> = {};
  let inEnvBlock = false;

  for (const line of content.split("\n")) {
    const trimmed = line.trim();
    if (trimmed.startsWith("#") || trimmed === "") {
      continue;
    }

    if (trimmed === "env:") {
      inEnvBlock = true;
      continue;
    }

    // Indented lines belong to the env block
    if (inEnvBlock && /^\s/.test(line)) {
      const envMatch = trimmed.match(/^([A-Za-z_][A-Za-z0-9_]*):\s*(.*)$/);
      if (envMatch?.[1] !== undefined && envMatch[2] !== undefined) {
        env[envMatch[1]] = unquote(envMatch[2]);
      }
      continue;
    }
    inEnvBlock = false;

    const match = trimmed.match(/^([a-zA-Z_][a-zA-Z0-9_-]*):\s*(.*)$/);
    if (match?.[1] === undefined || match[2] === undefined) {
      continue;
    }
    const key = match[1];
    const cleanValue = unquote(match[2]);
    if (cleanValue === "true") {
      values[key] = true;
    } else if (cleanValue === "false") {
      values[key] = false;
    } else if (/^\d+(\.\d+)?$/.test(cleanValue)) {
      values[key] = Number(cleanValue);
    } else if (cleanValue !== "") {
      values[key] = cleanValue;
    }
  }

  return { values, env };
}

/**
 * Load configuration from one file.
 *
 * @returns null when the file does not exist.
 * @throws ConfigError when a recognized key has a value of the wrong type.
 */
export function loadConfigFile(path: string): SandboxConfig | null {
  if (!existsSync(path)) {
    return null;
  }

  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (e) {
    log.warn(`Ignoring unreadable config file ${path}`);
    log.debug(String(e));
    return null;
  }

  const parsed = parseSimpleYaml(content);
  const config: SandboxConfig = {};

  for (const key of STRING_KEYS) {
    const value = parsed.values[key];
    if (value === undefined) {
      continue;
    }
    // `cpus: 2` parses as a number; limits are passed to the runtime as text
    if (typeof value === "boolean") {
      throw new ConfigError(`Invalid value for '${key}' in ${path}`, `Expected text or a number, got ${value}`);
    }
    config[key] = String(value);
  }

  if (Object.keys(parsed.env).length > 0) {
    config.env = parsed.env;
  }

  return config;
}

/**
 * Find and load project-specific config file.
 */
function loadProjectConfig(projectPath: string): SandboxConfig | null {
  for (const filename of PROJECT_CONFIG_FILES) {
    const configPath = join(projectPath, filename);
    const config = loadConfigFile(configPath);
    if (config) {
      log.debug(`Loaded project config: ${configPath}`);
      return config;
    }
  }
  return null;
}

/**
 * Merge configurations with proper precedence.
 * Order: global < project (CLI flags and env vars are applied by the caller)
 */
export function mergeConfigs(...configs: (SandboxConfig | null)[]): SandboxConfig {
  const result: SandboxConfig = {};

  for (const config of configs) {
    if (!config) {continue;}

    for (const key of STRING_KEYS) {
      const value = config[key];
      if (value !== undefined) {
        result[key] = value;
      }
    }

    // Env vars: merge (later overrides same keys)
    if (config.env) {
      result.env = { ...(result.env ?? {}), ...config.env };
    }
  }

  return result;
}

/**
 * Load claude-sandbox configuration.
 *
 * @param projectPath - Directory searched for a project config file.
 * @param globalPath - Global config file location.
 * @returns Merged configuration.
 */
export function loadSandboxConfig(projectPath: string, globalPath: string = GLOBAL_CONFIG_PATH): SandboxConfig {
  const globalConfig = loadConfigFile(globalPath);
  if (globalConfig) {
    log.debug(`Loaded global config: ${globalPath}`);
  }
  const projectConfig = loadProjectConfig(projectPath);

  return mergeConfigs(globalConfig, projectConfig);
}
