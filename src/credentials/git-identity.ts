/**
 * Git identity hand-off into the persistent configuration directory.
 */

import { copyFileSync, existsSync, mkdirSync } from "node:fs";
import { join } from "node:path";

import { GIT_IDENTITY_FILENAME } from "../constants.js";
import { log } from "../logger.js";

/**
 * Create the persistent configuration directory on first use.
 */
export function ensureConfigDir(configDir: string): string {
  mkdirSync(configDir, { recursive: true });
  return configDir;
}

/**
 * Copy the host git identity file into the configuration directory,
 * overwriting any earlier copy. Concurrent launches may race; the last
 * writer wins.
 *
 * @returns The copied file's path, or null when the host has no identity file.
 */
export function copyGitIdentity(source: string, configDir: string): string | null {
  if (!existsSync(source)) {
    log.warn(`No git identity at ${source}; commits in the session will need one`);
    return null;
  }

  ensureConfigDir(configDir);
  const target = join(configDir, GIT_IDENTITY_FILENAME);
  copyFileSync(source, target);
  log.debug(`Git identity copied: ${source} -> ${target}`);
  return target;
}
