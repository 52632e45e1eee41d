/**
 * SSH key resolution and agent registration.
 *
 * Only the agent socket is ever shared with a session; private keys stay on
 * the host and are loaded into the host's own agent here.
 */

import { existsSync } from "node:fs";
import { homedir } from "node:os";
import { isAbsolute, join } from "node:path";

import { CCS_ENV, DEFAULT_SSH_KEY_NAME, HOST_SSH_DIR, SSH_ADD_TIMEOUT } from "../constants.js";
import type { CommandRunner } from "../exec.js";
import { CredentialUnavailableError } from "../errors.js";
import { log } from "../logger.js";

/** Where the resolved key came from, in precedence order. */
export type KeySource = "flag" | "env" | "config" | "default";

export interface ResolvedKey {
  readonly path: string;
  readonly source: KeySource;
}

export interface KeyResolutionInput {
  /** Value of --ssh-key */
  requested?: string;
  env?: NodeJS.ProcessEnv;
  /** `sshKey` from the config file */
  configured?: string;
  /** Directory bare key names are resolved against */
  sshDir?: string;
}

/**
 * Turn a key reference into a path: absolute paths stay, `~/` expands,
 * anything else is a name inside the key directory.
 */
export function keyReferenceToPath(reference: string, sshDir: string = HOST_SSH_DIR): string {
  if (reference.startsWith("~/")) {
    return join(homedir(), reference.slice(2));
  }
  if (isAbsolute(reference)) {
    return reference;
  }
  return join(sshDir, reference);
}

/**
 * Resolve which private key to register.
 *
 * Precedence: --ssh-key > CCS_SSH_KEY > config file > DEFAULT_SSH_KEY_NAME.
 * Empty values are treated as unset.
 */
export function resolveSshKey(input: KeyResolutionInput = {}): ResolvedKey {
  const env = input.env ?? process.env;
  const sshDir = input.sshDir ?? HOST_SSH_DIR;

  const candidates: Array<[string | undefined, KeySource]> = [
    [input.requested, "flag"],
    [env[CCS_ENV.SSH_KEY], "env"],
    [input.configured, "config"],
  ];
  for (const [reference, source] of candidates) {
    const trimmed = reference?.trim();
    if (trimmed) {
      return { path: keyReferenceToPath(trimmed, sshDir), source };
    }
  }
  return { path: join(sshDir, DEFAULT_SSH_KEY_NAME), source: "default" };
}

/** `ssh-add` exit status when it cannot reach an agent. */
const SSH_ADD_NO_AGENT = 2;

/** SHA256 fingerprint token out of `ssh-keygen -l` / `ssh-add -l` output. */
function fingerprints(output: string): Set<string> {
  return new Set(output.match(/SHA256:[A-Za-z0-9+/=]+/g) ?? []);
}

/**
 * Register a key with the host agent.
 *
 * Skips the add when the agent already holds the key, so passphrase-protected
 * keys prompt only once per agent lifetime.
 *
 * @throws CredentialUnavailableError when the agent is unreachable, the key
 *   file is missing, or the agent refuses the key.
 */
export async function registerKey(
  runner: CommandRunner,
  key: ResolvedKey,
  env: NodeJS.ProcessEnv = process.env
): Promise<void> {
  if (!existsSync(key.path)) {
    throw new CredentialUnavailableError(`SSH key not found: ${key.path}`, {
      remediation: `Pass --ssh-key <name|path> or set ${CCS_ENV.SSH_KEY} (resolved from ${key.source}).`,
    });
  }

  if (!env.SSH_AUTH_SOCK) {
    throw new CredentialUnavailableError("SSH agent unreachable: SSH_AUTH_SOCK is not set", {
      remediation: "Start an agent (eval \"$(ssh-agent -s)\") and rerun.",
    });
  }

  const listed = await runner.exec("ssh-add", ["-l"], { timeout: SSH_ADD_TIMEOUT, env });
  if (listed.code === "ENOENT") {
    throw new CredentialUnavailableError("ssh-add not found in PATH", {
      remediation: "Install the OpenSSH client tools and rerun.",
    });
  }
  if (listed.exitCode === SSH_ADD_NO_AGENT) {
    throw new CredentialUnavailableError("SSH agent unreachable", {
      detail: listed.stderr.trim(),
      remediation: `Check that SSH_AUTH_SOCK (${env.SSH_AUTH_SOCK}) points at a running agent.`,
    });
  }

  const own = await runner.exec("ssh-keygen", ["-l", "-f", key.path], { timeout: SSH_ADD_TIMEOUT, env });
  if (own.exitCode === 0) {
    const loaded = fingerprints(listed.stdout);
    if ([...fingerprints(own.stdout)].some((fp) => loaded.has(fp))) {
      log.debug(`SSH key already in agent: ${key.path}`);
      return;
    }
  }

  // Attached to the terminal so a passphrase prompt reaches the user
  const added = await runner.execInherit("ssh-add", [key.path], { env, captureStderr: true });
  if (added.exitCode === SSH_ADD_NO_AGENT) {
    throw new CredentialUnavailableError("SSH agent unreachable", { detail: added.stderr.trim() });
  }
  if (added.exitCode !== 0) {
    throw new CredentialUnavailableError(`SSH agent refused key: ${key.path}`, {
      detail: added.stderr.trim(),
    });
  }
  log.debug(`SSH key registered: ${key.path} (${key.source})`);
}
