/**
 * Host capability detection for claude-sandbox.
 *
 * Decides how the container engine is hosted (inside a VM or as a native
 * daemon), which tool can start it, and which SSH agent socket exists on the
 * host. Everything downstream (start action, timeouts, credential forwarding)
 * keys off the returned HostCapabilities record, so tests inject a fake one.
 *
 * Dependency direction:
 *   This module imports from: exec.ts, logger.ts
 *   It should NOT import from: commands, credentials, session
 */

import { existsSync } from "node:fs";

import { commandExists, type CommandRunner } from "../exec.js";
import { log } from "../logger.js";

/** Where the engine's kernel lives relative to the host. */
export type RuntimeFlavor = "vm" | "native";

/** Tool able to bring the engine up when it is not reachable. */
export type RuntimeStarter = "colima" | "docker-desktop" | "systemctl";

export interface HostCapabilities {
  readonly flavor: RuntimeFlavor;
  /** null when no start tool is installed (starting is then forgone) */
  readonly starter: RuntimeStarter | null;
  /** Host SSH agent socket, only when SSH_AUTH_SOCK points at an existing path */
  readonly hostAgentSocket: string | null;
}

/** Docker contexts whose engine runs inside a VM. */
const VM_CONTEXT_PATTERN = /^(colima|desktop-linux|orbstack|rancher-desktop)/;

const DOCKER_DESKTOP_APP = "/Applications/Docker.app";

/**
 * Determine the runtime flavor.
 *
 * 1. Active docker context names a VM-backed engine → vm
 * 2. Host kernel cannot run Linux containers itself → vm
 * 3. Otherwise → native daemon
 */
async function detectFlavor(runner: CommandRunner): Promise<RuntimeFlavor> {
  const context = await runner.exec("docker", ["context", "show"], { timeout: 5_000 });
  const contextName = context.exitCode === 0 ? context.stdout.trim() : "";
  if (contextName) {
    log.debug(`Docker context: ${contextName}`);
  }
  if (VM_CONTEXT_PATTERN.test(contextName)) {
    return "vm";
  }
  return process.platform === "linux" ? "native" : "vm";
}

async function detectStarter(
  runner: CommandRunner,
  flavor: RuntimeFlavor
): Promise<RuntimeStarter | null> {
  if (flavor === "vm") {
    if (await commandExists(runner, "colima")) {
      return "colima";
    }
    return existsSync(DOCKER_DESKTOP_APP) ? "docker-desktop" : null;
  }
  return (await commandExists(runner, "systemctl")) ? "systemctl" : null;
}

/**
 * Probe the host once at startup.
 */
export async function probeHostCapabilities(
  runner: CommandRunner,
  env: NodeJS.ProcessEnv = process.env
): Promise<HostCapabilities> {
  const flavor = await detectFlavor(runner);
  const starter = await detectStarter(runner, flavor);

  const sock = env.SSH_AUTH_SOCK;
  let hostAgentSocket: string | null = null;
  if (sock && existsSync(sock)) {
    hostAgentSocket = sock;
  } else if (sock) {
    log.debug(`SSH_AUTH_SOCK set but socket not found: ${sock}`);
  }

  log.debug(`Host: flavor=${flavor} starter=${starter ?? "none"} agent=${hostAgentSocket ?? "none"}`);
  return { flavor, starter, hostAgentSocket };
}
