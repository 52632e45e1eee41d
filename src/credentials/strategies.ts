/**
 * SSH agent socket forwarding strategies.
 *
 * One strategy is selected per launch from the probed HostCapabilities:
 *
 *   VmSocketStrategy    engine runs in a VM; the VM exposes the host agent at a
 *                       well-known socket owned by a VM-side group
 *   HostSocketStrategy  engine shares the host kernel; the host SSH_AUTH_SOCK is
 *                       bind-mounted at the same path
 */

import { statSync } from "node:fs";

import { EXIT_CODES, RUNTIME_COMMAND_TIMEOUT, VM_AGENT_SOCKET } from "../constants.js";
import { safeDockerRun } from "../docker/executor.js";
import type { MountSpec } from "../docker/command-builder.js";
import type { CommandRunner } from "../exec.js";
import { CredentialUnavailableError, LaunchFailureError } from "../errors.js";
import { log } from "../logger.js";
import type { HostCapabilities } from "../platform/detection.js";

/** What a strategy contributes to the session. */
export interface ForwardedAgent {
  readonly mount: MountSpec;
  readonly env: Readonly<Record<string, string>>;
  /** Supplementary group ids needed to open the socket */
  readonly groups: readonly number[];
}

export interface CredentialForwardStrategy {
  readonly name: string;
  forward(): Promise<ForwardedAgent>;
}

/** Group read+write bits: the socket is usable through its group. */
const GROUP_RW = 0o060;

function agentMount(socket: string): MountSpec {
  return { host: socket, container: socket, mode: "ro" };
}

/**
 * Forward the VM-mediated agent socket.
 *
 * The socket node only exists inside the VM, so its owning group is looked up
 * with a throwaway container from the session image rather than on the host.
 */
export class VmSocketStrategy implements CredentialForwardStrategy {
  readonly name = "vm-socket";

  constructor(
    private readonly runner: CommandRunner,
    private readonly image: string,
    private readonly socket: string = VM_AGENT_SOCKET
  ) {}

  async forward(): Promise<ForwardedAgent> {
    const gid = await this.discoverSocketGroup();
    log.debug(`SSH: VM agent socket ${this.socket} (gid ${gid})`);
    return {
      mount: agentMount(this.socket),
      env: { SSH_AUTH_SOCK: this.socket },
      groups: [gid],
    };
  }

  private async discoverSocketGroup(): Promise<number> {
    const result = await safeDockerRun(
      this.runner,
      [
        "run", "--rm", "--pull=never",
        "-v", `${this.socket}:${this.socket}`,
        "--entrypoint", "stat",
        this.image,
        "-c", "%g", this.socket,
      ],
      { timeout: RUNTIME_COMMAND_TIMEOUT }
    );

    // 125 is the runtime refusing the container (e.g. image not present locally)
    if (result.exitCode === EXIT_CODES.RUNTIME_REJECTED) {
      throw new LaunchFailureError(
        `Runtime could not run ${this.image} to look up the agent socket group`,
        result.exitCode,
        result.stderr.trim()
      );
    }

    const gid = Number.parseInt(result.stdout.trim(), 10);
    if (result.exitCode !== 0 || !Number.isInteger(gid) || gid < 0) {
      throw new CredentialUnavailableError(
        `Forwarded SSH agent socket not available in the runtime VM: ${this.socket}`,
        {
          detail: result.stderr.trim(),
          remediation: "Enable agent forwarding for the VM (e.g. `colima start --ssh-agent`).",
        }
      );
    }
    return gid;
  }
}

/**
 * Reuse the host agent socket path directly.
 */
export class HostSocketStrategy implements CredentialForwardStrategy {
  readonly name = "host-socket";

  constructor(private readonly socket: string) {}

  async forward(): Promise<ForwardedAgent> {
    const stats = statSync(this.socket);
    const groups = (stats.mode & GROUP_RW) === GROUP_RW ? [stats.gid] : [];
    log.debug(`SSH: host agent socket ${this.socket}${groups.length ? ` (gid ${stats.gid})` : ""}`);
    return {
      mount: agentMount(this.socket),
      env: { SSH_AUTH_SOCK: this.socket },
      groups,
    };
  }
}

/**
 * Select the forwarding strategy for this host.
 *
 * @throws CredentialUnavailableError on a native host with no agent socket.
 */
export function selectForwardStrategy(
  capabilities: HostCapabilities,
  runner: CommandRunner,
  image: string
): CredentialForwardStrategy {
  if (capabilities.flavor === "vm") {
    return new VmSocketStrategy(runner, image);
  }
  if (!capabilities.hostAgentSocket) {
    throw new CredentialUnavailableError("SSH agent socket not found on host", {
      remediation: "Start an agent and export SSH_AUTH_SOCK before launching.",
    });
  }
  return new HostSocketStrategy(capabilities.hostAgentSocket);
}
