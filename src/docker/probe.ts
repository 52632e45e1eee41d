/**
 * Runtime readiness probe.
 *
 * Gates every launch: queries the engine, attempts one best-effort start when
 * it is unreachable, then polls at a fixed interval until a bounded timeout.
 * VM-backed engines get a longer budget than native daemons. The budget is
 * wall-clock time: a status query never runs past the deadline.
 */

import {
  NATIVE_RUNTIME_STARTUP_TIMEOUT,
  RUNTIME_CHECK_INTERVAL,
  RUNTIME_COMMAND_TIMEOUT,
  STARTER_TIMEOUT,
  VM_RUNTIME_STARTUP_TIMEOUT,
} from "../constants.js";
import type { CommandRunner } from "../exec.js";
import { RuntimeUnavailableError } from "../errors.js";
import { log } from "../logger.js";
import type { HostCapabilities, RuntimeFlavor, RuntimeStarter } from "../platform/detection.js";
import { checkDockerStatus } from "./executor.js";

export enum RuntimeState {
  Unavailable = "unavailable",
  Starting = "starting",
  Ready = "ready",
}

export interface RuntimeProbeOptions {
  runner: CommandRunner;
  capabilities: HostCapabilities;
  /** Poll interval in ms (default RUNTIME_CHECK_INTERVAL) */
  interval?: number;
  /** Overall wait budget in ms (default depends on runtime flavor) */
  timeout?: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

/** Start command per starter tool. */
const START_COMMANDS: Record<RuntimeStarter, { cmd: string; args: string[] }> = {
  colima: { cmd: "colima", args: ["start", "--ssh-agent"] },
  "docker-desktop": { cmd: "open", args: ["-a", "Docker"] },
  systemctl: { cmd: "sudo", args: ["-n", "systemctl", "start", "docker"] },
};

const REMEDIATION: Record<RuntimeFlavor, string> = {
  vm: "Start the runtime VM (e.g. `colima start --ssh-agent`) and rerun. Check: colima status",
  native: "Start the daemon (e.g. `sudo systemctl start docker`) and rerun. Check: docker info",
};

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Startup budget for a runtime flavor. */
export function startupTimeoutFor(flavor: RuntimeFlavor): number {
  return flavor === "vm" ? VM_RUNTIME_STARTUP_TIMEOUT : NATIVE_RUNTIME_STARTUP_TIMEOUT;
}

export class RuntimeProbe {
  private readonly runner: CommandRunner;
  private readonly capabilities: HostCapabilities;
  private readonly interval: number;
  private readonly timeout: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;
  private currentState: RuntimeState = RuntimeState.Unavailable;
  private pollCount = 0;

  constructor(options: RuntimeProbeOptions) {
    this.runner = options.runner;
    this.capabilities = options.capabilities;
    this.interval = options.interval ?? RUNTIME_CHECK_INTERVAL;
    this.timeout = options.timeout ?? startupTimeoutFor(options.capabilities.flavor);
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  get state(): RuntimeState {
    return this.currentState;
  }

  /** Status polls made after the start attempt (the initial query is not counted). */
  get polls(): number {
    return this.pollCount;
  }

  /** Maximum number of polls the budget allows. */
  get maxPolls(): number {
    return Math.max(1, Math.ceil(this.timeout / this.interval));
  }

  /**
   * Ensure the engine is reachable.
   *
   * @throws RuntimeUnavailableError once the budget is exhausted, or at once
   *   when the docker CLI is missing.
   */
  async ensureReady(): Promise<RuntimeState.Ready> {
    if (await checkDockerStatus(this.runner)) {
      this.currentState = RuntimeState.Ready;
      return RuntimeState.Ready;
    }

    this.currentState = RuntimeState.Starting;
    log.dim("Container runtime not running, attempting to start...");
    await this.start();

    const deadline = this.now() + this.timeout;
    for (let poll = 1; poll <= this.maxPolls; poll++) {
      await this.sleep(this.interval);
      const remaining = deadline - this.now();
      if (remaining <= 0) {
        break;
      }
      this.pollCount = poll;
      if (await checkDockerStatus(this.runner, Math.min(RUNTIME_COMMAND_TIMEOUT, remaining))) {
        this.currentState = RuntimeState.Ready;
        log.success("Container runtime started");
        return RuntimeState.Ready;
      }
      const elapsed = poll * this.interval;
      if (elapsed % 5_000 === 0) {
        log.dim(`Waiting for container runtime... (${elapsed / 1000}s)`);
      }
    }

    this.currentState = RuntimeState.Unavailable;
    throw new RuntimeUnavailableError(
      `Container runtime unreachable after ${Math.round(this.timeout / 1000)}s`,
      { remediation: REMEDIATION[this.capabilities.flavor] }
    );
  }

  /**
   * Best-effort start. A missing tool or a failed start is logged, not thrown:
   * the runtime may still come up on its own while we poll.
   */
  private async start(): Promise<void> {
    const { starter } = this.capabilities;
    if (!starter) {
      log.dim("No runtime start tool found; waiting for the runtime to come up");
      return;
    }

    const { cmd, args } = START_COMMANDS[starter];
    log.debug(`Starting runtime: ${cmd} ${args.join(" ")}`);
    const result = await this.runner.exec(cmd, args, { timeout: STARTER_TIMEOUT });
    if (result.code === "ENOENT") {
      log.dim(`Runtime start tool '${cmd}' not found`);
    } else if (result.exitCode !== 0) {
      const firstLine = result.stderr.trim().split("\n")[0] ?? "";
      log.warn(`Runtime start command failed (${cmd} exited ${result.exitCode})`);
      if (firstLine) {
        log.dim(firstLine);
      }
    }
  }
}
