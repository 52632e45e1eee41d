import { describe, it, expect, vi } from "vitest";

import {
  NATIVE_RUNTIME_STARTUP_TIMEOUT,
  RUNTIME_CHECK_INTERVAL,
  RUNTIME_COMMAND_TIMEOUT,
  VM_RUNTIME_STARTUP_TIMEOUT,
} from "../src/constants.js";
import { RuntimeProbe, RuntimeState } from "../src/docker/probe.js";
import { RuntimeUnavailableError } from "../src/errors.js";
import { probeHostCapabilities, type HostCapabilities } from "../src/platform/detection.js";
import { FakeRunner, subcommand } from "./mocks/fake-runner.js";

const native: HostCapabilities = { flavor: "native", starter: "systemctl", hostAgentSocket: null };

/** docker info fails for the first `failures` calls, then succeeds. */
function runtimeReadyAfter(failures: number): FakeRunner {
  let calls = 0;
  return new FakeRunner().on(
    "docker",
    () => {
      calls++;
      return calls > failures ? { exitCode: 0 } : { exitCode: 1, stderr: "Cannot connect" };
    },
    subcommand("info")
  );
}

function probeWith(runner: FakeRunner, capabilities: HostCapabilities = native) {
  const sleep = vi.fn(async (_ms: number) => {});
  const probe = new RuntimeProbe({ runner, capabilities, interval: 1000, timeout: 10_000, sleep });
  return { probe, sleep };
}

describe("RuntimeProbe", () => {
  it("is ready without polling when the engine answers", async () => {
    const runner = runtimeReadyAfter(0);
    const { probe, sleep } = probeWith(runner);

    await expect(probe.ensureReady()).resolves.toBe(RuntimeState.Ready);
    expect(probe.polls).toBe(0);
    expect(sleep).not.toHaveBeenCalled();
    expect(runner.callsTo("sudo")).toEqual([]);
  });

  it("starts the engine and returns after k polls", async () => {
    // Initial query plus two polls fail; the third poll succeeds
    const runner = runtimeReadyAfter(3).on("sudo", { exitCode: 0 });
    const { probe, sleep } = probeWith(runner);

    await expect(probe.ensureReady()).resolves.toBe(RuntimeState.Ready);
    expect(probe.polls).toBe(3);
    expect(probe.polls).toBeLessThan(probe.maxPolls);
    expect(sleep).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledWith(1000);
    expect(runner.callsTo("sudo")[0]?.args).toEqual(["-n", "systemctl", "start", "docker"]);
    expect(probe.state).toBe(RuntimeState.Ready);
  });

  it("fails at exactly the poll bound when the engine never answers", async () => {
    const runner = runtimeReadyAfter(Infinity).on("sudo", { exitCode: 0 });
    const { probe } = probeWith(runner);

    await expect(probe.ensureReady()).rejects.toBeInstanceOf(RuntimeUnavailableError);
    expect(probe.maxPolls).toBe(10);
    expect(probe.polls).toBe(10);
    expect(runner.callsTo("docker")).toHaveLength(11);
    expect(probe.state).toBe(RuntimeState.Unavailable);
  });

  it("fails at once when the docker CLI is missing", async () => {
    const runner = new FakeRunner().on("sudo", { exitCode: 0 });
    const sleep = vi.fn(async (_ms: number) => {});
    const probe = new RuntimeProbe({ runner, capabilities: native, interval: 1000, timeout: 3000, sleep });

    await expect(probe.ensureReady()).rejects.toThrow("Container runtime CLI 'docker' not found in PATH");
    expect(probe.polls).toBe(0);
    expect(sleep).not.toHaveBeenCalled();
    expect(runner.callsTo("sudo")).toEqual([]);
  });

  it("bounds the wait by elapsed time when status queries hang", async () => {
    let clock = 0;
    // Every status query fails after 4s
    const runner = new FakeRunner()
      .on(
        "docker",
        () => {
          clock += 4000;
          return { exitCode: 1, timedOut: true };
        },
        subcommand("info")
      )
      .on("sudo", { exitCode: 0 });
    const probe = new RuntimeProbe({
      runner,
      capabilities: native,
      interval: 1000,
      timeout: 10_000,
      sleep: async (ms) => {
        clock += ms;
      },
      now: () => clock,
    });

    await expect(probe.ensureReady()).rejects.toThrow("Container runtime unreachable after 10s");
    // Deadline is 14s: polls start at 5s and 10s, the next would start at 15s
    expect(probe.polls).toBe(2);
    expect(runner.callsTo("docker").map((call) => call.opts)).toEqual([
      { timeout: RUNTIME_COMMAND_TIMEOUT },
      { timeout: 9000 },
      { timeout: 4000 },
    ]);
  });

  it("waits without a start attempt when no starter is available", async () => {
    const runner = runtimeReadyAfter(1);
    const { probe } = probeWith(runner, { flavor: "vm", starter: null, hostAgentSocket: null });

    await probe.ensureReady();
    expect(probe.polls).toBe(1);
    expect(runner.calls.map((call) => call.cmd)).toEqual(["docker", "docker"]);
  });

  it("keeps polling when the start tool is missing", async () => {
    const runner = runtimeReadyAfter(1);
    const { probe } = probeWith(runner, { flavor: "vm", starter: "colima", hostAgentSocket: null });

    await expect(probe.ensureReady()).resolves.toBe(RuntimeState.Ready);
    expect(runner.callsTo("colima")[0]?.args).toEqual(["start", "--ssh-agent"]);
    expect(probe.polls).toBe(1);
  });

  it("gives VM runtimes a longer budget than native daemons", () => {
    const runner = new FakeRunner();
    const vm = new RuntimeProbe({ runner, capabilities: { ...native, flavor: "vm" } });
    const daemon = new RuntimeProbe({ runner, capabilities: native });

    expect(vm.maxPolls).toBe(VM_RUNTIME_STARTUP_TIMEOUT / RUNTIME_CHECK_INTERVAL);
    expect(daemon.maxPolls).toBe(NATIVE_RUNTIME_STARTUP_TIMEOUT / RUNTIME_CHECK_INTERVAL);
    expect(vm.maxPolls).toBeGreaterThan(daemon.maxPolls);
  });
});

describe("probeHostCapabilities", () => {
  it("recognizes a VM-backed context and its starter", async () => {
    const runner = new FakeRunner()
      .on("docker", { stdout: "colima\n" }, subcommand("context"))
      .on("which", { stdout: "/usr/local/bin/colima\n" }, (args) => args[0] === "colima");

    const capabilities = await probeHostCapabilities(runner, { SSH_AUTH_SOCK: "/nonexistent/agent.sock" });

    expect(capabilities).toEqual({ flavor: "vm", starter: "colima", hostAgentSocket: null });
  });

  it("falls back to the host platform for other contexts", async () => {
    const runner = new FakeRunner()
      .on("docker", { stdout: "default\n" }, subcommand("context"))
      .on("which", { exitCode: 0 });

    const capabilities = await probeHostCapabilities(runner, {});

    if (process.platform === "linux") {
      expect(capabilities.flavor).toBe("native");
      expect(capabilities.starter).toBe("systemctl");
    } else {
      expect(capabilities.flavor).toBe("vm");
      expect(capabilities.starter).toBe("colima");
    }
    expect(capabilities.hostAgentSocket).toBeNull();
  });
});
