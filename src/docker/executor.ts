/**
 * Runtime command execution with consistent error handling.
 *
 * Core execution layer - all captured `docker` commands flow through safeDockerRun.
 */

import { RUNTIME_COMMAND_TIMEOUT } from "../constants.js";
import type { CommandRunner } from "../exec.js";
import { RuntimeUnavailableError } from "../errors.js";

/** Result of a runtime command execution */
export interface DockerResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/**
 * Run a docker command with consistent error handling.
 *
 * @param runner - Process execution seam.
 * @param args - Command arguments (without 'docker' prefix).
 * @throws RuntimeUnavailableError if the docker binary is missing, or the command
 *   times out and `allowTimeout` is not set.
 */
export async function safeDockerRun(
  runner: CommandRunner,
  args: string[],
  options: { timeout?: number; allowTimeout?: boolean } = {}
): Promise<DockerResult> {
  const timeout = options.timeout ?? RUNTIME_COMMAND_TIMEOUT;
  const result = await runner.exec("docker", args, { timeout });

  if (result.code === "ENOENT") {
    throw new RuntimeUnavailableError("Container runtime CLI 'docker' not found in PATH", {
      remediation: "Install Docker (or Colima + the docker CLI) and rerun.",
    });
  }

  if (result.timedOut && !options.allowTimeout) {
    throw new RuntimeUnavailableError(
      `Runtime command timed out after ${timeout}ms: docker ${args.slice(0, 3).join(" ")}`
    );
  }

  return {
    exitCode: result.exitCode,
    stdout: result.stdout,
    stderr: result.stderr,
  };
}

/**
 * Check if the container engine is responsive.
 *
 * A status query that times out counts as "not responsive"; it does not abort
 * the caller's wait.
 *
 * @returns True if `docker info` succeeds.
 * @throws RuntimeUnavailableError if the docker CLI itself is missing.
 */
export async function checkDockerStatus(
  runner: CommandRunner,
  timeout: number = RUNTIME_COMMAND_TIMEOUT
): Promise<boolean> {
  const result = await safeDockerRun(runner, ["info"], { timeout, allowTimeout: true });
  return result.exitCode === 0;
}
