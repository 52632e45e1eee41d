/**
 * Read-only runtime queries.
 */

import type { CommandRunner } from "../exec.js";
import { RuntimeUnavailableError } from "../errors.js";
import { safeDockerRun } from "./executor.js";

/**
 * List container names known to the runtime (running and stopped).
 *
 * Unlike a best-effort listing, a failure here is fatal: name allocation
 * depends on a complete view of the names in use.
 *
 * @param nameFilter - Substring filter passed to `docker ps --filter name=`.
 */
export async function listContainerNames(
  runner: CommandRunner,
  nameFilter?: string
): Promise<string[]> {
  const args = ["ps", "-a", "--format", "{{.Names}}"];
  if (nameFilter) {
    args.push("--filter", `name=${nameFilter}`);
  }

  const result = await safeDockerRun(runner, args);
  if (result.exitCode !== 0) {
    throw new RuntimeUnavailableError("Could not list existing sessions", {
      detail: result.stderr.trim(),
    });
  }

  return result.stdout.split("\n").map((line) => line.trim()).filter(Boolean);
}
