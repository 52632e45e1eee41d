/**
 * Session launcher.
 *
 * Composes identity, credentials and the normalized invocation into a single
 * `docker run` and runs it attached to the caller's terminal. The session's
 * exit code is the launcher's result; the only codes interpreted here are the
 * ones the runtime itself uses to say it never started the session.
 */

import { existsSync } from "node:fs";

import { CONTAINER_HOME, CONTAINER_IDE_DIR, EXIT_CODES } from "../constants.js";
import type { CredentialBundle } from "../credentials/forwarder.js";
import { DockerRunCommandBuilder, type MountSpec } from "../docker/command-builder.js";
import type { CommandRunner } from "../exec.js";
import { LaunchFailureError, NameCollisionError } from "../errors.js";
import { entrypointArgs, type InvocationSpec } from "../invocation/normalizer.js";
import { log } from "../logger.js";
import type { SessionIdentity } from "./name-allocator.js";

/** Host-side facts the composed command depends on. */
export interface LaunchContext {
  image: string;
  /** Host working directory, mounted at the same path */
  cwd: string;
  /** IDE settings directory; mounted read-only when it exists */
  ideDir: string | null;
  /** Attach a TTY (-it) rather than plain stdin (-i) */
  tty: boolean;
  timezone: string;
  terminalEnv: Readonly<Record<string, string>>;
  /** Validated user env (config file `env` block, --env) */
  extraEnv: Readonly<Record<string, string>>;
}

/** `docker: Error response from daemon: Conflict. The container name "/x" is already in use` */
const NAME_IN_USE_PATTERN = /already in use/i;

/** Exit status of a shell for "command not found". */
const COMMAND_NOT_FOUND = 127;

export class SessionLauncher {
  constructor(private readonly runner: CommandRunner) {}

  /**
   * Build the `docker run` arguments (without the "docker" prefix).
   */
  compose(
    identity: SessionIdentity,
    bundle: CredentialBundle,
    spec: InvocationSpec,
    context: LaunchContext
  ): string[] {
    const mounts: MountSpec[] = [
      { host: bundle.configDir, container: CONTAINER_HOME, mode: "rw" },
      ...bundle.mounts,
    ];
    if (context.ideDir && existsSync(context.ideDir)) {
      mounts.push({ host: context.ideDir, container: CONTAINER_IDE_DIR, mode: "ro" });
    }
    mounts.push({ host: context.cwd, container: context.cwd, mode: "rw" });

    return new DockerRunCommandBuilder(context.image)
      .withName(identity.name)
      .withInteractive(context.tty)
      .withInit()
      .withWorkdir(context.cwd)
      .withResourceLimits({ cpus: spec.resources.cpuLimit, memory: spec.resources.memoryLimit })
      .withGroups(bundle.groups)
      .withMounts(mounts)
      .withEnvironment({ TZ: context.timezone })
      .withEnvironment(context.terminalEnv)
      .withEnvironment(bundle.env)
      .withEnvironment(context.extraEnv)
      .withEntrypointArgs(entrypointArgs(spec))
      .build();
  }

  /**
   * Run the session and return its exit code unchanged.
   *
   * @throws NameCollisionError when another launch already holds the name.
   * @throws LaunchFailureError when the runtime rejects the invocation.
   */
  async launch(
    identity: SessionIdentity,
    bundle: CredentialBundle,
    spec: InvocationSpec,
    context: LaunchContext
  ): Promise<number> {
    const args = this.compose(identity, bundle, spec, context);
    log.debug(`Session ${identity.name}: docker ${args.join(" ")}`);

    const result = await this.runner.execInherit("docker", args, { captureStderr: true });

    if (result.code === "ENOENT") {
      throw new LaunchFailureError("Container runtime CLI 'docker' not found in PATH", COMMAND_NOT_FOUND);
    }

    if (result.exitCode === EXIT_CODES.RUNTIME_REJECTED) {
      const diagnostic = result.stderr.trim();
      if (NAME_IN_USE_PATTERN.test(diagnostic)) {
        throw new NameCollisionError(identity.name, diagnostic);
      }
      throw new LaunchFailureError(
        `Runtime rejected session ${identity.name}`,
        EXIT_CODES.RUNTIME_REJECTED,
        diagnostic
      );
    }

    return result.exitCode;
  }
}
