/**
 * Launch orchestration for claude-sandbox.
 *
 * One launch, leaf-first:
 *   1. normalize the command line (pure, cannot fail)
 *   2. probe the host and make sure the runtime is reachable
 *   3. register the SSH key and prepare credential forwarding
 *   4. allocate a session name and run the session
 *
 * Every stage fails fast. The only retry is a single re-allocation when
 * another launch took the same session name between listing and running.
 */

import {
  CCS_ENV,
  DEFAULT_IMAGE,
  DEFAULT_SESSION_BASE_NAME,
  HOST_GIT_IDENTITY,
  HOST_IDE_DIR,
  HOST_SSH_DIR,
  PERSISTENT_CONFIG_DIR,
} from "../constants.js";
import type { SandboxConfig } from "../config-file.js";
import { CredentialForwarder } from "../credentials/forwarder.js";
import { formatShellCommand } from "../docker/command-builder.js";
import { RuntimeProbe } from "../docker/probe.js";
import { logExitCode } from "../error-handler.js";
import { NameCollisionError } from "../errors.js";
import type { CommandRunner } from "../exec.js";
import { normalize, type InvocationSpec } from "../invocation/normalizer.js";
import { LogLevel, log, setLogLevel } from "../logger.js";
import { probeHostCapabilities, type HostCapabilities } from "../platform/detection.js";
import { getHostTimezone, getTerminalEnv } from "../platform/platform-utils.js";
import { SessionLauncher, type LaunchContext } from "../session/launcher.js";
import { SessionNameAllocator } from "../session/name-allocator.js";
import { buildEnvRecord } from "../validation.js";

export interface RunDependencies {
  runner: CommandRunner;
  cwd: string;
  env: NodeJS.ProcessEnv;
  /** Merged config file settings */
  config: SandboxConfig;
  tty: boolean;
  /** Skip host probing (tests) */
  capabilities?: HostCapabilities;
  /** Poll pacing for the runtime probe (tests) */
  probe?: { interval?: number; timeout?: number; sleep?: (ms: number) => Promise<void> };
  configDir?: string;
  sshDir?: string;
  gitIdentitySource?: string;
  ideDir?: string | null;
}

/** Allocation attempts when the runtime reports a name collision. */
const MAX_LAUNCH_ATTEMPTS = 2;

function resolveImage(spec: InvocationSpec, env: NodeJS.ProcessEnv, config: SandboxConfig): string {
  return spec.launcher.image ?? (env[CCS_ENV.IMAGE] || undefined) ?? config.image ?? DEFAULT_IMAGE;
}

/**
 * Run one session.
 *
 * @returns The session's exit code, or 0 after a dry run.
 * @throws SandboxError subclasses for every launcher failure.
 */
export async function run(rawArgs: readonly string[], deps: RunDependencies): Promise<number> {
  const { runner, cwd, env, config } = deps;

  const spec = normalize(rawArgs, { cpuLimit: config.cpus, memoryLimit: config.memory });
  if (spec.launcher.verbose || env[CCS_ENV.DEBUG] === "1") {
    setLogLevel(LogLevel.DEBUG);
  }
  log.debug(`Invocation: ${JSON.stringify(spec)}`);

  const extraEnv = buildEnvRecord(config.env ?? {}, spec.launcher.env);
  const image = resolveImage(spec, env, config);

  const capabilities = deps.capabilities ?? (await probeHostCapabilities(runner, env));
  await new RuntimeProbe({ runner, capabilities, ...deps.probe }).ensureReady();

  const forwarder = new CredentialForwarder({
    runner,
    capabilities,
    image,
    env,
    configuredKey: config.sshKey,
    configDir: deps.configDir ?? PERSISTENT_CONFIG_DIR,
    sshDir: deps.sshDir ?? HOST_SSH_DIR,
    gitIdentitySource: deps.gitIdentitySource ?? HOST_GIT_IDENTITY,
  });
  const bundle = await forwarder.prepare(spec.launcher.sshKey);

  const context: LaunchContext = {
    image,
    cwd,
    ideDir: deps.ideDir === undefined ? HOST_IDE_DIR : deps.ideDir,
    tty: deps.tty,
    timezone: getHostTimezone(env),
    terminalEnv: getTerminalEnv(env),
    extraEnv,
  };

  const allocator = new SessionNameAllocator(runner);
  const launcher = new SessionLauncher(runner);
  const baseName = spec.launcher.name ?? config.name ?? DEFAULT_SESSION_BASE_NAME;

  if (spec.launcher.dryRun) {
    const identity = await allocator.allocate(baseName);
    log.raw(formatShellCommand(["docker", ...launcher.compose(identity, bundle, spec, context)]));
    return 0;
  }

  for (let attempt = 1; ; attempt++) {
    const identity = await allocator.allocate(baseName);
    log.info(`Starting session ${identity.name} (${image})`);
    try {
      const code = await launcher.launch(identity, bundle, spec, context);
      logExitCode(code, identity.name);
      return code;
    } catch (error) {
      if (error instanceof NameCollisionError && attempt < MAX_LAUNCH_ATTEMPTS) {
        log.warn(`${error.message}; allocating a new name`);
        continue;
      }
      throw error;
    }
  }
}
