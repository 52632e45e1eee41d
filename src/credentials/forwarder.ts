/**
 * Credential forwarding for one session.
 *
 * prepare() runs once per launch and yields a CredentialBundle: which key was
 * loaded, which mounts/env/groups expose the agent and the git identity, and
 * the persistent configuration directory the session will use as its home.
 */

import { CONTAINER_GIT_IDENTITY, HOST_GIT_IDENTITY, HOST_SSH_DIR, PERSISTENT_CONFIG_DIR } from "../constants.js";
import type { MountSpec } from "../docker/command-builder.js";
import type { CommandRunner } from "../exec.js";
import { log } from "../logger.js";
import type { HostCapabilities } from "../platform/detection.js";
import { copyGitIdentity, ensureConfigDir } from "./git-identity.js";
import { registerKey, resolveSshKey, type ResolvedKey } from "./keys.js";
import { selectForwardStrategy, type CredentialForwardStrategy } from "./strategies.js";

export interface CredentialBundle {
  readonly key: ResolvedKey;
  /** Name of the strategy that produced the agent mount */
  readonly strategy: string;
  /** Host directory mounted read-write as the session's home */
  readonly configDir: string;
  /** Read-only mounts: agent socket, then git identity when present */
  readonly mounts: readonly MountSpec[];
  readonly env: Readonly<Record<string, string>>;
  readonly groups: readonly number[];
}

export interface CredentialForwarderOptions {
  runner: CommandRunner;
  capabilities: HostCapabilities;
  /** Session image, used to inspect VM-side sockets */
  image: string;
  env?: NodeJS.ProcessEnv;
  /** `sshKey` from the config file */
  configuredKey?: string;
  configDir?: string;
  sshDir?: string;
  gitIdentitySource?: string;
  /** Override strategy selection (tests) */
  strategy?: CredentialForwardStrategy;
}

export class CredentialForwarder {
  private readonly options: CredentialForwarderOptions;

  constructor(options: CredentialForwarderOptions) {
    this.options = options;
  }

  /**
   * Resolve and register the SSH key, refresh the git identity copy and
   * expose the agent socket.
   *
   * @param requestedKey - Value of --ssh-key, if given.
   * @throws CredentialUnavailableError when the agent or key is unusable.
   */
  async prepare(requestedKey?: string): Promise<CredentialBundle> {
    const {
      runner,
      capabilities,
      image,
      env = process.env,
      configuredKey,
      configDir = PERSISTENT_CONFIG_DIR,
      sshDir = HOST_SSH_DIR,
      gitIdentitySource = HOST_GIT_IDENTITY,
    } = this.options;

    const key = resolveSshKey({ requested: requestedKey, env, configured: configuredKey, sshDir });
    await registerKey(runner, key, env);

    const strategy = this.options.strategy ?? selectForwardStrategy(capabilities, runner, image);
    const agent = await strategy.forward();

    ensureConfigDir(configDir);
    const mounts: MountSpec[] = [agent.mount];
    const identity = copyGitIdentity(gitIdentitySource, configDir);
    if (identity) {
      mounts.push({ host: identity, container: CONTAINER_GIT_IDENTITY, mode: "ro" });
    }

    log.dim(`SSH: ${key.path} via ${strategy.name}`);
    return {
      key,
      strategy: strategy.name,
      configDir,
      mounts,
      env: agent.env,
      groups: agent.groups,
    };
  }
}
