/**
 * claude-sandbox - run an AI coding assistant in isolated container sessions.
 *
 * Library entry point: the launcher components, usable without the CLI.
 */

export { VERSION, DEFAULT_IMAGE, DEFAULT_SESSION_BASE_NAME } from "./constants.js";
export {
  SandboxError,
  ValidationError,
  ConfigError,
  RuntimeUnavailableError,
  CredentialUnavailableError,
  NameCollisionError,
  LaunchFailureError,
} from "./errors.js";
export { run, type RunDependencies } from "./commands/run.js";
export { loadSandboxConfig, type SandboxConfig } from "./config-file.js";
export { nodeRunner, type CommandRunner, type ExecResult } from "./exec.js";
export { RuntimeProbe, RuntimeState } from "./docker/probe.js";
export { probeHostCapabilities, type HostCapabilities } from "./platform/detection.js";
export { SessionNameAllocator, type SessionIdentity } from "./session/name-allocator.js";
export { SessionLauncher, type LaunchContext } from "./session/launcher.js";
export { CredentialForwarder, type CredentialBundle } from "./credentials/index.js";
export { normalize, entrypointArgs, type InvocationSpec } from "./invocation/index.js";
