/**
 * Constants module for claude-sandbox.
 *
 * All timeout values, paths and shared defaults are defined here (SSOT).
 */

import { homedir } from "node:os";
import { join } from "node:path";

// === Version (SSOT: package.json) ===
import pkg from "../package.json" with { type: "json" };
export const VERSION: string = pkg.version;

// === Naming (SSOT) ===
export const CLI_NAME = "ccs";
export const DEFAULT_SESSION_BASE_NAME = "claude-sandbox";
export const DEFAULT_IMAGE = "claude-code-sandbox:latest";

// === Runtime Timeouts (milliseconds) ===
export const RUNTIME_COMMAND_TIMEOUT = 30_000; // Quick runtime commands (info, ps, stat probe)
export const RUNTIME_CHECK_INTERVAL = 1_000; // Between status polls
export const VM_RUNTIME_STARTUP_TIMEOUT = 60_000; // Colima / Docker Desktop boot a VM first
export const NATIVE_RUNTIME_STARTUP_TIMEOUT = 30_000; // Native daemon via service manager
export const STARTER_TIMEOUT = 180_000; // `colima start` itself can take minutes on first boot
export const SSH_ADD_TIMEOUT = 15_000;

// === Host Paths ===
export const PERSISTENT_CONFIG_DIR = join(homedir(), ".claude-sandbox");
export const HOST_SSH_DIR = join(homedir(), ".ssh");
export const HOST_GIT_IDENTITY = join(homedir(), ".gitconfig");
export const HOST_IDE_DIR = join(homedir(), ".claude", "ide");
export const GLOBAL_CONFIG_PATH = join(homedir(), ".config", "claude-sandbox", "config.yaml");

// === Container Paths (image contract) ===
export const CONTAINER_HOME = "/home/claude";
export const CONTAINER_GIT_IDENTITY = "/home/claude/.gitconfig";
export const CONTAINER_IDE_DIR = "/home/claude/.claude/ide";

// === Credential Forwarding ===
export const DEFAULT_SSH_KEY_NAME = "id_ed25519";
export const VM_AGENT_SOCKET = "/run/host-services/ssh-auth.sock"; // Provided inside the runtime VM
export const GIT_IDENTITY_FILENAME = ".gitconfig";

// === Default Resource Limits ===
export const DEFAULT_CPU_LIMIT = "2";
export const DEFAULT_MEMORY_LIMIT = "4g";

// === Environment Variables (SSOT for names) ===
export const CCS_ENV = {
  SSH_KEY: "CCS_SSH_KEY",
  IMAGE: "CCS_IMAGE",
  DEBUG: "CCS_DEBUG",
} as const;

// === Exit Codes (launcher's own failure classification) ===
export const EXIT_CODES = {
  USAGE: 2,
  RUNTIME_UNAVAILABLE: 69, // sysexits EX_UNAVAILABLE
  NAME_COLLISION: 75, // EX_TEMPFAIL
  CREDENTIAL_UNAVAILABLE: 77, // EX_NOPERM
  RUNTIME_REJECTED: 125, // docker run: the daemon itself failed
} as const;
