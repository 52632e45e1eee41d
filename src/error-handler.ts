/**
 * Error reporting for claude-sandbox.
 *
 * Turns launcher failures into one diagnostic line plus the underlying tool's
 * text, and describes non-zero session exit codes without altering them.
 */

import { CLI_NAME, EXIT_CODES as LAUNCHER_EXIT_CODES } from "./constants.js";
import { SandboxError, extractErrorDetails } from "./errors.js";
import { log } from "./logger.js";

/** Known session exit codes with their meanings and suggestions. */
export interface ExitCodeInfo {
  code: number;
  name: string;
  description: string;
  suggestion?: string;
  severity: "info" | "warn" | "error";
}

/** Exit code database for session failures. */
const EXIT_CODES: Record<number, ExitCodeInfo> = {
  0: {
    code: 0,
    name: "SUCCESS",
    description: "Session exited successfully",
    severity: "info",
  },
  1: {
    code: 1,
    name: "GENERAL_ERROR",
    description: "Session ended with an error",
    severity: "error",
  },
  125: {
    code: 125,
    name: "RUNTIME_ERROR",
    description: "Container runtime failed to start the session",
    suggestion: "Check: docker info",
    severity: "error",
  },
  126: {
    code: 126,
    name: "NOT_EXECUTABLE",
    description: "Session entrypoint not executable",
    suggestion: "Rebuild the session image",
    severity: "error",
  },
  127: {
    code: 127,
    name: "NOT_FOUND",
    description: "Session entrypoint not found",
    suggestion: "Rebuild the session image or pass --image",
    severity: "error",
  },
  130: {
    code: 130,
    name: "SIGINT",
    description: "Interrupted by Ctrl+C",
    severity: "info",
  },
  137: {
    code: 137,
    name: "OOM_KILLED",
    description: "Session was killed (OOM or manual stop)",
    suggestion: `Try: ${CLI_NAME} --memory 8g`,
    severity: "warn",
  },
  139: {
    code: 139,
    name: "SEGFAULT",
    description: "Session crashed (segmentation fault)",
    severity: "error",
  },
  143: {
    code: 143,
    name: "SIGTERM",
    description: "Session terminated by signal",
    severity: "info",
  },
};

/**
 * Get information about an exit code.
 */
export function getExitCodeInfo(code: number): ExitCodeInfo {
  return (
    EXIT_CODES[code] ?? {
      code,
      name: "UNKNOWN",
      description: `Session exited with code ${code}`,
      severity: "warn" as const,
    }
  );
}

/**
 * Check if an exit code indicates user-initiated termination (not an error).
 */
export function isUserTermination(code: number): boolean {
  return code === 130 || code === 143; // SIGINT (Ctrl+C) or SIGTERM
}

/**
 * Log an exit code with appropriate styling and suggestions.
 */
export function logExitCode(code: number, context?: string): void {
  if (code === 0) {
    return;
  }

  const info = getExitCodeInfo(code);
  if (isUserTermination(code)) {
    log.dim(info.description);
    return;
  }

  const contextStr = context ? ` (${context})` : "";
  switch (info.severity) {
    case "error":
      log.error(`${info.description}${contextStr}`);
      break;
    case "warn":
      log.warn(`${info.description}${contextStr}`);
      break;
    default:
      log.dim(`${info.description}${contextStr}`);
  }

  if (info.suggestion) {
    log.dim(info.suggestion);
  }
}

/**
 * Report a failure and return the exit code the launcher should exit with.
 *
 * SandboxErrors carry their own classification; anything else is an
 * unexpected internal failure (exit 1, stack trace at debug level).
 */
export function reportError(error: unknown): number {
  if (error instanceof SandboxError) {
    log.error(error.message);
    if (error.detail) {
      log.dim(error.detail);
    }
    if (error.remediation) {
      log.dim(error.remediation);
    }
    return error.exitCode;
  }

  log.error(`Unexpected error: ${extractErrorDetails(error)}`);
  if (error instanceof Error && error.stack) {
    log.debug(error.stack);
  }
  return 1;
}

/** Launcher classifications, for help text and documentation. */
export const LAUNCHER_EXIT_CODE_SUMMARY: ReadonlyArray<[number, string]> = [
  [LAUNCHER_EXIT_CODES.USAGE, "invalid arguments or configuration"],
  [LAUNCHER_EXIT_CODES.RUNTIME_UNAVAILABLE, "container runtime unavailable"],
  [LAUNCHER_EXIT_CODES.NAME_COLLISION, "session name collision persisted after retry"],
  [LAUNCHER_EXIT_CODES.CREDENTIAL_UNAVAILABLE, "SSH agent or key unavailable"],
  [LAUNCHER_EXIT_CODES.RUNTIME_REJECTED, "runtime rejected the session"],
];
