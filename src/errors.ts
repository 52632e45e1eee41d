/**
 * Unified exception hierarchy for claude-sandbox.
 *
 * All custom exceptions inherit from SandboxError for consistent error handling.
 * The CLI catches these and converts them to one diagnostic line plus an exit code.
 *
 * Dependency direction:
 *   This module imports only constants.ts.
 *   It may be imported by: all other modules.
 */

import { EXIT_CODES } from "./constants.js";

/**
 * Base exception for all launcher errors.
 *
 * `exitCode` is the launcher's own failure classification; `detail` carries the
 * underlying tool's text, shown verbatim below the diagnostic line.
 */
export class SandboxError extends Error {
  readonly exitCode: number = 1;
  readonly detail?: string;
  readonly remediation?: string;

  constructor(message: string, options: { detail?: string; remediation?: string } = {}) {
    super(message);
    this.name = "SandboxError";
    this.detail = options.detail;
    this.remediation = options.remediation;
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Invalid user input: malformed env var keys, bad config values.
 */
export class ValidationError extends SandboxError {
  override readonly exitCode: number = EXIT_CODES.USAGE;

  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

/** Configuration file could not be used. */
export class ConfigError extends SandboxError {
  override readonly exitCode: number = EXIT_CODES.USAGE;

  constructor(message: string, detail?: string) {
    super(message, { detail });
    this.name = "ConfigError";
  }
}

/**
 * Container engine unreachable after the bounded start/poll sequence.
 * Terminal: the user must fix the runtime and rerun.
 */
export class RuntimeUnavailableError extends SandboxError {
  override readonly exitCode: number = EXIT_CODES.RUNTIME_UNAVAILABLE;

  constructor(message: string, options: { detail?: string; remediation?: string } = {}) {
    super(message, options);
    this.name = "RuntimeUnavailableError";
  }
}

/**
 * SSH agent unreachable or key file missing.
 *
 * Fatal on purpose: git inside the session would otherwise fail with an
 * opaque authentication error much later.
 */
export class CredentialUnavailableError extends SandboxError {
  override readonly exitCode: number = EXIT_CODES.CREDENTIAL_UNAVAILABLE;

  constructor(message: string, options: { detail?: string; remediation?: string } = {}) {
    super(message, options);
    this.name = "CredentialUnavailableError";
  }
}

/** Another launch took the allocated session name first. */
export class NameCollisionError extends SandboxError {
  override readonly exitCode: number = EXIT_CODES.NAME_COLLISION;
  readonly sessionName: string;

  constructor(sessionName: string, detail?: string) {
    super(`Session name '${sessionName}' is already in use`, { detail });
    this.name = "NameCollisionError";
    this.sessionName = sessionName;
  }
}

/** The runtime rejected the composed invocation. */
export class LaunchFailureError extends SandboxError {
  override readonly exitCode: number;

  constructor(message: string, exitCode: number, detail?: string) {
    super(message, { detail });
    this.name = "LaunchFailureError";
    this.exitCode = exitCode;
  }
}

/**
 * Extract error details from an unknown error for user-friendly messages.
 *
 * Prefers the captured stderr of a failed command, then the error message.
 * Truncates output to maxLength to avoid overwhelming log output.
 */
export function extractErrorDetails(error: unknown, maxLength = 1000): string {
  if (!(error instanceof Error)) {
    return String(error).slice(0, maxLength);
  }
  if (error instanceof SandboxError && error.detail) {
    return error.detail.slice(0, maxLength);
  }
  return error.message.slice(0, maxLength);
}
