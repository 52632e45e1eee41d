import { describe, it, expect } from "vitest";

import { getExitCodeInfo, isUserTermination, reportError } from "../src/error-handler.js";
import {
  ConfigError,
  CredentialUnavailableError,
  LaunchFailureError,
  NameCollisionError,
  RuntimeUnavailableError,
  ValidationError,
  extractErrorDetails,
} from "../src/errors.js";

describe("getExitCodeInfo", () => {
  it("suggests a larger memory limit after an OOM kill", () => {
    expect(getExitCodeInfo(137)).toMatchObject({ name: "OOM_KILLED", suggestion: "Try: ccs --memory 8g" });
  });

  it("describes unknown codes", () => {
    expect(getExitCodeInfo(42)).toEqual({
      code: 42,
      name: "UNKNOWN",
      description: "Session exited with code 42",
      severity: "warn",
    });
  });

  it("recognizes user termination", () => {
    expect(isUserTermination(130)).toBe(true);
    expect(isUserTermination(143)).toBe(true);
    expect(isUserTermination(1)).toBe(false);
  });
});

describe("reportError", () => {
  it("maps each failure kind to its exit code", () => {
    expect(reportError(new ValidationError("bad"))).toBe(2);
    expect(reportError(new ConfigError("bad config", "line 3"))).toBe(2);
    expect(reportError(new RuntimeUnavailableError("down", { remediation: "start it" }))).toBe(69);
    expect(reportError(new NameCollisionError("claude-sandbox-0"))).toBe(75);
    expect(reportError(new CredentialUnavailableError("no agent"))).toBe(77);
    expect(reportError(new LaunchFailureError("rejected", 125, "daemon said no"))).toBe(125);
  });

  it("treats anything else as an internal failure", () => {
    expect(reportError(new Error("boom"))).toBe(1);
    expect(reportError("boom")).toBe(1);
  });
});

describe("extractErrorDetails", () => {
  it("prefers the underlying tool's text", () => {
    expect(extractErrorDetails(new LaunchFailureError("rejected", 125, "daemon said no"))).toBe("daemon said no");
    expect(extractErrorDetails(new Error("plain"))).toBe("plain");
    expect(extractErrorDetails("x".repeat(20), 5)).toBe("xxxxx");
  });
});
