/**
 * Platform utility functions for claude-sandbox.
 *
 * Cross-platform detection of timezone and terminal environment, forwarded
 * into the session so the assistant renders and timestamps like the host.
 */

import { existsSync, readFileSync, readlinkSync } from "node:fs";
import { env as processEnv } from "node:process";

import { log } from "../logger.js";

/**
 * Get host timezone in IANA format.
 */
export function getHostTimezone(env: NodeJS.ProcessEnv = processEnv): string {
  const tzEnv = env.TZ;
  if (tzEnv && tzEnv.includes("/")) {
    return tzEnv;
  }

  try {
    const tz = Intl.DateTimeFormat().resolvedOptions().timeZone;
    if (tz && tz.includes("/")) {
      return tz;
    }
  } catch (e) {
    log.debug(`Intl timezone detection error: ${String(e)}`);
  }

  try {
    const tzFile = "/etc/timezone";
    if (existsSync(tzFile)) {
      const tz = readFileSync(tzFile, "utf-8").trim();
      if (tz && tz.includes("/")) {
        return tz;
      }
    }
  } catch (e) {
    log.debug(`/etc/timezone read error: ${String(e)}`);
  }

  try {
    const target = readlinkSync("/etc/localtime");
    const tz = target.split("zoneinfo/")[1];
    if (tz && tz.includes("/")) {
      return tz;
    }
  } catch (e) {
    log.debug(`/etc/localtime read error: ${String(e)}`);
  }

  return "UTC";
}

/**
 * Terminal-specific variables passed through when set on the host.
 */
const TERMINAL_PASSTHROUGH_VARS = [
  "TERM_PROGRAM",
  "TERM_PROGRAM_VERSION",
  "ITERM_SESSION_ID",
  "KITTY_WINDOW_ID",
  "WEZTERM_PANE",
  "GHOSTTY_RESOURCES_DIR",
  "VSCODE_GIT_IPC_HANDLE",
  "WT_SESSION",
  "TMUX",
  "TMUX_PANE",
] as const;

/**
 * Terminal environment for the session: TERM/COLORTERM with sane defaults,
 * plus terminal program variables that are set on the host.
 */
export function getTerminalEnv(env: NodeJS.ProcessEnv = processEnv): Record<string, string> {
  const vars: Record<string, string> = {
    TERM: env.TERM ?? "xterm-256color",
    COLORTERM: env.COLORTERM ?? "truecolor",
  };

  for (const name of TERMINAL_PASSTHROUGH_VARS) {
    const value = env[name];
    if (value) {
      vars[name] = value;
    }
  }

  return vars;
}
