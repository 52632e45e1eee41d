/**
 * Unified logging abstraction for claude-sandbox.
 *
 * Centralizes all launcher output with consistent styling and log levels.
 * Uses picocolors for terminal styling.
 *
 * IMPORTANT: All launcher output MUST go through this module.
 * Never use console.log/console.error directly in other modules.
 * Launcher chatter goes to stderr so the session's stdout stays clean
 * for one-shot prompts piped into other tools.
 */

import pc from "picocolors";

/** Log levels in order of verbosity (debug is most verbose). */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

/** Logger configuration. */
interface LoggerConfig {
  level: LogLevel;
  /** If true, prefix messages with [ccs] (set when stderr is not a TTY) */
  prefix: boolean;
}

/** Global logger configuration. */
const config: LoggerConfig = {
  level: LogLevel.INFO,
  prefix: !process.stderr.isTTY,
};

/** Console reference captured at load time. */
const out = {
  error: console.error.bind(console),
};

function canOutput(level: LogLevel): boolean {
  return config.level <= level;
}

/**
 * Set the minimum log level. Messages below this level are suppressed.
 */
export function setLogLevel(level: LogLevel): void {
  config.level = level;
}

function formatMessage(message: string): string {
  return config.prefix ? `[ccs] ${message}` : message;
}

/**
 * Logger object with level-aware methods.
 *
 * Usage:
 *   log.debug("verbose info")
 *   log.info("normal output")
 *   log.warn("warning message")
 *   log.error("error message")
 *   log.success("completed!")
 *   log.dim("subtle info")
 */
export const log = {
  /** Debug-level message, dim. */
  debug(message: string): void {
    if (canOutput(LogLevel.DEBUG)) {
      out.error(pc.dim(formatMessage(message)));
    }
  },

  info(message: string): void {
    if (canOutput(LogLevel.INFO)) {
      out.error(formatMessage(message));
    }
  },

  warn(message: string): void {
    if (canOutput(LogLevel.WARN)) {
      out.error(pc.yellow(formatMessage(message)));
    }
  },

  error(message: string): void {
    if (canOutput(LogLevel.ERROR)) {
      out.error(pc.red(formatMessage(message)));
    }
  },

  success(message: string): void {
    if (canOutput(LogLevel.INFO)) {
      out.error(pc.green(formatMessage(message)));
    }
  },

  /** Subtle info (info level). */
  dim(message: string): void {
    if (canOutput(LogLevel.INFO)) {
      out.error(pc.dim(formatMessage(message)));
    }
  },

  /**
   * Raw output on stdout without styling or prefix.
   * Used for machine-readable output such as --dry-run.
   */
  raw(message: string): void {
    if (canOutput(LogLevel.INFO)) {
      process.stdout.write(`${message}\n`);
    }
  },
};

/**
 * Styled string builders (for help text compositions).
 */
export const style = {
  bold: (text: string) => pc.bold(text),
};
