/**
 * Thin wrapper over node:child_process for claude-sandbox.
 *
 * Every external command (docker, colima, ssh-add, systemctl) flows through a
 * CommandRunner so each component can be exercised with an in-process fake.
 */

import { execFile, spawn, type ChildProcess } from "node:child_process";
import { constants } from "node:os";

export interface ExecResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  timedOut?: boolean;
  /** Set to "ENOENT" when the binary itself could not be found */
  code?: string;
}

export interface ExecOptions {
  timeout?: number;
  env?: NodeJS.ProcessEnv;
}

export interface ExecInheritOptions {
  env?: NodeJS.ProcessEnv;
  /** stdin mode: "inherit" (default) or "ignore" */
  stdin?: "inherit" | "ignore";
  /**
   * Pipe stderr through the launcher: every line is still forwarded to our own
   * stderr, and the text is also returned in `stderr` for diagnosis.
   */
  captureStderr?: boolean;
}

/** Process execution seam shared by all launcher components. */
export interface CommandRunner {
  /** Run to completion capturing output. Never rejects. */
  exec(cmd: string, args: string[], opts?: ExecOptions): Promise<ExecResult>;
  /** Run attached to the caller's terminal. Resolves with the exit code. Never rejects. */
  execInherit(cmd: string, args: string[], opts?: ExecInheritOptions): Promise<ExecResult>;
}

/** Cap on captured stderr kept for diagnosis (forwarding is unbounded). */
const MAX_CAPTURED_STDERR = 64 * 1024;

/**
 * Execute a command and capture output. Never rejects (reject:false semantics).
 */
export function exec(cmd: string, args: string[], opts: ExecOptions = {}): Promise<ExecResult> {
  return new Promise((resolve) => {
    const child = execFile(cmd, args, {
      timeout: opts.timeout ?? 0,
      env: opts.env,
      encoding: "utf8",
      maxBuffer: 10 * 1024 * 1024,
    }, (error, stdout, stderr) => {
      if (error?.code === "ENOENT") {
        resolve({ exitCode: 1, stdout, stderr, timedOut: false, code: "ENOENT" });
        return;
      }

      const timedOut = Boolean(error?.killed) && child.exitCode === null;
      resolve({
        exitCode: child.exitCode ?? (error ? 1 : 0),
        stdout,
        stderr,
        timedOut,
      });
    });
  });
}

/**
 * Forward a piped stderr stream line by line while keeping a bounded copy.
 */
function teeStderr(child: ChildProcess): () => string {
  let captured = "";
  let partial = "";
  child.stderr?.on("data", (chunk: Buffer) => {
    const text = partial + chunk.toString();
    const lines = text.split("\n");
    partial = lines.pop() ?? "";
    for (const line of lines) {
      process.stderr.write(line + "\n");
      if (captured.length < MAX_CAPTURED_STDERR) {
        captured += line + "\n";
      }
    }
  });
  child.stderr?.on("end", () => {
    if (partial) {
      process.stderr.write(partial);
      captured += partial;
      partial = "";
    }
  });
  return () => captured;
}

/** Signals that end the launcher and must reach the attached session too. */
const FORWARDED_SIGNALS: readonly NodeJS.Signals[] = ["SIGINT", "SIGTERM", "SIGHUP"];

/**
 * Relay termination signals to the child while it runs.
 * Returns the function that removes the handlers again.
 */
function forwardSignals(child: ChildProcess): () => void {
  const handlers = FORWARDED_SIGNALS.map((signal) => {
    const handler = (): void => {
      child.kill(signal);
    };
    process.on(signal, handler);
    return { signal, handler };
  });
  return () => {
    for (const { signal, handler } of handlers) {
      process.off(signal, handler);
    }
  };
}

/**
 * Execute with stdio inherited from the launcher. Resolves with the exit code.
 *
 * SIGINT, SIGTERM and SIGHUP received by the launcher are passed on to the
 * child, and the promise settles only once the child has closed.
 * A child killed by a signal reports 128 + signal number, matching what a
 * shell would show for the same session.
 */
export function execInherit(
  cmd: string,
  args: string[],
  opts: ExecInheritOptions = {}
): Promise<ExecResult> {
  const stdin = opts.stdin ?? "inherit";
  const child = spawn(cmd, args, {
    stdio: [stdin, "inherit", opts.captureStderr ? "pipe" : "inherit"],
    env: opts.env,
  });
  const readStderr = opts.captureStderr ? teeStderr(child) : () => "";
  const stopForwarding = forwardSignals(child);

  return new Promise<ExecResult>((resolve) => {
    child.on("close", (code, signal) => {
      stopForwarding();
      const exitCode = code ?? (signal ? 128 + signalNumber(signal) : 0);
      resolve({ exitCode, stdout: "", stderr: readStderr() });
    });
    child.on("error", (error: NodeJS.ErrnoException) => {
      stopForwarding();
      resolve({ exitCode: 1, stdout: "", stderr: String(error), code: error.code });
    });
  });
}

function signalNumber(signal: NodeJS.Signals): number {
  return constants.signals[signal] ?? 0;
}

/** Runner backed by real child processes. */
export const nodeRunner: CommandRunner = { exec, execInherit };

/**
 * Check if a command exists on the host system.
 */
export async function commandExists(runner: CommandRunner, command: string): Promise<boolean> {
  const result = await runner.exec("which", [command], { timeout: 5_000 });
  return result.exitCode === 0 && result.code !== "ENOENT";
}
