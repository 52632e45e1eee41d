/**
 * In-process CommandRunner for unit tests.
 *
 * Replies are registered per command (optionally narrowed by an argument
 * matcher); the most recent matching registration wins. Unregistered commands
 * behave like a binary missing from PATH. Every call is recorded.
 */

import type { CommandRunner, ExecInheritOptions, ExecOptions, ExecResult } from "../../src/exec.js";

export type Reply = Partial<ExecResult> | ((args: string[]) => Partial<ExecResult>);
export type ArgsMatcher = (args: string[]) => boolean;

export interface RecordedCall {
  mode: "exec" | "inherit";
  cmd: string;
  args: string[];
  opts?: ExecOptions | ExecInheritOptions;
}

interface Handler {
  cmd: string;
  match?: ArgsMatcher;
  reply: Reply;
}

const MISSING: ExecResult = { exitCode: 127, stdout: "", stderr: "", code: "ENOENT" };

/** Matches `docker <subcommand> ...`. */
export function subcommand(name: string): ArgsMatcher {
  return (args) => args[0] === name;
}

export class FakeRunner implements CommandRunner {
  readonly calls: RecordedCall[] = [];
  private readonly execHandlers: Handler[] = [];
  private readonly inheritHandlers: Handler[] = [];

  /** Reply for captured exec() calls. */
  on(cmd: string, reply: Reply, match?: ArgsMatcher): this {
    this.execHandlers.push({ cmd, reply, match });
    return this;
  }

  /** Reply for terminal-attached execInherit() calls. */
  onInherit(cmd: string, reply: Reply, match?: ArgsMatcher): this {
    this.inheritHandlers.push({ cmd, reply, match });
    return this;
  }

  async exec(cmd: string, args: string[], opts?: ExecOptions): Promise<ExecResult> {
    this.calls.push({ mode: "exec", cmd, args, opts });
    return resolve(this.execHandlers, cmd, args);
  }

  async execInherit(cmd: string, args: string[], opts?: ExecInheritOptions): Promise<ExecResult> {
    this.calls.push({ mode: "inherit", cmd, args, opts });
    return resolve(this.inheritHandlers, cmd, args);
  }

  /** Recorded calls for one command, optionally one mode. */
  callsTo(cmd: string, mode?: RecordedCall["mode"]): RecordedCall[] {
    return this.calls.filter((call) => call.cmd === cmd && (mode === undefined || call.mode === mode));
  }
}

function resolve(handlers: readonly Handler[], cmd: string, args: string[]): ExecResult {
  for (let i = handlers.length - 1; i >= 0; i--) {
    const handler = handlers[i];
    if (handler && handler.cmd === cmd && (!handler.match || handler.match(args))) {
      const partial = typeof handler.reply === "function" ? handler.reply(args) : handler.reply;
      return { exitCode: 0, stdout: "", stderr: "", ...partial };
    }
  }
  return { ...MISSING };
}

/** Reply that walks through a list of results, repeating the last one. */
export function sequence(...replies: Array<Partial<ExecResult>>): (args: string[]) => Partial<ExecResult> {
  let index = 0;
  return () => {
    const reply = replies[Math.min(index, replies.length - 1)] ?? {};
    index++;
    return reply;
  };
}
