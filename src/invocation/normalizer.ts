/**
 * Invocation normalizer.
 *
 * Turns the raw command-line tokens into one immutable InvocationSpec:
 * launcher options, the resource-limit record, the flags forwarded to the
 * in-container entrypoint, and the free-text prompt. Pure: no I/O, never throws.
 *
 * Grammar (left to right, see flags.ts for the table):
 *   --                 ends flag parsing; everything after it is prompt text
 *   -                  prompt text
 *   --flag=value       name/value split on the first "=" (long flags only)
 *   arity-1 flag       takes the next token as its value, whatever it looks like;
 *                      at the very end with no value an entrypoint flag is
 *                      forwarded bare and a launcher/resource flag is dropped
 *   unknown -x/--xyz   arity-0 entrypoint flag
 *   anything else      prompt text, joined with single spaces
 */

import { DEFAULT_CPU_LIMIT, DEFAULT_MEMORY_LIMIT } from "../constants.js";
import { PROMPT_FLAGS, isFlagToken, lookupFlag, splitFlag } from "./flags.js";

export interface ResourceLimits {
  readonly cpuLimit: string;
  readonly memoryLimit: string;
}

export interface LauncherOptions {
  readonly sshKey?: string;
  readonly image?: string;
  readonly name?: string;
  readonly dryRun: boolean;
  readonly verbose: boolean;
  /** Repeated --env KEY=VALUE entries, in order (validated later) */
  readonly env: readonly string[];
}

export interface InvocationSpec {
  /** Entrypoint flags in their original order */
  readonly passThrough: readonly string[];
  /** Free text, when any was left over */
  readonly prompt?: string;
  /** True when -p/--print is already among the pass-through flags */
  readonly printMode: boolean;
  readonly resources: ResourceLimits;
  readonly launcher: LauncherOptions;
}

/** Fallbacks for limits not given on the command line (config file values). */
export interface NormalizeDefaults {
  cpuLimit?: string;
  memoryLimit?: string;
}

interface MutableLauncher {
  sshKey?: string;
  image?: string;
  name?: string;
  dryRun: boolean;
  verbose: boolean;
  env: string[];
}

export function normalize(rawArgs: readonly string[], defaults: NormalizeDefaults = {}): InvocationSpec {
  const passThrough: string[] = [];
  const text: string[] = [];
  const resources: { cpuLimit?: string; memoryLimit?: string } = {};
  const launcher: MutableLauncher = { dryRun: false, verbose: false, env: [] };
  let printMode = false;

  for (let i = 0; i < rawArgs.length; i++) {
    const token = rawArgs[i];
    if (token === undefined) {
      continue;
    }
    if (token === "--") {
      text.push(...rawArgs.slice(i + 1));
      break;
    }
    if (!isFlagToken(token)) {
      text.push(token);
      continue;
    }

    const { name, inline } = splitFlag(token);
    const flag = lookupFlag(name);

    let value = inline;
    let consumedNext = false;
    if (flag.arity === 1 && value === undefined) {
      const next = rawArgs[i + 1];
      if (next !== undefined) {
        value = next;
        consumedNext = true;
        i++;
      }
    }

    switch (flag.kind) {
      case "resource":
        if (value) {
          resources[flag.field] = value;
        }
        break;
      case "launcher":
        if (flag.arity === 0) {
          launcher[flag.field] = true;
        } else if (flag.field === "env") {
          if (value) {
            launcher.env.push(value);
          }
        } else if (value) {
          launcher[flag.field] = value;
        }
        break;
      case "entrypoint":
        passThrough.push(token);
        if (consumedNext && value !== undefined) {
          passThrough.push(value);
        }
        if (PROMPT_FLAGS.has(name)) {
          printMode = true;
        }
        break;
    }
  }

  const prompt = text.length > 0 ? text.join(" ") : undefined;
  return Object.freeze({
    passThrough: Object.freeze(passThrough),
    ...(prompt !== undefined ? { prompt } : {}),
    printMode,
    resources: Object.freeze({
      cpuLimit: resources.cpuLimit ?? defaults.cpuLimit ?? DEFAULT_CPU_LIMIT,
      memoryLimit: resources.memoryLimit ?? defaults.memoryLimit ?? DEFAULT_MEMORY_LIMIT,
    }),
    launcher: Object.freeze({ ...launcher, env: Object.freeze(launcher.env) }),
  });
}

/**
 * Arguments handed to the image entrypoint: pass-through flags, then the
 * prompt. The prompt goes in a synthesized `-p` pair unless print mode was
 * already requested, in which case it is appended as positional text.
 */
export function entrypointArgs(spec: InvocationSpec): string[] {
  const args = [...spec.passThrough];
  if (spec.prompt !== undefined) {
    if (spec.printMode) {
      args.push(spec.prompt);
    } else {
      args.push("-p", spec.prompt);
    }
  }
  return args;
}
