/**
 * Session name allocation.
 *
 * Names are `<base>-<n>` with the smallest non-negative n not known to the
 * runtime. There is no stored counter and no lock: two launches racing for
 * the same suffix are caught when the runtime refuses the second `docker run`
 * (see NameCollisionError), and the caller re-allocates once.
 */

import { DEFAULT_SESSION_BASE_NAME } from "../constants.js";
import { listContainerNames } from "../docker/inspect.js";
import type { CommandRunner } from "../exec.js";

export interface SessionIdentity {
  readonly baseName: string;
  readonly index: number;
  /** Full runtime name: `${baseName}-${index}` */
  readonly name: string;
}

const MAX_BASE_NAME_LENGTH = 50;

/**
 * Reduce a user-supplied base name to characters the runtime accepts.
 */
export function sanitizeBaseName(baseName: string): string {
  let safeName = baseName
    .toLowerCase()
    .replace(/[^a-z0-9_.-]/g, "-")
    .replace(/-{2,}/g, "-") // Collapse multiple hyphens
    .replace(/^[-_.]+|-+$/g, ""); // Runtime names must start alphanumeric

  if (safeName.length > MAX_BASE_NAME_LENGTH) {
    safeName = safeName.slice(0, MAX_BASE_NAME_LENGTH).replace(/-+$/, "");
  }

  return safeName || DEFAULT_SESSION_BASE_NAME;
}

export function sessionIdentity(baseName: string, index: number): SessionIdentity {
  return { baseName, index, name: `${baseName}-${index}` };
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Pick the first free suffix given the names currently in use.
 *
 * Only exact `<base>-<digits>` names count; `sandbox-1-old` or `other-sandbox-0`
 * do not reserve anything.
 */
export function pickFreeIdentity(baseName: string, existingNames: Iterable<string>): SessionIdentity {
  const pattern = new RegExp(`^${escapeRegExp(baseName)}-(0|[1-9]\\d*)$`);
  const used = new Set<number>();
  for (const name of existingNames) {
    const match = pattern.exec(name);
    if (match?.[1] !== undefined) {
      used.add(Number(match[1]));
    }
  }

  let index = 0;
  while (used.has(index)) {
    index++;
  }
  return sessionIdentity(baseName, index);
}

export class SessionNameAllocator {
  constructor(private readonly runner: CommandRunner) {}

  /**
   * Allocate an identity against the runtime's current names.
   */
  async allocate(baseName: string): Promise<SessionIdentity> {
    const base = sanitizeBaseName(baseName);
    const existing = await listContainerNames(this.runner, `${base}-`);
    return pickFreeIdentity(base, existing);
  }
}
