/**
 * Flags-with-arity table for the launcher's command line.
 *
 * Every token the normalizer recognizes is listed here with its arity and
 * its owner:
 *   resource    extracted into the resource-limit record
 *   launcher    consumed by the launcher itself, never forwarded
 *   entrypoint  known to the in-container assistant, forwarded verbatim
 *
 * Any other `-x` / `--xyz` token is an arity-0 entrypoint flag.
 */

export type ResourceField = "cpuLimit" | "memoryLimit";
export type LauncherValueField = "sshKey" | "image" | "name" | "env";
export type LauncherSwitchField = "dryRun" | "verbose";

export type FlagDefinition =
  | { readonly kind: "resource"; readonly arity: 1; readonly field: ResourceField }
  | { readonly kind: "launcher"; readonly arity: 1; readonly field: LauncherValueField }
  | { readonly kind: "launcher"; readonly arity: 0; readonly field: LauncherSwitchField }
  | { readonly kind: "entrypoint"; readonly arity: 0 | 1 };

const RESOURCE_FLAGS: ReadonlyArray<[string, ResourceField]> = [
  ["--cpus", "cpuLimit"],
  ["--memory", "memoryLimit"],
];

const LAUNCHER_VALUE_FLAGS: ReadonlyArray<[string, LauncherValueField]> = [
  ["--ssh-key", "sshKey"],
  ["--image", "image"],
  ["--name", "name"],
  ["--env", "env"],
];

const LAUNCHER_SWITCHES: ReadonlyArray<[string, LauncherSwitchField]> = [
  ["--dry-run", "dryRun"],
  ["--sandbox-verbose", "verbose"],
];

/** Assistant flags that take a value. */
const ENTRYPOINT_VALUE_FLAGS = [
  "-p", "--print",
  "-r", "--resume",
  "--model",
  "--fallback-model",
  "--system-prompt",
  "--append-system-prompt",
  "--output-format",
  "--input-format",
  "--permission-mode",
  "--settings",
  "--setting-sources",
  "--session-id",
  "--agents",
  "--max-turns",
  "--allowedTools", "--allowed-tools",
  "--disallowedTools", "--disallowed-tools",
  "--add-dir",
  "--mcp-config",
] as const;

/** Assistant switches, listed so they are never mistaken for value flags. */
const ENTRYPOINT_SWITCHES = [
  "-c", "--continue",
  "-d", "--debug",
  "--verbose",
  "--version",
  "--strict-mcp-config",
  "--fork-session",
  "--include-partial-messages",
  "--replay-user-messages",
] as const;

function buildTable(): ReadonlyMap<string, FlagDefinition> {
  const table = new Map<string, FlagDefinition>();
  for (const [name, field] of RESOURCE_FLAGS) {
    table.set(name, { kind: "resource", arity: 1, field });
  }
  for (const [name, field] of LAUNCHER_VALUE_FLAGS) {
    table.set(name, { kind: "launcher", arity: 1, field });
  }
  for (const [name, field] of LAUNCHER_SWITCHES) {
    table.set(name, { kind: "launcher", arity: 0, field });
  }
  for (const name of ENTRYPOINT_VALUE_FLAGS) {
    table.set(name, { kind: "entrypoint", arity: 1 });
  }
  for (const name of ENTRYPOINT_SWITCHES) {
    table.set(name, { kind: "entrypoint", arity: 0 });
  }
  return table;
}

export const FLAG_TABLE: ReadonlyMap<string, FlagDefinition> = buildTable();

const UNKNOWN_FLAG: FlagDefinition = { kind: "entrypoint", arity: 0 };

/** Flags whose value the entrypoint treats as the prompt itself. */
export const PROMPT_FLAGS: ReadonlySet<string> = new Set(["-p", "--print"]);

/** A lone "-" is text, not a flag. */
export function isFlagToken(token: string): boolean {
  return token.length > 1 && token.startsWith("-");
}

/**
 * Split a flag token into its name and inline value.
 * Only long flags accept the `--flag=value` form.
 */
export function splitFlag(token: string): { name: string; inline?: string } {
  const eq = token.indexOf("=");
  if (token.startsWith("--") && eq > 2) {
    return { name: token.slice(0, eq), inline: token.slice(eq + 1) };
  }
  return { name: token };
}

export function lookupFlag(name: string): FlagDefinition {
  return FLAG_TABLE.get(name) ?? UNKNOWN_FLAG;
}
