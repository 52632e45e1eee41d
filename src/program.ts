/**
 * Command-line program for claude-sandbox.
 *
 * Commander.js provides the program shell (help text, version). The launcher's
 * own grammar lives in invocation/: every token is handed to the session
 * launcher untouched so unknown flags reach the assistant verbatim.
 *
 * Only two forms are claimed here: `--sandbox-version` as the first token, and
 * `--help` / `-h` as the sole token. Anywhere else they belong to the assistant.
 */

import { Command, CommanderError } from "commander";

import { CLI_NAME, DEFAULT_CPU_LIMIT, DEFAULT_IMAGE, DEFAULT_MEMORY_LIMIT, VERSION } from "./constants.js";
import { loadSandboxConfig } from "./config-file.js";
import { run } from "./commands/run.js";
import { LAUNCHER_EXIT_CODE_SUMMARY, reportError } from "./error-handler.js";
import { nodeRunner } from "./exec.js";
import { style } from "./logger.js";

/** Starts one session from the raw tokens and resolves with its exit code. */
export type SessionLaunch = (tokens: string[]) => Promise<number>;

const HELP_TOKENS: ReadonlySet<string> = new Set(["--help", "-h"]);

const LAUNCHER_HELP = `
${style.bold("Launcher options")} (everything else is passed to the assistant):
  --ssh-key <name|path>   SSH key to load into the agent (default: $CCS_SSH_KEY or id_ed25519)
  --cpus <n>              CPU limit (default: ${DEFAULT_CPU_LIMIT})
  --memory <size>         Memory limit (default: ${DEFAULT_MEMORY_LIMIT})
  --image <ref>           Session image (default: $CCS_IMAGE or ${DEFAULT_IMAGE})
  --name <base>           Session base name (sessions are <base>-0, <base>-1, ...)
  --env <KEY=VALUE>       Extra session environment variable (repeatable)
  --dry-run               Print the runtime command instead of running it
  --sandbox-verbose       Debug output from the launcher
  --sandbox-version       Show launcher version (first argument only)
  -h, --help              Show this help (only as the sole argument)

${style.bold("Examples")}:
  ${CLI_NAME}                             interactive session
  ${CLI_NAME} fix the failing test        one-shot prompt
  ${CLI_NAME} --cpus 4 --model opus       limits plus an assistant flag
  ${CLI_NAME} -- --help                   send "--help" to the assistant as text

${style.bold("Exit codes")}:
${LAUNCHER_EXIT_CODE_SUMMARY.map(([code, text]) => `  ${String(code).padEnd(4)}${text}`).join("\n")}
  other   the session's own exit code
`;

/** Launch with the real process runner, host environment and config files. */
export const launchSession: SessionLaunch = (tokens) => {
  const cwd = process.cwd();
  return run(tokens, {
    runner: nodeRunner,
    cwd,
    env: process.env,
    config: loadSandboxConfig(cwd),
    tty: Boolean(process.stdin.isTTY && process.stdout.isTTY),
  });
};

function createProgram(): Command {
  return new Command()
    .name(CLI_NAME)
    .description("Run the AI coding assistant in an isolated container session with forwarded host credentials")
    .version(VERSION, "--sandbox-version", "Show launcher version")
    .usage("[options] [prompt...]")
    .helpOption(false)
    .addHelpText("after", LAUNCHER_HELP)
    .allowUnknownOption()
    .allowExcessArguments()
    .passThroughOptions()
    .exitOverride()
    .argument("[tokens...]");
}

/**
 * Run the program for the given user arguments (argv without node and script).
 *
 * @returns The process exit code. Never rejects: failures are reported here.
 */
export async function main(argv: readonly string[], launch: SessionLaunch = launchSession): Promise<number> {
  const program = createProgram();
  const [first] = argv;
  if (argv.length === 1 && first !== undefined && HELP_TOKENS.has(first)) {
    program.outputHelp();
    return 0;
  }

  let exitCode = 0;
  program.action(async (_tokens: string[], _options: Record<string, unknown>, command: Command) => {
    // Commander consumes a leading "--"; the invocation grammar needs to see it
    const tokens = first === "--" ? ["--", ...command.args] : command.args;
    exitCode = await launch(tokens);
  });

  try {
    await program.parseAsync([...argv], { from: "user" });
    return exitCode;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    return reportError(error);
  }
}
