/**
 * Docker run command builder for claude-sandbox.
 *
 * Fluent builder for the one `docker run` invocation a session needs.
 *
 * Usage:
 *   const args = new DockerRunCommandBuilder("claude-code-sandbox:latest")
 *     .withName("claude-sandbox-0")
 *     .withMounts([{ host: "/home/me/.claude-sandbox", container: "/home/claude", mode: "rw" }])
 *     .withResourceLimits({ cpus: "2", memory: "4g" })
 *     .withEntrypointArgs(["-p", "fix the bug"])
 *     .build();
 */

/** Bind mount specification. */
export interface MountSpec {
  host: string;
  container: string;
  mode?: "rw" | "ro";
}

/**
 * Builder for Docker run commands.
 *
 * Produces a string[] suitable for passing to execInherit("docker", args).
 * The `--rm` flag is always present: a session never outlives its process.
 */
export class DockerRunCommandBuilder {
  private readonly args: string[] = ["run", "--rm"];
  private readonly envVars: Map<string, string> = new Map();
  private readonly mounts: string[] = [];
  private readonly entrypointArgs: string[] = [];
  private readonly imageName: string;

  constructor(imageName: string) {
    this.imageName = imageName;
  }

  /** Set container name. */
  withName(name: string): this {
    this.args.push("--name", name);
    return this;
  }

  /** Set interactive mode (-it or -i). */
  withInteractive(tty = true): this {
    this.args.push(tty ? "-it" : "-i");
    return this;
  }

  /** Add init process (signal forwarding + zombie reaping). */
  withInit(): this {
    this.args.push("--init");
    return this;
  }

  /** Add volume mounts. */
  withMounts(specs: readonly MountSpec[]): this {
    for (const spec of specs) {
      this.mounts.push(`${spec.host}:${spec.container}:${spec.mode ?? "rw"}`);
    }
    return this;
  }

  /** Set working directory. */
  withWorkdir(dir: string): this {
    this.args.push("-w", dir);
    return this;
  }

  /** Set environment variables. Later calls override earlier keys. */
  withEnvironment(vars: Readonly<Record<string, string>>): this {
    for (const [key, value] of Object.entries(vars)) {
      this.envVars.set(key, value);
    }
    return this;
  }

  /** Add CPU and memory limits. */
  withResourceLimits(opts: { cpus: string; memory: string }): this {
    this.args.push(`--cpus=${opts.cpus}`, `--memory=${opts.memory}`);
    return this;
  }

  /** Add supplementary groups (numeric ids). */
  withGroups(gids: readonly number[]): this {
    for (const gid of new Set(gids)) {
      this.args.push("--group-add", String(gid));
    }
    return this;
  }

  /** Arguments appended after the image, handed to its entrypoint. */
  withEntrypointArgs(args: readonly string[]): this {
    this.entrypointArgs.push(...args);
    return this;
  }

  /** Build the final command array (without "docker" prefix). */
  build(): string[] {
    const cmd = [...this.args];

    for (const mount of this.mounts) {
      cmd.push("-v", mount);
    }

    for (const [key, value] of this.envVars) {
      cmd.push("-e", `${key}=${value}`);
    }

    cmd.push(this.imageName, ...this.entrypointArgs);
    return cmd;
  }
}

const SHELL_SAFE = /^[A-Za-z0-9_@%+=:,./-]+$/;

/**
 * Render a command as one line a POSIX shell would split back into the same
 * argument vector.
 */
export function formatShellCommand(argv: readonly string[]): string {
  return argv
    .map((arg) => (SHELL_SAFE.test(arg) ? arg : `'${arg.replace(/'/g, `'\\''`)}'`))
    .join(" ");
}
