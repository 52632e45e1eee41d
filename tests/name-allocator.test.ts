import { describe, it, expect } from "vitest";

import { RuntimeUnavailableError } from "../src/errors.js";
import {
  SessionNameAllocator,
  pickFreeIdentity,
  sanitizeBaseName,
} from "../src/session/name-allocator.js";
import { FakeRunner, subcommand } from "./mocks/fake-runner.js";

describe("pickFreeIdentity", () => {
  it("fills the first gap", () => {
    expect(pickFreeIdentity("sandbox", ["sandbox-0", "sandbox-2"])).toEqual({
      baseName: "sandbox",
      index: 1,
      name: "sandbox-1",
    });
  });

  it("only counts exact <base>-<n> names", () => {
    const existing = ["sandbox-1-old", "other-sandbox-0", "sandbox-01", "sandbox-x", "sandbox"];
    expect(pickFreeIdentity("sandbox", existing).name).toBe("sandbox-0");
  });

  it("escapes regex characters in the base name", () => {
    expect(pickFreeIdentity("a.b", ["axb-0", "a.b-0"]).name).toBe("a.b-1");
  });

  it("hands out the smallest N suffixes to N sequential allocations", () => {
    for (let n = 1; n <= 8; n++) {
      const taken: string[] = [];
      for (let i = 0; i < n; i++) {
        taken.push(pickFreeIdentity("sandbox", taken).name);
      }
      expect(new Set(taken).size).toBe(n);
      expect(taken).toEqual(Array.from({ length: n }, (_, i) => `sandbox-${i}`));
    }
  });

  it("returns the smallest unused suffix for every set of existing names", () => {
    const universe = [0, 1, 2, 3, 4, 5];
    for (let mask = 0; mask < 1 << universe.length; mask++) {
      const used = universe.filter((i) => mask & (1 << i));
      const expected = universe.find((i) => !used.includes(i)) ?? universe.length;

      const identity = pickFreeIdentity("s", used.map((i) => `s-${i}`));
      expect(identity.index).toBe(expected);
    }
  });
});

describe("sanitizeBaseName", () => {
  it("lowercases and replaces characters the runtime rejects", () => {
    expect(sanitizeBaseName("My Project!")).toBe("my-project");
  });

  it("falls back to the default base name", () => {
    expect(sanitizeBaseName("!!!")).toBe("claude-sandbox");
  });

  it("caps the length", () => {
    expect(sanitizeBaseName("a".repeat(80))).toBe("a".repeat(50));
  });
});

describe("SessionNameAllocator", () => {
  it("allocates against the names the runtime lists", async () => {
    const runner = new FakeRunner().on("docker", { stdout: "sandbox-0\nsandbox-1\n" }, subcommand("ps"));

    const identity = await new SessionNameAllocator(runner).allocate("sandbox");

    expect(identity.name).toBe("sandbox-2");
    expect(runner.callsTo("docker")[0]?.args).toEqual([
      "ps", "-a", "--format", "{{.Names}}", "--filter", "name=sandbox-",
    ]);
  });

  it("fails when the runtime cannot list sessions", async () => {
    const runner = new FakeRunner().on(
      "docker",
      { exitCode: 1, stderr: "Cannot connect to the Docker daemon" },
      subcommand("ps")
    );

    await expect(new SessionNameAllocator(runner).allocate("sandbox")).rejects.toBeInstanceOf(
      RuntimeUnavailableError
    );
  });
});
