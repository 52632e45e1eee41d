import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, it, expect } from "vitest";

import { loadConfigFile, loadSandboxConfig, mergeConfigs, parseSimpleYaml } from "../src/config-file.js";
import { ConfigError } from "../src/errors.js";

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), "ccs-config-"));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe("parseSimpleYaml", () => {
  it("parses scalars and the env block", () => {
    const parsed = parseSimpleYaml(
      [
        "# sandbox settings",
        'image: "img:2"',
        "cpus: 4",
        "memory: 8g",
        "verbose: true",
        "env:",
        "  FOO: bar",
        "  QUOTED: 'x y'",
        "name: proj",
        "",
      ].join("\n")
    );

    expect(parsed.values).toEqual({ image: "img:2", cpus: 4, memory: "8g", verbose: true, name: "proj" });
    expect(parsed.env).toEqual({ FOO: "bar", QUOTED: "x y" });
  });
});

describe("loadConfigFile", () => {
  it("returns null for a missing file", () => {
    expect(loadConfigFile(join(dir, "absent.yaml"))).toBeNull();
  });

  it("keeps numeric limits as text", () => {
    const path = join(dir, "ccs.yaml");
    writeFileSync(path, "cpus: 1.5\nmemory: 2g\nsshKey: id_work\n");

    expect(loadConfigFile(path)).toEqual({ cpus: "1.5", memory: "2g", sshKey: "id_work" });
  });

  it("rejects a boolean where text is expected", () => {
    const path = join(dir, "ccs.yaml");
    writeFileSync(path, "image: true\n");

    expect(() => loadConfigFile(path)).toThrow(ConfigError);
  });
});

describe("loadSandboxConfig", () => {
  it("layers the project file over the global file", () => {
    const globalPath = join(dir, "global.yaml");
    writeFileSync(globalPath, "image: g:1\ncpus: 2\nenv:\n  A: 1\n  B: 1\n");
    writeFileSync(join(dir, "ccs.yaml"), "cpus: 6\nenv:\n  B: 2\n");

    expect(loadSandboxConfig(dir, globalPath)).toEqual({
      image: "g:1",
      cpus: "6",
      env: { A: "1", B: "2" },
    });
  });

  it("falls back to .ccsrc", () => {
    writeFileSync(join(dir, ".ccsrc"), "name: from-rc\n");

    expect(loadSandboxConfig(dir, join(dir, "no-global.yaml"))).toEqual({ name: "from-rc" });
  });
});

describe("mergeConfigs", () => {
  it("skips absent layers", () => {
    expect(mergeConfigs(null, { memory: "1g" }, null)).toEqual({ memory: "1g" });
  });
});
