// pattern: Functional Core

import { describe, expect, it } from "vitest";

import {
  DEFAULT_SETTINGS,
  type SettingKey,
  type SettingSource,
} from "../../config/types/index.js";
import { ConfigParseError } from "../../utils/errors.js";

import { describeCompiled, describeSettings, formatInvocation } from "./output.js";

import type { ResolvedSettings } from "../../config/resolver.js";
import type { CompiledSandbox } from "../../runner/index.js";

function resolvedWith(overrides: Partial<ResolvedSettings> = {}): ResolvedSettings {
  return {
    settings: DEFAULT_SETTINGS,
    sources: new Map<SettingKey, SettingSource>([["profile", "cli"]]),
    file: null,
    skipped: [],
    ...overrides,
  };
}

describe("formatInvocation", () => {
  it("should quote arguments that need it", () => {
    expect(
      formatInvocation({
        executable: "bwrap",
        args: ["--ro-bind", "/usr", "/usr", "--", "sh", "-c", "echo hi"],
      })
    ).toBe("bwrap --ro-bind /usr /usr -- sh -c 'echo hi'");
  });
});

describe("describeSettings", () => {
  it("should align keys and show each value's source", () => {
    const lines = describeSettings(resolvedWith());

    expect(lines[0]).toBe("profile             = standard  [cli]");
    expect(lines[1]).toBe("network             = true  [default]");
    expect(lines).toContain("seed                = .claude:.claude.json  [default]");
    expect(lines).toContain("blocked             = (none)  [default]");
  });

  it("should name the loaded config file", () => {
    const lines = describeSettings(
      resolvedWith({
        file: { path: "/p/.cellblock.yaml", scope: "project", settings: {} },
      })
    );

    expect(lines.at(-1)).toBe("Config file: /p/.cellblock.yaml (project)");
  });

  it("should list skipped config files after the loaded one", () => {
    const lines = describeSettings(
      resolvedWith({
        skipped: [new ConfigParseError("/p/.cellblock.toml", "invalid TOML")],
      })
    );

    expect(lines.slice(-2)).toEqual([
      "Config file: (none)",
      "Skipped: Could not load config file /p/.cellblock.toml: invalid TOML",
    ]);
  });
});

describe("describeCompiled", () => {
  const compiled: CompiledSandbox = {
    resolved: resolvedWith(),
    profile: "paranoid",
    projectPath: "/home/u/p",
    sandboxPath: "/home/u/p/.cellblock",
    targets: { project: "/work", sandbox: "/sandbox" },
    git: { root: "/home/u/main", isWorktree: true },
    directives: [{ kind: "unshare", name: "net" }],
    invocation: { executable: "bwrap", args: [] },
  };

  it("should summarize the profile, paths and git root", () => {
    expect(describeCompiled(compiled)).toEqual([
      "Profile: paranoid",
      "Project: /home/u/p",
      "Sandbox: /home/u/p/.cellblock",
      "Project inside sandbox: /work",
      "Git worktree of: /home/u/main",
      "Directives: 1",
    ]);
  });

  it("should leave out the inside path when the project stays in place", () => {
    const lines = describeCompiled({
      ...compiled,
      targets: { project: "/home/u/p", sandbox: "/home/u/p/.cellblock" },
      git: null,
    });

    expect(lines).toEqual([
      "Profile: paranoid",
      "Project: /home/u/p",
      "Sandbox: /home/u/p/.cellblock",
      "Directives: 1",
    ]);
  });
});
