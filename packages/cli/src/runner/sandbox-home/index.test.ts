// pattern: Functional Core
import { describe, expect, it } from "vitest";

import { UnsafeSandboxRootError } from "../../utils/errors.js";

import {
  isUnsafeSandboxRoot,
  resolveSandboxRoot,
  sandboxRootPath,
  validateSandboxRoot,
} from "./index.js";

describe("sandboxRootPath", () => {
  it("joins an absolute sandbox home with the sandbox name", () => {
    expect(
      sandboxRootPath(
        { sandboxHome: "/srv/sandboxes", sandboxName: ".cellblock" },
        "/home/user/project"
      )
    ).toBe("/srv/sandboxes/.cellblock");
  });

  it("treats a relative sandbox home as the leaf under the working directory", () => {
    expect(
      sandboxRootPath(
        { sandboxHome: ".box", sandboxName: "ignored" },
        "/home/user/worktrees"
      )
    ).toBe("/home/user/worktrees/.box");
  });

  it("drops trailing slashes", () => {
    expect(
      sandboxRootPath(
        { sandboxHome: "/srv/sandboxes/", sandboxName: "jail/" },
        "/home/user/project"
      )
    ).toBe("/srv/sandboxes/jail");
  });
});

describe("validateSandboxRoot", () => {
  it.each(["/", "/etc", "/home", "/root", "/usr", "/tmp", "/var", "/sys"])(
    "rejects %s",
    path => {
      expect(() => validateSandboxRoot(path)).toThrow(UnsafeSandboxRootError);
    }
  );

  it.each(["/tmp/my-sandbox", "/home/user/project/.sandbox", "/etc2"])(
    "accepts %s",
    path => {
      expect(() => validateSandboxRoot(path)).not.toThrow();
    }
  );

  it("matches deny-listed paths written with a trailing slash", () => {
    expect(isUnsafeSandboxRoot("/etc/")).toBe(true);
  });
});

describe("resolveSandboxRoot", () => {
  it("refuses a relative home that climbs to the filesystem root", () => {
    expect(() =>
      resolveSandboxRoot({
        settings: { sandboxHome: "../..", sandboxName: ".cellblock" },
        cwd: "/home/user",
        fromUserConfig: false,
      })
    ).toThrow(UnsafeSandboxRootError);
  });

  it("adds an advisory when the home comes from a user-wide file", () => {
    const root = resolveSandboxRoot({
      settings: { sandboxHome: "/srv/sandboxes", sandboxName: ".cellblock" },
      cwd: "/home/user/project",
      fromUserConfig: true,
    });

    expect(root.path).toBe("/srv/sandboxes/.cellblock");
    expect(root.advisory).toBe(
      "sandboxHome is set in a user-wide config file, so every project uses a sandbox under /srv/sandboxes"
    );
  });

  it("has no advisory when a user-wide file sets a relative home", () => {
    const root = resolveSandboxRoot({
      settings: { sandboxHome: ".box", sandboxName: ".cellblock" },
      cwd: "/home/user/project",
      fromUserConfig: true,
    });

    expect(root).toEqual({ path: "/home/user/project/.box", advisory: null });
  });

  it("has no advisory for project settings", () => {
    const root = resolveSandboxRoot({
      settings: { sandboxHome: ".cellblock", sandboxName: ".cellblock" },
      cwd: "/home/user/project",
      fromUserConfig: false,
    });

    expect(root).toEqual({
      path: "/home/user/project/.cellblock",
      advisory: null,
    });
  });
});
