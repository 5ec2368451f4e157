// pattern: Mixed (unavoidable)
// Host lookups decide which system files and PATH entries are bound.

import {
  bindPathDirectories,
  type HostEnvironment,
  passthroughEnv,
  sandboxHomeEnv,
  systemBase,
  systemDns,
  systemSsl,
  systemUsers,
} from "../../sandbox/system.js";

import type { DirectiveAccumulator } from "../../sandbox/accumulator.js";
import type { Profile } from "../types.js";

/**
 * System layer shared by `standard` and `dev`: namespaces, read-only
 * system directories and the host PATH.
 */
export function applyStandardSystem(
  acc: DirectiveAccumulator,
  host: HostEnvironment
): void {
  acc.unshare("user", "pid", "uts", "ipc", "cgroup");

  systemBase(acc);
  systemDns(acc);
  systemSsl(acc);
  systemUsers(acc);

  acc.proc();
  acc.dev();

  acc.tmpfs("/tmp");
  acc.tmpfs("/run");

  bindPathDirectories(acc, host.env["PATH"]);
}

/**
 * Project and sandbox binds plus the session environment shared by
 * `standard` and `dev`
 */
export function applyStandardSession(
  acc: DirectiveAccumulator,
  host: HostEnvironment,
  projectPath: string,
  sandboxPath: string
): void {
  acc.requireBind(projectPath);
  acc.requireBind(sandboxPath);

  sandboxHomeEnv(acc, sandboxPath);
  acc.setenv("PATH", host.env["PATH"] ?? "");
  acc.setenv("TERM", host.env["TERM"] ?? "xterm-256color");
  acc.setenv("LANG", host.env["LANG"] ?? "en_US.UTF-8");
  acc.setenv("SHELL", "/bin/bash");
  passthroughEnv(acc, host.env);

  acc.chdir(projectPath);
}

export function standardProfile(host: HostEnvironment): Profile {
  return {
    description:
      "Balanced isolation for everyday use; host PATH tools available read-only",

    apply(acc, projectPath, sandboxPath) {
      applyStandardSystem(acc, host);
      applyStandardSession(acc, host, projectPath, sandboxPath);
    },
  };
}
