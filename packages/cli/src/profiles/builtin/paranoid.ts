// pattern: Mixed (unavoidable)

import {
  DEFAULT_SANDBOX_PATH,
  type HostEnvironment,
  isDirectory,
  roBindDirectory,
  usrMergedDirectory,
} from "../../sandbox/system.js";

import type { Profile } from "../types.js";

const PROJECT_TARGET = "/work";
const SANDBOX_TARGET = "/sandbox";

/**
 * Maximum isolation: the fewest mounts that still run a program with
 * network access, and neither the project nor the home at its host path.
 */
export function paranoidProfile(host: HostEnvironment): Profile {
  return {
    description: `Maximum isolation; project at ${PROJECT_TARGET}, home at ${SANDBOX_TARGET}`,

    apply(acc, projectPath, sandboxPath) {
      acc.unshare("all");
      // The API still needs the network
      acc.share("net");

      acc.roBind("/usr");
      acc.roBind("/bin");
      acc.roBind("/lib");
      if (isDirectory("/lib64")) {
        acc.roBind("/lib64");
      } else {
        usrMergedDirectory(acc, "lib64");
      }

      acc.roBind("/etc/resolv.conf");
      acc.roBind("/etc/hosts");
      acc.roBind("/etc/ssl");
      roBindDirectory(acc, "/etc/ca-certificates");

      acc.proc();
      acc.dev();
      acc.tmpfs("/tmp");

      acc.requireBind(projectPath, PROJECT_TARGET);
      acc.requireBind(sandboxPath, SANDBOX_TARGET);

      acc.setenv("HOME", SANDBOX_TARGET);
      acc.setenv("XDG_CONFIG_HOME", `${SANDBOX_TARGET}/.config`);
      acc.setenv("XDG_DATA_HOME", `${SANDBOX_TARGET}/.local/share`);
      acc.setenv("XDG_CACHE_HOME", `${SANDBOX_TARGET}/.cache`);
      acc.setenv("PATH", DEFAULT_SANDBOX_PATH);
      acc.setenv("TERM", host.env["TERM"] ?? "xterm-256color");
      acc.setenv("LANG", "C.UTF-8");
      acc.setenv("SHELL", "/bin/sh");
      acc.setenv("TMPDIR", "/tmp");

      acc.chdir(PROJECT_TARGET);
    },

    targets() {
      return { project: PROJECT_TARGET, sandbox: SANDBOX_TARGET };
    },
  };
}
