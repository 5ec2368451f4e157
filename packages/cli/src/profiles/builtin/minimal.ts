// pattern: Mixed (unavoidable)
// Host lookups decide how /lib64 is mirrored.

import {
  DEFAULT_SANDBOX_PATH,
  type HostEnvironment,
  usrMergedDirectory,
} from "../../sandbox/system.js";

import type { Profile } from "../types.js";

/**
 * Fast startup, basic protection: system directories read-only, the whole
 * of /etc visible, everything else hidden.
 */
export function minimalProfile(host: HostEnvironment): Profile {
  return {
    description: "Basic isolation with fast startup, for trusted codebases",

    apply(acc, projectPath, sandboxPath) {
      acc.unshare("all");
      acc.share("net");

      acc.roBind("/usr");
      acc.roBind("/etc");
      acc.roBind("/run");

      acc.proc();
      acc.dev();

      usrMergedDirectory(acc, "lib64");

      acc.tmpfs("/tmp");

      acc.requireBind(projectPath);
      acc.requireBind(sandboxPath);

      acc.setenv("HOME", sandboxPath);
      acc.setenv("PATH", DEFAULT_SANDBOX_PATH);
      acc.setenv("TERM", host.env["TERM"] ?? "xterm-256color");

      acc.chdir(projectPath);
    },
  };
}
