// pattern: Mixed (unavoidable)

import { join } from "path";

import {
  type HostEnvironment,
  isDirectory,
  roBindDirectory,
} from "../../sandbox/system.js";

import { applyStandardSession, applyStandardSystem } from "./standard.js";

import type { Profile } from "../types.js";

// Relative to the host home; bound read-only when present
const TOOLCHAIN_DIRS = [
  // mise
  ".local/share/mise",
  ".config/mise",
  // rust
  ".cargo",
  ".rustup",
  // python
  ".cache/uv",
  ".local/share/uv",
  ".pyenv",
  // node
  ".nvm",
  ".npm",
  ".volta",
  ".bun",
  // go
  "go",
  ".local/bin",
];

const TOOLCHAIN_ENV: [name: string, dir: string][] = [
  ["MISE_DATA_DIR", ".local/share/mise"],
  ["MISE_CONFIG_DIR", ".config/mise"],
  ["CARGO_HOME", ".cargo"],
  ["RUSTUP_HOME", ".rustup"],
];

/**
 * `standard` plus the user's language toolchains, so that version managers
 * keep resolving the same binaries inside the sandbox.
 */
export function devProfile(host: HostEnvironment): Profile {
  return {
    description:
      "Standard isolation plus read-only toolchains (mise, cargo, uv, node, go)",

    apply(acc, projectPath, sandboxPath) {
      applyStandardSystem(acc, host);

      for (const dir of TOOLCHAIN_DIRS) {
        roBindDirectory(acc, join(host.home, dir));
      }

      applyStandardSession(acc, host, projectPath, sandboxPath);

      for (const [name, dir] of TOOLCHAIN_ENV) {
        const path = join(host.home, dir);
        if (isDirectory(path)) {
          acc.setenv(name, path);
        }
      }
    },
  };
}
