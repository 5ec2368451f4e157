// pattern: Mixed (unavoidable)
// Host discovery shared by the built-in profiles: which system directories,
// PATH entries and environment variables exist on this machine.

import { accessSync, constants, lstatSync, realpathSync, statSync } from "fs";
import { homedir } from "os";
import { delimiter, dirname, isAbsolute, join } from "path";

import type { DirectiveAccumulator } from "./accumulator.js";

/**
 * The parts of the host a profile may look at
 */
export interface HostEnvironment {
  home: string;
  env: Record<string, string | undefined>;
}

export function currentHost(): HostEnvironment {
  return { home: homedir(), env: process.env };
}

export const DEFAULT_SANDBOX_PATH = "/usr/local/bin:/usr/bin:/bin";

const PASSTHROUGH_ENV = [
  // Git identity
  "GIT_AUTHOR_NAME",
  "GIT_AUTHOR_EMAIL",
  "GIT_COMMITTER_NAME",
  "GIT_COMMITTER_EMAIL",
  // Proxies
  "http_proxy",
  "https_proxy",
  "HTTP_PROXY",
  "HTTPS_PROXY",
  "no_proxy",
  "NO_PROXY",
  "ANTHROPIC_API_KEY",
  "TZ",
];

export function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

export function isFile(path: string): boolean {
  try {
    return statSync(path).isFile();
  } catch {
    return false;
  }
}

export function isSymlink(path: string): boolean {
  try {
    return lstatSync(path).isSymbolicLink();
  } catch {
    return false;
  }
}

/**
 * Read-only bind when `path` is a directory on the host
 */
export function roBindDirectory(
  acc: DirectiveAccumulator,
  path: string,
  dst: string = path
): void {
  if (isDirectory(path)) {
    acc.roBind(path, dst);
  }
}

/**
 * Read-only bind when `path` is a regular file on the host
 */
export function roBindFile(acc: DirectiveAccumulator, path: string): void {
  if (isFile(path)) {
    acc.roBind(path);
  }
}

/**
 * Mirror a top-level directory that merged-/usr systems replace with a
 * symlink: recreate the symlink, or bind the real directory.
 */
export function usrMergedDirectory(acc: DirectiveAccumulator, name: string): void {
  const path = `/${name}`;
  if (isSymlink(path)) {
    acc.symlink(`usr/${name}`, path);
  } else if (isDirectory(path)) {
    acc.roBind(path);
  }
}

export function systemBase(acc: DirectiveAccumulator): void {
  acc.roBind("/usr");
  for (const name of ["bin", "lib", "lib64", "sbin"]) {
    usrMergedDirectory(acc, name);
  }
  roBindDirectory(acc, "/etc/alternatives");
}

export function systemDns(acc: DirectiveAccumulator): void {
  for (const file of [
    "/etc/resolv.conf",
    "/etc/hosts",
    "/etc/nsswitch.conf",
    "/etc/host.conf",
    "/etc/gai.conf",
  ]) {
    roBindFile(acc, file);
  }
}

export function systemSsl(acc: DirectiveAccumulator): void {
  roBindDirectory(acc, "/etc/ssl");
  roBindDirectory(acc, "/etc/ca-certificates");
  roBindDirectory(acc, "/etc/pki");
  roBindFile(acc, "/etc/ca-certificates.conf");
}

export function systemUsers(acc: DirectiveAccumulator): void {
  roBindFile(acc, "/etc/passwd");
  roBindFile(acc, "/etc/group");
  roBindFile(acc, "/etc/localtime");
}

/**
 * Read-only bind of every directory on the host PATH, in PATH order
 */
export function bindPathDirectories(
  acc: DirectiveAccumulator,
  pathValue: string | undefined
): void {
  for (const dir of (pathValue ?? "").split(delimiter)) {
    if (dir) {
      roBindDirectory(acc, dir);
    }
  }
}

export function passthroughEnv(
  acc: DirectiveAccumulator,
  env: Record<string, string | undefined>
): void {
  for (const name of PASSTHROUGH_ENV) {
    const value = env[name];
    if (value) {
      acc.setenv(name, value);
    }
  }
}

/**
 * HOME plus the XDG base directories, all rooted at `home`
 */
export function sandboxHomeEnv(acc: DirectiveAccumulator, home: string): void {
  acc.setenv("HOME", home);
  acc.setenv("XDG_CONFIG_HOME", join(home, ".config"));
  acc.setenv("XDG_DATA_HOME", join(home, ".local/share"));
  acc.setenv("XDG_CACHE_HOME", join(home, ".cache"));
}

function isExecutableFile(path: string): boolean {
  if (!isFile(path)) {
    return false;
  }
  try {
    accessSync(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Host path of `name`: an absolute path as is, a bare name looked up on
 * `pathEnv`. Relative paths and names not found give `null`.
 */
export function findExecutable(
  name: string,
  pathEnv: string | undefined
): string | null {
  if (isAbsolute(name)) {
    return isExecutableFile(name) ? name : null;
  }
  if (name.includes("/")) {
    return null;
  }
  for (const dir of (pathEnv ?? "").split(delimiter)) {
    if (!dir) continue;
    const candidate = join(dir, name);
    if (isExecutableFile(candidate)) {
      return candidate;
    }
  }
  return null;
}

/**
 * Make the command runnable when its PATH entry is a symlink into a
 * directory the profile does not expose (e.g. `~/.local/bin/claude` into a
 * versioned install): follow the links and ro-bind the real binary's
 * directory unless a mount already covers it. Returns the host path found.
 */
export function bindRealExecutable(
  acc: DirectiveAccumulator,
  name: string,
  pathEnv: string | undefined
): string | null {
  const bin = findExecutable(name, pathEnv);
  if (!bin) {
    return null;
  }

  let real: string;
  try {
    real = realpathSync(bin);
  } catch {
    real = bin;
  }

  const dir = dirname(real);
  if (!acc.isCovered(dir)) {
    roBindDirectory(acc, dir);
  }
  return bin;
}
