// pattern: Functional Core
import { isAbsolute, join, resolve } from "path";

import { normalizeSandboxPath } from "../../sandbox/paths.js";
import { UnsafeSandboxRootError } from "../../utils/errors.js";

import type { Settings } from "../../config/types/index.js";

/**
 * Top-level system directories that may never be a sandbox root.
 * Only these literal paths are refused; anything beneath them is fine.
 */
export const UNSAFE_SANDBOX_ROOTS: ReadonlySet<string> = new Set([
  "/",
  "/etc",
  "/home",
  "/root",
  "/usr",
  "/bin",
  "/sbin",
  "/lib",
  "/lib64",
  "/var",
  "/tmp",
  "/boot",
  "/dev",
  "/proc",
  "/sys",
]);

export interface SandboxRoot {
  /** Absolute path of the sandbox's private home */
  path: string;
  /** Non-fatal notice to show the user, if any */
  advisory: string | null;
}

/**
 * Compute the sandbox root.
 *
 * An absolute `sandboxHome` is the parent directory and `sandboxName` the
 * leaf. A relative `sandboxHome` is itself the leaf, placed under the
 * working directory `cwd`, which keeps single-field configurations working.
 * Worktrees of one repository launched from the same directory share it.
 */
export function sandboxRootPath(
  settings: Pick<Settings, "sandboxHome" | "sandboxName">,
  cwd: string
): string {
  if (isAbsolute(settings.sandboxHome)) {
    return normalizeSandboxPath(join(settings.sandboxHome, settings.sandboxName));
  }
  return normalizeSandboxPath(resolve(cwd, settings.sandboxHome));
}

export function isUnsafeSandboxRoot(path: string): boolean {
  return UNSAFE_SANDBOX_ROOTS.has(normalizeSandboxPath(path));
}

/**
 * Throws {@link UnsafeSandboxRootError} for a deny-listed path
 */
export function validateSandboxRoot(path: string): void {
  if (isUnsafeSandboxRoot(path)) {
    throw new UnsafeSandboxRootError(path);
  }
}

export interface ResolveSandboxRootOptions {
  settings: Pick<Settings, "sandboxHome" | "sandboxName">;
  /** Parent of a relative sandbox home */
  cwd: string;
  /** The sandbox home was set by a config file shared across projects */
  fromUserConfig: boolean;
}

export function resolveSandboxRoot(
  options: ResolveSandboxRootOptions
): SandboxRoot {
  const path = sandboxRootPath(options.settings, options.cwd);
  validateSandboxRoot(path);

  // Only an absolute home configures the parent; a relative one follows cwd
  const advisory =
    options.fromUserConfig && isAbsolute(options.settings.sandboxHome)
      ? `sandboxHome is set in a user-wide config file, so every project uses a sandbox under ${options.settings.sandboxHome}`
      : null;

  return { path, advisory };
}
