// pattern: Imperative Shell

import { statSync } from "node:fs";
import { resolve } from "node:path";

import { FileSystemError } from "../utils/errors.js";

import type { Settings } from "../config/types/index.js";

/**
 * Sandbox options collected from the root command before any action runs
 */
export interface SandboxInvocation {
  projectDir: string;
  /** Working directory the CLI was started in */
  cwd: string;
  overrides: Partial<Settings>;
  configFile: string | undefined;
  gitRoot: string | undefined;
  dryRun: boolean;
}

let SANDBOX_INVOCATION: SandboxInvocation | undefined;

/**
 * Set the sandbox options for this invocation.
 * The project directory must exist and be a directory.
 */
export function setSandboxInvocation(invocation: SandboxInvocation): void {
  const projectDir = resolve(invocation.projectDir);
  let isDirectory = false;
  try {
    isDirectory = statSync(projectDir).isDirectory();
  } catch {
    isDirectory = false;
  }
  if (!isDirectory) {
    throw new FileSystemError(
      `Invalid project directory: ${projectDir}`,
      "access",
      projectDir
    );
  }
  SANDBOX_INVOCATION = { ...invocation, projectDir };
}

/**
 * Sandbox options for this invocation; the current directory with no
 * overrides when none were set
 */
export function getSandboxInvocation(): SandboxInvocation {
  return (
    SANDBOX_INVOCATION ?? {
      projectDir: process.cwd(),
      cwd: process.cwd(),
      overrides: {},
      configFile: undefined,
      gitRoot: undefined,
      dryRun: false,
    }
  );
}
