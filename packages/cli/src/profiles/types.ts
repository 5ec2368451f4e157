// pattern: Functional Core

import type { DirectiveAccumulator } from "../sandbox/accumulator.js";

/**
 * Where the project and the sandbox home appear inside the sandbox
 */
export interface ProfileTargets {
  project: string;
  sandbox: string;
}

/**
 * A named isolation policy.
 *
 * `apply` only calls accumulator primitives and keeps no state between
 * calls: applying a profile twice to a reset accumulator yields the same
 * directives.
 */
export interface Profile {
  readonly description: string;

  apply(acc: DirectiveAccumulator, projectPath: string, sandboxPath: string): void;

  /**
   * Mount points of the project and the sandbox home.
   * Profiles that bind both in place may omit this.
   */
  targets?(projectPath: string, sandboxPath: string): ProfileTargets;
}
