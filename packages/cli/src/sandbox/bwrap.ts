// pattern: Mixed (unavoidable)
// Bubblewrap command emitter for Linux.
// Serialises an accumulator into bwrap arguments and checks that bwrap works.

import { execSync } from "child_process";

import { type DirectiveAccumulator } from "./accumulator.js";
import { directiveToArgs } from "./directives.js";

import type { Logger } from "pino";

/**
 * Arguments prepared for sandbox execution
 */
export interface SandboxArgs {
  /** The sandbox executable */
  executable: string;
  /** Arguments to pass to the sandbox executable, command included */
  args: string[];
}

// Always first: the sandbox dies with us and cannot reach our terminal session
const LEADING_FLAGS = ["--die-with-parent", "--new-session"];

/**
 * Bubblewrap (bwrap) command emitter.
 */
export class BwrapSandbox {
  private bwrapPath: string | null = null;
  private validated = false;

  readonly name = "bubblewrap";

  constructor(private readonly logger: Logger) {}

  /**
   * Build the bwrap invocation: leading flags, the directives in bucket
   * order, the `--` separator, then the command and its arguments.
   */
  buildSandboxArgs(
    accumulator: DirectiveAccumulator,
    command: string,
    args: string[]
  ): SandboxArgs {
    const bwrapArgs = [...LEADING_FLAGS];
    for (const directive of accumulator.directives()) {
      bwrapArgs.push(...directiveToArgs(directive));
    }
    bwrapArgs.push("--", command, ...args);

    return {
      executable: this.bwrapPath ?? "bwrap",
      args: bwrapArgs,
    };
  }

  async validate(): Promise<boolean> {
    if (this.validated) {
      return this.bwrapPath !== null;
    }
    this.validated = true;

    let found: string;
    try {
      found = execSync("which bwrap", { encoding: "utf-8" }).trim();
    } catch {
      this.logger.debug("Bwrap not found in PATH");
      return false;
    }
    if (!found) {
      return false;
    }
    this.logger.debug({ bwrapPath: found }, "Found bwrap binary");

    // Test basic functionality with a minimal sandbox
    try {
      execSync(`${found} --ro-bind / / --unshare-user /bin/true`, {
        encoding: "utf-8",
        stdio: "pipe",
      });
    } catch (testError) {
      const errorMessage =
        testError instanceof Error ? testError.message : String(testError);
      if (this.isAppArmorPermissionError(errorMessage)) {
        this.logAppArmorGuidance(errorMessage);
      } else {
        this.logger.error(
          { err: testError },
          "Bwrap is installed but failed basic functionality test"
        );
      }
      return false;
    }

    this.logger.debug("Bwrap validation successful");
    this.bwrapPath = found;
    return true;
  }

  /**
   * Check if the error is related to AppArmor user namespace restrictions
   */
  private isAppArmorPermissionError(errorMessage: string): boolean {
    const appArmorIndicators = [
      "loopback: Failed RTM_NEWADDR: Operation not permitted",
      "setting up uid map: Permission denied",
      "No permissions to create new namespace",
      "Operation not permitted",
    ];

    return appArmorIndicators.some(indicator =>
      errorMessage.toLowerCase().includes(indicator.toLowerCase())
    );
  }

  private logAppArmorGuidance(errorMessage: string): void {
    this.logger.warn(
      { error: errorMessage },
      "Bubblewrap failed due to user namespace restrictions, likely AppArmor policy"
    );

    this.logger.info(
      "Unprivileged user namespaces appear to be restricted on this system. " +
        "Either install an AppArmor profile that allows bwrap, or run " +
        "'sudo sysctl -w kernel.apparmor_restrict_unprivileged_userns=0' to lift the restriction."
    );

    this.logger.debug(
      "See https://ubuntu.com/blog/ubuntu-23-10-restricted-unprivileged-user-namespaces for more details"
    );
  }
}
