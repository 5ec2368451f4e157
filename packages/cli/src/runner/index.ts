// pattern: Imperative Shell

import { BwrapSandbox } from "../sandbox/bwrap.js";
import { createCommand } from "../utils/command/index.js";
import { ProcessError } from "../utils/errors.js";

import type { CompiledSandbox } from "./compile/index.js";
import type { Logger } from "pino";

export {
  type CompiledSandbox,
  compileSandbox,
  type CompileOptions,
  sandboxShell,
  toSandboxPath,
} from "./compile/index.js";

/**
 * Run a compiled sandbox attached to the terminal and resolve with the
 * sandboxed command's exit code.
 *
 * @throws {ProcessError} when bubblewrap is missing or cannot create
 * namespaces on this host
 */
export async function executeSandbox(
  compiled: CompiledSandbox,
  logger: Logger
): Promise<number> {
  const sandbox = new BwrapSandbox(logger);
  if (!(await sandbox.validate())) {
    throw new ProcessError(
      "bubblewrap (bwrap) is not installed or cannot create namespaces on this system",
      "bwrap"
    );
  }

  const { executable, args } = compiled.invocation;
  logger.info(
    { profile: compiled.profile, sandbox: compiled.sandboxPath },
    "Starting sandbox"
  );

  return createCommand(executable, logger)
    .addArgs(args)
    .currentDir(compiled.projectPath)
    .run();
}
