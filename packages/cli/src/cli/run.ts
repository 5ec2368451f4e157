// pattern: Imperative Shell

import { Command } from "@commander-js/extra-typings";

import { compileSandbox, executeSandbox } from "../runner/index.js";

import { describeCompiled, formatInvocation } from "./_utils/output.js";
import { withErrorHandling } from "./_utils/with-error-handling.js";
import { CLI_LOGGER } from "./_deps.js";
import { getSandboxInvocation } from "./_globals.js";

/**
 * Compile the sandbox and run `command` in it, or print the invocation under
 * --dry-run. `undefined` runs the configured command and `null` the
 * sandbox's shell. The exit code of the sandboxed command becomes ours.
 */
export async function runInSandbox(
  command: string[] | null | undefined
): Promise<void> {
  const invocation = getSandboxInvocation();
  const compiled = await compileSandbox({
    projectDir: invocation.projectDir,
    cwd: invocation.cwd,
    overrides: invocation.overrides,
    configFile: invocation.configFile,
    gitRoot: invocation.gitRoot,
    command,
    logger: CLI_LOGGER,
  });

  if (compiled.resolved.settings.verbose) {
    for (const line of describeCompiled(compiled)) {
      CLI_LOGGER.info(line);
    }
  }

  if (invocation.dryRun) {
    // eslint-disable-next-line no-console
    console.log(formatInvocation(compiled.invocation));
    return;
  }

  process.exitCode = await executeSandbox(compiled, CLI_LOGGER);
}

// eslint-disable-next-line @typescript-eslint/explicit-function-return-type
export function makeRunCommand() {
  return new Command("run")
    .description("Run a command inside the sandbox (the default command)")
    .argument("[command...]", "Command and arguments to run; defaults to the configured command")
    .addHelpText(
      "after",
      `
Examples:
  cellblock                         Run the configured command in the sandbox
  cellblock run -- npm test         Run npm test in the sandbox
  cellblock --no-network run make   Run make with the network unshared
  cellblock --dry-run run           Print the bwrap command instead of running it

Pass -- before a command whose arguments start with a dash.
      `
    )
    .action(
      withErrorHandling(async (command: string[]) => {
        await runInSandbox(command.length > 0 ? command : undefined);
      })
    );
}
