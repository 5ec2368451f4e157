// pattern: Imperative Shell

import { Command } from "@commander-js/extra-typings";

import { compileSandbox } from "../runner/index.js";

import { describeCompiled, formatInvocation } from "./_utils/output.js";
import { withErrorHandling } from "./_utils/with-error-handling.js";
import { CLI_LOGGER } from "./_deps.js";
import { getSandboxInvocation } from "./_globals.js";

// eslint-disable-next-line @typescript-eslint/explicit-function-return-type
export function makeDebugCommand() {
  return new Command("debug")
    .description("Print the sandbox command without running it")
    .argument("[command...]", "Command to compile; defaults to the configured command")
    .addHelpText(
      "after",
      `
Prints a short summary of the compiled sandbox followed by the shell-quoted
bwrap command line. Nothing is executed, but the sandbox home is created and
seeded as it would be for a real run.
      `
    )
    .action(
      withErrorHandling(async (command: string[]) => {
        const invocation = getSandboxInvocation();
        const compiled = await compileSandbox({
          projectDir: invocation.projectDir,
          cwd: invocation.cwd,
          overrides: invocation.overrides,
          configFile: invocation.configFile,
          gitRoot: invocation.gitRoot,
          command: command.length > 0 ? command : undefined,
          logger: CLI_LOGGER,
        });

        for (const line of describeCompiled(compiled)) {
          // eslint-disable-next-line no-console
          console.log(line);
        }
        // eslint-disable-next-line no-console
        console.log("");
        // eslint-disable-next-line no-console
        console.log(formatInvocation(compiled.invocation));
      })
    );
}
