// pattern: Imperative Shell

import { Command } from "@commander-js/extra-typings";

import { withErrorHandling } from "./_utils/with-error-handling.js";
import { CLI_LOGGER } from "./_deps.js";
import { runInSandbox } from "./run.js";

// eslint-disable-next-line @typescript-eslint/explicit-function-return-type
export function makeShellCommand() {
  return new Command("shell")
    .description("Start an interactive shell inside the sandbox")
    .action(
      withErrorHandling(async () => {
        CLI_LOGGER.info("Entering sandbox shell; exit to leave");
        await runInSandbox(null);
      })
    );
}
