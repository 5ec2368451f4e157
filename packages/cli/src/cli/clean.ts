// pattern: Imperative Shell

import { Command } from "@commander-js/extra-typings";
import { realpath } from "fs/promises";

import { resolveSettings, sandboxHomeFromUserConfig } from "../config/resolver.js";
import { resolveSandboxRoot } from "../runner/sandbox-home/index.js";
import { removeSandbox } from "../runner/sandbox-prep/index.js";

import { withErrorHandling } from "./_utils/with-error-handling.js";
import { CLI_LOGGER } from "./_deps.js";
import { getSandboxInvocation } from "./_globals.js";

// eslint-disable-next-line @typescript-eslint/explicit-function-return-type
export function makeCleanCommand() {
  return new Command("clean")
    .description("Delete the project's sandbox home")
    .addHelpText(
      "after",
      `
The sandbox home is recreated, and reseeded when copyConfig is on, on the
next run. The project directory itself is never removed.
      `
    )
    .action(
      withErrorHandling(async () => {
        const invocation = getSandboxInvocation();
        const projectDir = await realpath(invocation.projectDir);
        const resolved = await resolveSettings({
          overrides: invocation.overrides,
          configFile: invocation.configFile,
          projectDir,
          logger: CLI_LOGGER,
        });
        const root = resolveSandboxRoot({
          settings: resolved.settings,
          cwd: invocation.cwd,
          fromUserConfig: sandboxHomeFromUserConfig(resolved),
        });

        if (await removeSandbox(root.path, projectDir)) {
          CLI_LOGGER.info(`Removed sandbox ${root.path}`);
        } else {
          CLI_LOGGER.info(`No sandbox at ${root.path}`);
        }
      })
    );
}
