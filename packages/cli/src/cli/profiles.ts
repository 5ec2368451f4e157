// pattern: Imperative Shell

import { Command } from "@commander-js/extra-typings";
import chalk from "chalk";

import { resolveSettings } from "../config/resolver.js";
import { createDefaultRegistry } from "../profiles/index.js";

import { withErrorHandling } from "./_utils/with-error-handling.js";
import { CLI_LOGGER } from "./_deps.js";
import { getSandboxInvocation } from "./_globals.js";

// eslint-disable-next-line @typescript-eslint/explicit-function-return-type
export function makeProfilesCommand() {
  return new Command("profiles")
    .description("List the available sandbox profiles")
    .option("--json", "Output the profiles as JSON", false)
    .action(
      withErrorHandling(async (options: { json: boolean }) => {
        const invocation = getSandboxInvocation();
        const resolved = await resolveSettings({
          overrides: invocation.overrides,
          configFile: invocation.configFile,
          projectDir: invocation.projectDir,
          logger: CLI_LOGGER,
        });
        const current = resolved.settings.profile;
        const profiles = createDefaultRegistry().describe();

        if (options.json) {
          // eslint-disable-next-line no-console
          console.log(
            JSON.stringify(
              profiles.map(p => ({ ...p, selected: p.name === current })),
              null,
              2
            )
          );
          return;
        }

        const width = Math.max(...profiles.map(p => p.name.length));
        for (const profile of profiles) {
          const marker = profile.name === current ? chalk.green("*") : " ";
          // eslint-disable-next-line no-console
          console.log(
            `${marker} ${chalk.bold(profile.name.padEnd(width))}  ${profile.description}`
          );
        }
      })
    );
}
