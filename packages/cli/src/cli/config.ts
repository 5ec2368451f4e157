// pattern: Imperative Shell

import { Command } from "@commander-js/extra-typings";

import { resolveSettings } from "../config/resolver.js";
import {
  CONFIG_FILE_ENV_VAR,
  configFileCandidates,
  defaultConfigHome,
  SETTING_ENV_VARS,
} from "../config/sources.js";

import { describeSettings } from "./_utils/output.js";
import { withErrorHandling } from "./_utils/with-error-handling.js";
import { CLI_LOGGER } from "./_deps.js";
import { getSandboxInvocation } from "./_globals.js";

function makeShowCommand(): Command {
  return new Command("show")
    .description("Show every resolved setting and where it came from")
    .action(
      withErrorHandling(async () => {
        const invocation = getSandboxInvocation();
        const resolved = await resolveSettings({
          overrides: invocation.overrides,
          configFile: invocation.configFile,
          projectDir: invocation.projectDir,
          logger: CLI_LOGGER,
        });

        for (const line of describeSettings(resolved)) {
          // eslint-disable-next-line no-console
          console.log(line);
        }
      })
    );
}

function makeHelpCommand(): Command {
  return new Command("help")
    .description("Describe config file locations and environment variables")
    .action(() => {
      const invocation = getSandboxInvocation();
      const candidates = configFileCandidates({
        explicitPath: invocation.configFile,
        projectDir: invocation.projectDir,
        home: process.env["HOME"] ?? "~",
        configHome: defaultConfigHome(),
        env: process.env,
      });

      const lines = [
        "Config files are searched in this order; the first one that loads wins:",
        ...candidates.map(c => `  ${c.path}  (${c.scope})`),
        "",
        `${CONFIG_FILE_ENV_VAR} names a config file to load before all others.`,
        "",
        "Environment variables (override config files, overridden by flags):",
        ...Object.entries(SETTING_ENV_VARS).map(
          ([key, name]) => `  ${name.padEnd(28)} ${key}`
        ),
        "",
        "Booleans accept true, yes or 1. Path lists are colon-separated.",
      ];
      for (const line of lines) {
        // eslint-disable-next-line no-console
        console.log(line);
      }
    });
}

// eslint-disable-next-line @typescript-eslint/explicit-function-return-type
export function makeConfigCommand() {
  return new Command("config")
    .description("Inspect cellblock configuration")
    .addCommand(makeShowCommand())
    .addCommand(makeHelpCommand());
}
