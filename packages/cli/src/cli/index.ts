// pattern: Imperative Shell

import { Command, Option } from "@commander-js/extra-typings";

import {
  LOG_FORMATS,
  LOG_LEVELS,
  type LogFormat,
  type LogLevel,
} from "../logger/index.js";

import { makeSchemaCommand } from "./schema/index.js";
import { collectValues, overridesFromCli } from "./_utils/overrides.js";
import { CLI_LOGGER, initializeLogger, setCliLogLevel } from "./_deps.js";
import { setSandboxInvocation } from "./_globals.js";
import { makeCleanCommand } from "./clean.js";
import { makeConfigCommand } from "./config.js";
import { makeDebugCommand } from "./debug.js";
import { makeProfilesCommand } from "./profiles.js";
import { makeRunCommand } from "./run.js";
import { makeShellCommand } from "./shell.js";

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

// Determine defaults based on environment
function getDefaultLogLevel(): LogLevel {
  const envLevel = process.env["CELLBLOCK_LOG_LEVEL"];
  return isLogLevel(envLevel) ? envLevel : "info";
}

export function isNonInteractive(): boolean {
  return (
    !process.stdout.isTTY || process.env["CELLBLOCK_NON_INTERACTIVE"] === "1"
  );
}

function getDefaultLogFormat(): LogFormat {
  return isNonInteractive() ? "json" : "nice";
}

// Define the root command
export const rootCommand = new Command("cellblock")
  .version("0.1.0")
  .description("run commands inside a bubblewrap sandbox built from a profile")
  .addOption(
    new Option("-l, --log-level <level>", "Set log level")
      .choices(LOG_LEVELS)
      .default(getDefaultLogLevel())
  )
  .addOption(
    new Option("--non-interactive", "Disable interactive features").default(
      isNonInteractive()
    )
  )
  .addOption(
    new Option("-f, --format <format>", "Log output format")
      .choices(LOG_FORMATS)
      .default(getDefaultLogFormat())
  )
  .addOption(new Option("-d, --dir <path>", "Project directory (defaults to the current directory)"))
  .addOption(new Option("-p, --profile <name>", "Sandbox profile to apply"))
  .addOption(new Option("-v, --verbose", "Describe the sandbox before running it"))
  .addOption(new Option("--network", "Allow network access"))
  .addOption(new Option("--no-network", "Unshare the network namespace"))
  .addOption(new Option("--copy-config", "Seed the sandbox home from $HOME"))
  .addOption(new Option("--no-copy-config", "Do not seed the sandbox home"))
  .addOption(
    new Option("--ro <path>", "Bind a path read-only (repeatable)").argParser(
      collectValues
    )
  )
  .addOption(
    new Option("--rw <path>", "Bind a path read-write (repeatable)").argParser(
      collectValues
    )
  )
  .addOption(
    new Option("--blocked <path>", "Hide a path inside the sandbox (repeatable)").argParser(
      collectValues
    )
  )
  .addOption(new Option("--sandbox-home <path>", "Directory holding sandbox homes"))
  .addOption(new Option("--sandbox-name <name>", "Name of the sandbox home directory"))
  .addOption(
    new Option("--git-root <path>", "Main repository root for a git worktree")
  )
  .addOption(new Option("--git-ro", "Bind the main repository's .git read-only"))
  .addOption(new Option("-c, --config <path>", "Config file to load before all others"))
  .addOption(
    new Option("-n, --dry-run", "Print the bwrap command instead of running it").default(
      false
    )
  )
  .hook("preAction", thisCommand => {
    // Configure CLI_LOGGER and the sandbox options before any action runs
    const options = thisCommand.opts();

    initializeLogger(options.format, options.nonInteractive);
    setCliLogLevel(options.logLevel);
    CLI_LOGGER.debug(
      `Log level configured to: ${options.logLevel}, format: ${options.format}, non-interactive: ${options.nonInteractive}`
    );

    const cwd = process.cwd();
    const projectDir = options.dir ?? cwd;
    if (options.dir) {
      CLI_LOGGER.debug(`Project directory override: ${options.dir}`);
    }

    setSandboxInvocation({
      projectDir,
      cwd,
      overrides: overridesFromCli(
        {
          profile: options.profile,
          verbose: options.verbose,
          network: options.network,
          copyConfig: options.copyConfig,
          ro: options.ro,
          rw: options.rw,
          blocked: options.blocked,
          sandboxHome: options.sandboxHome,
          sandboxName: options.sandboxName,
          gitRo: options.gitRo,
        },
        cwd
      ),
      configFile: options.config,
      gitRoot: options.gitRoot,
      dryRun: options.dryRun,
    });
  })
  .addCommand(makeRunCommand(), { isDefault: true })
  .addCommand(makeShellCommand())
  .addCommand(makeDebugCommand())
  .addCommand(makeCleanCommand())
  .addCommand(makeProfilesCommand())
  .addCommand(makeConfigCommand())
  .addCommand(makeSchemaCommand());
