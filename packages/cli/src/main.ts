#!/usr/bin/env node
// pattern: Imperative Shell

import { isNonInteractive, rootCommand } from "./cli/index.js";
import { CLI_LOGGER, initializeLogger } from "./logger/index.js";

// Configuration loading errors before the preAction hook still get
// formatted; the hook re-initializes from the CLI flags
const nonInteractive = isNonInteractive();
initializeLogger(nonInteractive ? "json" : "nice", nonInteractive);

rootCommand.parseAsync(process.argv).catch((error: unknown) => {
  CLI_LOGGER.error({ err: error }, "Unexpected failure");
  process.exitCode = 1;
});
