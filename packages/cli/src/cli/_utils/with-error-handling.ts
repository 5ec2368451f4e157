// pattern: Imperative Shell

import { CLI_LOGGER } from "../_deps.js";

import { analyzeError } from "./error-analysis.js";

/**
 * Wraps a Commander.js action so that any error is reported once, with
 * suggestions, and the process exits with status 1.
 *
 * Technical details and the stack trace are logged only at debug level.
 */
export function withErrorHandling<T extends unknown[]>(
  action: (...args: T) => Promise<void> | void
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await action(...args);
    } catch (error) {
      const analyzed = analyzeError(error);

      CLI_LOGGER.error(analyzed.userMessage);
      for (const suggestion of analyzed.suggestions) {
        CLI_LOGGER.error(`  • ${suggestion}`);
      }

      if (CLI_LOGGER.isLevelEnabled("debug")) {
        CLI_LOGGER.debug(
          { err: error, category: analyzed.category },
          analyzed.technicalMessage
        );
      }

      // Ensure logs are flushed before exit
      CLI_LOGGER.flush();
      setTimeout(() => {
        process.exit(1);
      }, 100);
    }
  };
}
