// pattern: Imperative Shell

import { type Logger } from "pino";

import { createLogger, mapLogLevelToPinoLevel } from "./config.js";
import { type LogFormat, type LogLevel } from "./types.js";

// Global logger instance
let LOGGER: Logger | undefined;

// Initialize logger with format and interactive preferences
export function initializeLogger(
  format: LogFormat,
  nonInteractive: boolean
): void {
  LOGGER = createLogger(format, nonInteractive);
}

// Set the log level on the global logger
export function setCliLogLevel(logLevel: LogLevel): void {
  if (!LOGGER) {
    throw new Error("Logger not initialized. Call initializeLogger() first.");
  }
  LOGGER.level = mapLogLevelToPinoLevel(logLevel);
}

function currentLogger(): Logger {
  if (!LOGGER) {
    throw new Error("Logger not initialized. Call initializeLogger() first.");
  }
  return LOGGER;
}

// Proxy that always refers to the current logger instance
export const CLI_LOGGER = new Proxy({} as Logger, {
  get(_target, prop) {
    const logger = currentLogger();
    const value: unknown = Reflect.get(logger, prop, logger);
    if (typeof value === "function") {
      return value.bind(logger);
    }
    return value;
  },
});
