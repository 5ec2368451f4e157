// pattern: Functional Core

import pino, {
  type DestinationStream,
  type LevelWithSilent,
  type Logger,
  type LoggerOptions,
} from "pino";

import createRenderer from "./renderer.js";
import { type LogFormat, type LogLevel } from "./types.js";

// Map CLI log levels to pino's string levels
export function mapLogLevelToPinoLevel(logLevel: LogLevel): LevelWithSilent {
  switch (logLevel) {
    case "error":
      return "error";
    case "warn":
      return "warn";
    case "info":
      return "info";
    case "debug":
      return "debug";
    case "trace":
      return "trace";
    default:
      return "info";
  }
}

function serializeError(
  err: unknown,
  format: LogFormat,
  nonInteractive: boolean
): unknown {
  if (!(err instanceof Error)) return err;

  // The nice renderer prints message and a trimmed stack on its own
  if (format === "nice" && !nonInteractive) {
    return {
      message: err.message,
      stack: err.stack ? err.stack.split("\n").slice(1, 9) : undefined,
    };
  }

  return pino.stdSerializers.err(err);
}

// Create pino logger writing to stderr, so stdout stays free for command output
export function createLogger(
  format: LogFormat,
  nonInteractive: boolean
): Logger {
  const baseConfig: LoggerOptions = {
    name: "cellblock",
    level: "info",
    serializers: {
      err: (err: unknown) => serializeError(err, format, nonInteractive),
    },
  };

  let stream: DestinationStream;
  if (format === "nice") {
    const renderer = createRenderer({ colorize: !nonInteractive });
    renderer.pipe(process.stderr);
    stream = renderer;
  } else {
    stream = pino.destination(2);
  }

  return pino(baseConfig, stream);
}
