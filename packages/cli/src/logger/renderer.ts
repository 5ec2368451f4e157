// pattern: Functional Core

import { Chalk, type ChalkInstance } from "chalk";
import { Transform } from "stream";

interface PinoLogObject {
  level: number;
  msg?: string;
  err?: unknown;
  [key: string]: unknown;
}

export interface RendererOptions {
  colorize?: boolean;
}

// pino's own bookkeeping fields, never shown in nice output
const HIDDEN_FIELDS = new Set(["level", "time", "pid", "hostname", "name", "msg", "err"]);

function isPinoLogObject(value: unknown): value is PinoLogObject {
  return (
    typeof value === "object" &&
    value !== null &&
    "level" in value &&
    typeof value.level === "number"
  );
}

function formatErrorObject(err: unknown, chalk: ChalkInstance): string {
  if (!err || typeof err !== "object") {
    return "";
  }

  const lines: string[] = [];
  const message = "message" in err ? err.message : undefined;
  const stack = "stack" in err ? err.stack : undefined;

  if (typeof message === "string" && message) {
    lines.push(chalk.yellow(`    ${message}`));
  }

  // Serializer already trimmed the stack to an array in nice mode
  const stackLines = Array.isArray(stack)
    ? stack
    : typeof stack === "string"
      ? stack.split("\n").slice(1, 9)
      : [];

  for (const line of stackLines) {
    const trimmedLine = String(line).trim();
    if (trimmedLine) {
      lines.push(chalk.dim(chalk.yellow(`        ${trimmedLine}`)));
    }
  }

  return lines.length > 0 ? `\n${lines.join("\n")}` : "";
}

export function formatLogObject(
  logObj: PinoLogObject,
  chalk: ChalkInstance
): string {
  let levelDisplay: string;
  let msgColor = chalk.reset;

  switch (logObj.level) {
    case 10: // trace
      levelDisplay = chalk.green("+");
      break;
    case 20: // debug
      levelDisplay = chalk.cyan("=");
      break;
    case 30: // info
      levelDisplay = chalk.gray(">");
      break;
    case 40: // warn
      levelDisplay = chalk.yellowBright("W");
      msgColor = chalk.yellow;
      break;
    case 50: // error
      levelDisplay = chalk.inverse.red("E");
      msgColor = chalk.red;
      break;
    case 60: // fatal
      levelDisplay = chalk.inverse.redBright("E");
      msgColor = chalk.red;
      break;
    default:
      levelDisplay = chalk.gray("  LOG  ");
  }

  const extra = Object.fromEntries(
    Object.entries(logObj).filter(([key]) => !HIDDEN_FIELDS.has(key))
  );
  const extraStr =
    Object.keys(extra).length > 0 ? ` ${chalk.dim(JSON.stringify(extra))}` : "";
  const errorStr = logObj.err ? formatErrorObject(logObj.err, chalk) : "";

  return `${levelDisplay} ${msgColor(logObj.msg ?? "")}${extraStr}${errorStr}\n`;
}

// Turns pino's newline-delimited JSON into the nice CLI format
export default function createRenderer(
  options: RendererOptions = {}
): Transform {
  const chalk = new Chalk({ level: options.colorize === false ? 0 : 1 });

  return new Transform({
    objectMode: false,
    transform(chunk: Buffer | string, _encoding, callback) {
      const formattedLines: string[] = [];

      for (const line of chunk.toString().split("\n")) {
        if (!line.trim()) continue;
        try {
          const parsed: unknown = JSON.parse(line);
          formattedLines.push(
            isPinoLogObject(parsed) ? formatLogObject(parsed, chalk) : `${line}\n`
          );
        } catch {
          // Not JSON: pass the line through untouched
          formattedLines.push(`${line}\n`);
        }
      }

      callback(null, formattedLines.join(""));
    },
  });
}
