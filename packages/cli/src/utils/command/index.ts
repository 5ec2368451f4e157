// pattern: Mixed (unavoidable)
// Command execution requires integration of pure logic with side effects
import { execa, ExecaError, type Options } from "execa";

import { ProcessError } from "../errors.js";

import type { Logger } from "pino";

/**
 * A command builder with logging integration.
 * `output()` captures stdout; `run()` hands the terminal to the child.
 */
export class CommandBuilder {
  private command: string;
  private args: string[];
  private childLogger: Logger;
  private cwd?: string;

  constructor(command: string, logger: Logger) {
    this.command = command;
    this.args = [];

    // Extract process name (first part of command, without path or extension)
    const processName = command.split(/[/\\]/).pop()?.split(".")[0] ?? command;
    this.childLogger = logger.child({ process: processName });
  }

  addArgs(args: string[]): this {
    this.args.push(...args);
    return this;
  }

  currentDir(path: string): this {
    this.cwd = path;
    return this;
  }

  private options(): Options {
    return this.cwd !== undefined ? { cwd: this.cwd } : {};
  }

  /**
   * Execute the command and return trimmed stdout.
   * stderr is logged at DEBUG level.
   */
  async output(): Promise<string> {
    this.childLogger.debug(
      { command: this.command, argCount: this.args.length, cwd: this.cwd },
      "Executing command"
    );

    try {
      const result = await execa(this.command, this.args, {
        ...this.options(),
        stderr: "pipe",
        stdout: "pipe",
      });

      if (typeof result.stderr === "string" && result.stderr.trim()) {
        this.childLogger.debug(
          { stderr: result.stderr },
          "Command stderr output"
        );
      }

      this.childLogger.debug(
        { exitCode: result.exitCode, duration: result.durationMs },
        "Command completed successfully"
      );

      return typeof result.stdout === "string" ? result.stdout.trim() : "";
    } catch (error) {
      if (error instanceof ExecaError) {
        this.childLogger.debug(
          {
            error: error.message,
            stderr: error.stderr,
            exitCode: error.exitCode,
          },
          "Command execution failed"
        );
      }
      throw error;
    }
  }

  /**
   * Run the command attached to this terminal and resolve with its exit
   * code. A non-zero exit is returned; failing to start throws
   * {@link ProcessError}.
   */
  async run(): Promise<number> {
    this.childLogger.debug(
      { command: this.command, argCount: this.args.length, cwd: this.cwd },
      "Running interactive command"
    );

    const result = await execa(this.command, this.args, {
      ...this.options(),
      stdio: "inherit",
      reject: false,
    });

    if (result.exitCode !== undefined) {
      this.childLogger.debug(
        { exitCode: result.exitCode, duration: result.durationMs },
        "Interactive command finished"
      );
      return result.exitCode;
    }
    if (result.signal !== undefined) {
      this.childLogger.debug({ signal: result.signal }, "Interactive command killed");
      return 1;
    }
    throw new ProcessError(
      `Could not start ${this.command}`,
      this.command
    );
  }
}

/**
 * Create a new command builder with the specified command and logger
 */
export function createCommand(command: string, logger: Logger): CommandBuilder {
  return new CommandBuilder(command, logger);
}
