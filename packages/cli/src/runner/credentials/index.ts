// pattern: Mixed (unavoidable)
// Live-binds the host's Claude credentials so a login inside the sandbox
// persists on the host.

import { mkdirSync, writeFileSync } from "fs";
import { join } from "path";

import { isFile } from "../../sandbox/system.js";

import type { DirectiveAccumulator } from "../../sandbox/accumulator.js";
import type { Directive } from "../../sandbox/directives.js";
import type { HostEnvironment } from "../../sandbox/system.js";
import type { Logger } from "pino";

const CREDENTIALS_FILE = ".credentials.json";

/**
 * First credentials file found in `$CLAUDE_CONFIG_DIR`,
 * `$XDG_CONFIG_HOME/claude` (default `~/.config/claude`), then `~/.claude`
 */
export function findCredentialsFile(host: HostEnvironment): string | null {
  const candidates = [
    host.env["CLAUDE_CONFIG_DIR"],
    join(host.env["XDG_CONFIG_HOME"] ?? join(host.home, ".config"), "claude"),
    join(host.home, ".claude"),
  ];

  for (const dir of candidates) {
    if (!dir) continue;
    const file = join(dir, CREDENTIALS_FILE);
    if (isFile(file)) {
      return file;
    }
  }
  return null;
}

export interface BindCredentialsOptions {
  host: HostEnvironment;
  /** Sandbox home on the host */
  sandboxPath: string;
  /** Sandbox home as seen inside the sandbox */
  sandboxTarget: string;
  logger: Logger;
}

/**
 * Bind the host credentials file over `.claude/.credentials.json` in the
 * sandbox home. The placeholder file is created first so the mount point
 * exists under the sandbox home bind.
 */
export function bindCredentials(
  acc: DirectiveAccumulator,
  options: BindCredentialsOptions
): Directive[] {
  const source = findCredentialsFile(options.host);
  if (!source) {
    options.logger.debug("No credentials file found on host");
    return [];
  }

  const placeholderDir = join(options.sandboxPath, ".claude");
  mkdirSync(placeholderDir, { recursive: true });
  writeFileSync(join(placeholderDir, CREDENTIALS_FILE), "", { flag: "a" });

  const mark = acc.mark();
  acc.requireBind(source, join(options.sandboxTarget, ".claude", CREDENTIALS_FILE));
  options.logger.debug({ source }, "Binding credentials into sandbox");
  return acc.since(mark);
}
