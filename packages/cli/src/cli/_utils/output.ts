// pattern: Functional Core

import { join as shellJoin } from "shlex";

import { SETTING_KEYS } from "../../config/types/index.js";

import type { ResolvedSettings } from "../../config/resolver.js";
import type { CompiledSandbox } from "../../runner/index.js";
import type { SandboxArgs } from "../../sandbox/bwrap.js";

/**
 * The invocation as a single shell-quoted command line
 */
export function formatInvocation(invocation: SandboxArgs): string {
  return shellJoin([invocation.executable, ...invocation.args]);
}

/**
 * Short description of a compiled sandbox, one fact per line
 */
export function describeCompiled(compiled: CompiledSandbox): string[] {
  const lines = [
    `Profile: ${compiled.profile}`,
    `Project: ${compiled.projectPath}`,
    `Sandbox: ${compiled.sandboxPath}`,
  ];
  if (compiled.targets.project !== compiled.projectPath) {
    lines.push(`Project inside sandbox: ${compiled.targets.project}`);
  }
  if (compiled.git?.isWorktree) {
    lines.push(`Git worktree of: ${compiled.git.root}`);
  }
  lines.push(`Directives: ${compiled.directives.length}`);
  return lines;
}

function formatValue(value: unknown): string {
  if (Array.isArray(value)) {
    return value.length === 0 ? "(none)" : value.join(":");
  }
  return String(value);
}

/**
 * `key = value  [source]` lines for every setting, followed by the config
 * file that was loaded and any that were skipped
 */
export function describeSettings(resolved: ResolvedSettings): string[] {
  const width = Math.max(...SETTING_KEYS.map(key => key.length));
  const lines: string[] = SETTING_KEYS.map(
    key =>
      `${key.padEnd(width)} = ${formatValue(resolved.settings[key])}  [${resolved.sources.get(key) ?? "default"}]`
  );

  lines.push("");
  lines.push(
    resolved.file
      ? `Config file: ${resolved.file.path} (${resolved.file.scope})`
      : "Config file: (none)"
  );
  for (const skipped of resolved.skipped) {
    lines.push(`Skipped: ${skipped.message}`);
  }
  return lines;
}
