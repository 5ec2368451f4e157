// pattern: Functional Core

import { resolve } from "path";

import type { Settings } from "../../config/types/index.js";

/**
 * Root command options that feed the settings tier for the command line.
 * Absent options stay `undefined` so lower tiers can supply them.
 */
export interface SandboxCliOptions {
  profile?: string | undefined;
  verbose?: boolean | undefined;
  network?: boolean | undefined;
  copyConfig?: boolean | undefined;
  ro?: string[] | undefined;
  rw?: string[] | undefined;
  blocked?: string[] | undefined;
  sandboxHome?: string | undefined;
  sandboxName?: string | undefined;
  gitRo?: boolean | undefined;
}

/**
 * Repeatable option parser: each occurrence appends to the list
 */
export function collectValues(value: string, previous: string[] | undefined): string[] {
  return [...(previous ?? []), value];
}

/**
 * Command-line settings tier. Path lists are resolved against `cwd`; the
 * sandbox home is kept as typed, since a relative value is a directory name.
 */
export function overridesFromCli(
  options: SandboxCliOptions,
  cwd: string
): Partial<Settings> {
  const paths = (list: string[] | undefined): string[] | undefined =>
    list?.map(path => resolve(cwd, path));

  return {
    profile: options.profile,
    verbose: options.verbose,
    network: options.network,
    copyConfig: options.copyConfig,
    extraReadOnly: paths(options.ro),
    extraReadWrite: paths(options.rw),
    blocked: paths(options.blocked),
    sandboxHome: options.sandboxHome,
    sandboxName: options.sandboxName,
    gitWorktreeReadonly: options.gitRo,
  };
}
