// pattern: Functional Core
// Environment-variable tier and config-file candidate locations.

import envPaths from "env-paths";
import { join } from "path";

import type { ConfigFileCandidate, Settings } from "./types/index.js";

/**
 * Environment variable for each setting that can be set from the environment
 */
export const SETTING_ENV_VARS = {
  profile: "CELLBLOCK_PROFILE",
  network: "CELLBLOCK_NETWORK",
  sandboxHome: "CELLBLOCK_SANDBOX_HOME",
  sandboxName: "CELLBLOCK_SANDBOX_NAME",
  copyConfig: "CELLBLOCK_COPY_CONFIG",
  gitWorktreeReadonly: "CELLBLOCK_GIT_WORKTREE_RO",
  verbose: "CELLBLOCK_VERBOSE",
  command: "CELLBLOCK_COMMAND",
  extraReadOnly: "CELLBLOCK_EXTRA_RO",
  extraReadWrite: "CELLBLOCK_EXTRA_RW",
  blocked: "CELLBLOCK_BLOCKED",
} as const satisfies Partial<Record<keyof Settings, string>>;

export const CONFIG_FILE_ENV_VAR = "CELLBLOCK_CONFIG_FILE";

const CONFIG_EXTENSIONS = [".yaml", ".yml", ".toml", ".json"];

type Env = Record<string, string | undefined>;

/** `true`, `yes` and `1` are true, anything else is false */
export function parseBoolean(value: string): boolean {
  return ["true", "yes", "1"].includes(value.trim().toLowerCase());
}

/** Colon-separated path list; empty entries are dropped */
export function parsePathList(value: string): string[] {
  return value.split(":").filter(entry => entry.length > 0);
}

function read(env: Env, name: string): string | undefined {
  const value = env[name];
  return value === undefined || value === "" ? undefined : value;
}

/**
 * Settings present in the environment. Unset and empty variables come back
 * as `undefined`.
 */
export function readEnvironmentSettings(env: Env): Partial<Settings> {
  const settings: Partial<Settings> = {};

  const text = (name: string): string | undefined => read(env, name);
  const flag = (name: string): boolean | undefined => {
    const value = read(env, name);
    return value === undefined ? undefined : parseBoolean(value);
  };
  const list = (name: string): string[] | undefined => {
    const value = read(env, name);
    return value === undefined ? undefined : parsePathList(value);
  };

  settings.profile = text(SETTING_ENV_VARS.profile);
  settings.network = flag(SETTING_ENV_VARS.network);
  settings.sandboxHome = text(SETTING_ENV_VARS.sandboxHome);
  settings.sandboxName = text(SETTING_ENV_VARS.sandboxName);
  settings.copyConfig = flag(SETTING_ENV_VARS.copyConfig);
  settings.gitWorktreeReadonly = flag(SETTING_ENV_VARS.gitWorktreeReadonly);
  settings.verbose = flag(SETTING_ENV_VARS.verbose);
  settings.command = text(SETTING_ENV_VARS.command);
  settings.extraReadOnly = list(SETTING_ENV_VARS.extraReadOnly);
  settings.extraReadWrite = list(SETTING_ENV_VARS.extraReadWrite);
  settings.blocked = list(SETTING_ENV_VARS.blocked);

  return settings;
}

/**
 * Directory holding the user-global config file
 * (`$XDG_CONFIG_HOME/cellblock` on Linux)
 */
export function defaultConfigHome(): string {
  return envPaths("cellblock", { suffix: "" }).config;
}

export interface CandidateOptions {
  /** Explicit override from the CLI; falls back to CELLBLOCK_CONFIG_FILE */
  explicitPath?: string | undefined;
  projectDir: string;
  home: string;
  configHome: string;
  env: Env;
}

/**
 * Config file candidates in search order: explicit override, project-local,
 * user-global, legacy dotfile
 */
export function configFileCandidates(
  options: CandidateOptions
): ConfigFileCandidate[] {
  const candidates: ConfigFileCandidate[] = [];

  const explicit = options.explicitPath ?? read(options.env, CONFIG_FILE_ENV_VAR);
  if (explicit) {
    candidates.push({ path: explicit, scope: "explicit" });
  }

  for (const ext of CONFIG_EXTENSIONS) {
    candidates.push({
      path: join(options.projectDir, `.cellblock${ext}`),
      scope: "project",
    });
  }

  for (const ext of CONFIG_EXTENSIONS) {
    candidates.push({
      path: join(options.configHome, `config${ext}`),
      scope: "user",
    });
  }

  for (const ext of [".yaml", ".toml"]) {
    candidates.push({
      path: join(options.home, `.cellblock${ext}`),
      scope: "legacy",
    });
  }

  return candidates;
}
