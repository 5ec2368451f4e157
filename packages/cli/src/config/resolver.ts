// pattern: Imperative Shell
// Layered configuration: CLI overrides, environment, first config file, defaults.

import { homedir } from "os";
import { resolve } from "path";

import { expandPathTemplate } from "../utils/string-templating/index.js";

import { loadFirstSettingsFile } from "./loaders/settings-file.js";
import {
  configFileCandidates,
  defaultConfigHome,
  readEnvironmentSettings,
} from "./sources.js";
import {
  DEFAULT_SETTINGS,
  type LoadedConfigFile,
  SETTING_KEYS,
  type SettingKey,
  type Settings,
  type SettingSource,
} from "./types/index.js";

import type { ConfigParseError } from "../utils/errors.js";
import type { Logger } from "pino";

export interface ResolveSettingsOptions {
  /** Values given on the command line */
  overrides?: Partial<Settings>;
  /** Config file path given on the command line */
  configFile?: string | undefined;
  projectDir: string;
  env?: Record<string, string | undefined>;
  home?: string;
  /** Directory of the user-global config file */
  configHome?: string;
  logger: Logger;
}

export interface ResolvedSettings {
  settings: Readonly<Settings>;
  sources: ReadonlyMap<SettingKey, SettingSource>;
  /** The config file that was loaded, if any */
  file: LoadedConfigFile | null;
  /** Candidates that existed but could not be loaded */
  skipped: ConfigParseError[];
}

function fileTier(file: LoadedConfigFile | null): Partial<Settings> {
  if (!file) {
    return {};
  }
  const { version: _version, ...settings } = file.settings;
  return settings;
}

/**
 * Resolve every setting from the highest tier that defines it.
 *
 * Lists are taken whole from a single tier and never merged. Path values
 * (`sandboxHome` when absolute-looking, and the path lists) are expanded
 * after resolution.
 */
export async function resolveSettings(
  options: ResolveSettingsOptions
): Promise<ResolvedSettings> {
  const env = options.env ?? process.env;
  const home = options.home ?? homedir();
  const projectDir = resolve(options.projectDir);

  const candidates = configFileCandidates({
    explicitPath: options.configFile,
    projectDir,
    home,
    configHome: options.configHome ?? defaultConfigHome(),
    env,
  });
  const { file, skipped } = await loadFirstSettingsFile(
    candidates,
    options.logger
  );

  const tiers: [SettingSource, Partial<Settings>][] = [
    ["cli", options.overrides ?? {}],
    ["env", readEnvironmentSettings(env)],
    ["file", fileTier(file)],
  ];

  const sources = new Map<SettingKey, SettingSource>();
  const choose = <K extends SettingKey>(key: K): Settings[K] => {
    for (const [source, values] of tiers) {
      const value = values[key];
      if (value !== undefined) {
        sources.set(key, source);
        return value;
      }
    }
    sources.set(key, "default");
    return DEFAULT_SETTINGS[key];
  };

  const templateContext = { home, projectDir, env };
  const expand = (paths: string[]): string[] =>
    paths.map(path => expandPathTemplate(path, templateContext));

  const sandboxHome = choose("sandboxHome");
  const settings: Settings = {
    profile: choose("profile"),
    network: choose("network"),
    // A relative sandbox home is a directory name, not a path
    sandboxHome:
      sandboxHome.startsWith("/") ||
      sandboxHome.startsWith("~") ||
      sandboxHome.includes("{{")
        ? expandPathTemplate(sandboxHome, templateContext)
        : sandboxHome,
    sandboxName: choose("sandboxName"),
    copyConfig: choose("copyConfig"),
    gitWorktreeReadonly: choose("gitWorktreeReadonly"),
    verbose: choose("verbose"),
    command: choose("command"),
    seed: [...choose("seed")],
    extraReadOnly: expand(choose("extraReadOnly")),
    extraReadWrite: expand(choose("extraReadWrite")),
    blocked: expand(choose("blocked")),
  };

  options.logger.debug(
    {
      file: file?.path,
      sources: Object.fromEntries(SETTING_KEYS.map(key => [key, sources.get(key)])),
    },
    "Resolved settings"
  );

  return { settings, sources, file, skipped };
}

/**
 * Whether the sandbox location came from a config file shared by every
 * project (user-global or legacy dotfile)
 */
export function sandboxHomeFromUserConfig(resolved: ResolvedSettings): boolean {
  return (
    resolved.sources.get("sandboxHome") === "file" &&
    (resolved.file?.scope === "user" || resolved.file?.scope === "legacy")
  );
}
