// pattern: Functional Core
import { type Static, Type } from "@sinclair/typebox";

import { PathStringTemplate } from "./utils.js";

const PathList = Type.Array(PathStringTemplate);

export const SettingsFileV1 = Type.Object(
  {
    version: Type.Optional(
      Type.Literal(1, { description: "Config file format version" })
    ),
    profile: Type.Optional(
      Type.String({ minLength: 1, description: "Profile to apply" })
    ),
    network: Type.Optional(
      Type.Boolean({ description: "Allow network access inside the sandbox" })
    ),
    sandboxHome: Type.Optional(PathStringTemplate),
    sandboxName: Type.Optional(
      Type.String({
        minLength: 1,
        description: "Directory name of the sandbox under sandboxHome",
      })
    ),
    copyConfig: Type.Optional(
      Type.Boolean({
        description: "Copy the seed entries from $HOME on first run",
      })
    ),
    gitWorktreeReadonly: Type.Optional(
      Type.Boolean({
        description: "Bind the main repository's .git read-only in worktrees",
      })
    ),
    verbose: Type.Optional(Type.Boolean()),
    command: Type.Optional(
      Type.String({
        minLength: 1,
        description: "Command run inside the sandbox when none is given",
      })
    ),
    seed: Type.Optional(
      Type.Array(Type.String({ minLength: 1 }), {
        description: "Entries relative to $HOME copied into the sandbox home",
      })
    ),
    extraReadOnly: Type.Optional(PathList),
    extraReadWrite: Type.Optional(PathList),
    blocked: Type.Optional(PathList),
  },
  {
    additionalProperties: false,
    description: "cellblock configuration file",
    errorMessage: {
      additionalProperties: "contains an unknown setting",
    },
  }
);
export type SettingsFileV1 = Static<typeof SettingsFileV1>;

/**
 * Fully resolved configuration, one value per key
 */
export interface Settings {
  profile: string;
  network: boolean;
  sandboxHome: string;
  sandboxName: string;
  copyConfig: boolean;
  gitWorktreeReadonly: boolean;
  verbose: boolean;
  command: string;
  seed: string[];
  extraReadOnly: string[];
  extraReadWrite: string[];
  blocked: string[];
}
export type SettingKey = keyof Settings;

export const SETTING_KEYS = [
  "profile",
  "network",
  "sandboxHome",
  "sandboxName",
  "copyConfig",
  "gitWorktreeReadonly",
  "verbose",
  "command",
  "seed",
  "extraReadOnly",
  "extraReadWrite",
  "blocked",
] as const satisfies readonly SettingKey[];

export const DEFAULT_SETTINGS: Readonly<Settings> = {
  profile: "standard",
  network: true,
  sandboxHome: ".cellblock",
  sandboxName: ".cellblock",
  copyConfig: true,
  gitWorktreeReadonly: false,
  verbose: false,
  command: "claude",
  seed: [".claude", ".claude.json"],
  extraReadOnly: [],
  extraReadWrite: [],
  blocked: [],
};

/** Where a resolved setting came from, highest precedence first */
export type SettingSource = "cli" | "env" | "file" | "default";

/** Which candidate location a config file was found in */
export type ConfigFileScope = "explicit" | "project" | "user" | "legacy";

export interface ConfigFileCandidate {
  path: string;
  scope: ConfigFileScope;
}

export interface LoadedConfigFile extends ConfigFileCandidate {
  settings: SettingsFileV1;
}
