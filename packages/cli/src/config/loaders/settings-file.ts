// pattern: Functional Core
import { parse as parseToml } from "@iarna/toml";
import { access, constants, readFile } from "fs/promises";
import { extname } from "path";
import { parse as parseYaml } from "yaml";

import { ajv } from "../../utils/ajv.js";
import { ConfigParseError, ValidationError } from "../../utils/errors.js";
import {
  type ConfigFileCandidate,
  type LoadedConfigFile,
  SettingsFileV1,
} from "../types/index.js";

import type { Logger } from "pino";

// Compile schema once for reuse
const validateSettingsFile = ajv.compile(SettingsFileV1);

/**
 * Loads and parses a config file, detecting the format by extension
 * (.json, .yaml/.yml, .toml)
 */
export async function loadSettingsFromFile(filePath: string): Promise<unknown> {
  const content = await readFile(filePath, "utf8");
  const ext = extname(filePath).toLowerCase();

  switch (ext) {
    case ".json":
      return JSON.parse(content);
    case ".yaml":
    case ".yml":
      // An empty YAML document is an empty config
      return parseYaml(content) ?? {};
    case ".toml":
      return parseToml(content);
    default:
      throw new Error(
        `Unsupported file format: ${ext}. Supported formats: .json, .yaml, .yml, .toml`
      );
  }
}

/**
 * Validates a parsed object against the SettingsFileV1 schema
 */
export function validateSettingsFileObject(
  data: unknown
): data is SettingsFileV1 {
  if (validateSettingsFile(data)) {
    return true;
  }

  const errors = (validateSettingsFile.errors ?? []).map(
    err => `${err.instancePath || "root"}: ${err.message ?? "is invalid"}`
  );
  throw new ValidationError(
    `Settings validation failed: ${errors.join(", ")}`,
    errors
  );
}

export async function loadAndValidateSettingsFile(
  filePath: string
): Promise<SettingsFileV1> {
  const data = await loadSettingsFromFile(filePath);

  if (validateSettingsFileObject(data)) {
    return data;
  }

  // Unreachable: validation throws on failure
  throw new Error("Unexpected validation state");
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath, constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

function toParseError(filePath: string, error: unknown): ConfigParseError {
  if (error instanceof ValidationError) {
    return new ConfigParseError(
      filePath,
      "invalid settings",
      error.validationErrors ?? []
    );
  }
  const reason = error instanceof Error ? error.message : String(error);
  return new ConfigParseError(filePath, reason);
}

export interface ConfigFileSearchResult {
  file: LoadedConfigFile | null;
  skipped: ConfigParseError[];
}

/**
 * Load the first candidate that exists and is well formed.
 *
 * Candidates that fail to read, parse or validate are logged and skipped;
 * the search stops at the first one that loads.
 */
export async function loadFirstSettingsFile(
  candidates: ConfigFileCandidate[],
  logger: Logger
): Promise<ConfigFileSearchResult> {
  const skipped: ConfigParseError[] = [];

  for (const candidate of candidates) {
    if (!(await fileExists(candidate.path))) {
      if (candidate.scope === "explicit") {
        logger.warn({ path: candidate.path }, "Config file override not found");
      }
      continue;
    }

    try {
      const settings = await loadAndValidateSettingsFile(candidate.path);
      logger.debug(
        { path: candidate.path, scope: candidate.scope },
        "Loaded config file"
      );
      return { file: { ...candidate, settings }, skipped };
    } catch (error) {
      const parseError = toParseError(candidate.path, error);
      logger.warn(
        { path: candidate.path, details: parseError.details },
        parseError.message
      );
      skipped.push(parseError);
    }
  }

  return { file: null, skipped };
}
