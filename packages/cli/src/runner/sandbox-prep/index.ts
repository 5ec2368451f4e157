// pattern: Imperative Shell
// Creates the sandbox home and seeds it from the host home on first use.

import { constants } from "fs";
import { copyFile, cp, mkdir, rm, stat, writeFile } from "fs/promises";
import { dirname, join } from "path";

import { isStrictlyInside } from "../../sandbox/paths.js";
import { createCommand } from "../../utils/command/index.js";
import { FileSystemError } from "../../utils/errors.js";

import type { Logger } from "pino";

/** Created inside every sandbox home */
export const SANDBOX_SUBDIRS = [".config", ".cache", ".local/share"];

/** Written inside a seeded directory once it has been copied */
export const COPIED_MARKER = ".copied";

/**
 * Copies the contents of one directory into another without overwriting
 * files already present in the destination
 */
export type DirectoryCopier = (
  source: string,
  destination: string,
  logger: Logger
) => Promise<void>;

export const rsyncCopier: DirectoryCopier = async (source, destination, logger) => {
  await createCommand("rsync", logger)
    .addArgs(["-a", "--ignore-existing", `${source}/`, `${destination}/`])
    .output();
};

/** Used when the configured copier fails, e.g. rsync is not installed */
export const fsCopier: DirectoryCopier = async (source, destination) => {
  await cp(source, destination, {
    recursive: true,
    force: false,
    errorOnExist: false,
  });
};

export interface PrepareSandboxOptions {
  sandboxPath: string;
  /** Host home the seed entries are read from */
  home: string;
  copyConfig: boolean;
  /** Entries relative to `home` */
  seed: readonly string[];
  logger: Logger;
  copier?: DirectoryCopier;
  fallbackCopier?: DirectoryCopier;
}

export interface SeedReport {
  copied: string[];
  /** Present on the host but already seeded */
  alreadySeeded: string[];
  /** Could not be copied; retried on the next run */
  failed: string[];
}

type SeedOutcome = "copied" | "seeded" | "failed";

type EntryKind = "directory" | "file" | "missing";

async function entryKind(path: string): Promise<EntryKind> {
  try {
    const stats = await stat(path);
    if (stats.isDirectory()) return "directory";
    if (stats.isFile()) return "file";
    return "missing";
  } catch {
    return "missing";
  }
}

async function seedDirectory(
  source: string,
  destination: string,
  copiers: [DirectoryCopier, DirectoryCopier],
  logger: Logger
): Promise<SeedOutcome> {
  const marker = join(destination, COPIED_MARKER);
  if ((await entryKind(marker)) === "file") {
    return "seeded";
  }
  await mkdir(destination, { recursive: true });

  const [copier, fallback] = copiers;
  try {
    await copier(source, destination, logger);
  } catch (error) {
    logger.warn(
      { source, err: error },
      "Copying config into the sandbox failed, retrying with a plain copy"
    );
    try {
      await fallback(source, destination, logger);
    } catch (fallbackError) {
      logger.warn(
        { source, err: fallbackError },
        "Could not seed sandbox directory, continuing without it"
      );
      return "failed";
    }
  }

  await writeFile(marker, "");
  return "copied";
}

async function seedFile(
  source: string,
  destination: string,
  logger: Logger
): Promise<SeedOutcome> {
  if ((await entryKind(destination)) !== "missing") {
    return "seeded";
  }
  await mkdir(dirname(destination), { recursive: true });
  try {
    await copyFile(source, destination, constants.COPYFILE_EXCL);
    return "copied";
  } catch (error) {
    // Lost a race with another copy; the file is there either way
    if (error instanceof Error && "code" in error && error.code === "EEXIST") {
      return "seeded";
    }
    logger.warn({ source, err: error }, "Could not seed sandbox file");
    return "failed";
  }
}

/**
 * Create the sandbox home and, when `copyConfig` is set, copy each seed
 * entry that exists in the host home. Directories are copied once (guarded
 * by {@link COPIED_MARKER}); files only when absent. Safe to run on every
 * start.
 */
export async function prepareSandbox(
  options: PrepareSandboxOptions
): Promise<SeedReport> {
  const { sandboxPath, logger } = options;
  const report: SeedReport = { copied: [], alreadySeeded: [], failed: [] };

  for (const dir of SANDBOX_SUBDIRS) {
    await mkdir(join(sandboxPath, dir), { recursive: true });
  }

  if (!options.copyConfig) {
    logger.debug("Config seeding disabled");
    return report;
  }

  const copiers: [DirectoryCopier, DirectoryCopier] = [
    options.copier ?? rsyncCopier,
    options.fallbackCopier ?? fsCopier,
  ];
  for (const entry of options.seed) {
    const source = join(options.home, entry);
    const destination = join(sandboxPath, entry);

    const kind = await entryKind(source);
    if (kind === "missing") {
      logger.trace({ source }, "Seed entry not present on host");
      continue;
    }

    const outcome =
      kind === "directory"
        ? await seedDirectory(source, destination, copiers, logger)
        : await seedFile(source, destination, logger);

    if (outcome === "copied") {
      logger.info({ entry }, "Copied host config into sandbox");
      report.copied.push(entry);
    } else if (outcome === "seeded") {
      report.alreadySeeded.push(entry);
    } else {
      report.failed.push(entry);
    }
  }

  return report;
}

/**
 * Delete the sandbox home. Refuses a path that is, or contains, the
 * project directory. Returns false when there was nothing to remove.
 */
export async function removeSandbox(
  sandboxPath: string,
  projectPath: string
): Promise<boolean> {
  if (sandboxPath === projectPath || isStrictlyInside(projectPath, sandboxPath)) {
    throw new FileSystemError(
      `Refusing to remove ${sandboxPath}: it contains the project directory`,
      "delete",
      sandboxPath
    );
  }
  if ((await entryKind(sandboxPath)) !== "directory") {
    return false;
  }
  await rm(sandboxPath, { recursive: true, force: true });
  return true;
}
