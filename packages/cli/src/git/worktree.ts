// pattern: Mixed (unavoidable)
// Git topology discovery: primary clone or linked worktree, and the main
// repository's .git directory a worktree needs inside the sandbox.

import { readFileSync, statSync } from "fs";
import { dirname, join, resolve } from "path";

import { isStrictlyInside } from "../sandbox/paths.js";
import {
  InvalidManualGitRootError,
  NotARepositoryError,
} from "../utils/errors.js";

import type { DirectiveAccumulator } from "../sandbox/accumulator.js";
import type { Directive } from "../sandbox/directives.js";
import type { Logger } from "pino";

export interface GitRepoInfo {
  /** Root of the main checkout, the directory that holds the real .git */
  root: string;
  /** Whether the queried directory is a linked worktree */
  isWorktree: boolean;
}

type GitEntry = "directory" | "file" | "missing";

function gitEntry(dir: string): GitEntry {
  try {
    const stats = statSync(join(dir, ".git"));
    if (stats.isDirectory()) return "directory";
    if (stats.isFile()) return "file";
    return "missing";
  } catch {
    return "missing";
  }
}

function readFirstLine(filePath: string): string | null {
  try {
    return readFileSync(filePath, "utf8").split("\n")[0]?.trim() ?? null;
  } catch {
    return null;
  }
}

/**
 * Find the main repository root for `projectDir`.
 *
 * A `.git` directory means a primary clone, which is its own root. A `.git`
 * file is followed through `gitdir:` to the worktree's private directory and
 * from there through `commondir` to the shared `.git`, whose parent is the
 * root. Relative pointers resolve against the directory holding them.
 */
export function resolveMainRepoRoot(
  projectDir: string
): GitRepoInfo | NotARepositoryError {
  const dir = resolve(projectDir);

  switch (gitEntry(dir)) {
    case "missing":
      return new NotARepositoryError(dir);
    case "directory":
      return { root: dir, isWorktree: false };
    case "file":
      break;
  }

  const pointer = readFirstLine(join(dir, ".git"));
  const match = pointer ? /^gitdir:\s*(.+)$/.exec(pointer) : null;
  const gitdirValue = match?.[1];
  if (!gitdirValue) {
    return new NotARepositoryError(dir, ".git file has no gitdir line");
  }
  const gitdir = resolve(dir, gitdirValue);

  const commondirValue = readFirstLine(join(gitdir, "commondir"));
  if (!commondirValue) {
    return new NotARepositoryError(
      dir,
      `no commondir file in ${gitdir}`
    );
  }
  const commonDir = resolve(gitdir, commondirValue);

  return { root: dirname(commonDir), isWorktree: true };
}

export interface GitBindingOptions {
  /** Bind the main .git read-only */
  readonly: boolean;
  /** Main repository root given by the user; skips pointer following */
  override?: string | undefined;
  logger: Logger;
}

/**
 * Bind the main repository's .git when `projectDir` is a worktree whose
 * repository data lives outside it.
 *
 * Returns the directives added (none for a primary clone or when the main
 * .git is already inside the project), or the {@link NotARepositoryError}
 * explaining why nothing was added. An override without a .git directory
 * throws {@link InvalidManualGitRootError}.
 */
export function contributeGitBindings(
  acc: DirectiveAccumulator,
  projectDir: string,
  options: GitBindingOptions
): Directive[] | NotARepositoryError {
  const dir = resolve(projectDir);
  const entry = gitEntry(dir);
  if (entry === "missing") {
    return new NotARepositoryError(dir);
  }

  let root: string;
  if (options.override) {
    root = resolve(options.override);
    if (gitEntry(root) !== "directory") {
      throw new InvalidManualGitRootError(root);
    }
  } else {
    if (entry === "directory") {
      options.logger.debug({ project: dir }, "Primary clone, .git is part of the project");
      return [];
    }
    const info = resolveMainRepoRoot(dir);
    if (info instanceof NotARepositoryError) {
      return info;
    }
    root = info.root;
  }

  const mainGitDir = join(root, ".git");
  if (isStrictlyInside(mainGitDir, dir)) {
    options.logger.debug(
      { gitDir: mainGitDir },
      "Main .git is inside the project directory"
    );
    return [];
  }

  const mark = acc.mark();
  const error = acc.bind(mainGitDir, mainGitDir, options.readonly ? "ro" : "rw");
  if (error) {
    return new NotARepositoryError(dir, `${mainGitDir} does not exist`);
  }
  options.logger.debug(
    { gitDir: mainGitDir, readonly: options.readonly },
    "Binding main repository .git for worktree"
  );
  return acc.since(mark);
}

const SHARED_PROJECT_FILES: { name: string; kind: "directory" | "file" }[] = [
  { name: ".claude", kind: "directory" },
  { name: "CLAUDE.md", kind: "file" },
  { name: ".claudeignore", kind: "file" },
];

function hasEntry(path: string, kind: "directory" | "file"): boolean {
  try {
    const stats = statSync(path);
    return kind === "directory" ? stats.isDirectory() : stats.isFile();
  } catch {
    return false;
  }
}

/**
 * Worktrees kept beside each other under one parent often leave agent
 * instructions in that parent. Bind each one the project lacks to
 * `projectTarget` (where the project appears inside the sandbox).
 */
export function inheritSharedProjectFiles(
  acc: DirectiveAccumulator,
  projectDir: string,
  projectTarget: string,
  logger: Logger
): Directive[] {
  const dir = resolve(projectDir);
  const parent = dirname(dir);
  const mark = acc.mark();

  for (const { name, kind } of SHARED_PROJECT_FILES) {
    const source = join(parent, name);
    if (hasEntry(source, kind) && !hasEntry(join(dir, name), kind)) {
      logger.debug({ source, name }, "Binding shared worktree file");
      acc.bind(source, join(projectTarget, name));
    }
  }

  return acc.since(mark);
}
