// pattern: Imperative Shell
import { mkdir, realpath, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { pino } from "pino";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { DirectiveAccumulator } from "../sandbox/accumulator.js";
import {
  InvalidManualGitRootError,
  NotARepositoryError,
} from "../utils/errors.js";

import {
  contributeGitBindings,
  inheritSharedProjectFiles,
  resolveMainRepoRoot,
} from "./worktree.js";

import type { Directive } from "../sandbox/directives.js";

const logger = pino({ level: "silent" });

function binds(directives: Directive[] | NotARepositoryError): Directive[] {
  if (directives instanceof NotARepositoryError) {
    throw directives;
  }
  return directives.filter(d => d.kind === "bind");
}

describe("git worktree resolver", () => {
  let tempDir: string;
  let mainDir: string;
  let featureDir: string;
  let acc: DirectiveAccumulator;

  beforeEach(async () => {
    const base = join(
      tmpdir(),
      `cellblock-git-${Date.now()}-${Math.random().toString(36).substring(7)}`
    );
    await mkdir(base, { recursive: true });
    tempDir = await realpath(base);
    mainDir = join(tempDir, "main");
    featureDir = join(tempDir, "feature");

    // main/.git is a real repository directory with one linked worktree
    await mkdir(join(mainDir, ".git", "worktrees", "feature"), {
      recursive: true,
    });
    await writeFile(
      join(mainDir, ".git", "worktrees", "feature", "commondir"),
      "../..\n"
    );
    await mkdir(featureDir);
    await writeFile(
      join(featureDir, ".git"),
      "gitdir: ../main/.git/worktrees/feature\n"
    );

    acc = new DirectiveAccumulator(logger);
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  describe("resolveMainRepoRoot", () => {
    it("returns a primary clone as its own root", () => {
      expect(resolveMainRepoRoot(mainDir)).toEqual({
        root: mainDir,
        isWorktree: false,
      });
    });

    it("follows gitdir and commondir to the main checkout", () => {
      expect(resolveMainRepoRoot(featureDir)).toEqual({
        root: mainDir,
        isWorktree: true,
      });
    });

    it("accepts an absolute gitdir pointer", async () => {
      await writeFile(
        join(featureDir, ".git"),
        `gitdir: ${join(mainDir, ".git", "worktrees", "feature")}\n`
      );

      expect(resolveMainRepoRoot(featureDir)).toEqual({
        root: mainDir,
        isWorktree: true,
      });
    });

    it("fails when the worktree has no commondir", async () => {
      await rm(join(mainDir, ".git", "worktrees", "feature", "commondir"));

      expect(resolveMainRepoRoot(featureDir)).toBeInstanceOf(
        NotARepositoryError
      );
    });

    it("fails when the .git file has no gitdir line", async () => {
      await writeFile(join(featureDir, ".git"), "garbage\n");

      expect(resolveMainRepoRoot(featureDir)).toBeInstanceOf(
        NotARepositoryError
      );
    });

    it("fails outside a repository", async () => {
      const plain = join(tempDir, "plain");
      await mkdir(plain);

      expect(resolveMainRepoRoot(plain)).toBeInstanceOf(NotARepositoryError);
    });
  });

  describe("contributeGitBindings", () => {
    it("adds nothing for a primary clone", () => {
      const result = contributeGitBindings(acc, mainDir, {
        readonly: false,
        logger,
      });

      expect(result).toEqual([]);
      expect(acc.directives()).toEqual([]);
    });

    it("binds the main .git read-write for a worktree", () => {
      const result = contributeGitBindings(acc, featureDir, {
        readonly: false,
        logger,
      });

      expect(binds(result)).toEqual([
        {
          kind: "bind",
          src: join(mainDir, ".git"),
          dst: join(mainDir, ".git"),
          mode: "rw",
        },
      ]);
    });

    it("binds read-only when requested", () => {
      const result = contributeGitBindings(acc, featureDir, {
        readonly: true,
        logger,
      });

      expect(binds(result).map(d => (d.kind === "bind" ? d.mode : null))).toEqual([
        "ro",
      ]);
    });

    it("returns NotARepositoryError outside a repository", async () => {
      const plain = join(tempDir, "plain");
      await mkdir(plain);

      const result = contributeGitBindings(acc, plain, {
        readonly: false,
        logger,
      });

      expect(result).toBeInstanceOf(NotARepositoryError);
      expect(acc.directives()).toEqual([]);
    });

    it("uses a valid override without following pointers", async () => {
      await rm(join(mainDir, ".git", "worktrees"), { recursive: true });

      const result = contributeGitBindings(acc, featureDir, {
        readonly: false,
        override: mainDir,
        logger,
      });

      expect(binds(result)).toHaveLength(1);
    });

    it("throws for an override without a .git directory", () => {
      expect(() =>
        contributeGitBindings(acc, featureDir, {
          readonly: false,
          override: featureDir,
          logger,
        })
      ).toThrow(InvalidManualGitRootError);
    });

    it("adds nothing when the main .git lives inside the project", async () => {
      const outer = join(tempDir, "outer");
      await mkdir(join(outer, "inner", ".git", "worktrees", "w"), {
        recursive: true,
      });
      await writeFile(
        join(outer, "inner", ".git", "worktrees", "w", "commondir"),
        "../..\n"
      );
      await writeFile(join(outer, ".git"), "gitdir: inner/.git/worktrees/w\n");

      const result = contributeGitBindings(acc, outer, {
        readonly: false,
        logger,
      });

      expect(result).toEqual([]);
    });
  });

  describe("inheritSharedProjectFiles", () => {
    it("binds parent files the project lacks", async () => {
      await writeFile(join(tempDir, "CLAUDE.md"), "# notes\n");
      await mkdir(join(tempDir, ".claude"));
      await mkdir(join(featureDir, ".claude"));

      const result = inheritSharedProjectFiles(acc, featureDir, featureDir, logger);

      expect(result.filter(d => d.kind === "bind")).toEqual([
        {
          kind: "bind",
          src: join(tempDir, "CLAUDE.md"),
          dst: join(featureDir, "CLAUDE.md"),
          mode: "rw",
        },
      ]);
    });

    it("maps destinations under the sandbox project path", async () => {
      await writeFile(join(tempDir, ".claudeignore"), "dist\n");

      const result = inheritSharedProjectFiles(acc, featureDir, "/work", logger);

      expect(result).toEqual([
        { kind: "dir", path: "/work" },
        {
          kind: "bind",
          src: join(tempDir, ".claudeignore"),
          dst: "/work/.claudeignore",
          mode: "rw",
        },
      ]);
    });
  });
});
