// pattern: Imperative Shell
import { cp, mkdir, readFile, rm, stat, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { pino } from "pino";
import {
  afterEach,
  beforeEach,
  describe,
  expect,
  it,
  type Mock,
  vi,
} from "vitest";

import { FileSystemError } from "../../utils/errors.js";

import {
  COPIED_MARKER,
  type DirectoryCopier,
  prepareSandbox,
  removeSandbox,
} from "./index.js";

const logger = pino({ level: "silent" });

async function exists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

describe("prepareSandbox", () => {
  let tempDir: string;
  let home: string;
  let sandboxPath: string;
  let copier: Mock<DirectoryCopier>;

  beforeEach(async () => {
    tempDir = join(
      tmpdir(),
      `cellblock-prep-${Date.now()}-${Math.random().toString(36).substring(7)}`
    );
    home = join(tempDir, "home");
    sandboxPath = join(tempDir, "project", ".cellblock");
    await mkdir(home, { recursive: true });

    // Same contract as rsync --ignore-existing
    copier = vi.fn<DirectoryCopier>(async (source, destination) => {
      await cp(source, destination, { recursive: true, force: false });
    });
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it("creates the sandbox home directories", async () => {
    await prepareSandbox({
      sandboxPath,
      home,
      copyConfig: false,
      seed: [],
      logger,
    });

    for (const dir of [".config", ".cache", ".local/share"]) {
      expect(await exists(join(sandboxPath, dir))).toBe(true);
    }
  });

  it("copies nothing when seeding is disabled", async () => {
    await writeFile(join(home, ".claude.json"), "{}");

    const report = await prepareSandbox({
      sandboxPath,
      home,
      copyConfig: false,
      seed: [".claude.json"],
      logger,
      copier,
    });

    expect(report.copied).toEqual([]);
    expect(await exists(join(sandboxPath, ".claude.json"))).toBe(false);
  });

  it("copies seed directories once and marks them", async () => {
    await mkdir(join(home, ".claude"));
    await writeFile(join(home, ".claude", "settings.json"), '{"a":1}');
    const options = {
      sandboxPath,
      home,
      copyConfig: true,
      seed: [".claude"],
      logger,
      copier,
    };

    const first = await prepareSandbox(options);
    const second = await prepareSandbox(options);

    expect(first.copied).toEqual([".claude"]);
    expect(second).toEqual({
      copied: [],
      alreadySeeded: [".claude"],
      failed: [],
    });
    expect(copier).toHaveBeenCalledTimes(1);
    expect(await exists(join(sandboxPath, ".claude", COPIED_MARKER))).toBe(true);
    expect(
      await readFile(join(sandboxPath, ".claude", "settings.json"), "utf8")
    ).toBe('{"a":1}');
  });

  it("never overwrites a seeded file", async () => {
    await writeFile(join(home, ".claude.json"), '{"host":true}');
    await mkdir(sandboxPath, { recursive: true });
    await writeFile(join(sandboxPath, ".claude.json"), '{"sandbox":true}');

    const report = await prepareSandbox({
      sandboxPath,
      home,
      copyConfig: true,
      seed: [".claude.json"],
      logger,
      copier,
    });

    expect(report.alreadySeeded).toEqual([".claude.json"]);
    expect(await readFile(join(sandboxPath, ".claude.json"), "utf8")).toBe(
      '{"sandbox":true}'
    );
  });

  it("skips seed entries missing on the host", async () => {
    await writeFile(join(home, ".claude.json"), "{}");

    const report = await prepareSandbox({
      sandboxPath,
      home,
      copyConfig: true,
      seed: [".claude", ".claude.json"],
      logger,
      copier,
    });

    expect(report).toEqual({
      copied: [".claude.json"],
      alreadySeeded: [],
      failed: [],
    });
    expect(copier).not.toHaveBeenCalled();
  });

  it("falls back to a plain copy when rsync is unavailable", async () => {
    await mkdir(join(home, ".claude"));
    await writeFile(join(home, ".claude", "settings.json"), '{"a":1}');
    const missingRsync = vi.fn<DirectoryCopier>(() =>
      Promise.reject(new Error("spawn rsync ENOENT"))
    );

    const report = await prepareSandbox({
      sandboxPath,
      home,
      copyConfig: true,
      seed: [".claude"],
      logger,
      copier: missingRsync,
      fallbackCopier: copier,
    });

    expect(report).toEqual({ copied: [".claude"], alreadySeeded: [], failed: [] });
    expect(missingRsync).toHaveBeenCalledTimes(1);
    expect(
      await readFile(join(sandboxPath, ".claude", "settings.json"), "utf8")
    ).toBe('{"a":1}');
    expect(await exists(join(sandboxPath, ".claude", COPIED_MARKER))).toBe(true);
  });

  it("keeps going when a directory cannot be copied at all", async () => {
    await mkdir(join(home, ".claude"));
    await writeFile(join(home, ".claude.json"), "{}");
    const failing = vi.fn<DirectoryCopier>(() =>
      Promise.reject(new Error("spawn rsync ENOENT"))
    );

    const report = await prepareSandbox({
      sandboxPath,
      home,
      copyConfig: true,
      seed: [".claude", ".claude.json"],
      logger,
      copier: failing,
      fallbackCopier: failing,
    });

    expect(report).toEqual({
      copied: [".claude.json"],
      alreadySeeded: [],
      failed: [".claude"],
    });
    expect(await exists(join(sandboxPath, ".claude", COPIED_MARKER))).toBe(false);
  });
});

describe("removeSandbox", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = join(
      tmpdir(),
      `cellblock-clean-${Date.now()}-${Math.random().toString(36).substring(7)}`
    );
    await mkdir(join(tempDir, "project", ".cellblock", ".cache"), {
      recursive: true,
    });
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it("deletes the sandbox home", async () => {
    const sandboxPath = join(tempDir, "project", ".cellblock");

    expect(await removeSandbox(sandboxPath, join(tempDir, "project"))).toBe(
      true
    );
    expect(await exists(sandboxPath)).toBe(false);
    expect(await exists(join(tempDir, "project"))).toBe(true);
  });

  it("reports a sandbox that was never created", async () => {
    expect(
      await removeSandbox(join(tempDir, "other"), join(tempDir, "project"))
    ).toBe(false);
  });

  it("refuses to delete the project", async () => {
    const projectPath = join(tempDir, "project");

    await expect(removeSandbox(projectPath, projectPath)).rejects.toThrow(
      FileSystemError
    );
    await expect(removeSandbox(tempDir, projectPath)).rejects.toThrow(
      "contains the project directory"
    );
    expect(await exists(projectPath)).toBe(true);
  });
});
