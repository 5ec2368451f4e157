// pattern: Imperative Shell
import { mkdir, readFile, realpath, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { pino } from "pino";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { DirectiveAccumulator } from "../../sandbox/accumulator.js";
import { ofKind } from "../../test-utils/directives.js";

import { bindCredentials, findCredentialsFile } from "./index.js";

const logger = pino({ level: "silent" });

describe("credentials binding", () => {
  let tempDir: string;
  let home: string;
  let sandboxPath: string;

  beforeEach(async () => {
    const base = join(
      tmpdir(),
      `cellblock-creds-${Date.now()}-${Math.random().toString(36).substring(7)}`
    );
    await mkdir(base, { recursive: true });
    tempDir = await realpath(base);
    home = join(tempDir, "home");
    sandboxPath = join(tempDir, "sandbox");
    await mkdir(join(home, ".claude"), { recursive: true });
    await mkdir(sandboxPath);
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it("prefers CLAUDE_CONFIG_DIR over the home directory", async () => {
    const configDir = join(tempDir, "claude-config");
    await mkdir(configDir);
    await writeFile(join(configDir, ".credentials.json"), "{}");
    await writeFile(join(home, ".claude", ".credentials.json"), "{}");

    expect(
      findCredentialsFile({ home, env: { CLAUDE_CONFIG_DIR: configDir } })
    ).toBe(join(configDir, ".credentials.json"));
  });

  it("falls back to ~/.claude", async () => {
    await writeFile(join(home, ".claude", ".credentials.json"), "{}");

    expect(findCredentialsFile({ home, env: {} })).toBe(
      join(home, ".claude", ".credentials.json")
    );
  });

  it("returns null when no credentials exist", () => {
    expect(findCredentialsFile({ home, env: {} })).toBeNull();
  });

  it("binds the credentials under the sandbox target", async () => {
    const source = join(home, ".claude", ".credentials.json");
    await writeFile(source, '{"token":"test-secret"}');
    const acc = new DirectiveAccumulator(logger);

    const added = bindCredentials(acc, {
      host: { home, env: {} },
      sandboxPath,
      sandboxTarget: "/sandbox",
      logger,
    });

    expect(ofKind(added, "bind")).toEqual([
      {
        kind: "bind",
        src: source,
        dst: "/sandbox/.claude/.credentials.json",
        mode: "rw",
      },
    ]);
    // The placeholder stays empty; the bind supplies the content
    expect(
      await readFile(join(sandboxPath, ".claude", ".credentials.json"), "utf8")
    ).toBe("");
  });

  it("adds nothing without a credentials file", () => {
    const acc = new DirectiveAccumulator(logger);

    expect(
      bindCredentials(acc, {
        host: { home, env: {} },
        sandboxPath,
        sandboxTarget: sandboxPath,
        logger,
      })
    ).toEqual([]);
    expect(acc.directives()).toEqual([]);
  });
});
