// pattern: Functional Core
import { Chalk } from "chalk";
import { describe, expect, it } from "vitest";

import createRenderer, { formatLogObject } from "./renderer.js";

const plain = new Chalk({ level: 0 });

describe("formatLogObject", () => {
  it("drops pino bookkeeping fields", () => {
    const line = formatLogObject(
      {
        level: 30,
        time: 1700000000000,
        pid: 42,
        hostname: "box",
        name: "cellblock",
        msg: "Compiled sandbox",
      },
      plain
    );

    expect(line).toBe("> Compiled sandbox\n");
  });

  it("appends remaining fields as JSON", () => {
    const line = formatLogObject(
      { level: 40, msg: "Skipping missing path", path: "/opt/none" },
      plain
    );

    expect(line).toBe('W Skipping missing path {"path":"/opt/none"}\n');
  });

  it("prints error message and stack lines", () => {
    const line = formatLogObject(
      {
        level: 50,
        msg: "failed",
        err: { message: "boom", stack: ["at one", "at two"] },
      },
      plain
    );

    expect(line).toBe("E failed\n    boom\n        at one\n        at two\n");
  });
});

describe("createRenderer", () => {
  it("passes through lines that are not JSON", async () => {
    const renderer = createRenderer({ colorize: false });
    const chunks: string[] = [];
    renderer.on("data", (chunk: Buffer) => chunks.push(chunk.toString()));

    const done = new Promise<void>(resolve => renderer.on("end", resolve));
    renderer.end('plain text\n{"level":20,"msg":"details"}\n');
    await done;

    expect(chunks.join("")).toBe("plain text\n= details\n");
  });
});
