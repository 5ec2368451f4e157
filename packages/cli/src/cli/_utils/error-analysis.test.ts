// pattern: Functional Core

import { describe, expect, it } from "vitest";

import {
  ConfigParseError,
  InvalidManualGitRootError,
  NotARepositoryError,
  PathNotFoundError,
  ProcessError,
  UnknownProfileError,
  UnsafeSandboxRootError,
  ValidationError,
} from "../../utils/errors.js";

import { analyzeError } from "./error-analysis.js";

describe("analyzeError", () => {
  describe("cellblock errors", () => {
    it("should point unknown profiles at the profiles command", () => {
      const result = analyzeError(
        new UnknownProfileError("strict", ["minimal", "standard"])
      );

      expect(result).toEqual({
        category: "configuration",
        userMessage:
          "Unknown profile 'strict'. Available profiles: minimal, standard",
        technicalMessage:
          "Unknown profile 'strict'. Available profiles: minimal, standard",
        suggestions: [
          "List the available profiles with: cellblock profiles",
          "Check the profile setting with: cellblock config show",
        ],
      });
    });

    it("should treat config parse errors as configuration errors", () => {
      const result = analyzeError(
        new ConfigParseError("/p/.cellblock.yaml", "invalid YAML")
      );

      expect(result.category).toBe("configuration");
      expect(result.userMessage).toBe(
        "Could not load config file /p/.cellblock.yaml: invalid YAML"
      );
    });

    it("should suggest a subdirectory for an unsafe sandbox root", () => {
      const result = analyzeError(new UnsafeSandboxRootError("/etc"));

      expect(result.category).toBe("filesystem");
      expect(result.suggestions[0]).toBe(
        "Set sandboxHome to a directory beneath the system directory, e.g. /tmp/sandboxes"
      );
    });

    it("should keep the path in missing-path messages", () => {
      const result = analyzeError(new PathNotFoundError("/nope"));

      expect(result.category).toBe("filesystem");
      expect(result.userMessage).toBe("Path does not exist: /nope");
    });

    it("should explain an invalid git root override", () => {
      const result = analyzeError(new InvalidManualGitRootError("/src/app"));

      expect(result.category).toBe("git");
      expect(result.userMessage).toBe(
        "Git root override /src/app does not contain a .git directory"
      );
      expect(result.suggestions).toHaveLength(2);
    });

    it("should categorize other git errors", () => {
      const result = analyzeError(new NotARepositoryError("/src/app"));

      expect(result.category).toBe("git");
      expect(result.userMessage).toBe(
        "/src/app is not a git repository: no .git entry found"
      );
    });

    it("should give installation advice when bwrap is unusable", () => {
      const result = analyzeError(new ProcessError("bwrap missing", "bwrap"));

      expect(result.category).toBe("process");
      expect(result.suggestions[0]).toBe(
        "Install bubblewrap (e.g. apt install bubblewrap or dnf install bubblewrap)"
      );
    });

    it("should list validation details as suggestions", () => {
      const result = analyzeError(
        new ValidationError("Settings file is invalid", [
          "/network: must be boolean",
        ])
      );

      expect(result.category).toBe("validation");
      expect(result.suggestions).toContain("- /network: must be boolean");
    });
  });

  describe("other errors", () => {
    it("should categorize EACCES errors", () => {
      const result = analyzeError(
        new Error("EACCES: permission denied, mkdir '/srv/sandbox'")
      );

      expect(result.category).toBe("filesystem");
      expect(result.userMessage).toBe(
        "Permission denied accessing files or directories"
      );
    });

    it("should categorize ENOENT errors", () => {
      const result = analyzeError(new Error("ENOENT: no such file or directory"));

      expect(result.category).toBe("filesystem");
      expect(result.suggestions).toContain(
        "Verify the file or directory path exists"
      );
    });

    it("should recognise rsync failures", () => {
      const result = analyzeError(
        new Error("Command failed with exit code 23: rsync -a --ignore-existing")
      );

      expect(result.category).toBe("process");
      expect(result.userMessage).toBe(
        "Copying host configuration into the sandbox failed"
      );
    });

    it("should handle string errors", () => {
      const result = analyzeError("something odd");

      expect(result.category).toBe("unknown");
      expect(result.technicalMessage).toBe("something odd");
    });

    it("should handle objects with a message", () => {
      const result = analyzeError({ message: "object failure" });

      expect(result.technicalMessage).toBe("object failure");
    });
  });
});
