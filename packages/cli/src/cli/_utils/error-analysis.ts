// pattern: Functional Core

import {
  CellblockError,
  ConfigurationError,
  FileSystemError,
  GitError,
  InvalidManualGitRootError,
  PathNotFoundError,
  ProcessError,
  UnknownProfileError,
  UnsafeSandboxRootError,
  ValidationError,
} from "../../utils/errors.js";

/**
 * Represents a categorized error with user-friendly messaging
 */
export interface AnalyzedError {
  category:
    | "filesystem"
    | "process"
    | "validation"
    | "configuration"
    | "git"
    | "unknown";
  userMessage: string;
  technicalMessage: string;
  suggestions: string[];
}

const DEBUG_SUGGESTION = "Run with --log-level debug for more detailed information";

function analyzeCellblockError(error: CellblockError): AnalyzedError {
  const errorMessage = error.message;
  const base = { userMessage: errorMessage, technicalMessage: errorMessage };

  if (error instanceof UnknownProfileError) {
    return {
      ...base,
      category: "configuration",
      suggestions: [
        "List the available profiles with: cellblock profiles",
        "Check the profile setting with: cellblock config show",
      ],
    };
  }

  if (error instanceof ConfigurationError) {
    return {
      ...base,
      category: "configuration",
      suggestions: [
        "Check your .cellblock.yaml file for errors",
        "Show the resolved settings and their sources with: cellblock config show",
        DEBUG_SUGGESTION,
      ],
    };
  }

  if (error instanceof UnsafeSandboxRootError) {
    return {
      ...base,
      category: "filesystem",
      suggestions: [
        "Set sandboxHome to a directory beneath the system directory, e.g. /tmp/sandboxes",
        "Or set sandboxHome to a relative name to keep the sandbox inside the project",
      ],
    };
  }

  if (error instanceof PathNotFoundError) {
    return {
      ...base,
      category: "filesystem",
      suggestions: [
        "Verify the file or directory path exists",
        "Pass the project directory with --dir",
      ],
    };
  }

  if (error instanceof FileSystemError) {
    return {
      ...base,
      category: "filesystem",
      suggestions: [
        "Verify the file or directory path exists",
        "Check that you have the necessary permissions",
      ],
    };
  }

  if (error instanceof InvalidManualGitRootError) {
    return {
      ...base,
      category: "git",
      suggestions: [
        "Point --git-root at the main checkout, the directory that contains the .git directory",
        "Omit --git-root to follow the worktree's .git file automatically",
      ],
    };
  }

  if (error instanceof GitError) {
    return {
      ...base,
      category: "git",
      suggestions: ["Check that the project is a git repository or worktree"],
    };
  }

  if (error instanceof ProcessError) {
    const suggestions =
      error.processName === "bwrap"
        ? [
            "Install bubblewrap (e.g. apt install bubblewrap or dnf install bubblewrap)",
            "Check that unprivileged user namespaces are allowed on this system",
          ]
        : [
            "Check that the command is installed and in your PATH",
            "Verify you have the necessary permissions",
          ];
    return { ...base, category: "process", suggestions };
  }

  if (error instanceof ValidationError) {
    const suggestions = [
      "Check your configuration file syntax",
      "Print the settings schema with: cellblock schema",
    ];
    if (error.validationErrors && error.validationErrors.length > 0) {
      suggestions.push(...error.validationErrors.map(e => `- ${e}`));
    }
    return { ...base, category: "validation", suggestions };
  }

  return {
    ...base,
    category: "unknown",
    suggestions: ["Check the error message for details", DEBUG_SUGGESTION],
  };
}

/**
 * Analyzes an error and provides structured information with user-friendly
 * messages and suggestions
 */
export function analyzeError(error: unknown): AnalyzedError {
  if (error instanceof CellblockError) {
    return analyzeCellblockError(error);
  }

  // Fall back to string-based analysis for errors from Node and libraries
  const errorMessage = getErrorMessage(error);
  const errorString = errorMessage.toLowerCase();

  if (
    errorString.includes("eacces") ||
    errorString.includes("permission denied")
  ) {
    return {
      category: "filesystem",
      userMessage: "Permission denied accessing files or directories",
      technicalMessage: errorMessage,
      suggestions: [
        "Check that you have write permissions to the sandbox directory",
        "Verify the file or directory ownership is correct",
      ],
    };
  }

  if (errorString.includes("enoent")) {
    return {
      category: "filesystem",
      userMessage: "Required file or directory not found",
      technicalMessage: errorMessage,
      suggestions: [
        "Verify the file or directory path exists",
        "Check that rsync and bwrap are installed",
      ],
    };
  }

  if (errorString.includes("rsync")) {
    return {
      category: "process",
      userMessage: "Copying host configuration into the sandbox failed",
      technicalMessage: errorMessage,
      suggestions: [
        "Check that rsync is installed",
        "Disable seeding with --no-copy-config or copyConfig: false",
      ],
    };
  }

  return {
    category: "unknown",
    userMessage: "An unexpected error occurred",
    technicalMessage: errorMessage,
    suggestions: [
      "Try the operation again",
      "Check the command syntax and arguments",
      DEBUG_SUGGESTION,
    ],
  };
}

/**
 * Extracts a string message from various error types
 */
function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  if (error && typeof error === "object" && "message" in error) {
    return String(error.message);
  }
  return String(error);
}
