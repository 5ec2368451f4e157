// pattern: Functional Core

/**
 * Base class for cellblock application errors.
 * Subclasses set a category used by the CLI error analysis.
 */
export abstract class CellblockError extends Error {
  public readonly category: string;

  protected constructor(category: string, message: string) {
    super(message);
    this.name = this.constructor.name;
    this.category = category;

    // Maintain proper stack trace for where our error was thrown
    // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Errors related to configuration values and their resolution
 */
export class ConfigurationError extends CellblockError {
  constructor(message: string) {
    super("configuration", message);
  }
}

/**
 * A candidate config file could not be read, parsed or validated.
 * The resolver logs these and moves on to the next candidate.
 */
export class ConfigParseError extends ConfigurationError {
  public readonly filePath: string;
  public readonly details: string[];

  constructor(filePath: string, reason: string, details: string[] = []) {
    super(`Could not load config file ${filePath}: ${reason}`);
    this.filePath = filePath;
    this.details = details;
  }
}

/**
 * The requested profile is not registered
 */
export class UnknownProfileError extends ConfigurationError {
  public readonly profileName: string;
  public readonly availableProfiles: string[];

  constructor(profileName: string, availableProfiles: string[]) {
    super(
      `Unknown profile '${profileName}'. Available profiles: ${availableProfiles.join(", ")}`
    );
    this.profileName = profileName;
    this.availableProfiles = availableProfiles;
  }
}

/**
 * Errors related to file system operations
 */
export class FileSystemError extends CellblockError {
  public readonly operation?: string;
  public readonly filePath?: string;

  constructor(message: string, operation?: string, filePath?: string) {
    super("filesystem", message);
    if (operation) {
      this.operation = operation;
    }
    if (filePath) {
      this.filePath = filePath;
    }
  }
}

/**
 * A bind source does not exist on the host
 */
export class PathNotFoundError extends FileSystemError {
  constructor(filePath: string) {
    super(`Path does not exist: ${filePath}`, "access", filePath);
  }
}

/**
 * The sandbox root resolves to a top-level system directory
 */
export class UnsafeSandboxRootError extends FileSystemError {
  constructor(filePath: string) {
    super(
      `Refusing to use ${filePath} as the sandbox root: it is a system directory`,
      "sandbox-root",
      filePath
    );
  }
}

/**
 * Errors related to git repository discovery
 */
export class GitError extends CellblockError {
  public readonly repositoryPath: string;

  constructor(message: string, repositoryPath: string) {
    super("git", message);
    this.repositoryPath = repositoryPath;
  }
}

/**
 * The directory is not a git repository, or a worktree's pointer chain is
 * incomplete
 */
export class NotARepositoryError extends GitError {
  constructor(repositoryPath: string, reason = "no .git entry found") {
    super(`${repositoryPath} is not a git repository: ${reason}`, repositoryPath);
  }
}

/**
 * A user-supplied git root does not contain a .git directory
 */
export class InvalidManualGitRootError extends GitError {
  constructor(repositoryPath: string) {
    super(
      `Git root override ${repositoryPath} does not contain a .git directory`,
      repositoryPath
    );
  }
}

/**
 * Errors related to process operations and permissions
 */
export class ProcessError extends CellblockError {
  public readonly processName?: string;
  public readonly exitCode?: number;

  constructor(message: string, processName?: string, exitCode?: number) {
    super("process", message);
    if (processName) {
      this.processName = processName;
    }
    if (exitCode !== undefined) {
      this.exitCode = exitCode;
    }
  }
}

/**
 * Errors related to validation failures
 */
export class ValidationError extends CellblockError {
  public readonly validationErrors?: string[];

  constructor(message: string, validationErrors?: string[]) {
    super("validation", message);
    if (validationErrors) {
      this.validationErrors = validationErrors;
    }
  }
}
