// pattern: Imperative Shell
// One compilation pass: settings, sandbox root, profile, git, extra paths and
// blocked paths, ending in the bwrap invocation. Nothing is executed here.

import { realpathSync } from "fs";
import { resolve } from "path";
import { split as shellSplit } from "shlex";

import { resolveSettings, sandboxHomeFromUserConfig } from "../../config/resolver.js";
import {
  contributeGitBindings,
  type GitRepoInfo,
  inheritSharedProjectFiles,
  resolveMainRepoRoot,
} from "../../git/worktree.js";
import { createDefaultRegistry } from "../../profiles/index.js";
import { DirectiveAccumulator } from "../../sandbox/accumulator.js";
import { BwrapSandbox, type SandboxArgs } from "../../sandbox/bwrap.js";
import { isStrictlyInside, normalizeSandboxPath } from "../../sandbox/paths.js";
import {
  bindRealExecutable,
  currentHost,
  type HostEnvironment,
  isDirectory,
  isFile,
} from "../../sandbox/system.js";
import { NotARepositoryError, PathNotFoundError } from "../../utils/errors.js";
import { bindCredentials } from "../credentials/index.js";
import { resolveSandboxRoot } from "../sandbox-home/index.js";
import { type DirectoryCopier, prepareSandbox } from "../sandbox-prep/index.js";

import type { ResolvedSettings } from "../../config/resolver.js";
import type { Settings } from "../../config/types/index.js";
import type { ProfileRegistry, ProfileTargets } from "../../profiles/index.js";
import type { Directive } from "../../sandbox/directives.js";
import type { Logger } from "pino";

export interface CompileOptions {
  projectDir: string;
  /** Parent of a relative sandbox home; defaults to the process cwd */
  cwd?: string;
  /** Settings given on the command line */
  overrides?: Partial<Settings>;
  configFile?: string | undefined;
  /** Main repository root given by the user */
  gitRoot?: string | undefined;
  /**
   * Command to run inside the sandbox; defaults to the configured command.
   * `null` runs the sandbox's login shell.
   */
  command?: string[] | null;
  logger: Logger;

  host?: HostEnvironment;
  configHome?: string;
  registry?: ProfileRegistry;
  accumulator?: DirectiveAccumulator;
  copier?: DirectoryCopier;
}

export interface CompiledSandbox {
  resolved: ResolvedSettings;
  profile: string;
  projectPath: string;
  sandboxPath: string;
  targets: ProfileTargets;
  git: GitRepoInfo | null;
  directives: Directive[];
  invocation: SandboxArgs;
}

/**
 * Where a host path appears inside the sandbox, for profiles that mount the
 * project or the sandbox home somewhere else
 */
export function toSandboxPath(
  hostPath: string,
  projectPath: string,
  sandboxPath: string,
  targets: ProfileTargets
): string {
  const path = normalizeSandboxPath(hostPath);
  // The sandbox home usually lives inside the project, so check it first
  const mounts: [from: string, to: string][] = [
    [sandboxPath, targets.sandbox],
    [projectPath, targets.project],
  ];
  for (const [from, to] of mounts) {
    if (path === from) return to;
    if (isStrictlyInside(path, from)) {
      return `${to}${path.slice(from.length)}`;
    }
  }
  return path;
}

/**
 * Login shell the profile sets, falling back to /bin/sh
 */
export function sandboxShell(directives: Directive[]): string {
  let shell = "/bin/sh";
  for (const directive of directives) {
    if (directive.kind === "env" && directive.name === "SHELL") {
      shell = directive.value;
    }
  }
  return shell;
}

function canonicalProject(projectDir: string): string {
  const path = resolve(projectDir);
  try {
    return realpathSync(path);
  } catch {
    throw new PathNotFoundError(path);
  }
}

/**
 * Run one compilation pass and return the bwrap invocation.
 *
 * Fatal errors (unknown profile, unsafe sandbox root, missing project,
 * invalid git root override) are thrown before anything is executed.
 * Missing optional paths are logged and skipped.
 */
export async function compileSandbox(
  options: CompileOptions
): Promise<CompiledSandbox> {
  const { logger } = options;
  const host = options.host ?? currentHost();
  const registry = options.registry ?? createDefaultRegistry(host);
  const acc = options.accumulator ?? new DirectiveAccumulator(logger);

  const projectPath = canonicalProject(options.projectDir);

  const resolved = await resolveSettings({
    overrides: options.overrides ?? {},
    configFile: options.configFile,
    projectDir: projectPath,
    env: host.env,
    home: host.home,
    ...(options.configHome !== undefined && { configHome: options.configHome }),
    logger,
  });
  const { settings } = resolved;

  // Unknown profiles fail before the sandbox is touched
  registry.get(settings.profile);

  const root = resolveSandboxRoot({
    settings,
    cwd: options.cwd ?? process.cwd(),
    fromUserConfig: sandboxHomeFromUserConfig(resolved),
  });
  if (root.advisory) {
    logger.warn({ sandbox: root.path }, root.advisory);
  }
  const sandboxPath = root.path;

  await prepareSandbox({
    sandboxPath,
    home: host.home,
    copyConfig: settings.copyConfig,
    seed: settings.seed,
    logger,
    ...(options.copier !== undefined && { copier: options.copier }),
  });

  acc.reset();
  registry.apply(settings.profile, acc, projectPath, sandboxPath);
  const targets = registry.targets(settings.profile, projectPath, sandboxPath);

  bindCredentials(acc, {
    host,
    sandboxPath,
    sandboxTarget: targets.sandbox,
    logger,
  });

  if (!settings.network) {
    acc.unshare("net");
  }

  let git: GitRepoInfo | null = null;
  const gitDirectives = contributeGitBindings(acc, projectPath, {
    readonly: settings.gitWorktreeReadonly,
    override: options.gitRoot,
    logger,
  });
  if (gitDirectives instanceof NotARepositoryError) {
    logger.debug({ reason: gitDirectives.message }, "No git bindings added");
  } else {
    const info = resolveMainRepoRoot(projectPath);
    if (!(info instanceof NotARepositoryError)) {
      git = info;
      if (info.isWorktree) {
        inheritSharedProjectFiles(acc, projectPath, targets.project, logger);
      }
    }
  }

  const mapped = (path: string): string =>
    toSandboxPath(path, projectPath, sandboxPath, targets);

  for (const path of settings.extraReadOnly) {
    if (acc.roBind(path, mapped(path))) {
      logger.warn({ path }, "Extra read-only path does not exist, skipping");
    }
  }
  for (const path of settings.extraReadWrite) {
    if (acc.bind(path, mapped(path))) {
      logger.warn({ path }, "Extra read-write path does not exist, skipping");
    }
  }

  for (const path of settings.blocked) {
    if (isDirectory(path)) {
      acc.tmpfs(mapped(path));
    } else if (isFile(path)) {
      acc.roBind("/dev/null", mapped(path));
    } else {
      logger.warn({ path }, "Blocked path does not exist, skipping");
    }
  }

  const command =
    options.command === null
      ? [sandboxShell(acc.directives())]
      : (options.command ?? shellSplit(settings.command));
  const [executable = settings.command, ...args] = command;

  if (!bindRealExecutable(acc, executable, host.env["PATH"])) {
    logger.debug({ executable }, "Command not found on the host PATH");
  }
  const directives = acc.directives();

  const invocation = new BwrapSandbox(logger).buildSandboxArgs(
    acc,
    executable,
    args
  );

  logger.debug(
    {
      profile: settings.profile,
      project: projectPath,
      sandbox: sandboxPath,
      directives: directives.length,
    },
    "Compiled sandbox"
  );

  return {
    resolved,
    profile: settings.profile,
    projectPath,
    sandboxPath,
    targets,
    git,
    directives,
    invocation,
  };
}
