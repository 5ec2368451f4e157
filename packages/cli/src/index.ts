// pattern: Functional Core
// Library entry point: compile bubblewrap sandboxes without the CLI.

export * from "./config/types/index.js";
export {
  type ResolvedSettings,
  resolveSettings,
  type ResolveSettingsOptions,
} from "./config/resolver.js";
export {
  CONFIG_FILE_ENV_VAR,
  configFileCandidates,
  SETTING_ENV_VARS,
} from "./config/sources.js";
export {
  contributeGitBindings,
  type GitRepoInfo,
  resolveMainRepoRoot,
} from "./git/worktree.js";
export { createLogger } from "./logger/index.js";
export type { LogFormat, LogLevel } from "./logger/index.js";
export {
  createDefaultRegistry,
  type Profile,
  ProfileRegistry,
  type ProfileSummary,
  type ProfileTargets,
} from "./profiles/index.js";
export {
  type CompiledSandbox,
  compileSandbox,
  type CompileOptions,
  executeSandbox,
  sandboxShell,
  toSandboxPath,
} from "./runner/index.js";
export { removeSandbox } from "./runner/sandbox-prep/index.js";
export { resolveSandboxRoot, UNSAFE_SANDBOX_ROOTS } from "./runner/sandbox-home/index.js";
export { DirectiveAccumulator } from "./sandbox/accumulator.js";
export { BwrapSandbox, type SandboxArgs } from "./sandbox/bwrap.js";
export type { BindMode, Directive, UnshareNamespace } from "./sandbox/directives.js";
export * from "./utils/errors.js";
