// pattern: Mixed (unavoidable)
// Builds the directive set for one sandbox. Bind sources are checked against
// and canonicalised through the host filesystem as they are added.

import { existsSync, realpathSync } from "fs";

import { PathNotFoundError } from "../utils/errors.js";

import {
  type BindMode,
  bucketOf,
  type Directive,
  isShareNamespace,
  isUnshareNamespace,
} from "./directives.js";
import { ancestorsOf, normalizeSandboxPath } from "./paths.js";

import type { Logger } from "pino";

/**
 * Mutable, caller-owned collection of sandbox directives.
 *
 * Destinations of binds, symlinks and ancestor directories are tracked so
 * that each appears at most once; re-adding one is a silent no-op. Call
 * {@link reset} before reusing an instance for another compilation.
 */
export class DirectiveAccumulator {
  private entries: Directive[] = [];
  private readonly createdDirs = new Set<string>();
  private readonly mounted = new Set<string>();

  constructor(private readonly logger: Logger) {}

  reset(): void {
    this.entries = [];
    this.createdDirs.clear();
    this.mounted.clear();
  }

  /**
   * Expose a host path inside the sandbox.
   *
   * Returns a {@link PathNotFoundError} without adding anything when `src`
   * is missing. Binding an already-bound destination does nothing.
   */
  bind(
    src: string,
    dst: string = src,
    mode: BindMode = "rw"
  ): PathNotFoundError | undefined {
    if (!existsSync(src)) {
      return new PathNotFoundError(src);
    }

    const target = normalizeSandboxPath(dst);
    if (this.mounted.has(target)) {
      this.logger.trace({ dst: target }, "Destination already bound");
      return undefined;
    }

    let canonical: string;
    try {
      canonical = realpathSync(src);
    } catch (error) {
      this.logger.debug({ path: src, err: error }, "Could not resolve bind source");
      return new PathNotFoundError(src);
    }

    this.ensureAncestors(target);
    this.mounted.add(target);
    this.entries.push({ kind: "bind", src: canonical, dst: target, mode });
    return undefined;
  }

  roBind(src: string, dst: string = src): PathNotFoundError | undefined {
    return this.bind(src, dst, "ro");
  }

  /**
   * Like {@link bind}, but a missing source is fatal
   */
  requireBind(src: string, dst: string = src, mode: BindMode = "rw"): void {
    const error = this.bind(src, dst, mode);
    if (error) {
      throw error;
    }
  }

  tmpfs(path: string): void {
    const target = normalizeSandboxPath(path);
    this.ensureAncestors(target);
    this.entries.push({ kind: "tmpfs", path: target });
  }

  symlink(target: string, link: string): void {
    const linkPath = normalizeSandboxPath(link);
    if (this.mounted.has(linkPath)) {
      return;
    }
    this.ensureAncestors(linkPath);
    // A directory must never be created over the link later
    this.createdDirs.add(linkPath);
    this.mounted.add(linkPath);
    this.entries.push({ kind: "symlink", target, link: linkPath });
  }

  dev(path = "/dev"): void {
    this.entries.push({ kind: "dev", path: normalizeSandboxPath(path) });
  }

  proc(path = "/proc"): void {
    this.entries.push({ kind: "proc", path: normalizeSandboxPath(path) });
  }

  chdir(path: string): void {
    this.entries.push({ kind: "chdir", path: normalizeSandboxPath(path) });
  }

  unshare(...names: string[]): void {
    for (const name of names) {
      if (isUnshareNamespace(name)) {
        this.entries.push({ kind: "unshare", name });
      } else {
        this.logger.debug({ namespace: name }, "Ignoring unknown namespace");
      }
    }
  }

  share(...names: string[]): void {
    for (const name of names) {
      if (isShareNamespace(name)) {
        this.entries.push({ kind: "share", name });
      } else {
        this.logger.debug({ namespace: name }, "Ignoring unknown namespace");
      }
    }
  }

  setenv(name: string, value: string): void {
    this.entries.push({ kind: "env", name, value });
  }

  isMounted(dst: string): boolean {
    return this.mounted.has(normalizeSandboxPath(dst));
  }

  /** Whether `path` or one of its ancestors is already a mount destination */
  isCovered(path: string): boolean {
    const target = normalizeSandboxPath(path);
    return (
      this.mounted.has(target) ||
      ancestorsOf(target).some(ancestor => this.mounted.has(ancestor))
    );
  }

  /** Position marker for {@link since} */
  mark(): number {
    return this.entries.length;
  }

  /** Directives added after `mark`, in insertion order */
  since(mark: number): Directive[] {
    return this.entries.slice(mark);
  }

  /**
   * All directives in emission order: grouped by bucket, insertion order
   * kept within each bucket
   */
  directives(): Directive[] {
    return this.entries
      .map((directive, index) => ({ directive, index }))
      .sort(
        (a, b) =>
          bucketOf(a.directive) - bucketOf(b.directive) || a.index - b.index
      )
      .map(({ directive }) => directive);
  }

  private ensureAncestors(path: string): void {
    for (const ancestor of ancestorsOf(path)) {
      if (this.createdDirs.has(ancestor)) continue;
      this.createdDirs.add(ancestor);
      this.entries.push({ kind: "dir", path: ancestor });
    }
  }
}
