// pattern: Functional Core
// Directive model for the bubblewrap argument vector.

export type BindMode = "ro" | "rw";

export const UNSHARE_NAMESPACES = [
  "all",
  "user",
  "pid",
  "net",
  "ipc",
  "uts",
  "cgroup",
] as const;
export type UnshareNamespace = (typeof UNSHARE_NAMESPACES)[number];

export const SHARE_NAMESPACES = ["net"] as const;
export type ShareNamespace = (typeof SHARE_NAMESPACES)[number];

export type Directive =
  | { kind: "unshare"; name: UnshareNamespace }
  | { kind: "share"; name: ShareNamespace }
  | { kind: "dir"; path: string }
  | { kind: "bind"; src: string; dst: string; mode: BindMode }
  | { kind: "tmpfs"; path: string }
  | { kind: "symlink"; target: string; link: string }
  | { kind: "dev"; path: string }
  | { kind: "proc"; path: string }
  | { kind: "chdir"; path: string }
  | { kind: "env"; name: string; value: string };

export type DirectiveKind = Directive["kind"];

/**
 * Emission groups. bwrap applies options left to right, so namespaces come
 * first, then the directories later mounts land in, then mounts, then env.
 */
export enum DirectiveBucket {
  Namespace = 0,
  Directory = 1,
  Mount = 2,
  Environment = 3,
}

export function bucketOf(directive: Directive): DirectiveBucket {
  switch (directive.kind) {
    case "unshare":
    case "share":
      return DirectiveBucket.Namespace;
    case "dir":
      return DirectiveBucket.Directory;
    case "bind":
    case "tmpfs":
    case "symlink":
    case "dev":
    case "proc":
    case "chdir":
      return DirectiveBucket.Mount;
    case "env":
      return DirectiveBucket.Environment;
  }
}

export function isUnshareNamespace(name: string): name is UnshareNamespace {
  return UNSHARE_NAMESPACES.some(ns => ns === name);
}

export function isShareNamespace(name: string): name is ShareNamespace {
  return SHARE_NAMESPACES.some(ns => ns === name);
}

/**
 * Render one directive as bwrap arguments
 */
export function directiveToArgs(directive: Directive): string[] {
  switch (directive.kind) {
    case "unshare":
      return [`--unshare-${directive.name}`];
    case "share":
      return [`--share-${directive.name}`];
    case "dir":
      return ["--dir", directive.path];
    case "bind":
      return [
        directive.mode === "ro" ? "--ro-bind" : "--bind",
        directive.src,
        directive.dst,
      ];
    case "tmpfs":
      return ["--tmpfs", directive.path];
    case "symlink":
      return ["--symlink", directive.target, directive.link];
    case "dev":
      return ["--dev", directive.path];
    case "proc":
      return ["--proc", directive.path];
    case "chdir":
      return ["--chdir", directive.path];
    case "env":
      return ["--setenv", directive.name, directive.value];
  }
}
