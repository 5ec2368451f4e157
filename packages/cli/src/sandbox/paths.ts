// pattern: Functional Core
// Path helpers for sandbox destinations: normalisation and ancestor iteration.

import { isAbsolute, posix, resolve } from "path";

/**
 * Normalise a sandbox destination to an absolute POSIX path without a
 * trailing slash. Relative input is resolved against the current directory.
 */
export function normalizeSandboxPath(path: string): string {
  const absolute = isAbsolute(path) ? path : resolve(path);
  return posix.normalize(absolute).replace(/(.)\/+$/, "$1");
}

/**
 * Every proper prefix of `path`, shortest first.
 * `/a/b/c` yields `/a`, `/a/b`.
 */
export function ancestorsOf(path: string): string[] {
  const components = normalizeSandboxPath(path).split("/").filter(Boolean);
  const ancestors: string[] = [];
  let current = "";
  for (const component of components.slice(0, -1)) {
    current = `${current}/${component}`;
    ancestors.push(current);
  }
  return ancestors;
}

/**
 * Whether `child` lies strictly beneath `parent`
 */
export function isStrictlyInside(child: string, parent: string): boolean {
  const normalizedParent = normalizeSandboxPath(parent);
  const normalizedChild = normalizeSandboxPath(child);
  if (normalizedParent === "/") {
    return normalizedChild !== "/";
  }
  return normalizedChild.startsWith(`${normalizedParent}/`);
}
