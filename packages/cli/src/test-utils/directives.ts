// pattern: Functional Core
// Helpers for asserting on directive lists in tests.

import type { Directive } from "../sandbox/directives.js";

export function ofKind<K extends Directive["kind"]>(
  directives: Directive[],
  kind: K
): Extract<Directive, { kind: K }>[] {
  return directives.filter(
    (d): d is Extract<Directive, { kind: K }> => d.kind === kind
  );
}

/** `[name, value]` pairs of the env directives, in order */
export function envPairs(directives: Directive[]): [string, string][] {
  return ofKind(directives, "env").map(d => [d.name, d.value]);
}
