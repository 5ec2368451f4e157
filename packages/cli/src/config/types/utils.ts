// pattern: Functional Core
import { type Static, Type } from "@sinclair/typebox";

declare const brand: unique symbol;

/** Nominal string: structurally a string, but not interchangeable with one */
export type Branded<TBrand extends string> = string & {
  readonly [brand]: TBrand;
};

export const PathStringTemplate = Type.Unsafe<Branded<"PathStringTemplate">>(
  Type.String({
    description:
      "A path, optionally starting with ~/ or containing Mustache variables " +
      "({{dirs.home}}, {{dirs.project}}, {{parentEnv.NAME}}), resolved at runtime.",
  })
);
export type PathStringTemplate = Static<typeof PathStringTemplate>;
