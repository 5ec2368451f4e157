// pattern: Functional Core

import { UnknownProfileError } from "../utils/errors.js";

import type { DirectiveAccumulator } from "../sandbox/accumulator.js";
import type { Profile, ProfileTargets } from "./types.js";

export interface ProfileSummary {
  name: string;
  description: string;
}

/**
 * Name to profile map. Built-in profiles are registered at startup and
 * callers may add or replace entries.
 */
export class ProfileRegistry {
  private readonly profiles = new Map<string, Profile>();

  /** Registering an existing name replaces the previous profile */
  register(name: string, profile: Profile): this {
    this.profiles.set(name, profile);
    return this;
  }

  has(name: string): boolean {
    return this.profiles.has(name);
  }

  /**
   * @throws {UnknownProfileError} when `name` is not registered
   */
  get(name: string): Profile {
    const profile = this.profiles.get(name);
    if (!profile) {
      throw new UnknownProfileError(name, this.list());
    }
    return profile;
  }

  /**
   * Run a profile against an accumulator the caller has already reset.
   */
  apply(
    name: string,
    acc: DirectiveAccumulator,
    projectPath: string,
    sandboxPath: string
  ): void {
    this.get(name).apply(acc, projectPath, sandboxPath);
  }

  targets(name: string, projectPath: string, sandboxPath: string): ProfileTargets {
    const profile = this.get(name);
    return (
      profile.targets?.(projectPath, sandboxPath) ?? {
        project: projectPath,
        sandbox: sandboxPath,
      }
    );
  }

  list(): string[] {
    return [...this.profiles.keys()].sort();
  }

  describe(): ProfileSummary[] {
    return this.list().map(name => ({
      name,
      description: this.get(name).description,
    }));
  }
}
