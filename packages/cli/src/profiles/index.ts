// pattern: Functional Core

import { currentHost, type HostEnvironment } from "../sandbox/system.js";

import {
  devProfile,
  minimalProfile,
  paranoidProfile,
  standardProfile,
} from "./builtin/index.js";
import { ProfileRegistry } from "./registry.js";

export { ProfileRegistry, type ProfileSummary } from "./registry.js";
export type { Profile, ProfileTargets } from "./types.js";

/**
 * Registry holding the built-in profiles, reading the given host
 */
export function createDefaultRegistry(
  host: HostEnvironment = currentHost()
): ProfileRegistry {
  return new ProfileRegistry()
    .register("minimal", minimalProfile(host))
    .register("standard", standardProfile(host))
    .register("dev", devProfile(host))
    .register("paranoid", paranoidProfile(host));
}
