/**
 * Command composer — turns the build configuration into the flag tokens
 * shared by every forwarded cargo command.
 */

import type { IBuildConfiguration } from "../types/config.js";
import { splitFlags } from "../utils/sanitizer.js";

export const FEATURES_FLAG = "--features";

/**
 * Workspace flag, extra cargo flags, then `--features <list>`.
 * Empty fields contribute nothing; an empty feature list emits no `--features` at all.
 */
export function composeFlags(
  config: Pick<IBuildConfiguration, "workspace" | "cargoFlags" | "features">,
): readonly string[] {
  const features = config.features.trim();
  return [
    ...splitFlags(config.workspace),
    ...splitFlags(config.cargoFlags),
    ...(features.length > 0 ? [FEATURES_FLAG, features] : []),
  ];
}
