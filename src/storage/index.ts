/**
 * Storage barrel export
 */

export { ConfigStore, resolveBuildConfiguration } from "./config-store.js";
export type { ProjectConfig, IConfigSources } from "./config-store.js";
