/**
 * Configuration store
 * Resolves the build configuration from defaults, the optional project file,
 * the environment and VAR=value overrides, in that order of precedence.
 */

import { existsSync, readFileSync } from "node:fs";
import { z } from "zod";
import { logger } from "../utils/logger.js";
import { DEFAULT_BUILD_CONFIG, OVERRIDE_VARIABLE_NAMES, OVERRIDE_VARIABLES } from "../types/config.js";
import type { IBuildConfiguration } from "../types/config.js";

// ── Zod Schemas ─────────────────────────────────────────────────────────

const ProjectConfigSchema = z
  .object({
    cargo: z.string(),
    features: z.string(),
    workspace: z.string(),
    cargoFlags: z.string(),
    testFlags: z.string(),
  })
  .partial()
  .strict();

export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;

export interface IConfigSources {
  readonly project?: ProjectConfig | undefined;
  readonly env?: Readonly<Record<string, string | undefined>> | undefined;
  readonly overrides?: Readonly<Record<string, string>> | undefined;
}

export class ConfigStore {
  private projectConfig: ProjectConfig = {};

  /**
   * Load the project file. A missing file is not an error; an unreadable
   * or invalid one is ignored with a warning.
   */
  loadProject(configPath: string): ProjectConfig {
    if (!existsSync(configPath)) {
      logger.debug({ path: configPath }, "Project config not found, using defaults");
      this.projectConfig = {};
      return this.projectConfig;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(configPath, "utf-8"));
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn({ path: configPath, error: message }, "Project config unreadable, ignoring");
      this.projectConfig = {};
      return this.projectConfig;
    }

    const validated = ProjectConfigSchema.safeParse(parsed);
    if (!validated.success) {
      logger.warn(
        { path: configPath, errors: validated.error.issues },
        "Project config validation failed, ignoring",
      );
      this.projectConfig = {};
      return this.projectConfig;
    }

    this.projectConfig = validated.data;
    logger.debug({ path: configPath }, "Project config loaded");
    return this.projectConfig;
  }

  resolve(
    env: Readonly<Record<string, string | undefined>> = process.env,
    overrides: Readonly<Record<string, string>> = {},
  ): IBuildConfiguration {
    return resolveBuildConfiguration({ project: this.projectConfig, env, overrides });
  }
}

/**
 * Merge configuration sources into one frozen configuration.
 * A variable set to the empty string still counts as set.
 */
export function resolveBuildConfiguration(sources: IConfigSources): IBuildConfiguration {
  const resolved: Record<keyof IBuildConfiguration, string> = { ...DEFAULT_BUILD_CONFIG };

  for (const variable of OVERRIDE_VARIABLE_NAMES) {
    const field = OVERRIDE_VARIABLES[variable];
    const value =
      sources.overrides?.[variable] ?? sources.env?.[variable] ?? sources.project?.[field];
    if (value !== undefined) {
      resolved[field] = value;
    }
  }

  return Object.freeze(resolved);
}
