/**
 * Build configuration types
 */

// ── Build Configuration ─────────────────────────────────────────────────

export interface IBuildConfiguration {
  /** Toolchain executable. */
  readonly cargo: string;
  /** Comma-separated feature list, forwarded as `--features <value>`. */
  readonly features: string;
  /** Multi-package flag, usually `--workspace`. */
  readonly workspace: string;
  /** Extra flags for every command that takes the composed flags. */
  readonly cargoFlags: string;
  /** Extra flags for the test command only. */
  readonly testFlags: string;
}

// ── Override Variables ──────────────────────────────────────────────────

export const OVERRIDE_VARIABLES = {
  CARGO: "cargo",
  FEATURES: "features",
  WORKSPACE: "workspace",
  CARGO_FLAGS: "cargoFlags",
  TEST_FLAGS: "testFlags",
} as const satisfies Record<string, keyof IBuildConfiguration>;

export type OverrideVariable = keyof typeof OVERRIDE_VARIABLES;

export const OVERRIDE_VARIABLE_NAMES: readonly OverrideVariable[] = [
  "CARGO",
  "FEATURES",
  "WORKSPACE",
  "CARGO_FLAGS",
  "TEST_FLAGS",
];

export function isOverrideVariable(name: string): name is OverrideVariable {
  return OVERRIDE_VARIABLE_NAMES.some((variable) => variable === name);
}

// ── Default Configuration ───────────────────────────────────────────────

export const DEFAULT_BUILD_CONFIG: IBuildConfiguration = Object.freeze({
  cargo: "cargo",
  features: "",
  workspace: "",
  cargoFlags: "",
  testFlags: "",
});

export const PROJECT_CONFIG_FILE = "cargo-tasks.json";
