/**
 * Static usage text for the help task and `--help`.
 */

import type { TaskName } from "../types/task.js";
import { TASKS } from "./task-catalog.js";

export const PROGRAM_NAME = "cargo-tasks";

const HELP_ORDER: readonly TaskName[] = [
  "all",
  "debug",
  "release",
  "test",
  "fmt",
  "lint",
  "check",
  "doc",
  "ci",
  "clean",
  "update-deps",
  "upgrade-deps",
  "help",
];

const OVERRIDE_EXAMPLES: ReadonlyArray<readonly [string, string]> = [
  ["CARGO=cargo", "toolchain executable"],
  ["FEATURES=foo,bar", "feature flags"],
  ["WORKSPACE=--workspace", "multi-package mode"],
  ["CARGO_FLAGS=...", "extra flags, e.g. --all-targets"],
  ["TEST_FLAGS=...", "test-only flags, e.g. '-- --nocapture'"],
];

function renderTable(rows: ReadonlyArray<readonly [string, string]>): string[] {
  const width = Math.max(...rows.map(([label]) => label.length)) + 2;
  return rows.map(([label, text]) => `  ${label.padEnd(width)}${text}`);
}

export function renderUsage(): string {
  return `Usage: ${PROGRAM_NAME} [options] [task...] [VAR=value...]`;
}

/** Task table and override variables. */
export function renderHelp(): string {
  const taskRows = HELP_ORDER.map((name): readonly [string, string] => {
    const task = TASKS[name];
    const note = task.kind === "invoke" && task.requires !== undefined
      ? `, needs ${task.requires}`
      : "";
    return [name, `${task.description}${note}`];
  });

  return [
    "Tasks:",
    ...renderTable(taskRows),
    "",
    "Overrides (environment variables or VAR=value arguments):",
    ...renderTable(OVERRIDE_EXAMPLES),
    "",
  ].join("\n");
}
