/**
 * Task catalog — every named task and the cargo arguments it forwards.
 */

import type { TaskDefinition, TaskName } from "../types/task.js";
import { TASK_NAMES } from "../types/task.js";
import { UnknownTaskError } from "../types/errors.js";
import { splitFlags } from "../utils/sanitizer.js";
import { composeFlags } from "./compose-flags.js";

export const DEFAULT_TASK: TaskName = "all";

const TASK_ALIASES: Readonly<Record<string, TaskName>> = {
  format: "fmt",
};

export const TASKS: Readonly<Record<TaskName, TaskDefinition>> = {
  all: {
    name: "all",
    kind: "composite",
    description: "fmt, lint, test, release (default)",
    steps: ["fmt", "lint", "test", "release"],
  },
  debug: {
    name: "debug",
    kind: "invoke",
    description: "build debug",
    buildArgs: (config) => ["build", ...composeFlags(config)],
  },
  release: {
    name: "release",
    kind: "invoke",
    description: "build release",
    buildArgs: (config) => ["build", ...composeFlags(config), "--release"],
  },
  test: {
    name: "test",
    kind: "invoke",
    description: "run tests",
    buildArgs: (config) => ["test", ...composeFlags(config), ...splitFlags(config.testFlags)],
  },
  fmt: {
    name: "fmt",
    kind: "invoke",
    description: "format code with rustfmt",
    buildArgs: () => ["fmt"],
  },
  lint: {
    name: "lint",
    kind: "invoke",
    description: "run clippy (fail on warnings)",
    buildArgs: (config) => [
      "clippy",
      ...composeFlags(config),
      "--all-targets",
      "--",
      "-D",
      "warnings",
    ],
  },
  check: {
    name: "check",
    kind: "invoke",
    description: "cargo check (fast compile check)",
    buildArgs: (config) => ["check", ...composeFlags(config)],
  },
  doc: {
    name: "doc",
    kind: "invoke",
    description: "build docs",
    buildArgs: (config) => ["doc", ...composeFlags(config), "--no-deps"],
  },
  ci: {
    name: "ci",
    kind: "composite",
    description: "fmt, lint, test (CI pipeline)",
    steps: ["fmt", "lint", "test"],
  },
  clean: {
    name: "clean",
    kind: "invoke",
    description: "clean target dir",
    buildArgs: () => ["clean"],
  },
  "update-deps": {
    name: "update-deps",
    kind: "invoke",
    description: "cargo update (lockfile refresh)",
    buildArgs: () => ["update", "--verbose"],
  },
  "upgrade-deps": {
    name: "upgrade-deps",
    kind: "invoke",
    description: "cargo upgrade (bump dependency versions)",
    buildArgs: () => ["upgrade", "--verbose"],
    requires: "cargo-edit",
  },
  help: {
    name: "help",
    kind: "help",
    description: "show this help",
  },
};

export function isTaskName(value: string): value is TaskName {
  return TASK_NAMES.some((name) => name === value);
}

export function resolveTaskName(input: string): TaskName | undefined {
  if (isTaskName(input)) {
    return input;
  }
  return TASK_ALIASES[input];
}

/**
 * Resolve command-line targets in order. No targets means the default task.
 */
export function resolveTargets(inputs: readonly string[]): TaskName[] {
  if (inputs.length === 0) {
    return [DEFAULT_TASK];
  }
  return inputs.map((input) => {
    const name = resolveTaskName(input);
    if (name === undefined) {
      throw new UnknownTaskError(input);
    }
    return name;
  });
}
