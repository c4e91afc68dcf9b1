/**
 * Task and invocation types
 */

import type { IBuildConfiguration } from "./config.js";

export const TASK_NAMES = [
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
] as const;

export type TaskName = (typeof TASK_NAMES)[number];

/** One forwarded toolchain command. */
export interface IInvocation {
  readonly command: string;
  readonly args: readonly string[];
}

// ── Task Definitions ────────────────────────────────────────────────────

interface ITaskBase {
  readonly name: TaskName;
  readonly description: string;
}

export interface IInvokeTask extends ITaskBase {
  readonly kind: "invoke";
  readonly buildArgs: (config: IBuildConfiguration) => readonly string[];
  /** Cargo extension the subcommand comes from, when it is not built in. */
  readonly requires?: string | undefined;
}

export interface ICompositeTask extends ITaskBase {
  readonly kind: "composite";
  readonly steps: readonly TaskName[];
}

export interface IHelpTask extends ITaskBase {
  readonly kind: "help";
}

export type TaskDefinition = IInvokeTask | ICompositeTask | IHelpTask;

// ── Execution ───────────────────────────────────────────────────────────

export interface ICommandExecutor {
  /** Runs the invocation to completion and resolves with its exit status. */
  execute(invocation: IInvocation): Promise<number>;
}
