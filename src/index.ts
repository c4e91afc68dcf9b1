/**
 * cargo-tasks — main barrel export
 * Public API surface for programmatic usage.
 */

// ── Types ───────────────────────────────────────────────────────────────

export type {
  IBuildConfiguration,
  OverrideVariable,
  TaskName,
  IInvocation,
  IInvokeTask,
  ICompositeTask,
  IHelpTask,
  TaskDefinition,
  ICommandExecutor,
  IErrorContext,
} from "./types/index.js";

export {
  OVERRIDE_VARIABLES,
  OVERRIDE_VARIABLE_NAMES,
  DEFAULT_BUILD_CONFIG,
  PROJECT_CONFIG_FILE,
  TASK_NAMES,
  isOverrideVariable,
  CargoTasksError,
  UnknownTaskError,
  ToolchainNotFoundError,
  WorkingDirectoryError,
} from "./types/index.js";

// ── Core ────────────────────────────────────────────────────────────────

export {
  composeFlags,
  FEATURES_FLAG,
  TASKS,
  DEFAULT_TASK,
  isTaskName,
  resolveTaskName,
  resolveTargets,
  renderHelp,
  renderUsage,
  EventBus,
  ProcessCommandExecutor,
  launchWithExeca,
  TaskRunner,
  runTask,
} from "./core/index.js";

export type {
  ITaskEventMap,
  TaskEventName,
  ProcessLauncher,
  IProcessOutcome,
  ITaskRunnerOptions,
} from "./core/index.js";

// ── Storage ─────────────────────────────────────────────────────────────

export { ConfigStore, resolveBuildConfiguration } from "./storage/index.js";
export type { ProjectConfig, IConfigSources } from "./storage/index.js";

// ── CLI ─────────────────────────────────────────────────────────────────

export { runCli } from "./cli/program.js";
export type { ICliDependencies } from "./cli/program.js";
