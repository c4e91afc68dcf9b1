/**
 * cargo-tasks shared types — barrel export
 */

export type {
  IBuildConfiguration,
  OverrideVariable,
} from "./config.js";

export {
  OVERRIDE_VARIABLES,
  OVERRIDE_VARIABLE_NAMES,
  DEFAULT_BUILD_CONFIG,
  PROJECT_CONFIG_FILE,
  isOverrideVariable,
} from "./config.js";

export type {
  TaskName,
  IInvocation,
  IInvokeTask,
  ICompositeTask,
  IHelpTask,
  TaskDefinition,
  ICommandExecutor,
} from "./task.js";

export { TASK_NAMES } from "./task.js";

export type { IErrorContext } from "./errors.js";

export {
  CargoTasksError,
  UnknownTaskError,
  ToolchainNotFoundError,
  WorkingDirectoryError,
} from "./errors.js";
