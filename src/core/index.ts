/**
 * Core barrel export
 */

export { composeFlags, FEATURES_FLAG } from "./compose-flags.js";
export {
  TASKS,
  DEFAULT_TASK,
  isTaskName,
  resolveTaskName,
  resolveTargets,
} from "./task-catalog.js";
export { renderHelp, renderUsage, PROGRAM_NAME } from "./help.js";
export { EventBus } from "./event-bus.js";
export type { ITaskEventMap, TaskEventName } from "./event-bus.js";
export {
  ProcessCommandExecutor,
  launchWithExeca,
  signalExitCode,
} from "./command-executor.js";
export type {
  ILaunchOptions,
  IProcessOutcome,
  ProcessLauncher,
  IProcessCommandExecutorOptions,
} from "./command-executor.js";
export { TaskRunner, runTask } from "./task-runner.js";
export type { ITaskRunnerOptions } from "./task-runner.js";
