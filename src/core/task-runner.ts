/**
 * Task runner — dispatches named tasks to the toolchain, one command at a time.
 * Composite tasks and multi-task sequences stop at the first non-zero exit status.
 */

import type { IBuildConfiguration } from "../types/config.js";
import type { ICommandExecutor, IInvocation, IInvokeTask, TaskName } from "../types/task.js";
import { logger } from "../utils/logger.js";
import { EventBus } from "./event-bus.js";
import { renderHelp, renderUsage } from "./help.js";
import { DEFAULT_TASK, TASKS } from "./task-catalog.js";

export interface ITaskRunnerOptions {
  readonly executor: ICommandExecutor;
  readonly events?: EventBus | undefined;
  /** Announce commands without executing them. */
  readonly dryRun?: boolean | undefined;
  /** Sink for the help text. */
  readonly write?: ((text: string) => void) | undefined;
}

export class TaskRunner {
  readonly events: EventBus;
  private readonly executor: ICommandExecutor;
  private readonly dryRun: boolean;
  private readonly write: (text: string) => void;

  constructor(options: ITaskRunnerOptions) {
    this.executor = options.executor;
    this.events = options.events ?? new EventBus();
    this.dryRun = options.dryRun ?? false;
    this.write = options.write ?? ((text) => {
      process.stdout.write(text);
    });
  }

  /**
   * Run tasks left to right. An empty list runs the default task.
   */
  async runSequence(names: readonly TaskName[], config: IBuildConfiguration): Promise<number> {
    const tasks = names.length > 0 ? names : [DEFAULT_TASK];
    for (const name of tasks) {
      const exitCode = await this.run(name, config);
      if (exitCode !== 0) {
        return exitCode;
      }
    }
    return 0;
  }

  async run(name: TaskName, config: IBuildConfiguration): Promise<number> {
    this.events.emit("task:start", { task: name });
    logger.debug({ task: name }, "Task started");

    const exitCode = await this.dispatch(name, config);

    this.events.emit("task:finish", { task: name, exitCode });
    logger.debug({ task: name, exitCode }, "Task finished");
    return exitCode;
  }

  private async dispatch(name: TaskName, config: IBuildConfiguration): Promise<number> {
    const task = TASKS[name];
    switch (task.kind) {
      case "help":
        this.write(`${renderUsage()}\n\n${renderHelp()}`);
        return 0;
      case "composite":
        return this.runSequence(task.steps, config);
      case "invoke":
        return this.invoke(task, config);
    }
  }

  private async invoke(task: IInvokeTask, config: IBuildConfiguration): Promise<number> {
    const invocation: IInvocation = {
      command: config.cargo,
      args: task.buildArgs(config),
    };

    this.events.emit("command:start", { task: task.name, invocation, dryRun: this.dryRun });
    if (this.dryRun) {
      return 0;
    }

    const startedAt = Date.now();
    const exitCode = await this.executor.execute(invocation);
    this.events.emit("command:exit", {
      task: task.name,
      invocation,
      exitCode,
      durationMs: Date.now() - startedAt,
    });
    return exitCode;
  }
}

/**
 * Run one task with a fresh runner.
 */
export function runTask(
  name: TaskName,
  config: IBuildConfiguration,
  options: ITaskRunnerOptions,
): Promise<number> {
  return new TaskRunner(options).run(name, config);
}
