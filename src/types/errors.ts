/**
 * cargo-tasks typed error hierarchy
 * Every error carries a code, a user message and the exit status the CLI reports.
 */

export interface IErrorContext {
  readonly code: string;
  readonly userMessage: string;
  readonly exitCode: number;
  readonly suggestedRecovery?: string | undefined;
}

export abstract class CargoTasksError extends Error {
  abstract readonly code: string;
  abstract readonly userMessage: string;
  abstract readonly exitCode: number;
  suggestedRecovery?: string | undefined;

  constructor(message: string, context?: Pick<IErrorContext, "suggestedRecovery">) {
    super(message);
    this.name = this.constructor.name;
    this.suggestedRecovery = context?.suggestedRecovery;
  }
}

// ── Task Errors ─────────────────────────────────────────────────────────

export class UnknownTaskError extends CargoTasksError {
  readonly code = "CARGO_TASKS_TASK_UNKNOWN_001" as const;
  readonly userMessage: string;
  readonly exitCode = 2;
  readonly taskName: string;

  constructor(taskName: string) {
    super(`No such task: ${taskName}`, {
      suggestedRecovery: "Run cargo-tasks help to list the available tasks.",
    });
    this.taskName = taskName;
    this.userMessage = `No task named "${taskName}". Stop.`;
  }
}

// ── Environment Errors ──────────────────────────────────────────────────

export class WorkingDirectoryError extends CargoTasksError {
  readonly code = "CARGO_TASKS_ENV_CWD_001" as const;
  readonly userMessage: string;
  readonly exitCode = 2;
  readonly directory: string;

  constructor(directory: string) {
    super(`Not a directory: ${directory}`);
    this.directory = directory;
    this.userMessage = `${directory}: No such file or directory. Stop.`;
  }
}

// ── Execution Errors ────────────────────────────────────────────────────

export class ToolchainNotFoundError extends CargoTasksError {
  readonly code = "CARGO_TASKS_EXEC_SPAWN_001" as const;
  readonly userMessage: string;
  readonly exitCode = 127;
  readonly command: string;

  constructor(command: string, reason: string) {
    super(`Failed to start ${command}: ${reason}`, {
      suggestedRecovery: "Install the Rust toolchain or point CARGO at the cargo executable.",
    });
    this.command = command;
    this.userMessage = `${command}: could not be started (${reason})`;
  }
}
