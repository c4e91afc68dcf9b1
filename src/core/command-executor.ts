/**
 * Forwarded command execution via execa.
 * Stdio is inherited so cargo's own output and diagnostics reach the user unchanged.
 */

import { execa } from "execa";
import { constants } from "node:os";
import type { ICommandExecutor, IInvocation } from "../types/task.js";
import { ToolchainNotFoundError } from "../types/errors.js";
import { formatCommandLine } from "../utils/sanitizer.js";
import { logger } from "../utils/logger.js";

export interface ILaunchOptions {
  readonly cwd: string;
}

export interface IProcessOutcome {
  readonly exitCode?: number | undefined;
  readonly signal?: string | undefined;
  readonly errorMessage?: string | undefined;
}

export type ProcessLauncher = (
  command: string,
  args: readonly string[],
  options: ILaunchOptions,
) => Promise<IProcessOutcome>;

export const launchWithExeca: ProcessLauncher = async (command, args, options) => {
  const result = await execa(command, args, {
    cwd: options.cwd,
    stdio: "inherit",
    reject: false,
  });
  return {
    exitCode: result.exitCode,
    signal: result.signal,
    errorMessage: result instanceof Error ? result.message : undefined,
  };
};

export function signalExitCode(signal: string): number {
  const match = Object.entries(constants.signals).find(([name]) => name === signal);
  return 128 + (match?.[1] ?? 0);
}

export interface IProcessCommandExecutorOptions {
  readonly cwd: string;
  readonly launch?: ProcessLauncher | undefined;
}

export class ProcessCommandExecutor implements ICommandExecutor {
  private readonly cwd: string;
  private readonly launch: ProcessLauncher;

  constructor(options: IProcessCommandExecutorOptions) {
    this.cwd = options.cwd;
    this.launch = options.launch ?? launchWithExeca;
  }

  async execute(invocation: IInvocation): Promise<number> {
    const commandLine = formatCommandLine(invocation.command, invocation.args);
    logger.debug({ command: commandLine, cwd: this.cwd }, "Spawning command");

    const outcome = await this.launch(invocation.command, invocation.args, { cwd: this.cwd });

    if (outcome.exitCode !== undefined) {
      logger.debug({ command: commandLine, exitCode: outcome.exitCode }, "Command exited");
      return outcome.exitCode;
    }

    if (outcome.signal !== undefined) {
      logger.debug({ command: commandLine, signal: outcome.signal }, "Command terminated by signal");
      return signalExitCode(outcome.signal);
    }

    const reason = outcome.errorMessage ?? "process could not be started";
    logger.error({ command: commandLine, error: reason }, "Command failed to start");
    throw new ToolchainNotFoundError(invocation.command, reason);
  }
}
