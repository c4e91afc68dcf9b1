/**
 * Commander program: argument parsing, configuration resolution and task dispatch.
 */

import { Command, CommanderError } from "commander";
import pc from "picocolors";
import type { ICommandExecutor, TaskName } from "../types/task.js";
import { CargoTasksError } from "../types/errors.js";
import { isOverrideVariable } from "../types/config.js";
import { ProcessCommandExecutor } from "../core/command-executor.js";
import { PROGRAM_NAME, renderHelp } from "../core/help.js";
import { resolveTargets } from "../core/task-catalog.js";
import { TaskRunner } from "../core/task-runner.js";
import { ConfigStore } from "../storage/config-store.js";
import { getProjectConfigPath, resolveWorkingDirectory } from "../utils/pathResolver.js";
import { formatCommandLine } from "../utils/sanitizer.js";
import { logger, setVerbose } from "../utils/logger.js";
import { partitionArguments } from "./args.js";
import { parseCliFlags } from "./flags.js";
import type { ICliFlags } from "./flags.js";

export const VERSION = "1.0.0";

export interface ICliDependencies {
  readonly env: Readonly<Record<string, string | undefined>>;
  readonly stdout: (text: string) => void;
  readonly stderr: (text: string) => void;
  readonly createExecutor: (cwd: string) => ICommandExecutor;
}

export function defaultDependencies(): ICliDependencies {
  return {
    env: process.env,
    stdout: (text) => {
      process.stdout.write(text);
    },
    stderr: (text) => {
      process.stderr.write(text);
    },
    createExecutor: (cwd) => new ProcessCommandExecutor({ cwd }),
  };
}

type Colors = ReturnType<typeof pc.createColors>;

async function execute(
  positionals: readonly string[],
  flags: ICliFlags,
  deps: ICliDependencies,
  colors: Colors,
): Promise<number> {
  setVerbose(flags.verbose);

  const { targets, overrides } = partitionArguments(positionals);
  for (const name of Object.keys(overrides)) {
    if (!isOverrideVariable(name)) {
      logger.warn({ variable: name }, "Unknown override variable, ignoring");
    }
  }

  const tasks: TaskName[] = resolveTargets(targets);

  const cwd = resolveWorkingDirectory(flags.directory);
  const store = new ConfigStore();
  store.loadProject(getProjectConfigPath(cwd, flags.config));
  const config = store.resolve(deps.env, overrides);
  logger.debug({ cwd, tasks, config }, "Configuration resolved");

  const runner = new TaskRunner({
    executor: deps.createExecutor(cwd),
    dryRun: flags.dryRun,
    write: deps.stdout,
  });

  if (!flags.silent || flags.dryRun) {
    runner.events.on("command:start", ({ invocation }) => {
      deps.stdout(`${formatCommandLine(invocation.command, invocation.args)}\n`);
    });
  }
  runner.events.on("command:exit", ({ task, exitCode }) => {
    if (exitCode !== 0) {
      deps.stderr(colors.red(`${PROGRAM_NAME}: *** [${task}] Error ${exitCode}\n`));
    }
  });

  return runner.runSequence(tasks, config);
}

export function createProgram(
  deps: ICliDependencies,
  onAction: (positionals: readonly string[], flags: ICliFlags) => Promise<void>,
): Command {
  return new Command()
    .name(PROGRAM_NAME)
    .description("Build, test, lint and maintain a Rust project through cargo")
    .version(VERSION, "-v, --version")
    .argument("[targets...]", "tasks to run, and VAR=value overrides")
    .option("-n, --dry-run", "print the commands without running them")
    .option("-s, --silent", "do not echo commands")
    .option("-C, --directory <dir>", "run cargo in <dir>")
    .option("--config <path>", "project config file (default: cargo-tasks.json)")
    .option("--verbose", "enable debug logging")
    .option("--no-color", "disable colored output")
    .addHelpText("after", `\n${renderHelp()}`)
    .configureOutput({ writeOut: deps.stdout, writeErr: deps.stderr })
    .exitOverride()
    .action(async (positionals: string[] | undefined, options: Record<string, unknown>) => {
      await onAction(positionals ?? [], parseCliFlags(options));
    });
}

/**
 * Parse user arguments (without the node and script paths), run the tasks
 * and resolve with the process exit status.
 */
export async function runCli(
  argv: readonly string[],
  deps: ICliDependencies = defaultDependencies(),
): Promise<number> {
  const colors = pc.createColors(!argv.includes("--no-color") && pc.isColorSupported);
  let exitCode = 0;

  const program = createProgram(deps, async (positionals, flags) => {
    exitCode = await execute(positionals, flags, deps, colors);
  });

  try {
    await program.parseAsync([...argv], { from: "user" });
  } catch (error: unknown) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    if (error instanceof CargoTasksError) {
      logger.debug({ code: error.code, error: error.message }, "Task run aborted");
      deps.stderr(colors.red(`${PROGRAM_NAME}: ${error.userMessage}\n`));
      if (error.suggestedRecovery !== undefined) {
        deps.stderr(colors.dim(`${error.suggestedRecovery}\n`));
      }
      return error.exitCode;
    }
    const message = error instanceof Error ? error.message : String(error);
    logger.error({ error: message }, "CLI error");
    deps.stderr(colors.red(`Error: ${message}\n`));
    return 1;
  }

  return exitCode;
}
