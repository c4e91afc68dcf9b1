import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join, resolve } from "node:path";
import { runCli, VERSION } from "./program.js";
import type { ICliDependencies } from "./program.js";
import type { ICommandExecutor, IInvocation } from "../types/task.js";
import { ToolchainNotFoundError } from "../types/errors.js";

class RecordingExecutor implements ICommandExecutor {
  readonly invocations: IInvocation[] = [];

  constructor(private readonly exitCodes: Readonly<Record<string, number>> = {}) {}

  async execute(invocation: IInvocation): Promise<number> {
    this.invocations.push(invocation);
    return this.exitCodes[invocation.args[0] ?? ""] ?? 0;
  }
}

interface IHarness {
  readonly deps: ICliDependencies;
  readonly stdout: string[];
  readonly stderr: string[];
  readonly cwds: string[];
}

function harness(
  executor: ICommandExecutor,
  env: Readonly<Record<string, string | undefined>> = {},
): IHarness {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const cwds: string[] = [];
  return {
    stdout,
    stderr,
    cwds,
    deps: {
      env,
      stdout: (text) => stdout.push(text),
      stderr: (text) => stderr.push(text),
      createExecutor: (cwd) => {
        cwds.push(cwd);
        return executor;
      },
    },
  };
}

describe("runCli", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "cargo-tasks-cli-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("echoes each command and reports the failing task", async () => {
    const executor = new RecordingExecutor({ clippy: 101 });
    const { deps, stdout, stderr, cwds } = harness(executor);

    const exitCode = await runCli(["--no-color", "-C", dir, "ci", "FEATURES=a"], deps);

    expect(exitCode).toBe(101);
    expect(cwds).toEqual([resolve(dir)]);
    expect(stdout).toEqual([
      "cargo fmt\n",
      "cargo clippy --features a --all-targets -- -D warnings\n",
    ]);
    expect(stderr).toEqual(["cargo-tasks: *** [lint] Error 101\n"]);
  });

  it("runs the default pipeline when no task is named", async () => {
    const executor = new RecordingExecutor();
    const { deps } = harness(executor);

    expect(await runCli(["-C", dir, "-s"], deps)).toBe(0);
    expect(executor.invocations.map((invocation) => invocation.args[0])).toEqual([
      "fmt",
      "clippy",
      "test",
      "build",
    ]);
  });

  it("does not echo in silent mode", async () => {
    const executor = new RecordingExecutor();
    const { deps, stdout } = harness(executor);

    expect(await runCli(["-C", dir, "--silent", "debug"], deps)).toBe(0);
    expect(stdout).toEqual([]);
    expect(executor.invocations).toEqual([{ command: "cargo", args: ["build"] }]);
  });

  it("prints commands without running them in dry-run mode", async () => {
    const executor = new RecordingExecutor();
    const { deps, stdout } = harness(executor);

    expect(await runCli(["-C", dir, "-n", "-s", "release", "test", "TEST_FLAGS=-- --nocapture"], deps)).toBe(0);
    expect(executor.invocations).toEqual([]);
    expect(stdout).toEqual(["cargo build --release\n", "cargo test -- --nocapture\n"]);
  });

  it("takes overrides from the environment, with arguments winning", async () => {
    const executor = new RecordingExecutor();
    const { deps } = harness(executor, { WORKSPACE: "--workspace", FEATURES: "env-only" });

    await runCli(["-C", dir, "-s", "check", "FEATURES=cli"], deps);

    expect(executor.invocations).toEqual([
      { command: "cargo", args: ["check", "--workspace", "--features", "cli"] },
    ]);
  });

  it("reads the project config file from the working directory", async () => {
    writeFileSync(join(dir, "cargo-tasks.json"), JSON.stringify({ cargo: "cross", cargoFlags: "--locked" }));
    const executor = new RecordingExecutor();
    const { deps } = harness(executor);

    await runCli(["-C", dir, "-s", "doc"], deps);

    expect(executor.invocations).toEqual([
      { command: "cross", args: ["doc", "--locked", "--no-deps"] },
    ]);
  });

  it("reads an explicit config file", async () => {
    writeFileSync(join(dir, "ci.json"), JSON.stringify({ workspace: "--workspace" }));
    const executor = new RecordingExecutor();
    const { deps } = harness(executor);

    await runCli(["-C", dir, "--config", "ci.json", "-s", "debug"], deps);

    expect(executor.invocations).toEqual([{ command: "cargo", args: ["build", "--workspace"] }]);
  });

  it("prints help without invoking the toolchain", async () => {
    const executor = new RecordingExecutor();
    const { deps, stdout } = harness(executor, { FEATURES: "whatever" });

    expect(await runCli(["-C", dir, "help"], deps)).toBe(0);
    expect(executor.invocations).toEqual([]);
    expect(stdout.join("").split("\n")[0]).toBe(
      "Usage: cargo-tasks [options] [task...] [VAR=value...]",
    );
  });

  it("rejects an unknown task with status 2", async () => {
    const executor = new RecordingExecutor();
    const { deps, stderr } = harness(executor);

    expect(await runCli(["--no-color", "-C", dir, "fmt", "deploy"], deps)).toBe(2);
    expect(executor.invocations).toEqual([]);
    expect(stderr[0]).toBe('cargo-tasks: No task named "deploy". Stop.\n');
  });

  it("rejects a working directory that does not exist with status 2", async () => {
    const executor = new RecordingExecutor();
    const { deps, stderr, cwds } = harness(executor);
    const missing = join(dir, "nonexistent");

    expect(await runCli(["--no-color", "-C", missing, "debug"], deps)).toBe(2);
    expect(cwds).toEqual([]);
    expect(executor.invocations).toEqual([]);
    expect(stderr).toEqual([`cargo-tasks: ${missing}: No such file or directory. Stop.\n`]);
  });

  it("reports a missing toolchain with status 127", async () => {
    const executor: ICommandExecutor = {
      execute: async (invocation) => {
        throw new ToolchainNotFoundError(invocation.command, "spawn cargo ENOENT");
      },
    };
    const { deps, stderr } = harness(executor);

    expect(await runCli(["--no-color", "-C", dir, "fmt"], deps)).toBe(127);
    expect(stderr[0]).toBe("cargo-tasks: cargo: could not be started (spawn cargo ENOENT)\n");
  });

  it("prints the version", async () => {
    const { deps, stdout } = harness(new RecordingExecutor());

    expect(await runCli(["--version"], deps)).toBe(0);
    expect(stdout).toEqual([`${VERSION}\n`]);
  });

  it("fails on an unknown option", async () => {
    const executor = new RecordingExecutor();
    const { deps, stderr } = harness(executor);

    expect(await runCli(["--bogus", "fmt"], deps)).toBe(1);
    expect(executor.invocations).toEqual([]);
    expect(stderr.join("")).toContain("unknown option '--bogus'");
  });
});
