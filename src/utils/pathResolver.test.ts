import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join, resolve } from "node:path";
import { getProjectConfigPath, resolveWorkingDirectory } from "./pathResolver.js";
import { WorkingDirectoryError } from "../types/errors.js";

describe("resolveWorkingDirectory", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "cargo-tasks-cwd-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("defaults to the process working directory", () => {
    expect(resolveWorkingDirectory()).toBe(process.cwd());
  });

  it("resolves an existing directory", () => {
    expect(resolveWorkingDirectory(dir)).toBe(resolve(dir));
  });

  it("rejects a directory that does not exist", () => {
    const missing = join(dir, "missing");
    expect(() => resolveWorkingDirectory(missing)).toThrow(WorkingDirectoryError);
  });

  it("rejects a path that is a file", () => {
    const file = join(dir, "Cargo.toml");
    writeFileSync(file, "[package]\n");
    expect(() => resolveWorkingDirectory(file)).toThrow(WorkingDirectoryError);
  });
});

describe("getProjectConfigPath", () => {
  it("uses cargo-tasks.json in the project root by default", () => {
    expect(getProjectConfigPath("/work/crate")).toBe(join("/work/crate", "cargo-tasks.json"));
  });

  it("resolves a relative explicit path against the project root", () => {
    expect(getProjectConfigPath("/work/crate", "ci.json")).toBe(resolve("/work/crate", "ci.json"));
  });
});
