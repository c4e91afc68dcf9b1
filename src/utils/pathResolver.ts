/**
 * Path handling for the working directory and the project config file.
 */

import { statSync } from "node:fs";
import { isAbsolute, join, resolve } from "node:path";
import { PROJECT_CONFIG_FILE } from "../types/config.js";
import { WorkingDirectoryError } from "../types/errors.js";

export function resolveWorkingDirectory(directory?: string): string {
  if (directory === undefined) {
    return process.cwd();
  }
  const resolved = resolve(directory);
  if (statSync(resolved, { throwIfNoEntry: false })?.isDirectory() !== true) {
    throw new WorkingDirectoryError(directory);
  }
  return resolved;
}

export function getProjectConfigPath(projectRoot: string, explicitPath?: string): string {
  if (explicitPath === undefined) {
    return join(projectRoot, PROJECT_CONFIG_FILE);
  }
  return isAbsolute(explicitPath) ? explicitPath : resolve(projectRoot, explicitPath);
}
