/**
 * Structured logging via pino.
 * Records go to stderr so they never interleave with cargo's stdout.
 */

import pino from "pino";

const DEFAULT_LOG_LEVEL = "warn";

/** Unknown level names fall back to the default instead of failing at startup. */
export function resolveLogLevel(level: string | undefined): string {
  if (level === undefined) {
    return DEFAULT_LOG_LEVEL;
  }
  return level === "silent" || Object.hasOwn(pino.levels.values, level) ? level : DEFAULT_LOG_LEVEL;
}

const logger = pino(
  {
    name: "cargo-tasks",
    level: resolveLogLevel(process.env["CARGO_TASKS_LOG_LEVEL"]),
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  pino.destination(2),
);

export function setVerbose(verbose: boolean): void {
  logger.level = verbose ? "debug" : resolveLogLevel(process.env["CARGO_TASKS_LOG_LEVEL"]);
}

export { logger };
