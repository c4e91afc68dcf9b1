#!/usr/bin/env node

/**
 * cargo-tasks — CLI entry point
 */

import pc from "picocolors";
import { runCli } from "./program.js";

runCli(process.argv.slice(2))
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    process.stderr.write(
      pc.red(`Fatal error: ${error instanceof Error ? error.message : String(error)}\n`),
    );
    process.exit(1);
  });
