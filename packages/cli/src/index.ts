#!/usr/bin/env node
/**
 * relaygen CLI - request handler registration generator
 */

import { runCli } from "./cli.js";

runCli(process.argv.slice(2))
  .then((exitCode) => {
    // exitCode rather than exit() so piped `list` output is flushed
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    console.error(
      "Fatal error:",
      error instanceof Error ? (error.stack ?? error.message) : error
    );
    process.exitCode = 1;
  });
