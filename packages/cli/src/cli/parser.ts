/**
 * CLI argument parser
 */

import type { CliOptions } from "../types.js";

export type ParsedArgs = {
  readonly command: string;
  readonly options: CliOptions;
  /** Unrecognized flags and extra arguments, reported by the dispatcher */
  readonly unknown: readonly string[];
};

type FlagOption = "verbose" | "quiet" | "timestamp";
type ValueOption = "config" | "src" | "out" | "catalog" | "tsconfig";

const FLAGS = new Map<string, FlagOption>([
  ["-V", "verbose"],
  ["--verbose", "verbose"],
  ["-q", "quiet"],
  ["--quiet", "quiet"],
  ["--timestamp", "timestamp"],
]);

const VALUES = new Map<string, ValueOption>([
  ["-c", "config"],
  ["--config", "config"],
  ["-s", "src"],
  ["--src", "src"],
  ["-o", "out"],
  ["--out", "out"],
  ["--catalog", "catalog"],
  ["--tsconfig", "tsconfig"],
]);

/**
 * Parse CLI arguments.
 *
 * Value options take the next argument or an inline `--name=value`; a value
 * option with nothing after it gets the empty string. `-h` and `-v` win over
 * everything else on the line.
 */
export const parseArgs = (args: readonly string[]): ParsedArgs => {
  const options: CliOptions = {};
  const unknown: string[] = [];
  let command = "";

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? "";

    if (arg === "-h" || arg === "--help") {
      return { command: "help", options: {}, unknown: [] };
    }
    if (arg === "-v" || arg === "--version") {
      return { command: "version", options: {}, unknown: [] };
    }

    if (!arg.startsWith("-")) {
      if (command === "") {
        command = arg;
      } else {
        unknown.push(arg);
      }
      continue;
    }

    const flag = FLAGS.get(arg);
    if (flag !== undefined) {
      options[flag] = true;
      continue;
    }

    const eq = arg.indexOf("=");
    const name = eq === -1 ? arg : arg.slice(0, eq);
    const valueOption = VALUES.get(name);
    if (valueOption === undefined) {
      unknown.push(arg);
      continue;
    }
    options[valueOption] = eq === -1 ? args[++i] ?? "" : arg.slice(eq + 1);
  }

  return { command, options, unknown };
};
