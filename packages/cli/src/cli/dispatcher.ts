/**
 * CLI command dispatcher
 */

import { dirname, resolve } from "node:path";
import { loadConfig, findConfig, resolveConfig } from "../config.js";
import type { ResolvedConfig, Result } from "../types.js";
import { generateCommand } from "../commands/generate.js";
import { listCommand } from "../commands/list.js";
import { checkCommand } from "../commands/check.js";
import { VERSION } from "./constants.js";
import { showHelp } from "./help.js";
import { parseArgs, type ParsedArgs } from "./parser.js";

/**
 * Load relaygen.json (named by -c, else the nearest one) and apply CLI
 * overrides. Without a config file the working directory is the project
 * root and defaults apply.
 */
const loadResolvedConfig = (
  parsed: ParsedArgs,
  cwd: string
): Result<ResolvedConfig, string> => {
  const configPath = parsed.options.config
    ? resolve(cwd, parsed.options.config)
    : findConfig(cwd);

  if (!configPath) {
    return { ok: true, value: resolveConfig({}, parsed.options, cwd) };
  }

  const configResult = loadConfig(configPath);
  if (!configResult.ok) {
    return configResult;
  }

  return {
    ok: true,
    value: resolveConfig(
      configResult.value,
      parsed.options,
      dirname(configPath)
    ),
  };
};

/**
 * Main CLI entry point
 */
export const runCli = async (
  args: readonly string[],
  cwd: string = process.cwd()
): Promise<number> => {
  const parsed = parseArgs(args);

  if (parsed.command === "version") {
    console.log(`relaygen v${VERSION}`);
    return 0;
  }

  if (parsed.command === "help" || !parsed.command) {
    showHelp();
    return 0;
  }

  const [unknownOption] = parsed.unknown;
  if (unknownOption !== undefined) {
    console.error(`Error: Unknown option '${unknownOption}'`);
    console.error("Run 'relaygen --help' for usage information");
    return 2;
  }

  const configResult = loadResolvedConfig(parsed, cwd);
  if (!configResult.ok) {
    console.error(`Error: ${configResult.error}`);
    return 1;
  }
  const config = configResult.value;

  switch (parsed.command) {
    case "generate": {
      const result = generateCommand(config);
      if (!result.ok) {
        console.error(`Error: ${result.error}`);
        return 1;
      }
      return 0;
    }

    case "list": {
      const result = listCommand(config);
      if (!result.ok) {
        console.error(`Error: ${result.error}`);
        return 1;
      }
      return 0;
    }

    case "check": {
      const result = checkCommand(config);
      if (!result.ok) {
        console.error(`Error: ${result.error}`);
        return 1;
      }
      return result.value === "up-to-date" ? 0 : 1;
    }

    default:
      console.error(`Error: Unknown command '${parsed.command}'`);
      console.error("Run 'relaygen --help' for usage information");
      return 2;
  }
};
