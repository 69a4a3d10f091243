/**
 * Configuration loading and validation
 */

import { readFileSync, existsSync } from "node:fs";
import { join, resolve, dirname, relative, isAbsolute } from "node:path";
import type { TypeIdentity } from "@relaygen/frontend";
import {
  DEFAULT_OUTPUT_FILE,
  defaultOptions,
  type ImportExtension,
} from "@relaygen/emitter";
import type {
  RelaygenConfig,
  CliOptions,
  ResolvedConfig,
  Result,
} from "./types.js";

export const CONFIG_FILE_NAME = "relaygen.json";

const IMPORT_EXTENSIONS: readonly ImportExtension[] = [".js", ".ts", ""];

type JsonObject = { readonly [key: string]: unknown };

const isJsonObject = (value: unknown): value is JsonObject =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const optionalString = (
  obj: JsonObject,
  field: string,
  errors: string[]
): string | undefined => {
  const value = obj[field];
  if (value === undefined || typeof value === "string") {
    return value;
  }
  errors.push(`${CONFIG_FILE_NAME}: '${field}' must be a string`);
  return undefined;
};

const optionalContract = (
  obj: JsonObject,
  errors: string[]
): TypeIdentity | undefined => {
  const value = obj.contract;
  if (value === undefined) {
    return undefined;
  }
  if (
    isJsonObject(value) &&
    typeof value.module === "string" &&
    typeof value.name === "string" &&
    value.name !== ""
  ) {
    return { module: value.module, name: value.name };
  }
  errors.push(
    `${CONFIG_FILE_NAME}: 'contract' must be an object with string 'module' and 'name'`
  );
  return undefined;
};

const optionalImportExtension = (
  obj: JsonObject,
  errors: string[]
): ImportExtension | undefined => {
  const value = obj.importExtension;
  if (value === undefined) {
    return undefined;
  }
  const match = IMPORT_EXTENSIONS.find((ext) => ext === value);
  if (match === undefined) {
    errors.push(
      `${CONFIG_FILE_NAME}: 'importExtension' must be one of ".js", ".ts", ""`
    );
  }
  return match;
};

/**
 * Validate the parsed contents of relaygen.json
 */
export const parseConfig = (data: unknown): Result<RelaygenConfig, string> => {
  if (!isJsonObject(data)) {
    return { ok: false, error: `${CONFIG_FILE_NAME} must contain an object` };
  }

  const errors: string[] = [];
  const includeTimestamp = data.includeTimestamp;
  if (includeTimestamp !== undefined && typeof includeTimestamp !== "boolean") {
    errors.push(`${CONFIG_FILE_NAME}: 'includeTimestamp' must be a boolean`);
  }

  const config: RelaygenConfig = {
    $schema: optionalString(data, "$schema", errors),
    sourceRoot: optionalString(data, "sourceRoot", errors),
    tsconfig: optionalString(data, "tsconfig", errors),
    outputFile: optionalString(data, "outputFile", errors),
    contract: optionalContract(data, errors),
    runtimeModule: optionalString(data, "runtimeModule", errors),
    importExtension: optionalImportExtension(data, errors),
    includeTimestamp:
      typeof includeTimestamp === "boolean" ? includeTimestamp : undefined,
    catalog: optionalString(data, "catalog", errors),
  };

  return errors.length === 0
    ? { ok: true, value: config }
    : { ok: false, error: errors.join("\n") };
};

/**
 * Load relaygen.json
 */
export const loadConfig = (
  configPath: string
): Result<RelaygenConfig, string> => {
  if (!existsSync(configPath)) {
    return {
      ok: false,
      error: `Config file not found: ${configPath}`,
    };
  }

  let data: unknown;
  try {
    data = JSON.parse(readFileSync(configPath, "utf-8"));
  } catch (error) {
    return {
      ok: false,
      error: `Failed to parse ${CONFIG_FILE_NAME}: ${error instanceof Error ? error.message : String(error)}`,
    };
  }

  return parseConfig(data);
};

/**
 * Find relaygen.json by walking up the directory tree
 */
export const findConfig = (startDir: string): string | null => {
  let currentDir = resolve(startDir);

  while (true) {
    const configPath = join(currentDir, CONFIG_FILE_NAME);
    if (existsSync(configPath)) {
      return configPath;
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
};

/**
 * Project-relative path with forward slashes and no leading "./"
 */
const toProjectPath = (projectRoot: string, file: string): string => {
  const relativePath = isAbsolute(file) ? relative(projectRoot, file) : file;
  return relativePath.replace(/\\/g, "/").replace(/^(\.\/)+/, "");
};

/**
 * Resolve final configuration from file + CLI args
 * @param projectRoot - Directory containing relaygen.json (or the working directory)
 */
export const resolveConfig = (
  config: RelaygenConfig,
  cliOptions: CliOptions,
  projectRoot: string = process.cwd()
): ResolvedConfig => {
  const root = resolve(projectRoot);
  const outputFile = toProjectPath(
    root,
    cliOptions.out ?? config.outputFile ?? DEFAULT_OUTPUT_FILE
  );
  const catalog = cliOptions.catalog ?? config.catalog;

  return {
    projectRoot: root,
    sourceRoot: cliOptions.src ?? config.sourceRoot ?? "src",
    tsconfig: cliOptions.tsconfig ?? config.tsconfig,
    outputFile,
    outputPath: resolve(root, outputFile),
    contract: config.contract ?? defaultOptions.contract,
    runtimeModule: config.runtimeModule ?? defaultOptions.runtimeModule,
    importExtension: config.importExtension ?? defaultOptions.importExtension,
    includeTimestamp:
      cliOptions.timestamp ??
      config.includeTimestamp ??
      defaultOptions.includeTimestamp,
    catalogPath: catalog === undefined ? undefined : resolve(root, catalog),
    verbose: cliOptions.verbose ?? false,
    quiet: cliOptions.quiet ?? false,
  };
};
