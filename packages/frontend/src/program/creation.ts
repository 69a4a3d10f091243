/**
 * Program creation
 */

import * as ts from "typescript";
import * as path from "node:path";
import * as fs from "node:fs";
import { type Result, ok, error } from "../types/result.js";
import {
  type DiagnosticsCollector,
  createDiagnostic,
  createDiagnosticsCollector,
} from "../types/diagnostic.js";
import type { HandlerProgram, ProgramOptions } from "./types.js";
import { defaultTsConfig } from "./config.js";
import { convertConfigDiagnostics } from "./diagnostics.js";

const SOURCE_EXTENSIONS = [".ts", ".tsx", ".mts", ".cts"];

const isSourceFileName = (name: string): boolean =>
  SOURCE_EXTENSIONS.some((ext) => name.endsWith(ext)) &&
  !/\.d\.[cm]?ts$/.test(name);

/**
 * Recursively scan a directory for TypeScript sources, skipping
 * node_modules and dot-directories
 */
export const scanForSourceFiles = (dir: string): readonly string[] => {
  const results: string[] = [];
  const entries = fs.readdirSync(dir, { withFileTypes: true });

  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      if (entry.name === "node_modules" || entry.name.startsWith(".")) {
        continue;
      }
      results.push(...scanForSourceFiles(fullPath));
    } else if (entry.isFile() && isSourceFileName(entry.name)) {
      results.push(fullPath);
    }
  }

  return results;
};

type RootFiles = {
  readonly fileNames: readonly string[];
  readonly compilerOptions: ts.CompilerOptions;
};

const readTsconfig = (
  configPath: string
): Result<RootFiles, DiagnosticsCollector> => {
  const configFile = ts.readConfigFile(configPath, ts.sys.readFile);
  if (configFile.error) {
    const readErrors = convertConfigDiagnostics([configFile.error]);
    return error(
      createDiagnosticsCollector(
        readErrors.length > 0
          ? readErrors
          : [
              createDiagnostic(
                "tsconfig-invalid",
                "error",
                `Failed to read ${configPath}`
              ),
            ]
      )
    );
  }

  const parsed = ts.parseJsonConfigFileContent(
    configFile.config,
    ts.sys,
    path.dirname(configPath),
    undefined,
    configPath
  );

  const parseErrors = convertConfigDiagnostics(parsed.errors);
  if (parseErrors.length > 0) {
    return error(createDiagnosticsCollector(parseErrors));
  }

  return ok({
    fileNames: parsed.fileNames,
    compilerOptions: { ...parsed.options, noEmit: true },
  });
};

const scanSourceRoot = (
  sourceRoot: string
): Result<RootFiles, DiagnosticsCollector> => {
  if (!fs.existsSync(sourceRoot) || !fs.statSync(sourceRoot).isDirectory()) {
    return error(
      createDiagnosticsCollector([
        createDiagnostic(
          "source-root-not-found",
          "error",
          `Source root not found: ${sourceRoot}`,
          undefined,
          "Set 'sourceRoot' in relaygen.json or pass --src"
        ),
      ])
    );
  }

  return ok({
    fileNames: scanForSourceFiles(sourceRoot),
    compilerOptions: defaultTsConfig,
  });
};

/**
 * Create the TypeScript program that handler discovery runs over
 */
export const createHandlerProgram = (
  options: ProgramOptions
): Result<HandlerProgram, DiagnosticsCollector> => {
  const rootsResult = options.tsconfig
    ? readTsconfig(path.resolve(options.projectRoot, options.tsconfig))
    : scanSourceRoot(path.resolve(options.projectRoot, options.sourceRoot));

  if (!rootsResult.ok) {
    return rootsResult;
  }

  const excluded = new Set(
    (options.exclude ?? []).map((file) => path.resolve(file))
  );

  const rootNames = rootsResult.value.fileNames
    .map((file) => path.resolve(file))
    .filter((file) => !excluded.has(file) && isSourceFileName(file))
    .sort();

  if (options.verbose) {
    console.log(`Scanning ${rootNames.length} source file(s)`);
  }

  const program = ts.createProgram(rootNames, rootsResult.value.compilerOptions);

  const sourceFiles = rootNames
    .map((file) => program.getSourceFile(file))
    .filter((sf): sf is ts.SourceFile => sf !== undefined);

  return ok({
    program,
    checker: program.getTypeChecker(),
    options,
    sourceFiles,
  });
};
