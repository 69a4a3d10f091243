/**
 * Module identities for source files
 *
 * Project files are named by their path relative to the project root
 * ("./src/handlers/ping.ts"), files of installed packages by the package
 * name, and globals (default library and script files) by "".
 */

import * as ts from "typescript";
import * as fs from "node:fs";
import * as path from "node:path";

const toPosix = (filePath: string): string => filePath.replace(/\\/g, "/");

/**
 * Package name of a file below node_modules, e.g.
 * "/p/node_modules/@scope/pkg/dist/index.d.ts" -> "@scope/pkg"
 */
export const packageNameFromPath = (filePath: string): string | undefined => {
  const normalized = toPosix(filePath);
  const marker = "/node_modules/";
  const index = normalized.lastIndexOf(marker);
  if (index < 0) {
    return undefined;
  }

  const segments = normalized.slice(index + marker.length).split("/");
  const [first, second] = segments;
  if (!first) {
    return undefined;
  }
  if (first.startsWith("@")) {
    return second ? `${first}/${second}` : undefined;
  }
  return first;
};

/**
 * Project-relative module identity, always starting with "./" or "../"
 */
export const relativeModuleId = (
  projectRoot: string,
  filePath: string
): string => {
  const relative = toPosix(path.relative(projectRoot, filePath));
  return relative.startsWith("../") ? relative : `./${relative}`;
};

const readPackageName = (packageJsonPath: string): string | undefined => {
  const parsed: unknown = JSON.parse(fs.readFileSync(packageJsonPath, "utf-8"));
  return typeof parsed === "object" &&
    parsed !== null &&
    "name" in parsed &&
    typeof parsed.name === "string"
    ? parsed.name
    : undefined;
};

/**
 * Build a module-identity lookup for one program.
 * Package names found on disk are cached per directory for the lifetime of
 * the returned function.
 */
export const createModuleIdentityResolver = (
  program: ts.Program,
  projectRoot: string
): ((sourceFile: ts.SourceFile) => string) => {
  const root = path.resolve(projectRoot);
  const packageNames = new Map<string, string | undefined>();

  const nearestPackageName = (dir: string): string | undefined => {
    const cached = packageNames.get(dir);
    if (cached !== undefined || packageNames.has(dir)) {
      return cached;
    }

    const packageJsonPath = path.join(dir, "package.json");
    const parent = path.dirname(dir);
    const name = fs.existsSync(packageJsonPath)
      ? readPackageName(packageJsonPath)
      : parent === dir
        ? undefined
        : nearestPackageName(parent);

    packageNames.set(dir, name);
    return name;
  };

  return (sourceFile: ts.SourceFile): string => {
    if (
      program.isSourceFileDefaultLibrary(sourceFile) ||
      !ts.isExternalModule(sourceFile)
    ) {
      return "";
    }

    const fileName = path.resolve(sourceFile.fileName);
    const fromNodeModules = packageNameFromPath(fileName);
    if (fromNodeModules) {
      return fromNodeModules;
    }

    const relative = path.relative(root, fileName);
    if (!relative.startsWith("..") && !path.isAbsolute(relative)) {
      return relativeModuleId(root, fileName);
    }

    // Linked workspace packages resolve to real paths outside the project
    return (
      nearestPackageName(path.dirname(fileName)) ??
      relativeModuleId(root, fileName)
    );
  };
};
