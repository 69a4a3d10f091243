/**
 * Module aliases for the registration module
 *
 * Every module a registration refers to is imported once as a namespace
 * (`__m0`, `__m1`, ...), so emitted names never collide with each other
 * or with the module's own bindings.
 */

import * as path from "node:path";
import {
  type HandlerRecord,
  type TypeIdentity,
  collectNamedReferences,
  compareOrdinal,
} from "@relaygen/frontend";
import type { ImportExtension } from "./types.js";

export type ModuleAlias = {
  /** Module identity as recorded in the catalog */
  readonly module: string;
  readonly alias: string;
  /** Specifier written in the import declaration */
  readonly specifier: string;
  /** A handler class is referenced as a value, so the import is not type-only */
  readonly valueImport: boolean;
};

export type ModuleAliasMap = {
  /** In import order (ordinal by module identity) */
  readonly imports: readonly ModuleAlias[];
  readonly aliasOf: (module: string) => string | undefined;
};

const isProjectModule = (module: string): boolean =>
  module.startsWith("./") || module.startsWith("../");

const OUTPUT_EXTENSIONS: Readonly<Record<string, string>> = {
  ".ts": ".js",
  ".tsx": ".js",
  ".mts": ".mjs",
  ".cts": ".cjs",
};

const splitExtension = (
  file: string
): { readonly base: string; readonly extension: string } => {
  const declaration = /\.d\.([cm]?)ts$/.exec(file);
  if (declaration) {
    return {
      base: file.slice(0, -declaration[0].length),
      extension: `.${declaration[1] ?? ""}ts`,
    };
  }
  const extension = path.posix.extname(file);
  return { base: file.slice(0, file.length - extension.length), extension };
};

const withImportExtension = (
  file: string,
  importExtension: ImportExtension
): string => {
  const { base, extension } = splitExtension(file);
  switch (importExtension) {
    case "":
      return base;
    case ".ts":
      return file.endsWith(".d.ts") ? `${base}.js` : file;
    case ".js":
      return `${base}${OUTPUT_EXTENSIONS[extension] ?? extension}`;
  }
};

/**
 * Import specifier for a module, as seen from the output file.
 * Packages are imported by name; project modules by relative path.
 */
export const resolveImportSpecifier = (
  outputFile: string,
  module: string,
  importExtension: ImportExtension
): string => {
  if (!isProjectModule(module)) {
    return module;
  }

  const relative = path.posix.relative(
    path.posix.dirname(path.posix.normalize(outputFile)),
    path.posix.normalize(module)
  );
  const specifier = relative.startsWith("../") ? relative : `./${relative}`;
  return withImportExtension(specifier, importExtension);
};

const referencedTypes = (
  record: HandlerRecord,
  contract: TypeIdentity
): readonly TypeIdentity[] => [
  contract,
  ...record.handler.typeArguments.flatMap(collectNamedReferences),
  ...collectNamedReferences(record.inputType),
  ...collectNamedReferences(record.outputType),
];

/**
 * Assign aliases to every module the records refer to. Globals ("") need
 * no import and get no alias.
 */
export const buildModuleAliases = (
  records: readonly HandlerRecord[],
  options: {
    readonly outputFile: string;
    readonly contract: TypeIdentity;
    readonly importExtension: ImportExtension;
  }
): ModuleAliasMap => {
  const valueModules = new Set(records.map((r) => r.handler.module));
  const modules = new Set<string>(valueModules);
  for (const record of records) {
    for (const identity of referencedTypes(record, options.contract)) {
      modules.add(identity.module);
    }
  }
  modules.delete("");

  const imports = [...modules].sort(compareOrdinal).map(
    (module, index): ModuleAlias => ({
      module,
      alias: `__m${index}`,
      specifier: resolveImportSpecifier(
        options.outputFile,
        module,
        options.importExtension
      ),
      valueImport: valueModules.has(module),
    })
  );

  const byModule = new Map<string, string>(
    imports.map((entry): [string, string] => [entry.module, entry.alias])
  );

  return {
    imports,
    aliasOf: (module) => byModule.get(module),
  };
};
