/**
 * Declaration naming and accessibility
 */

import * as ts from "typescript";
import type { Accessibility, TypeIdentity } from "../types.js";

export type DeclarationNaming = TypeIdentity & {
  /** Reachable from outside its module (exported, or global) */
  readonly exported: boolean;
};

export const hasInternalTag = (node: ts.Node): boolean =>
  ts.getJSDocTags(node).some((tag) => tag.tagName.text === "internal");

export const hasModifier = (
  node: ts.Declaration,
  flag: ts.ModifierFlags
): boolean => (ts.getCombinedModifierFlags(node) & flag) !== 0;

const ownName = (decl: ts.Declaration): string => {
  const name = ts.getNameOfDeclaration(decl);
  if (name && (ts.isIdentifier(name) || ts.isStringLiteral(name))) {
    return name.text;
  }
  return hasModifier(decl, ts.ModifierFlags.Default) ? "default" : "";
};

const resolveAlias = (checker: ts.TypeChecker, symbol: ts.Symbol): ts.Symbol =>
  symbol.flags & ts.SymbolFlags.Alias ? checker.getAliasedSymbol(symbol) : symbol;

/**
 * Names under which a top-level declaration is exported from its file
 */
const exportNamesOf = (
  checker: ts.TypeChecker,
  decl: ts.Declaration
): readonly string[] => {
  const sourceFile = decl.getSourceFile();
  const moduleSymbol = checker.getSymbolAtLocation(sourceFile);
  const name = ts.getNameOfDeclaration(decl);
  const declared = name
    ? checker.getSymbolAtLocation(name)
    : checker.getTypeAtLocation(decl).getSymbol();

  if (!moduleSymbol || !declared) {
    return [];
  }

  const target = checker.getExportSymbolOfSymbol(declared);

  return checker
    .getExportsOfModule(moduleSymbol)
    .filter(
      (exported) =>
        checker.getExportSymbolOfSymbol(resolveAlias(checker, exported)) ===
        target
    )
    .map((exported) => exported.name)
    .sort();
};

type Container = {
  /** Namespace path from the module boundary down to the declaration */
  readonly path: readonly ts.Declaration[];
  /** Ambient `declare module "x"` name, when nested in one */
  readonly ambientModule?: string;
  /** Declared inside a function, block or class body */
  readonly isLocal: boolean;
};

const findContainer = (decl: ts.Declaration): Container => {
  const path: ts.Declaration[] = [decl];
  // `export const x` is reached through its statement
  let current: ts.Node =
    ts.isVariableDeclaration(decl) && ts.isVariableStatement(decl.parent.parent)
      ? decl.parent.parent.parent
      : decl.parent;

  while (!ts.isSourceFile(current)) {
    if (ts.isModuleBlock(current)) {
      current = current.parent;
      continue;
    }
    if (ts.isModuleDeclaration(current)) {
      if (ts.isStringLiteral(current.name)) {
        return { path, ambientModule: current.name.text, isLocal: false };
      }
      path.unshift(current);
      current = current.parent;
      continue;
    }
    return { path, isLocal: true };
  }

  return { path, isLocal: false };
};

/**
 * Name a declaration the way an importing module would reach it.
 *
 * `moduleOf` maps the declaring file to its module identity.
 */
export const createDeclarationNamer =
  (checker: ts.TypeChecker, moduleOf: (sourceFile: ts.SourceFile) => string) =>
  (decl: ts.Declaration): DeclarationNaming => {
    const container = findContainer(decl);
    const names = container.path.map(ownName);
    const [outermost] = container.path;
    const module = container.ambientModule ?? moduleOf(decl.getSourceFile());

    if (container.isLocal || !outermost) {
      return { module, name: names.join("."), exported: false };
    }

    // Inner namespace members need their own export modifier
    const innerExported = container.path
      .slice(1)
      .every((node) => hasModifier(node, ts.ModifierFlags.Export));

    if (module === "" || container.ambientModule !== undefined) {
      return { module, name: names.join("."), exported: innerExported };
    }

    const exportNames = exportNamesOf(checker, outermost);
    const [firstExportName] = exportNames;
    const outerName =
      exportNames.find((n) => n === names[0]) ?? firstExportName ?? names[0];

    return {
      module,
      name: [outerName, ...names.slice(1)].join("."),
      exported: firstExportName !== undefined && innerExported,
    };
  };

/**
 * Accessibility of a type declaration: exported is public (internal when
 * tagged `@internal`), everything else private
 */
export const getTypeAccessibility = (
  decl: ts.Declaration,
  naming: DeclarationNaming
): Accessibility => {
  if (!naming.exported) {
    return "private";
  }
  return hasInternalTag(decl) ? "internal" : "public";
};
