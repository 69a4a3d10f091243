/**
 * Type catalog backed by a TypeScript program
 */

import * as ts from "typescript";
import type {
  BaseListEntry,
  CatalogEntry,
  TypeCatalog,
  TypeDescriptor,
  TypeIdentity,
} from "../types.js";
import type { HandlerProgram } from "../../program/types.js";
import { getNodeLocation } from "../../program/diagnostics.js";
import { sameIdentity } from "../type-reference.js";
import { createModuleIdentityResolver } from "./module-identity.js";
import {
  createDeclarationNamer,
  getTypeAccessibility,
  hasModifier,
} from "./declarations.js";
import type { TypeNodeContext } from "./type-nodes.js";
import { collectInterfaces, type HeritageDeclaration } from "./heritage.js";
import { collectConstructors } from "./constructors.js";

/**
 * Visit every class declaration in a file, including those nested in
 * namespaces and function bodies
 */
const collectClassDeclarations = (
  sourceFile: ts.SourceFile
): readonly ts.ClassDeclaration[] => {
  const found: ts.ClassDeclaration[] = [];

  const visit = (node: ts.Node): void => {
    if (ts.isClassDeclaration(node)) {
      found.push(node);
    }
    ts.forEachChild(node, visit);
  };

  visit(sourceFile);
  return found;
};

const collectInterfaceDeclarations = (
  sourceFile: ts.SourceFile
): readonly ts.InterfaceDeclaration[] => {
  const found: ts.InterfaceDeclaration[] = [];

  const visit = (node: ts.Node): void => {
    if (ts.isInterfaceDeclaration(node)) {
      found.push(node);
    } else if (
      ts.isSourceFile(node) ||
      ts.isModuleDeclaration(node) ||
      ts.isModuleBlock(node)
    ) {
      ts.forEachChild(node, visit);
    }
  };

  visit(sourceFile);
  return found;
};

const baseListOf = (decl: ts.ClassDeclaration): readonly BaseListEntry[] =>
  (decl.heritageClauses ?? []).flatMap((clause) =>
    clause.types.map((entry) => ({
      text: entry.getText(),
      location: getNodeLocation(entry),
    }))
  );

const symbolOf = (
  checker: ts.TypeChecker,
  decl: ts.ClassDeclaration
): ts.Symbol | undefined =>
  decl.name
    ? checker.getSymbolAtLocation(decl.name)
    : checker.getTypeAtLocation(decl).getSymbol();

/**
 * Declarations merged into a class symbol (a class plus same-named
 * interfaces) all contribute heritage
 */
const mergedDeclarations = (
  symbol: ts.Symbol,
  decl: ts.ClassDeclaration
): readonly HeritageDeclaration[] => {
  const merged = (symbol.declarations ?? []).filter(
    (d): d is HeritageDeclaration =>
      ts.isClassDeclaration(d) || ts.isInterfaceDeclaration(d)
  );
  return merged.includes(decl) ? merged : [decl, ...merged];
};

/**
 * Create a catalog over the program's project source files.
 *
 * Entries follow file order (sorted paths), then declaration order.
 * Each entry resolves its descriptor once, on first use.
 */
export const createProgramCatalog = (
  handlerProgram: HandlerProgram
): TypeCatalog => {
  const { program, checker } = handlerProgram;
  const moduleOf = createModuleIdentityResolver(
    program,
    handlerProgram.options.projectRoot
  );
  const nameDeclaration = createDeclarationNamer(checker, moduleOf);
  const context: TypeNodeContext = {
    checker,
    program,
    identityOf: (decl) => {
      const { module, name } = nameDeclaration(decl);
      return { module, name };
    },
  };

  const describe = (decl: ts.ClassDeclaration): TypeDescriptor | undefined => {
    const symbol = symbolOf(checker, decl);
    if (!symbol) {
      return undefined;
    }

    const naming = nameDeclaration(decl);
    const arity = decl.typeParameters?.length ?? 0;

    return {
      module: naming.module,
      name: naming.name,
      accessibility: getTypeAccessibility(decl, naming),
      isAbstract: hasModifier(decl, ts.ModifierFlags.Abstract),
      isStatic: false,
      arity,
      isUnboundGeneric: arity > 0,
      typeArguments: [],
      baseList: baseListOf(decl),
      interfaces: collectInterfaces(mergedDeclarations(symbol, decl), context),
      constructors: collectConstructors(checker, decl),
      locations: [getNodeLocation(decl.name ?? decl)],
    };
  };

  const createEntry = (decl: ts.ClassDeclaration): CatalogEntry => {
    let resolved: { readonly value: TypeDescriptor | undefined } | undefined;
    return {
      name: nameDeclaration(decl).name,
      baseList: baseListOf(decl),
      resolve: () => {
        if (!resolved) {
          resolved = { value: describe(decl) };
        }
        return resolved.value;
      },
    };
  };

  const entries = handlerProgram.sourceFiles
    .flatMap(collectClassDeclarations)
    .map(createEntry);

  const lookupContract = (target: TypeIdentity): TypeIdentity | undefined => {
    for (const sourceFile of program.getSourceFiles()) {
      if (moduleOf(sourceFile) !== target.module) {
        continue;
      }
      const match = collectInterfaceDeclarations(sourceFile)
        .map((decl) => context.identityOf(decl))
        .find((identity) => sameIdentity(identity, target));
      if (match) {
        return match;
      }
    }
    return undefined;
  };

  return { entries, lookupContract };
};
