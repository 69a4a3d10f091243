/**
 * Constructor discovery for class declarations
 */

import * as ts from "typescript";
import type { Accessibility, ConstructorDescriptor } from "../types.js";
import { hasInternalTag, hasModifier } from "./declarations.js";
import { resolveHeritageTarget } from "./heritage.js";

const IMPLICIT_CONSTRUCTOR: ConstructorDescriptor = {
  accessibility: "public",
  isStatic: false,
};

const constructorAccessibility = (
  ctor: ts.ConstructorDeclaration
): Accessibility => {
  if (hasModifier(ctor, ts.ModifierFlags.Private)) {
    return "private";
  }
  if (hasModifier(ctor, ts.ModifierFlags.Protected)) {
    return "protected";
  }
  return hasInternalTag(ctor) ? "internal" : "public";
};

const baseClassOf = (
  checker: ts.TypeChecker,
  decl: ts.ClassDeclaration
): ts.ClassDeclaration | undefined => {
  const extendsClause = decl.heritageClauses?.find(
    (clause) => clause.token === ts.SyntaxKind.ExtendsKeyword
  );
  const [entry] = extendsClause?.types ?? [];
  return entry
    ? resolveHeritageTarget(checker, entry).find(ts.isClassDeclaration)
    : undefined;
};

const instanceConstructors = (
  checker: ts.TypeChecker,
  decl: ts.ClassDeclaration,
  visited: ReadonlySet<ts.ClassDeclaration>
): readonly ConstructorDescriptor[] => {
  const declared = decl.members.filter(ts.isConstructorDeclaration);
  if (declared.length > 0) {
    return declared.map((ctor) => ({
      accessibility: constructorAccessibility(ctor),
      isStatic: false,
    }));
  }

  // No constructor of its own: the nearest base class's constructors apply
  const base = baseClassOf(checker, decl);
  return base && !visited.has(base)
    ? instanceConstructors(checker, base, new Set([...visited, decl]))
    : [IMPLICIT_CONSTRUCTOR];
};

/**
 * Constructors usable on a class: declared or inherited instance
 * constructors, plus one static constructor per `static {}` block
 */
export const collectConstructors = (
  checker: ts.TypeChecker,
  decl: ts.ClassDeclaration
): readonly ConstructorDescriptor[] => {
  const staticBlocks = decl.members
    .filter(ts.isClassStaticBlockDeclaration)
    .map(
      (): ConstructorDescriptor => ({ accessibility: "private", isStatic: true })
    );

  return [
    ...instanceConstructors(checker, decl, new Set()),
    ...staticBlocks,
  ];
};
