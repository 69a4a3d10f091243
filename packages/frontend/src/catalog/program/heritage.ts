/**
 * Transitive interface collection over heritage clauses
 */

import * as ts from "typescript";
import type {
  ContractInstantiation,
  TypeIdentity,
  TypeReference,
} from "../types.js";
import type { SourceLocation } from "../../types/diagnostic.js";
import { formatTypeReference } from "../type-reference.js";
import { getNodeLocation } from "../../program/diagnostics.js";
import {
  type TypeNodeContext,
  convertTypeNode,
  substituteTypeParameters,
} from "./type-nodes.js";

export type HeritageDeclaration = ts.ClassDeclaration | ts.InterfaceDeclaration;

const MAX_HERITAGE_DEPTH = 64;

const isHeritageDeclaration = (
  decl: ts.Declaration
): decl is HeritageDeclaration =>
  ts.isClassDeclaration(decl) || ts.isInterfaceDeclaration(decl);

/**
 * Class and interface declarations named by a heritage entry
 */
export const resolveHeritageTarget = (
  checker: ts.TypeChecker,
  entry: ts.ExpressionWithTypeArguments
): readonly HeritageDeclaration[] => {
  const symbol = checker.getSymbolAtLocation(entry.expression);
  const resolved =
    symbol && symbol.flags & ts.SymbolFlags.Alias
      ? checker.getAliasedSymbol(symbol)
      : symbol;
  return (resolved?.declarations ?? []).filter(isHeritageDeclaration);
};

/**
 * Bind a declaration's type parameters to written arguments; missing
 * arguments take the parameter default, then `unknown`
 */
export const bindTypeParameters = (
  parameters: readonly ts.TypeParameterDeclaration[],
  args: readonly TypeReference[],
  context: TypeNodeContext
): ReadonlyMap<string, TypeReference> => {
  const bound = new Map<string, TypeReference>();

  parameters.forEach((parameter, index) => {
    const written = args[index];
    const value: TypeReference =
      written ??
      (parameter.default
        ? substituteTypeParameters(
            convertTypeNode(parameter.default, context),
            bound
          )
        : { kind: "primitive", name: "unknown" });
    bound.set(parameter.name.text, value);
  });

  return bound;
};

type WalkState = {
  readonly seen: Set<string>;
  readonly active: Set<string>;
  readonly results: ContractInstantiation[];
};

const instantiationKey = (
  identity: TypeIdentity,
  typeArguments: readonly TypeReference[]
): string =>
  formatTypeReference({ kind: "named", ...identity, typeArguments });

const walk = (
  declarations: readonly HeritageDeclaration[],
  substitution: ReadonlyMap<string, TypeReference>,
  rootLocation: SourceLocation | undefined,
  context: TypeNodeContext,
  state: WalkState,
  depth: number
): void => {
  if (depth > MAX_HERITAGE_DEPTH) {
    return;
  }

  for (const decl of declarations) {
    for (const clause of decl.heritageClauses ?? []) {
      const producesInterface =
        clause.token === ts.SyntaxKind.ImplementsKeyword ||
        ts.isInterfaceDeclaration(decl);

      for (const entry of clause.types) {
        const targets = resolveHeritageTarget(context.checker, entry);
        const [primary] = targets;
        if (!primary) {
          continue;
        }

        const location = rootLocation ?? getNodeLocation(entry);
        const typeArguments = (entry.typeArguments ?? []).map((node) =>
          substituteTypeParameters(convertTypeNode(node, context), substitution)
        );
        const identity = context.identityOf(primary);
        const key = instantiationKey(identity, typeArguments);

        if (producesInterface && !state.seen.has(key)) {
          state.seen.add(key);
          state.results.push({
            origin: { module: identity.module, name: identity.name },
            typeArguments,
            location,
          });
        }

        if (state.active.has(key)) {
          continue;
        }

        state.active.add(key);
        walk(
          targets,
          bindTypeParameters(
            primary.typeParameters ?? [],
            typeArguments,
            context
          ),
          location,
          context,
          state,
          depth + 1
        );
        state.active.delete(key);
      }
    }
  }
};

/**
 * Every interface instantiation a class implements, including those
 * inherited through base classes and interface `extends`, in depth-first
 * declaration order. An instantiation reached twice is listed once.
 */
export const collectInterfaces = (
  declarations: readonly HeritageDeclaration[],
  context: TypeNodeContext
): readonly ContractInstantiation[] => {
  const state: WalkState = {
    seen: new Set(),
    active: new Set(),
    results: [],
  };
  walk(declarations, new Map(), undefined, context, state, 0);
  return state.results;
};
