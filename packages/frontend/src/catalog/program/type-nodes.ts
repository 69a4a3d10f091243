/**
 * Conversion of written type nodes into catalog type references
 *
 * Works from syntax plus symbol resolution only; the checker's inferred
 * types are never consulted, so aliases and written argument lists survive.
 */

import * as ts from "typescript";
import type {
  OpaquePart,
  PrimitiveTypeName,
  TypeIdentity,
  TypeReference,
} from "../types.js";

export type TypeNodeContext = {
  readonly checker: ts.TypeChecker;
  readonly program: ts.Program;
  readonly identityOf: (decl: ts.Declaration) => TypeIdentity;
};

const KEYWORD_PRIMITIVES: ReadonlyMap<ts.SyntaxKind, PrimitiveTypeName> =
  new Map<ts.SyntaxKind, PrimitiveTypeName>([
    [ts.SyntaxKind.StringKeyword, "string"],
    [ts.SyntaxKind.NumberKeyword, "number"],
    [ts.SyntaxKind.BooleanKeyword, "boolean"],
    [ts.SyntaxKind.BigIntKeyword, "bigint"],
    [ts.SyntaxKind.SymbolKeyword, "symbol"],
    [ts.SyntaxKind.ObjectKeyword, "object"],
    [ts.SyntaxKind.UndefinedKeyword, "undefined"],
    [ts.SyntaxKind.VoidKeyword, "void"],
    [ts.SyntaxKind.UnknownKeyword, "unknown"],
    [ts.SyntaxKind.NeverKeyword, "never"],
    [ts.SyntaxKind.AnyKeyword, "any"],
  ]);


const convertLiteral = (
  node: ts.LiteralTypeNode,
  context: TypeNodeContext
): TypeReference => {
  const literal = node.literal;
  switch (literal.kind) {
    case ts.SyntaxKind.NullKeyword:
      return { kind: "primitive", name: "null" };
    case ts.SyntaxKind.TrueKeyword:
      return { kind: "literal", value: true };
    case ts.SyntaxKind.FalseKeyword:
      return { kind: "literal", value: false };
    case ts.SyntaxKind.StringLiteral:
    case ts.SyntaxKind.NoSubstitutionTemplateLiteral:
      return { kind: "literal", value: literal.text };
    case ts.SyntaxKind.NumericLiteral:
      return { kind: "literal", value: Number(literal.text) };
    default:
      return ts.isPrefixUnaryExpression(literal) &&
        literal.operator === ts.SyntaxKind.MinusToken &&
        ts.isNumericLiteral(literal.operand)
        ? { kind: "literal", value: -Number(literal.operand.text) }
        : opaque(node, context);
  }
};

const resolveSymbol = (
  checker: ts.TypeChecker,
  name: ts.EntityName
): ts.Symbol | undefined => {
  const symbol = checker.getSymbolAtLocation(name);
  return symbol && symbol.flags & ts.SymbolFlags.Alias
    ? checker.getAliasedSymbol(symbol)
    : symbol;
};

/**
 * A non-generic alias of another type reference (`type PingAlias = Ping`)
 * names the same type, so it converts to the aliased reference
 */
const aliasedReference = (
  decl: ts.Declaration
): ts.TypeReferenceNode | undefined =>
  ts.isTypeAliasDeclaration(decl) &&
  !decl.typeParameters &&
  ts.isTypeReferenceNode(decl.type)
    ? decl.type
    : undefined;

const convertReference = (
  node: ts.TypeReferenceNode,
  context: TypeNodeContext,
  expanding: ReadonlySet<ts.Declaration> = new Set()
): TypeReference => {
  const typeArguments = (node.typeArguments ?? []).map((arg) =>
    convertTypeNode(arg, context)
  );
  const decl = resolveSymbol(context.checker, node.typeName)?.declarations?.[0];

  if (!decl) {
    return {
      kind: "named",
      module: "",
      name: node.typeName.getText(),
      typeArguments,
    };
  }

  if (ts.isTypeParameterDeclaration(decl)) {
    return { kind: "typeParameter", name: decl.name.text };
  }

  const aliased = aliasedReference(decl);
  if (aliased && !expanding.has(decl)) {
    return convertReference(aliased, context, new Set([...expanding, decl]));
  }

  const [elementType] = typeArguments;
  if (
    elementType &&
    typeArguments.length === 1 &&
    context.program.isSourceFileDefaultLibrary(decl.getSourceFile())
  ) {
    const name = ts.getNameOfDeclaration(decl)?.getText();
    if (name === "Array" || name === "ReadonlyArray") {
      return { kind: "array", elementType, readonly: name === "ReadonlyArray" };
    }
  }

  if (ts.isEnumMember(decl)) {
    const owner = context.identityOf(decl.parent);
    return {
      kind: "named",
      module: owner.module,
      name: `${owner.name}.${decl.name.getText()}`,
      typeArguments: [],
    };
  }

  return { kind: "named", ...context.identityOf(decl), typeArguments };
};

const declaredWithin = (decl: ts.Node, root: ts.Node): boolean =>
  decl.getSourceFile() === root.getSourceFile() &&
  decl.pos >= root.pos &&
  decl.end <= root.end;

/**
 * Reference embedded in opaque text, or undefined when the node stays text.
 * Type parameters declared inside the opaque form itself (mapped and
 * `infer` parameters) are local to it and stay text.
 */
const embeddedReference = (
  node: ts.Node,
  root: ts.Node,
  context: TypeNodeContext
): TypeReference | undefined => {
  if (ts.isTypeReferenceNode(node)) {
    const decl = resolveSymbol(context.checker, node.typeName)
      ?.declarations?.[0];
    return decl &&
      ts.isTypeParameterDeclaration(decl) &&
      declaredWithin(decl, root)
      ? undefined
      : convertReference(node, context);
  }
  if (ts.isTypeQueryNode(node.parent) && node === node.parent.exprName) {
    const decl = resolveSymbol(context.checker, node.parent.exprName)
      ?.declarations?.[0];
    return decl && !declaredWithin(decl, root)
      ? { kind: "named", ...context.identityOf(decl), typeArguments: [] }
      : undefined;
  }
  return undefined;
};

/**
 * Keep a type form without a structural counterpart as whitespace-normalized
 * text, with the references inside it converted
 */
const opaque = (node: ts.TypeNode, context: TypeNodeContext): TypeReference => {
  const source = node.getSourceFile().text;
  const parts: OpaquePart[] = [];
  let cursor = node.getStart();

  const pushText = (end: number): void => {
    if (end > cursor) {
      parts.push(source.slice(cursor, end).replace(/\s+/g, " "));
    }
  };

  const visit = (child: ts.Node): void => {
    const reference = embeddedReference(child, node, context);
    if (!reference) {
      ts.forEachChild(child, visit);
      return;
    }
    pushText(child.getStart());
    parts.push(reference);
    cursor = child.getEnd();
  };

  ts.forEachChild(node, visit);
  pushText(node.getEnd());
  return { kind: "opaque", parts };
};

/**
 * Convert a written type into a type reference. Forms without a structural
 * counterpart (function types, mapped types, `typeof`) keep their text.
 */
export const convertTypeNode = (
  node: ts.TypeNode,
  context: TypeNodeContext
): TypeReference => {
  const primitive = KEYWORD_PRIMITIVES.get(node.kind);
  if (primitive) {
    return { kind: "primitive", name: primitive };
  }

  if (ts.isParenthesizedTypeNode(node)) {
    return convertTypeNode(node.type, context);
  }
  if (ts.isTypeReferenceNode(node)) {
    return convertReference(node, context);
  }
  if (ts.isLiteralTypeNode(node)) {
    return convertLiteral(node, context);
  }
  if (ts.isArrayTypeNode(node)) {
    return {
      kind: "array",
      elementType: convertTypeNode(node.elementType, context),
      readonly: false,
    };
  }
  if (
    ts.isTypeOperatorNode(node) &&
    node.operator === ts.SyntaxKind.ReadonlyKeyword &&
    ts.isArrayTypeNode(node.type)
  ) {
    return {
      kind: "array",
      elementType: convertTypeNode(node.type.elementType, context),
      readonly: true,
    };
  }
  if (ts.isTupleTypeNode(node)) {
    const plain = node.elements.every(
      (e) => !ts.isRestTypeNode(e) && !ts.isOptionalTypeNode(e)
    );
    return plain
      ? {
          kind: "tuple",
          elements: node.elements.map((e) =>
            convertTypeNode(ts.isNamedTupleMember(e) ? e.type : e, context)
          ),
        }
      : opaque(node, context);
  }
  if (ts.isUnionTypeNode(node)) {
    return {
      kind: "union",
      types: node.types.map((t) => convertTypeNode(t, context)),
    };
  }
  if (ts.isIntersectionTypeNode(node)) {
    return {
      kind: "intersection",
      types: node.types.map((t) => convertTypeNode(t, context)),
    };
  }

  return opaque(node, context);
};

/**
 * Replace type parameters bound in `substitution`
 */
export const substituteTypeParameters = (
  ref: TypeReference,
  substitution: ReadonlyMap<string, TypeReference>
): TypeReference => {
  if (substitution.size === 0) {
    return ref;
  }

  switch (ref.kind) {
    case "typeParameter":
      return substitution.get(ref.name) ?? ref;
    case "named":
      return {
        ...ref,
        typeArguments: ref.typeArguments.map((t) =>
          substituteTypeParameters(t, substitution)
        ),
      };
    case "array":
      return {
        ...ref,
        elementType: substituteTypeParameters(ref.elementType, substitution),
      };
    case "tuple":
      return {
        ...ref,
        elements: ref.elements.map((t) =>
          substituteTypeParameters(t, substitution)
        ),
      };
    case "union":
    case "intersection":
      return {
        ...ref,
        types: ref.types.map((t) => substituteTypeParameters(t, substitution)),
      };
    case "opaque":
      return {
        ...ref,
        parts: ref.parts.map((part) =>
          typeof part === "string"
            ? part
            : substituteTypeParameters(part, substitution)
        ),
      };
    default:
      return ref;
  }
};
