/**
 * Printing and comparing type references
 */

import type { TypeIdentity, TypeReference } from "./types.js";

export const sameIdentity = (a: TypeIdentity, b: TypeIdentity): boolean =>
  a.module === b.module && a.name === b.name;

/**
 * Fully-qualified name of a declaration: `module#name`, or just `name` for globals
 */
export const formatIdentity = (identity: TypeIdentity): string =>
  identity.module === "" ? identity.name : `${identity.module}#${identity.name}`;

const PLAIN_NAME = /^[A-Za-z_$][\w$]*(\.[A-Za-z_$][\w$]*)*$/;

/**
 * Whether `ref` must be parenthesized as an array element or as a member of
 * a union or intersection. Opaque text is grouped unless it is a bare name.
 */
const needsGrouping = (
  ref: TypeReference,
  position: "element" | "union" | "intersection"
): boolean => {
  switch (ref.kind) {
    case "opaque": {
      const [only] = ref.parts;
      return !(
        ref.parts.length === 1 &&
        typeof only === "string" &&
        PLAIN_NAME.test(only)
      );
    }
    case "union":
      return position !== "union";
    case "intersection":
      return position === "element";
    case "array":
      return position === "element" && ref.readonly;
    default:
      return false;
  }
};

/**
 * Print a type reference, naming declarations through `nameOf`
 */
export const printTypeReference = (
  ref: TypeReference,
  nameOf: (identity: TypeIdentity) => string
): string => {
  const print = (inner: TypeReference): string =>
    printTypeReference(inner, nameOf);
  const grouped =
    (position: "element" | "union" | "intersection") =>
    (inner: TypeReference): string =>
      needsGrouping(inner, position) ? `(${print(inner)})` : print(inner);

  switch (ref.kind) {
    case "named":
      return ref.typeArguments.length === 0
        ? nameOf(ref)
        : `${nameOf(ref)}<${ref.typeArguments.map(print).join(", ")}>`;
    case "typeParameter":
    case "primitive":
      return ref.name;
    case "literal":
      return typeof ref.value === "string"
        ? JSON.stringify(ref.value)
        : String(ref.value);
    case "array":
      return `${ref.readonly ? "readonly " : ""}${grouped("element")(ref.elementType)}[]`;
    case "tuple":
      return `[${ref.elements.map(print).join(", ")}]`;
    case "union":
      return ref.types.map(grouped("union")).join(" | ");
    case "intersection":
      return ref.types.map(grouped("intersection")).join(" & ");
    case "opaque":
      return ref.parts
        .map((part) => (typeof part === "string" ? part : print(part)))
        .join("");
  }
};

/**
 * Fully-qualified text of a type reference, e.g.
 * `./src/requests.ts#Envelope<./src/requests.ts#Ping, string>`
 */
export const formatTypeReference = (ref: TypeReference): string =>
  printTypeReference(ref, formatIdentity);

/**
 * Short text for messages, e.g. `Envelope<Ping, string>`
 */
export const displayTypeReference = (ref: TypeReference): string =>
  printTypeReference(ref, (identity) => identity.name);

/**
 * Key used to detect duplicate handlers for the same input and output
 */
export const formatSignature = (
  input: TypeReference,
  output: TypeReference
): string => `${formatTypeReference(input)}|${formatTypeReference(output)}`;

/**
 * Visit every named reference inside a type reference, outermost first
 */
export const collectNamedReferences = (
  ref: TypeReference
): readonly TypeIdentity[] => {
  switch (ref.kind) {
    case "named":
      return [
        { module: ref.module, name: ref.name },
        ...ref.typeArguments.flatMap(collectNamedReferences),
      ];
    case "array":
      return collectNamedReferences(ref.elementType);
    case "tuple":
      return ref.elements.flatMap(collectNamedReferences);
    case "union":
    case "intersection":
      return ref.types.flatMap(collectNamedReferences);
    case "opaque":
      return ref.parts.flatMap((part) =>
        typeof part === "string" ? [] : collectNamedReferences(part)
      );
    default:
      return [];
  }
};
