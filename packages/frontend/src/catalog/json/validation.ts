/**
 * Field validation for JSON catalog snapshots
 *
 * Each parser narrows an `unknown` JSON value into the catalog model or
 * returns the messages describing what is wrong with it.
 */

import type { Result } from "../../types/result.js";
import type { SourceLocation } from "../../types/diagnostic.js";
import type {
  Accessibility,
  BaseListEntry,
  ConstructorDescriptor,
  ContractInstantiation,
  OpaquePart,
  PrimitiveTypeName,
  TypeIdentity,
  TypeReference,
} from "../types.js";

export type JsonObject = { readonly [key: string]: unknown };

export const isJsonObject = (value: unknown): value is JsonObject =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const ACCESSIBILITIES: readonly Accessibility[] = [
  "public",
  "internal",
  "protected",
  "private",
];

const PRIMITIVES: readonly PrimitiveTypeName[] = [
  "string",
  "number",
  "boolean",
  "bigint",
  "symbol",
  "object",
  "undefined",
  "null",
  "void",
  "unknown",
  "never",
  "any",
];

type Parsed<T> = Result<T, readonly string[]>;

const fail = <T>(message: string): Parsed<T> => ({
  ok: false,
  error: [message],
});

export const parseAccessibility = (
  value: unknown,
  context: string
): Parsed<Accessibility> => {
  const match = ACCESSIBILITIES.find((a) => a === value);
  return match
    ? { ok: true, value: match }
    : fail(
        `${context}: 'accessibility' must be one of ${ACCESSIBILITIES.join(", ")}`
      );
};

export const parseBoolean = (
  obj: JsonObject,
  field: string,
  context: string
): Parsed<boolean> => {
  const value = obj[field];
  if (value === undefined) {
    return { ok: true, value: false };
  }
  return typeof value === "boolean"
    ? { ok: true, value }
    : fail(`${context}: '${field}' must be a boolean`);
};

export const parseString = (
  obj: JsonObject,
  field: string,
  context: string
): Parsed<string> => {
  const value = obj[field];
  return typeof value === "string"
    ? { ok: true, value }
    : fail(`${context}: missing or invalid '${field}'`);
};

/**
 * Parse an optional array field, collecting every element's errors
 */
export const parseArray = <T>(
  obj: JsonObject,
  field: string,
  context: string,
  parseItem: (item: unknown, itemContext: string) => Parsed<T>
): Parsed<readonly T[]> => {
  const value = obj[field];
  if (value === undefined) {
    return { ok: true, value: [] };
  }
  if (!Array.isArray(value)) {
    return fail(`${context}: '${field}' must be an array`);
  }

  const items: T[] = [];
  const errors: string[] = [];
  value.forEach((item: unknown, index) => {
    const parsed = parseItem(item, `${context}.${field}[${index}]`);
    if (parsed.ok) {
      items.push(parsed.value);
    } else {
      errors.push(...parsed.error);
    }
  });

  return errors.length > 0
    ? { ok: false, error: errors }
    : { ok: true, value: items };
};

export const parseIdentity = (
  value: unknown,
  context: string
): Parsed<TypeIdentity> => {
  if (!isJsonObject(value)) {
    return fail(`${context}: must be an object`);
  }
  const module = parseString(value, "module", context);
  const name = parseString(value, "name", context);
  if (!module.ok || !name.ok) {
    return {
      ok: false,
      error: [
        ...(module.ok ? [] : module.error),
        ...(name.ok ? [] : name.error),
      ],
    };
  }
  return { ok: true, value: { module: module.value, name: name.value } };
};

export const parseLocation = (
  value: unknown,
  context: string
): Parsed<SourceLocation> => {
  if (!isJsonObject(value)) {
    return fail(`${context}: location must be an object`);
  }
  const { file, line, column, length } = value;
  if (
    typeof file !== "string" ||
    typeof line !== "number" ||
    typeof column !== "number" ||
    typeof length !== "number"
  ) {
    return fail(
      `${context}: location needs a string 'file' and numeric 'line', 'column', 'length'`
    );
  }
  return { ok: true, value: { file, line, column, length } };
};

const parseOptionalLocation = (
  obj: JsonObject,
  context: string
): Parsed<SourceLocation | undefined> =>
  obj.location === undefined
    ? { ok: true, value: undefined }
    : parseLocation(obj.location, context);

const parseTypeList = (
  obj: JsonObject,
  field: string,
  context: string
): Parsed<readonly TypeReference[]> =>
  parseArray(obj, field, context, parseTypeReference);

/**
 * Parse a type reference; the `kind` field selects the shape
 */
export const parseTypeReference = (
  value: unknown,
  context: string
): Parsed<TypeReference> => {
  if (!isJsonObject(value)) {
    return fail(`${context}: type reference must be an object`);
  }

  switch (value.kind) {
    case "named": {
      const identity = parseIdentity(value, context);
      const args = parseTypeList(value, "typeArguments", context);
      if (!identity.ok) return identity;
      if (!args.ok) return args;
      return {
        ok: true,
        value: { kind: "named", ...identity.value, typeArguments: args.value },
      };
    }
    case "typeParameter": {
      const name = parseString(value, "name", context);
      return name.ok
        ? { ok: true, value: { kind: "typeParameter", name: name.value } }
        : name;
    }
    case "primitive": {
      const name = PRIMITIVES.find((p) => p === value.name);
      return name
        ? { ok: true, value: { kind: "primitive", name } }
        : fail(`${context}: unknown primitive '${String(value.name)}'`);
    }
    case "literal": {
      const literal = value.value;
      return typeof literal === "string" ||
        typeof literal === "number" ||
        typeof literal === "boolean"
        ? { ok: true, value: { kind: "literal", value: literal } }
        : fail(`${context}: literal 'value' must be a string, number or boolean`);
    }
    case "array": {
      const element = parseTypeReference(
        value.elementType,
        `${context}.elementType`
      );
      const readonly = parseBoolean(value, "readonly", context);
      if (!element.ok) return element;
      if (!readonly.ok) return readonly;
      return {
        ok: true,
        value: {
          kind: "array",
          elementType: element.value,
          readonly: readonly.value,
        },
      };
    }
    case "tuple": {
      const elements = parseTypeList(value, "elements", context);
      return elements.ok
        ? { ok: true, value: { kind: "tuple", elements: elements.value } }
        : elements;
    }
    case "union":
    case "intersection": {
      const kind = value.kind === "union" ? "union" : "intersection";
      const types = parseTypeList(value, "types", context);
      return types.ok
        ? { ok: true, value: { kind, types: types.value } }
        : types;
    }
    case "opaque": {
      if (value.parts === undefined) {
        const text = parseString(value, "text", context);
        return text.ok
          ? { ok: true, value: { kind: "opaque", parts: [text.value] } }
          : text;
      }
      const parts = parseArray(value, "parts", context, parseOpaquePart);
      return parts.ok
        ? { ok: true, value: { kind: "opaque", parts: parts.value } }
        : parts;
    }
    default:
      return fail(
        `${context}: unknown type reference kind '${String(value.kind)}'`
      );
  }
};

const parseOpaquePart = (
  value: unknown,
  context: string
): Parsed<OpaquePart> =>
  typeof value === "string"
    ? { ok: true, value }
    : parseTypeReference(value, context);

export const parseBaseListEntry = (
  value: unknown,
  context: string
): Parsed<BaseListEntry> => {
  if (typeof value === "string") {
    return { ok: true, value: { text: value } };
  }
  if (!isJsonObject(value)) {
    return fail(`${context}: must be a string or an object`);
  }
  const text = parseString(value, "text", context);
  const location = parseOptionalLocation(value, context);
  if (!text.ok) return text;
  if (!location.ok) return location;
  return { ok: true, value: { text: text.value, location: location.value } };
};

export const parseInstantiation = (
  value: unknown,
  context: string
): Parsed<ContractInstantiation> => {
  if (!isJsonObject(value)) {
    return fail(`${context}: must be an object`);
  }
  const origin = parseIdentity(value.origin, `${context}.origin`);
  const args = parseTypeList(value, "typeArguments", context);
  const location = parseOptionalLocation(value, context);
  if (!origin.ok) return origin;
  if (!args.ok) return args;
  if (!location.ok) return location;
  return {
    ok: true,
    value: {
      origin: origin.value,
      typeArguments: args.value,
      location: location.value,
    },
  };
};

export const parseConstructor = (
  value: unknown,
  context: string
): Parsed<ConstructorDescriptor> => {
  if (!isJsonObject(value)) {
    return fail(`${context}: must be an object`);
  }
  const accessibility = parseAccessibility(value.accessibility, context);
  const isStatic = parseBoolean(value, "isStatic", context);
  if (!accessibility.ok) return accessibility;
  if (!isStatic.ok) return isStatic;
  return {
    ok: true,
    value: { accessibility: accessibility.value, isStatic: isStatic.value },
  };
};
