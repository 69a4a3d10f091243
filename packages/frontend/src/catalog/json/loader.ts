/**
 * JSON catalog loader - reads and validates serialized type catalogs.
 *
 * A catalog snapshot lets hosts other than the TypeScript program walker
 * feed the discovery pipeline:
 *
 *   {
 *     "version": 1,
 *     "interfaces": [{ "module": "@relaygen/contracts", "name": "RequestHandler" }],
 *     "types": [{ "module": "./src/ping.ts", "name": "PingHandler", ... }]
 *   }
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { type Result, collectErrors } from "../../types/result.js";
import { type Diagnostic, createDiagnostic } from "../../types/diagnostic.js";
import type {
  CatalogEntry,
  TypeCatalog,
  TypeDescriptor,
  TypeIdentity,
} from "../types.js";
import { sameIdentity } from "../type-reference.js";
import {
  isJsonObject,
  parseAccessibility,
  parseArray,
  parseBaseListEntry,
  parseBoolean,
  parseConstructor,
  parseIdentity,
  parseInstantiation,
  parseLocation,
  parseTypeReference,
} from "./validation.js";

export const CATALOG_VERSION = 1;

type ParsedType = {
  readonly descriptor: TypeDescriptor;
  /** The host could not resolve this declaration semantically */
  readonly unresolved: boolean;
};

const typeError = (message: string): Diagnostic =>
  createDiagnostic("catalog-invalid-type", "error", message);

const parseType = (
  value: unknown,
  context: string
): Result<ParsedType, readonly Diagnostic[]> => {
  if (!isJsonObject(value)) {
    return { ok: false, error: [typeError(`${context}: must be an object`)] };
  }

  const identity = parseIdentity(value, context);
  const accessibility = parseAccessibility(value.accessibility, context);
  const isAbstract = parseBoolean(value, "isAbstract", context);
  const isStatic = parseBoolean(value, "isStatic", context);
  const isUnboundGeneric = parseBoolean(value, "isUnboundGeneric", context);
  const unresolved = parseBoolean(value, "unresolved", context);
  const typeArguments = parseArray(
    value,
    "typeArguments",
    context,
    parseTypeReference
  );
  const baseList = parseArray(
    value,
    "baseList",
    context,
    parseBaseListEntry
  );
  const interfaces = parseArray(
    value,
    "interfaces",
    context,
    parseInstantiation
  );
  const constructors = parseArray(
    value,
    "constructors",
    context,
    parseConstructor
  );
  const locations = parseArray(value, "locations", context, parseLocation);

  const arity = value.arity ?? 0;
  const arityErrors =
    typeof arity === "number" && Number.isInteger(arity) && arity >= 0
      ? []
      : [`${context}: 'arity' must be a non-negative integer`];

  if (
    !identity.ok ||
    !accessibility.ok ||
    !isAbstract.ok ||
    !isStatic.ok ||
    !isUnboundGeneric.ok ||
    !unresolved.ok ||
    !typeArguments.ok ||
    !baseList.ok ||
    !interfaces.ok ||
    !constructors.ok ||
    !locations.ok ||
    typeof arity !== "number" ||
    arityErrors.length > 0
  ) {
    const messages = collectErrors([
      identity,
      accessibility,
      isAbstract,
      isStatic,
      isUnboundGeneric,
      unresolved,
      typeArguments,
      baseList,
      interfaces,
      constructors,
      locations,
    ]);
    return {
      ok: false,
      error: [...messages, ...arityErrors].map(typeError),
    };
  }

  return {
    ok: true,
    value: {
      unresolved: unresolved.value,
      descriptor: {
        ...identity.value,
        accessibility: accessibility.value,
        isAbstract: isAbstract.value,
        isStatic: isStatic.value,
        arity,
        isUnboundGeneric: isUnboundGeneric.value,
        typeArguments: typeArguments.value,
        baseList: baseList.value,
        interfaces: interfaces.value,
        constructors: constructors.value,
        locations: locations.value,
      },
    },
  };
};

const toEntry = ({ descriptor, unresolved }: ParsedType): CatalogEntry => ({
  name: descriptor.name,
  baseList: descriptor.baseList,
  resolve: () => (unresolved ? undefined : descriptor),
});

/**
 * Validate parsed JSON and build a catalog from it
 */
export const parseCatalog = (
  data: unknown,
  fileName: string
): Result<TypeCatalog, readonly Diagnostic[]> => {
  const baseName = path.basename(fileName);

  if (!isJsonObject(data)) {
    return {
      ok: false,
      error: [
        createDiagnostic(
          "catalog-invalid-structure",
          "error",
          `Catalog file must be an object: ${baseName}`
        ),
      ],
    };
  }

  const diagnostics: Diagnostic[] = [];

  if (data.version !== CATALOG_VERSION) {
    diagnostics.push(
      createDiagnostic(
        "catalog-invalid-structure",
        "error",
        `Unsupported catalog version '${String(data.version)}' in ${baseName} (expected ${CATALOG_VERSION})`
      )
    );
  }

  const interfaces = parseArray(data, "interfaces", baseName, parseIdentity);
  if (!interfaces.ok) {
    diagnostics.push(
      ...interfaces.error.map((message) =>
        createDiagnostic("catalog-invalid-structure", "error", message)
      )
    );
  }

  const types: ParsedType[] = [];
  if (!Array.isArray(data.types)) {
    diagnostics.push(
      createDiagnostic(
        "catalog-invalid-structure",
        "error",
        `Missing or invalid 'types' field in ${baseName}`
      )
    );
  } else {
    data.types.forEach((item: unknown, index) => {
      const parsed = parseType(item, `${baseName}.types[${index}]`);
      if (parsed.ok) {
        types.push(parsed.value);
      } else {
        diagnostics.push(...parsed.error);
      }
    });
  }

  if (diagnostics.length > 0 || !interfaces.ok) {
    return { ok: false, error: diagnostics };
  }

  const declared = interfaces.value;

  return {
    ok: true,
    value: {
      entries: types.map(toEntry),
      lookupContract: (target: TypeIdentity) =>
        declared.find((identity) => sameIdentity(identity, target)),
    },
  };
};

/**
 * Load and validate a catalog.json file.
 */
export const loadCatalogFile = (
  filePath: string
): Result<TypeCatalog, readonly Diagnostic[]> => {
  if (!fs.existsSync(filePath)) {
    return {
      ok: false,
      error: [
        createDiagnostic(
          "catalog-not-found",
          "error",
          `Catalog file not found: ${filePath}`
        ),
      ],
    };
  }

  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    return {
      ok: false,
      error: [
        createDiagnostic(
          "catalog-read-failed",
          "error",
          `Failed to read catalog file: ${err instanceof Error ? err.message : String(err)}`
        ),
      ],
    };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    return {
      ok: false,
      error: [
        createDiagnostic(
          "catalog-invalid-json",
          "error",
          `Invalid JSON in catalog file: ${err instanceof Error ? err.message : String(err)}`
        ),
      ],
    };
  }

  return parseCatalog(parsed, filePath);
};
