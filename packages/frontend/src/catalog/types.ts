/**
 * Type catalog model
 *
 * Everything the discovery pipeline knows about declared types. Catalog
 * providers (the TypeScript program walker, the JSON loader) produce these
 * values; the pipeline only reads them.
 */

import type { SourceLocation } from "../types/diagnostic.js";

export type Accessibility = "public" | "internal" | "protected" | "private";

export type PrimitiveTypeName =
  | "string"
  | "number"
  | "boolean"
  | "bigint"
  | "symbol"
  | "object"
  | "undefined"
  | "null"
  | "void"
  | "unknown"
  | "never"
  | "any";

/**
 * Where a declaration lives and what it is called there.
 *
 * `module` is "./relative/path.ts" for project files, a package name for
 * installed packages, and "" for globals.
 */
export type TypeIdentity = {
  readonly module: string;
  readonly name: string;
};

export type NamedTypeReference = TypeIdentity & {
  readonly kind: "named";
  readonly typeArguments: readonly TypeReference[];
};

export type TypeReference =
  | NamedTypeReference
  | { readonly kind: "typeParameter"; readonly name: string }
  | { readonly kind: "primitive"; readonly name: PrimitiveTypeName }
  | { readonly kind: "literal"; readonly value: string | number | boolean }
  | {
      readonly kind: "array";
      readonly elementType: TypeReference;
      readonly readonly: boolean;
    }
  | { readonly kind: "tuple"; readonly elements: readonly TypeReference[] }
  | { readonly kind: "union"; readonly types: readonly TypeReference[] }
  | { readonly kind: "intersection"; readonly types: readonly TypeReference[] }
  | { readonly kind: "opaque"; readonly parts: readonly OpaquePart[] };

/**
 * Piece of a type form with no structural counterpart (function types,
 * object literals, indexed access, `typeof`). Source text is kept as written,
 * whitespace-normalized; the types it names are kept as references so they
 * can be qualified.
 */
export type OpaquePart = string | TypeReference;

/**
 * One written entry of a heritage (base/interface) list
 */
export type BaseListEntry = {
  readonly text: string;
  readonly location?: SourceLocation;
};

/**
 * An implemented interface, with the type arguments it was closed over.
 * `location` points at the implementing type's own heritage entry through
 * which this instantiation was reached.
 */
export type ContractInstantiation = {
  readonly origin: TypeIdentity;
  readonly typeArguments: readonly TypeReference[];
  readonly location?: SourceLocation;
};

export type ConstructorDescriptor = {
  readonly accessibility: Accessibility;
  readonly isStatic: boolean;
};

export type TypeDescriptor = TypeIdentity & {
  readonly accessibility: Accessibility;
  readonly isAbstract: boolean;
  readonly isStatic: boolean;
  readonly arity: number;
  readonly isUnboundGeneric: boolean;
  readonly typeArguments: readonly TypeReference[];
  readonly baseList: readonly BaseListEntry[];
  readonly interfaces: readonly ContractInstantiation[];
  readonly constructors: readonly ConstructorDescriptor[];
  readonly locations: readonly SourceLocation[];
};

/**
 * Syntactic view of a declared type plus its deferred semantic resolution.
 * `resolve` returns undefined when the declaration has no resolvable symbol.
 */
export type CatalogEntry = {
  readonly name: string;
  readonly baseList: readonly BaseListEntry[];
  readonly resolve: () => TypeDescriptor | undefined;
};

export type TypeCatalog = {
  readonly entries: readonly CatalogEntry[];
  /**
   * Identity of the declared interface matching `target`, or undefined when the
   * catalog does not contain it.
   */
  readonly lookupContract: (target: TypeIdentity) => TypeIdentity | undefined;
};
