/**
 * In-memory catalogs for discovery tests
 */

import type {
  CatalogEntry,
  ContractInstantiation,
  TypeCatalog,
  TypeDescriptor,
  TypeIdentity,
  TypeReference,
} from "../catalog/types.js";
import { sameIdentity } from "../catalog/type-reference.js";

export const HANDLER_CONTRACT: TypeIdentity = {
  module: "@relaygen/contracts",
  name: "RequestHandler",
};

export const named = (
  name: string,
  module = "./src/requests.ts",
  typeArguments: readonly TypeReference[] = []
): TypeReference => ({ kind: "named", module, name, typeArguments });

export const STRING: TypeReference = { kind: "primitive", name: "string" };
export const NUMBER: TypeReference = { kind: "primitive", name: "number" };

export const handles = (
  ...typeArguments: readonly TypeReference[]
): ContractInstantiation => ({
  origin: HANDLER_CONTRACT,
  typeArguments,
  location: { file: "/project/src/handlers.ts", line: 1, column: 1, length: 1 },
});

/**
 * A public, concrete, constructible handler type unless overridden
 */
export const handlerType = (
  name: string,
  overrides: Partial<TypeDescriptor> = {}
): TypeDescriptor => ({
  module: "./src/handlers.ts",
  name,
  accessibility: "public",
  isAbstract: false,
  isStatic: false,
  arity: 0,
  isUnboundGeneric: false,
  typeArguments: [],
  baseList: [{ text: "RequestHandler" }],
  interfaces: [],
  constructors: [{ accessibility: "public", isStatic: false }],
  locations: [
    { file: "/project/src/handlers.ts", line: 1, column: 14, length: name.length },
  ],
  ...overrides,
});

export const entryFor = (
  type: TypeDescriptor | undefined,
  name = type?.name ?? "Unresolved"
): CatalogEntry => ({
  name,
  baseList: type?.baseList ?? [{ text: "RequestHandler" }],
  resolve: () => type,
});

export const catalogOf = (
  types: readonly TypeDescriptor[],
  contracts: readonly TypeIdentity[] = [HANDLER_CONTRACT]
): TypeCatalog => ({
  entries: types.map((type) => entryFor(type)),
  lookupContract: (target) =>
    contracts.find((identity) => sameIdentity(identity, target)),
});
