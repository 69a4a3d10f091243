/**
 * Eligibility resolver
 *
 * Rejection is silent: reasons are returned for verbose listings but never
 * become diagnostics.
 */

import type {
  CatalogEntry,
  ConstructorDescriptor,
  TypeDescriptor,
} from "../catalog/types.js";
import { type Result, ok, error } from "../types/result.js";

export type Rejection =
  | "unresolved"
  | "abstract-or-static"
  | "inaccessible"
  | "unbound-generic"
  | "open-generic"
  | "no-usable-constructor";

const isContainerVisible = (accessibility: string): boolean =>
  accessibility === "public" || accessibility === "internal";

const isUsableConstructor = (ctor: ConstructorDescriptor): boolean =>
  !ctor.isStatic && isContainerVisible(ctor.accessibility);

/**
 * First rule a resolved type breaks, or undefined when it is eligible
 */
export const findRejection = (type: TypeDescriptor): Rejection | undefined => {
  if (type.isAbstract || type.isStatic) {
    return "abstract-or-static";
  }
  if (!isContainerVisible(type.accessibility)) {
    return "inaccessible";
  }
  if (
    type.isUnboundGeneric ||
    (type.arity > 0 && type.typeArguments.length === 0)
  ) {
    return "unbound-generic";
  }
  // Only direct type-parameter arguments count; bases closed by inheritance pass
  if (type.typeArguments.some((arg) => arg.kind === "typeParameter")) {
    return "open-generic";
  }
  if (!type.constructors.some(isUsableConstructor)) {
    return "no-usable-constructor";
  }
  return undefined;
};

/**
 * Resolve a candidate and apply the eligibility rules in order
 */
export const resolveEligibleType = (
  entry: CatalogEntry
): Result<TypeDescriptor, Rejection> => {
  const type = entry.resolve();
  if (!type) {
    return error("unresolved");
  }

  const rejection = findRejection(type);
  return rejection ? error(rejection) : ok(type);
};
