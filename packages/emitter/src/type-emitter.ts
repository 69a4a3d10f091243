/**
 * Type emitter - TypeReference to TypeScript type syntax
 */

import {
  type TypeIdentity,
  type TypeReference,
  printTypeReference,
} from "@relaygen/frontend";

/**
 * Name a declaration through its module alias; globals stay bare
 */
export const emitQualifiedName = (
  identity: TypeIdentity,
  aliasOf: (module: string) => string | undefined
): string => {
  const alias = identity.module === "" ? undefined : aliasOf(identity.module);
  return alias ? `${alias}.${identity.name}` : identity.name;
};

/**
 * Emit a type reference as TypeScript type syntax, every named type
 * (including those inside opaque text) written through its module alias
 */
export const emitTypeReference = (
  ref: TypeReference,
  aliasOf: (module: string) => string | undefined
): string =>
  printTypeReference(ref, (identity) => emitQualifiedName(identity, aliasOf));
